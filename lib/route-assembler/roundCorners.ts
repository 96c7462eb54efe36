import type { Point } from "@tscircuit/math-utils"
import { BUNDLE_ROUTING_CONFIG } from "../../bundle-routing.config"
import { BendFeasibilityError, InvalidPathError } from "../errors"
import { getSegmentDirection, getSegmentLength, getSegmentSign } from "../geometry"
import { assemblerLog } from "../logger"
import { getPathSegments } from "../normalizeWaypoints"
import type { PlacedComponent, RoundCorners, Segment } from "../types"

const EPS = BUNDLE_ROUTING_CONFIG.MANHATTAN_TOLERANCE

// Heading in degrees of travel along a Manhattan segment
const getSegmentAngle = (s: Segment): number => {
  const sign = getSegmentSign(s)
  if (getSegmentDirection(s) === "horizontal") return sign < 0 ? 180 : 0
  return sign < 0 ? 270 : 90
}

const moveAlong = (p: Point, angle: number, distance: number): Point => {
  const rad = (angle * Math.PI) / 180
  return {
    x: p.x + Math.round(Math.cos(rad)) * distance,
    y: p.y + Math.round(Math.sin(rad)) * distance,
  }
}

/**
 * Reference route assembler. Places one bend at every corner of the
 * polyline and fills the remaining straight stretches, widening long
 * stretches with a pair of tapers when a taper is given.
 *
 * Throws BendFeasibilityError when a stretch is shorter than the bends at
 * its ends need.
 */
export const roundCorners: RoundCorners = ({
  points,
  bend,
  straightFactory,
  taper,
  crossSection,
}) => {
  if (points.length < 2) {
    throw new InvalidPathError(
      `Route needs at least 2 points, got ${points.length}`,
    )
  }

  const segments = getPathSegments(points)
  segments.forEach((s, i) => {
    if (getSegmentDirection(s) === "invalid") {
      throw new InvalidPathError("Route segments must be manhattan", s, i)
    }
  })

  const bendSize = bend.radius ?? crossSection.radius ?? 0
  const bendLength = bend.length ?? (Math.PI * bendSize) / 2
  const references: PlacedComponent[] = []
  let length = 0

  segments.forEach((segment, i) => {
    const angle = getSegmentAngle(segment)
    const isFirst = i === 0
    const isLast = i === segments.length - 1
    const bentEnds = (isFirst ? 0 : 1) + (isLast ? 0 : 1)
    const segmentLength = getSegmentLength(segment)
    const requiredLength = bentEnds * bendSize
    const straightLength = segmentLength - requiredLength

    if (straightLength < -EPS) {
      assemblerLog(
        "segment %d too short: needs %d, has %d",
        i,
        requiredLength,
        segmentLength,
      )
      throw new BendFeasibilityError(i, requiredLength, segmentLength)
    }

    if (!isFirst) {
      const incomingAngle = getSegmentAngle(segments[i - 1])
      references.push({
        component: bend,
        origin: moveAlong(segment[0], incomingAngle + 180, bendSize),
        rotation: incomingAngle,
        // The bend turns left, right turns use its mirror image
        mirror: (angle - incomingAngle + 360) % 360 === 270,
      })
      length += bendLength
    }

    let cursor = isFirst ? segment[0] : moveAlong(segment[0], angle, bendSize)
    const taperLength = taper?.length ?? 0

    if (taper && straightLength > 2 * taperLength) {
      const wideLength = straightLength - 2 * taperLength
      references.push({
        component: taper,
        origin: cursor,
        rotation: angle,
        mirror: false,
      })
      cursor = moveAlong(cursor, angle, taperLength)
      references.push({
        component: straightFactory({
          length: wideLength,
          crossSection,
          width: taper.width,
        }),
        origin: cursor,
        rotation: angle,
        mirror: false,
      })
      cursor = moveAlong(cursor, angle, wideLength + taperLength)
      references.push({
        component: taper,
        origin: cursor,
        rotation: (angle + 180) % 360,
        mirror: false,
      })
      length += straightLength
    } else if (straightLength > EPS) {
      references.push({
        component: straightFactory({ length: straightLength, crossSection }),
        origin: cursor,
        rotation: angle,
        mirror: false,
      })
      length += straightLength
    }
  })

  const firstAngle = getSegmentAngle(segments[0])
  const lastAngle = getSegmentAngle(segments[segments.length - 1])

  return {
    points: points.map((p) => ({ x: p.x, y: p.y })),
    references,
    ports: [
      {
        name: "o1",
        position: { ...points[0] },
        orientation: (firstAngle + 180) % 360,
        width: crossSection.width,
        layer: crossSection.layer,
      },
      {
        name: "o2",
        position: { ...points[points.length - 1] },
        orientation: lastAngle,
        width: crossSection.width,
        layer: crossSection.layer,
      },
    ],
    length,
  }
}
