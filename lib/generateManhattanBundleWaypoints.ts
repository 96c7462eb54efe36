import type { Point } from "@tscircuit/math-utils"
import { computeBundleOffsets } from "./computeBundleOffsets"
import { displaceSegment, intersectSegments } from "./displaceSegment"
import { PortCountMismatchError } from "./errors"
import { getPathSegments, normalizeWaypoints } from "./normalizeWaypoints"
import { snapRouteToEndPort } from "./snapRouteToEndPoint"
import type { Port, Segment } from "./types"

/**
 * Walks the shared path segments, shifting each one by this port's offset
 * and intersecting it with the previous shifted segment to recover the
 * corners of the port's own route.
 */
export const buildRouteForPort = ({
  segments,
  portIndex,
  startPort,
  endPort,
  startOffset,
  midOffset,
}: {
  segments: Segment[]
  portIndex: number
  startPort: Port
  endPort: Port
  startOffset: number
  midOffset: number
}): Point[] => {
  let route: Point[] = []
  let prevOffset = startOffset

  for (let j = 0; j < segments.length; j++) {
    const offset = j === 0 ? startOffset : midOffset
    const displaced = displaceSegment(segments[j], offset)

    if (j === 0) {
      route.push(displaced[0])
    } else {
      const prevDisplaced = displaceSegment(segments[j - 1], prevOffset)
      route.push(intersectSegments(displaced, prevDisplaced, portIndex))
    }

    if (j === segments.length - 1) {
      route.push({ ...endPort.position })
      route = snapRouteToEndPort(route, endPort)
    }
    prevOffset = offset
  }

  route[0] = { ...startPort.position }
  return route
}

/**
 * One Manhattan polyline per port pair, fanned out in parallel around the
 * path given by `waypoints`.
 *
 * `waypoints` runs from a point of the first bundle to a point of the second
 * bundle, usually the positions of the two reference ports. Ports must
 * already be paired by index (see sortBundles).
 */
export const generateManhattanBundleWaypoints = ({
  ports1,
  ports2,
  waypoints,
  separation,
}: {
  ports1: Port[]
  ports2: Port[]
  waypoints: Point[]
  separation?: number
}): Point[][] => {
  if (ports1.length !== ports2.length) {
    throw new PortCountMismatchError(ports1.length, ports2.length)
  }

  const path = normalizeWaypoints(waypoints)
  const segments = getPathSegments(path)
  const { startOffsets, midOffsets } = computeBundleOffsets({
    ports: ports1,
    referencePoint: path[0],
    separation,
  })

  return ports1.map((startPort, i) =>
    buildRouteForPort({
      segments,
      portIndex: i,
      startPort,
      endPort: ports2[i],
      startOffset: startOffsets[i],
      midOffset: midOffsets[i],
    }),
  )
}
