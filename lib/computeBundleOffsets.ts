import type { Point } from "@tscircuit/math-utils"
import { AmbiguousSeparationError } from "./errors"
import { getBundleOrientation } from "./sortBundles"
import type { BundleOffsets, Port } from "./types"

/**
 * Signed distance of each port from the reference point, measured across
 * the bundle: along y for ports facing 0/180, along x otherwise.
 */
export const getPortsXOrYDistances = (
  ports: Port[],
  referencePoint: Point,
): number[] => {
  if (ports.length === 0) return []
  const orientation = getBundleOrientation(ports)
  if (orientation === 0 || orientation === 180) {
    return ports.map((p) => p.position.y - referencePoint.y)
  }
  return ports.map((p) => p.position.x - referencePoint.x)
}

const getSeparatedOffsets = (
  startOffsets: number[],
  separation: number,
): number[] => {
  const n = startOffsets.length
  const firstIsZero = startOffsets[0] === 0
  const lastIsZero = startOffsets[n - 1] === 0

  if (n === 1 && firstIsZero) return [0]

  if (firstIsZero && lastIsZero) {
    throw new AmbiguousSeparationError(
      "Both outermost ports lie on the reference path, cannot tell which way the bundle fans out.",
      startOffsets,
    )
  }

  if (firstIsZero) {
    const sign = Math.sign(startOffsets[1])
    return startOffsets.map((_, i) => sign * separation * i)
  }

  if (lastIsZero) {
    const sign = Math.sign(startOffsets[n - 2])
    return startOffsets.map((_, i) => sign * separation * i).reverse()
  }

  throw new AmbiguousSeparationError(
    "Expected offset = 0 at either start or end of the bundle.",
    startOffsets,
  )
}

/**
 * Start offsets place each route on its port; mid offsets are used for
 * every segment after the first. With a separation the mid offsets become a
 * uniform pitch growing away from the port that sits on the reference path.
 *
 * Offsets of bundles facing 90/270 are negated to match the handedness used
 * by displaceSegment.
 */
export const computeBundleOffsets = ({
  ports,
  referencePoint,
  separation,
}: {
  ports: Port[]
  referencePoint: Point
  separation?: number
}): BundleOffsets => {
  let startOffsets = getPortsXOrYDistances(ports, referencePoint)
  let midOffsets = separation
    ? getSeparatedOffsets(startOffsets, separation)
    : startOffsets

  const orientation = getBundleOrientation(ports)
  if (orientation === 90 || orientation === 270) {
    startOffsets = startOffsets.map((d) => -d)
    midOffsets = midOffsets.map((d) => -d)
  }

  return { startOffsets, midOffsets }
}
