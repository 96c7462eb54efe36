import type { Point } from "@tscircuit/math-utils"
import { InvalidPathError, NonManhattanIntersectionError } from "./errors"
import { getSegmentDirection, getSegmentSign } from "./geometry"
import type { Segment } from "./types"

/**
 * Copy of the segment shifted sideways by `offset`, scaled by the segment's
 * direction of travel.
 *
 * Horizontal segments move by +offset in y, vertical segments by -offset in
 * x. This handedness decides which side of the nominal path a bundle fans
 * towards and pairs with the sign flip in computeBundleOffsets; changing
 * either one alone makes neighbouring routes cross.
 */
export const displaceSegment = (segment: Segment, offset: number): Segment => {
  const sign = getSegmentSign(segment)
  const direction = getSegmentDirection(segment)

  let dx = 0
  let dy = 0
  if (direction === "horizontal") {
    dy = sign * offset
  } else if (direction === "vertical") {
    dx = -sign * offset
  } else {
    throw new InvalidPathError("Segment should be manhattan", segment)
  }

  return [
    { x: segment[0].x + dx, y: segment[0].y + dy },
    { x: segment[1].x + dx, y: segment[1].y + dy },
  ]
}

/**
 * Corner shared by a horizontal and a vertical segment: x comes from the
 * vertical one, y from the horizontal one.
 */
export const intersectSegments = (
  s1: Segment,
  s2: Segment,
  portIndex?: number,
): Point => {
  const d1 = getSegmentDirection(s1)
  const d2 = getSegmentDirection(s2)

  if (d1 === "horizontal" && d2 === "vertical") {
    return { x: s2[0].x, y: s1[0].y }
  }
  if (d1 === "vertical" && d2 === "horizontal") {
    return { x: s1[0].x, y: s2[0].y }
  }

  throw new NonManhattanIntersectionError(s1, s2, portIndex)
}
