import type { Point } from "@tscircuit/math-utils"
import { BUNDLE_ROUTING_CONFIG } from "../../bundle-routing.config"
import type { Segment, SegmentDirection } from "../types"

const EPS = BUNDLE_ROUTING_CONFIG.MANHATTAN_TOLERANCE

export const isVertical = ([p0, p1]: Segment, tol = EPS) =>
  Math.abs(p0.x - p1.x) < tol

export const isHorizontal = ([p0, p1]: Segment, tol = EPS) =>
  Math.abs(p0.y - p1.y) < tol

// Vertical is tested first, so a zero-length segment reads as vertical
export const getSegmentDirection = (s: Segment): SegmentDirection => {
  if (isVertical(s)) return "vertical"
  if (isHorizontal(s)) return "horizontal"
  return "invalid"
}

/**
 * Direction of travel along the segment's own axis: +1, -1, or 0 for a
 * non-Manhattan or zero-length segment.
 */
export const getSegmentSign = (s: Segment): number => {
  const [p0, p1] = s
  const direction = getSegmentDirection(s)
  if (direction === "vertical") return Math.sign(p1.y - p0.y)
  if (direction === "horizontal") return Math.sign(p1.x - p0.x)
  return 0
}

export const arePointsEqual = (a: Point, b: Point, tol = EPS) =>
  Math.abs(a.x - b.x) < tol && Math.abs(a.y - b.y) < tol

export const getSegmentLength = ([p0, p1]: Segment) =>
  Math.hypot(p1.x - p0.x, p1.y - p0.y)
