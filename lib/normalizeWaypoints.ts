import type { Point } from "@tscircuit/math-utils"
import { InvalidPathError } from "./errors"
import {
  arePointsEqual,
  getSegmentDirection,
  getSegmentSign,
} from "./geometry"
import type { Segment } from "./types"

const getHeading = (s: Segment) =>
  `${getSegmentDirection(s)}:${getSegmentSign(s)}`

/**
 * Removes repeated points and collapses runs of collinear points travelling
 * in the same direction, so that every remaining pair of consecutive points
 * is a genuine horizontal or vertical segment.
 *
 * A path that doubles back on itself keeps its turning point; such a path
 * cannot be fanned out and fails later when corners are intersected.
 */
export const normalizeWaypoints = (waypoints: Point[]): Point[] => {
  if (waypoints.length < 2) {
    throw new InvalidPathError(
      `Waypoint path needs at least 2 points, got ${waypoints.length}`,
    )
  }

  const distinct: Point[] = []
  for (const p of waypoints) {
    const last = distinct[distinct.length - 1]
    if (last && arePointsEqual(last, p)) continue
    distinct.push({ x: p.x, y: p.y })
  }

  if (distinct.length < 2) {
    throw new InvalidPathError(
      "Waypoint path collapses to a single point after removing duplicates",
    )
  }

  for (let i = 0; i < distinct.length - 1; i++) {
    const segment: Segment = [distinct[i], distinct[i + 1]]
    if (getSegmentDirection(segment) === "invalid") {
      throw new InvalidPathError(
        "Waypoint segments must be horizontal or vertical",
        segment,
        i,
      )
    }
  }

  const normalized: Point[] = [distinct[0]]
  for (let i = 1; i < distinct.length - 1; i++) {
    const prev = normalized[normalized.length - 1]
    const current = distinct[i]
    const next = distinct[i + 1]
    if (getHeading([prev, current]) === getHeading([current, next])) continue
    normalized.push(current)
  }
  normalized.push(distinct[distinct.length - 1])

  return normalized
}

export const getPathSegments = (points: Point[]): Segment[] => {
  const segments: Segment[] = []
  for (let i = 0; i < points.length - 1; i++) {
    segments.push([points[i], points[i + 1]])
  }
  return segments
}
