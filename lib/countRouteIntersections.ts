import type { Point } from "@tscircuit/math-utils"
import { segmentToSegmentMinDistance } from "@tscircuit/math-utils"
import { BUNDLE_ROUTING_CONFIG } from "../bundle-routing.config"

/**
 * Number of segment pairs, taken from two different routes, that touch or
 * cross. A correctly fanned-out bundle has none.
 */
export const countRouteIntersections = (
  routes: Point[][],
  tolerance = BUNDLE_ROUTING_CONFIG.INTERSECTION_TOLERANCE,
): number => {
  const allSegments: { segment: [Point, Point]; routeIndex: number }[] = []
  routes.forEach((points, routeIndex) => {
    for (let i = 0; i < points.length - 1; i++) {
      allSegments.push({ segment: [points[i], points[i + 1]], routeIndex })
    }
  })

  let intersectionCount = 0
  for (let i = 0; i < allSegments.length; i++) {
    const seg1 = allSegments[i]
    for (let j = i + 1; j < allSegments.length; j++) {
      const seg2 = allSegments[j]
      if (seg1.routeIndex === seg2.routeIndex) continue

      const dist = segmentToSegmentMinDistance(
        seg1.segment[0],
        seg1.segment[1],
        seg2.segment[0],
        seg2.segment[1],
      )
      if (dist < tolerance) intersectionCount++
    }
  }

  return intersectionCount
}
