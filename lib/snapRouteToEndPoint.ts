import type { Point } from "@tscircuit/math-utils"
import { InvalidPathError } from "./errors"
import { normalizeOrientation } from "./sortBundles"
import type { Port } from "./types"

const assertSnappable = (route: Point[]) => {
  if (route.length < 2) {
    throw new InvalidPathError(
      `Route needs at least 2 points to snap onto its end port, got ${route.length}`,
    )
  }
}

export const snapRouteToEndPointX = (route: Point[], x: number): Point[] => {
  assertSnappable(route)
  const [p1, p2] = route.slice(-2)
  return [...route.slice(0, -2), { x, y: p1.y }, { x, y: p2.y }]
}

export const snapRouteToEndPointY = (route: Point[], y: number): Point[] => {
  assertSnappable(route)
  const [p1, p2] = route.slice(-2)
  return [...route.slice(0, -2), { x: p1.x, y }, { x: p2.x, y }]
}

/**
 * Aligns the final approach segment with the axis of the end port
 */
export const snapRouteToEndPort = (route: Point[], endPort: Port): Point[] => {
  const orientation = normalizeOrientation(endPort.orientation)
  if (orientation === 0 || orientation === 180) {
    return snapRouteToEndPointY(route, endPort.position.y)
  }
  return snapRouteToEndPointX(route, endPort.position.x)
}
