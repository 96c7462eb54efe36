import type { Point } from "@tscircuit/math-utils"
import type { GraphicsObject } from "graphics-debug"
import type { BundleRoutingProblem } from "../types"
import { getColorForRouteIndex } from "./index"

export const visualizeBundleProblem = (
  problem: BundleRoutingProblem,
  routes: Point[][] = [],
): GraphicsObject => {
  const graphics = {
    arrows: [],
    circles: [],
    lines: [],
    rects: [],
    coordinateSystem: "cartesian",
    points: [],
    texts: [],
    title: "Bundle From Waypoints",
  } as Required<GraphicsObject>

  const { ports1, ports2, waypoints } = problem

  // Nominal path through the reference ports
  if (ports1.length > 0 && ports2.length > 0) {
    graphics.lines.push({
      points: [ports1[0].position, ...waypoints, ports2[0].position],
      strokeColor: "rgba(0, 0, 0, 0.2)",
    })
  }

  ports1.forEach((port, i) => {
    graphics.points.push({
      ...port.position,
      label: `a${i} ${port.name ?? ""} (${port.orientation}°)`,
      color: "blue",
    })
  })
  ports2.forEach((port, i) => {
    graphics.points.push({
      ...port.position,
      label: `b${i} ${port.name ?? ""} (${port.orientation}°)`,
      color: "red",
    })
  })

  routes.forEach((points, i) => {
    graphics.lines.push({
      points,
      strokeColor: getColorForRouteIndex(i, routes.length),
    })
  })

  return graphics
}
