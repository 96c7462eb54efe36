export const getColorForRouteIndex = (index: number, routeCount: number) => {
  if (routeCount <= 0) return "rgba(0, 0, 0, 0.5)"
  return `hsl(${Math.round((index * 360) / routeCount) % 360}, 100%, 40%)`
}

export { visualizeBundleProblem } from "./visualizeBundleProblem"
