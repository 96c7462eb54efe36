export * from "./types"
export * from "./errors"
export { normalizeWaypoints, getPathSegments } from "./normalizeWaypoints"
export {
  SORT_KEYS_BY_ORIENTATION_PAIR,
  getBundleOrientation,
  getBundleSortKeys,
  normalizeOrientation,
  sortBundles,
  sortPortsByKey,
} from "./sortBundles"
export {
  computeBundleOffsets,
  getPortsXOrYDistances,
} from "./computeBundleOffsets"
export { displaceSegment, intersectSegments } from "./displaceSegment"
export {
  snapRouteToEndPointX,
  snapRouteToEndPointY,
  snapRouteToEndPort,
} from "./snapRouteToEndPoint"
export {
  buildRouteForPort,
  generateManhattanBundleWaypoints,
} from "./generateManhattanBundleWaypoints"
export { prepareBundles } from "./prepareBundles"
export { BundleWaypointSolver } from "./BundleWaypointSolver"
export {
  getBundleFromWaypoints,
  type GetBundleFromWaypointsOptions,
} from "./getBundleFromWaypoints"
export { roundCorners } from "./route-assembler/roundCorners"
export { bendCircular, straight, taper } from "./route-assembler/factories"
export { crossSection, strip } from "./crossSection"
export { countRouteIntersections } from "./countRouteIntersections"
export { generateRandomBundleProblem } from "./problem-generator"
export { visualizeBundleProblem } from "./visualization-utils"
