import type { Point } from "@tscircuit/math-utils"
import { BundleWaypointSolver } from "./BundleWaypointSolver"
import { strip } from "./crossSection"
import { BundleRoutingError } from "./errors"
import { solverLog } from "./logger"
import { bendCircular, straight, taper } from "./route-assembler/factories"
import { roundCorners as defaultRoundCorners } from "./route-assembler/roundCorners"
import type {
  BendFactory,
  ComponentGeometry,
  CrossSection,
  Port,
  RoundCorners,
  RouteGeometry,
  StraightFactory,
  TaperFactory,
} from "./types"

export interface GetBundleFromWaypointsOptions {
  ports1: Port[]
  ports2: Port[]
  waypoints: Point[]
  separation?: number
  sortPorts?: boolean
  crossSection?: CrossSection
  bendFactory?: BendFactory
  straightFactory?: StraightFactory
  // A fixed component is used as is, null disables widening
  taperFactory?: TaperFactory | ComponentGeometry | null
  roundCorners?: RoundCorners
}

const getTaper = (
  taperFactory: TaperFactory | ComponentGeometry | null,
  crossSection: CrossSection,
  startPort: Port,
): ComponentGeometry | undefined => {
  if (!taperFactory || !(crossSection.autoWiden ?? true)) return undefined
  if (typeof taperFactory !== "function") return taperFactory
  return taperFactory({
    length: crossSection.taperLength ?? 0,
    width1: startPort.width,
    width2: crossSection.widthWide,
    layer: startPort.layer,
  })
}

/**
 * Connects every port of `ports1` to its partner in `ports2` with a route
 * following `waypoints`. The routes run parallel to the nominal path
 * between the first port of each bundle and are assembled with one bend per
 * corner.
 *
 * Either every route is returned or an error is thrown.
 */
export const getBundleFromWaypoints = ({
  ports1,
  ports2,
  waypoints,
  separation,
  sortPorts = true,
  crossSection = strip,
  bendFactory = bendCircular,
  straightFactory = straight,
  taperFactory = taper,
  roundCorners = defaultRoundCorners,
}: GetBundleFromWaypointsOptions): RouteGeometry[] => {
  const solver = new BundleWaypointSolver({
    ports1,
    ports2,
    waypoints,
    separation,
    sortPorts,
  })
  solver.solve()

  if (solver.routingError) throw solver.routingError
  if (!solver.solved) {
    throw new BundleRoutingError(
      solver.error ?? "Bundle routing stopped before every port was routed",
    )
  }

  const bends = solver.ports1.map(() => bendFactory({ crossSection }))
  const widenTaper = getTaper(taperFactory, crossSection, solver.ports1[0])

  solverLog(
    "assembling %d routes%s",
    solver.routes.length,
    widenTaper ? ` with taper ${widenTaper.name}` : "",
  )

  return solver.routes.map((points, i) =>
    roundCorners({
      points,
      bend: bends[i],
      straightFactory,
      taper: widenTaper,
      crossSection,
    }),
  )
}
