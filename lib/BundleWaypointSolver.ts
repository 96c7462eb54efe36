import { BaseSolver } from "@tscircuit/solver-utils"
import type { GraphicsObject } from "graphics-debug"
import type { Point } from "@tscircuit/math-utils"
import { computeBundleOffsets } from "./computeBundleOffsets"
import { BundleRoutingError } from "./errors"
import { buildRouteForPort } from "./generateManhattanBundleWaypoints"
import { solverLog } from "./logger"
import { getPathSegments, normalizeWaypoints } from "./normalizeWaypoints"
import { prepareBundles } from "./prepareBundles"
import { getBundleSortKeys, sortPortsByKey } from "./sortBundles"
import type {
  BundleOffsets,
  BundleRoutingProblem,
  Port,
  Segment,
} from "./types"
import { visualizeBundleProblem } from "./visualization-utils"

type SolverPhase = "prepare" | "sort" | "path" | "offsets" | "routes"

/**
 * Routes a bundle of ports through shared waypoints, one phase per step and
 * then one port per step.
 *
 * A routing error stops the solver with `failed` set and the typed error in
 * `routingError`; no partial set of routes is exposed.
 */
export class BundleWaypointSolver extends BaseSolver {
  ports1: Port[] = []
  ports2: Port[] = []
  path: Point[] = []
  segments: Segment[] = []
  offsets: BundleOffsets = { startOffsets: [], midOffsets: [] }
  routingError: BundleRoutingError | null = null

  private phase: SolverPhase | null = "prepare"
  private rawPath: Point[] = []
  private partialRoutes: Point[][] = []

  constructor(public problem: BundleRoutingProblem) {
    super()
  }

  override getConstructorParams() {
    return this.problem
  }

  get routes(): Point[][] {
    if (!this.solved) return []
    return this.partialRoutes.map((route) => route.map((p) => ({ ...p })))
  }

  private stepPhase(phase: SolverPhase): SolverPhase | null {
    switch (phase) {
      case "prepare": {
        const { ports1, ports2 } = prepareBundles(
          this.problem.ports1,
          this.problem.ports2,
        )
        this.ports1 = ports1
        this.ports2 = ports2
        // One step per port after the four setup phases
        this.MAX_ITERATIONS = Math.max(this.MAX_ITERATIONS, ports1.length + 10)
        // The path runs between the reference ports as given, before sorting
        this.rawPath = [
          ports1[0].position,
          ...this.problem.waypoints,
          ports2[0].position,
        ]
        return "sort"
      }
      case "sort": {
        const [startKey, endKey] = getBundleSortKeys(
          this.ports1[0].orientation,
          this.ports2[0].orientation,
        )
        if (this.problem.sortPorts ?? true) {
          this.ports1 = sortPortsByKey(this.ports1, startKey)
          this.ports2 = sortPortsByKey(this.ports2, endKey)
        }
        return "path"
      }
      case "path": {
        this.path = normalizeWaypoints(this.rawPath)
        this.segments = getPathSegments(this.path)
        return "offsets"
      }
      case "offsets": {
        this.offsets = computeBundleOffsets({
          ports: this.ports1,
          referencePoint: this.path[0],
          separation: this.problem.separation,
        })
        return "routes"
      }
      case "routes": {
        const i = this.partialRoutes.length
        const route = buildRouteForPort({
          segments: this.segments,
          portIndex: i,
          startPort: this.ports1[i],
          endPort: this.ports2[i],
          startOffset: this.offsets.startOffsets[i],
          midOffset: this.offsets.midOffsets[i],
        })
        this.partialRoutes.push(route)
        solverLog("routed port %d with %d points", i, route.length)
        return this.partialRoutes.length < this.ports1.length ? "routes" : null
      }
    }
  }

  override _step() {
    if (!this.phase) {
      this.solved = true
      return
    }

    let nextPhase: SolverPhase | null
    try {
      nextPhase = this.stepPhase(this.phase)
    } catch (e) {
      if (!(e instanceof BundleRoutingError)) throw e
      solverLog("%s failed: %s", this.phase, e.message)
      this.routingError = e
      this.error = e.message
      this.failed = true
      return
    }

    if (nextPhase !== this.phase) {
      solverLog("phase %s -> %s", this.phase, nextPhase ?? "done")
    }
    this.phase = nextPhase
    this.stats = {
      phase: this.phase ?? "done",
      segments: this.segments.length,
      routedPorts: this.partialRoutes.length,
    }

    if (!this.phase) {
      this.solved = true
    }
  }

  getPhase(): string | null {
    return this.phase
  }

  override visualize(): GraphicsObject {
    return visualizeBundleProblem(this.problem, this.partialRoutes)
  }
}
