import { expect, test } from "vitest"
import { BundleWaypointSolver } from "lib/BundleWaypointSolver"
import { InvalidPathError } from "lib/errors"
import type { BundleRoutingProblem, Port } from "lib/types"

const port = (x: number, y: number, orientation: number): Port => ({
  position: { x, y },
  orientation,
  width: 0.5,
})

const straightProblem: BundleRoutingProblem = {
  ports1: [port(0, 10, 0), port(0, 0, 0)],
  ports2: [port(50, 10, 180), port(50, 0, 180)],
  waypoints: [],
}

test("bundle-waypoint-solver: runs one phase, then one port, per step", () => {
  const solver = new BundleWaypointSolver(straightProblem)

  const phases: (string | null)[] = []
  for (let i = 0; i < 6; i++) {
    solver._step()
    phases.push(solver.getPhase())
  }

  expect(phases).toEqual(["sort", "path", "offsets", "routes", "routes", null])
  expect(solver.solved).toBe(true)
  expect(solver.stats).toEqual({ phase: "done", segments: 1, routedPorts: 2 })
})

test("bundle-waypoint-solver: routes stay hidden until every port is routed", () => {
  const solver = new BundleWaypointSolver(straightProblem)
  for (let i = 0; i < 5; i++) solver._step()

  expect(solver.solved).toBe(false)
  expect(solver.routes).toEqual([])
})

test("bundle-waypoint-solver: sorts ports before pairing them", () => {
  const solver = new BundleWaypointSolver(straightProblem)
  solver.solve()

  expect(solver.ports1.map((p) => p.position.y)).toEqual([0, 10])
  expect(solver.path).toEqual([
    { x: 0, y: 10 },
    { x: 50, y: 10 },
  ])
  expect(solver.offsets.startOffsets).toEqual([-10, 0])
  expect(solver.routes).toEqual([
    [
      { x: 0, y: 0 },
      { x: 50, y: 0 },
    ],
    [
      { x: 0, y: 10 },
      { x: 50, y: 10 },
    ],
  ])
})

test("bundle-waypoint-solver: sortPorts false pairs ports in the given order", () => {
  const solver = new BundleWaypointSolver({
    ...straightProblem,
    sortPorts: false,
  })
  solver.solve()

  expect(solver.routes).toEqual([
    [
      { x: 0, y: 10 },
      { x: 50, y: 10 },
    ],
    [
      { x: 0, y: 0 },
      { x: 50, y: 0 },
    ],
  ])
})

test("bundle-waypoint-solver: works on copies of the caller's ports", () => {
  const ports1 = [port(0, 0, -360), port(0, 10, 360)]
  const solver = new BundleWaypointSolver({
    ports1,
    ports2: [port(50, 0, 540), port(50, 10, -180)],
    waypoints: [],
  })
  solver.solve()

  expect(solver.solved).toBe(true)
  expect(solver.ports1.map((p) => p.orientation)).toEqual([0, 0])
  expect(solver.ports2.map((p) => p.orientation)).toEqual([180, 180])
  expect(ports1.map((p) => p.orientation)).toEqual([-360, 360])
})

test("bundle-waypoint-solver: a diagonal path fails the whole bundle", () => {
  const solver = new BundleWaypointSolver({
    ports1: [port(0, 0, 0), port(0, 5, 0)],
    ports2: [port(50, 10, 180), port(50, 15, 180)],
    waypoints: [],
  })
  solver.solve()

  expect(solver.failed).toBe(true)
  expect(solver.solved).toBe(false)
  expect(solver.routingError).toBeInstanceOf(InvalidPathError)
  expect(solver.error).toBe(
    "Waypoint segments must be horizontal or vertical (segment 0: (0, 0) -> (50, 10))",
  )
  expect(solver.routes).toEqual([])
})

test("bundle-waypoint-solver: visualizes the nominal path, ports and routes", () => {
  const solver = new BundleWaypointSolver(straightProblem)
  solver.solve()

  const graphics = solver.visualize()
  expect(graphics.title).toBe("Bundle From Waypoints")
  expect(graphics.points?.length).toBe(4)
  expect(graphics.lines?.length).toBe(3)
  expect(graphics.lines?.[0].points).toEqual([
    { x: 0, y: 10 },
    { x: 50, y: 10 },
  ])
})

test("bundle-waypoint-solver: changing the returned routes leaves the solver untouched", () => {
  const solver = new BundleWaypointSolver(straightProblem)
  solver.solve()

  const routes = solver.routes
  routes[0][0].x = 999
  routes[0].push({ x: 1, y: 1 })
  routes.pop()

  expect(solver.routes[0]).toEqual([
    { x: 0, y: 0 },
    { x: 50, y: 0 },
  ])
  expect(solver.visualize().lines?.map((l) => l.points)).toEqual([
    [
      { x: 0, y: 10 },
      { x: 50, y: 10 },
    ],
    [
      { x: 0, y: 0 },
      { x: 50, y: 0 },
    ],
    [
      { x: 0, y: 10 },
      { x: 50, y: 10 },
    ],
  ])
})

test("bundle-waypoint-solver: the iteration limit grows with the bundle", () => {
  const solver = new BundleWaypointSolver(straightProblem)
  solver.MAX_ITERATIONS = 3
  solver.solve()

  expect(solver.solved).toBe(true)
  expect(solver.MAX_ITERATIONS).toBe(12)
  expect(solver.routes).toHaveLength(2)
})
