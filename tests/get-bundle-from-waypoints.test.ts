import { expect, test, vi } from "vitest"
import { crossSection } from "lib/crossSection"
import {
  BendFeasibilityError,
  InvalidBundleError,
  PortCountMismatchError,
  UnsupportedOrientationPairError,
} from "lib/errors"
import { getBundleFromWaypoints } from "lib/getBundleFromWaypoints"
import type { Port, RoundCorners, RouteGeometry } from "lib/types"

const port = (x: number, y: number, orientation: number): Port => ({
  position: { x, y },
  orientation,
  width: 0.5,
})

test("get-bundle-from-waypoints: two parallel ports end exactly at x = 50", () => {
  const routes = getBundleFromWaypoints({
    ports1: [port(0, 0, 0), port(0, 10, 0)],
    ports2: [port(50, 0, 180), port(50, 10, 180)],
    waypoints: [
      { x: 0, y: 0 },
      { x: 50, y: 0 },
    ],
  })

  expect(routes.map((r) => r.points)).toEqual([
    [
      { x: 0, y: 0 },
      { x: 50, y: 0 },
    ],
    [
      { x: 0, y: 10 },
      { x: 50, y: 10 },
    ],
  ])
  expect(routes.map((r) => r.length)).toEqual([50, 50])
  expect(routes[1].references.map((r) => r.component.name)).toEqual([
    "straight_l50_w0.5",
  ])
  expect(routes[1].ports.map((p) => p.position)).toEqual([
    { x: 0, y: 10 },
    { x: 50, y: 10 },
  ])
})

test("get-bundle-from-waypoints: hands every polyline to the route assembler", () => {
  const calls: Parameters<RoundCorners>[0][] = []
  const assemble = vi.fn(
    (params: Parameters<RoundCorners>[0]): RouteGeometry => {
      calls.push(params)
      return {
        points: params.points,
        references: [],
        ports: [port(0, 0, 180), port(0, 0, 0)],
        length: 0,
      }
    },
  )

  const routes = getBundleFromWaypoints({
    ports1: [port(0, 0, 0), port(0, 10, 0)],
    ports2: [port(50, 100, 270), port(60, 100, 270)],
    waypoints: [{ x: 50, y: 0 }],
    roundCorners: assemble,
  })

  expect(assemble).toHaveBeenCalledTimes(2)
  expect(routes).toHaveLength(2)
  expect(calls.map((c) => c.points)).toEqual([
    [
      { x: 0, y: 0 },
      { x: 60, y: 0 },
      { x: 60, y: 100 },
    ],
    [
      { x: 0, y: 10 },
      { x: 50, y: 10 },
      { x: 50, y: 100 },
    ],
  ])
  expect(calls[0].bend.name).toBe("bend_circular_r10")
  expect(calls[0].bend).not.toBe(calls[1].bend)
  // The default cross section does not widen
  expect(calls[0].taper).toBeUndefined()
})

test("get-bundle-from-waypoints: auto-widen builds one taper from the cross section", () => {
  const routes = getBundleFromWaypoints({
    ports1: [port(0, 0, 0)],
    ports2: [port(50, 0, 180)],
    waypoints: [],
    crossSection: crossSection({ autoWiden: true, widthWide: 2, taperLength: 10 }),
  })

  expect(routes[0].references.map((r) => r.component.name)).toEqual([
    "taper_l10_w0.5_w2",
    "straight_l30_w2",
    "taper_l10_w0.5_w2",
  ])
  expect(routes[0].length).toBe(50)
})

test("get-bundle-from-waypoints: a null taper factory turns widening off", () => {
  const routes = getBundleFromWaypoints({
    ports1: [port(0, 0, 0)],
    ports2: [port(50, 0, 180)],
    waypoints: [],
    crossSection: crossSection({ autoWiden: true }),
    taperFactory: null,
  })

  expect(routes[0].references.map((r) => r.component.name)).toEqual([
    "straight_l50_w0.5",
  ])
})

test("get-bundle-from-waypoints: bend feasibility errors reach the caller unchanged", () => {
  let error: unknown
  try {
    getBundleFromWaypoints({
      ports1: [port(0, 0, 0)],
      ports2: [port(5, 20, 270)],
      waypoints: [{ x: 5, y: 0 }],
    })
  } catch (e) {
    error = e
  }

  expect(error).toBeInstanceOf(BendFeasibilityError)
  if (!(error instanceof BendFeasibilityError)) return
  expect(error.segmentIndex).toBe(0)
  expect(error.requiredLength).toBe(10)
  expect(error.availableLength).toBe(5)
})

test("get-bundle-from-waypoints: bundle sizes must match", () => {
  let error: unknown
  try {
    getBundleFromWaypoints({
      ports1: [port(0, 0, 0), port(0, 10, 0)],
      ports2: [port(50, 0, 180)],
      waypoints: [],
    })
  } catch (e) {
    error = e
  }

  expect(error).toBeInstanceOf(PortCountMismatchError)
  if (!(error instanceof PortCountMismatchError)) return
  expect(error.count1).toBe(2)
  expect(error.count2).toBe(1)
})

test("get-bundle-from-waypoints: rejects invalid bundles", () => {
  expect(() =>
    getBundleFromWaypoints({ ports1: [], ports2: [], waypoints: [] }),
  ).toThrow(InvalidBundleError)

  expect(() =>
    getBundleFromWaypoints({
      ports1: [port(0, 0, 0), port(0, 10, 90)],
      ports2: [port(50, 0, 180), port(50, 10, 180)],
      waypoints: [],
    }),
  ).toThrow(InvalidBundleError)

  expect(() =>
    getBundleFromWaypoints({
      ports1: [{ ...port(0, 0, 0), width: 0 }],
      ports2: [port(50, 0, 180)],
      waypoints: [],
    }),
  ).toThrow(InvalidBundleError)
})

test("get-bundle-from-waypoints: non-cardinal orientations fail even without sorting", () => {
  expect(() =>
    getBundleFromWaypoints({
      ports1: [port(0, 0, 45)],
      ports2: [port(50, 0, 180)],
      waypoints: [],
      sortPorts: false,
    }),
  ).toThrow(UnsupportedOrientationPairError)
})

test("get-bundle-from-waypoints: caller ports are not modified", () => {
  const ports1 = [port(0, 10, 360), port(0, 0, 360)]
  const ports2 = [port(50, 10, -180), port(50, 0, -180)]

  getBundleFromWaypoints({ ports1, ports2, waypoints: [] })

  expect(ports1).toEqual([port(0, 10, 360), port(0, 0, 360)])
  expect(ports2).toEqual([port(50, 10, -180), port(50, 0, -180)])
})
