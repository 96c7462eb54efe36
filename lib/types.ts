import type { Point } from "@tscircuit/math-utils"

// Point: { x: number, y: number }

export type Orientation = 0 | 90 | 180 | 270

export interface Port {
  name?: string
  position: Point
  // Degrees, pointing away from the device the port belongs to
  orientation: number
  width: number
  layer?: [number, number]
}

export type Segment = [Point, Point]

export type SegmentDirection = "horizontal" | "vertical" | "invalid"

export type SortKey = "X" | "Y" | "-X" | "-Y"

export interface BundleOffsets {
  startOffsets: number[]
  midOffsets: number[]
}

export interface BundleRoutingProblem {
  ports1: Port[]
  ports2: Port[]

  // Interior waypoints, the reference ports are added to both ends
  waypoints: Point[]

  // Uniform pitch of the routes between the first and last segment
  separation?: number

  sortPorts?: boolean
}

export interface CrossSection {
  width: number
  layer?: [number, number]
  radius?: number
  autoWiden?: boolean
  widthWide?: number
  taperLength?: number
}

/**
 * Black-box shape with named attachment points. The router only reads the
 * fields it needs to lay components along a route.
 */
export interface ComponentGeometry {
  name: string
  ports: Record<string, Port>
  length?: number
  radius?: number
  width?: number
}

export interface PlacedComponent {
  component: ComponentGeometry
  origin: Point
  rotation: number
  mirror: boolean
}

export interface RouteGeometry {
  points: Point[]
  references: PlacedComponent[]
  ports: [Port, Port]
  length: number
}

export type BendFactory = (params: {
  radius?: number
  crossSection: CrossSection
}) => ComponentGeometry

export type StraightFactory = (params: {
  length: number
  crossSection: CrossSection
  width?: number
}) => ComponentGeometry

export type TaperFactory = (params: {
  length: number
  width1: number
  width2?: number
  layer?: [number, number]
}) => ComponentGeometry

export type RoundCorners = (params: {
  points: Point[]
  bend: ComponentGeometry
  straightFactory: StraightFactory
  taper?: ComponentGeometry
  crossSection: CrossSection
}) => RouteGeometry
