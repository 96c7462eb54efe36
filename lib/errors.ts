import type { Point } from "@tscircuit/math-utils"
import type { Segment } from "./types"

const formatPoint = (p: Point) => `(${p.x}, ${p.y})`

export const formatSegment = (s: Segment) =>
  `${formatPoint(s[0])} -> ${formatPoint(s[1])}`

export class BundleRoutingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = new.target.name
  }
}

export class PortCountMismatchError extends BundleRoutingError {
  constructor(
    public count1: number,
    public count2: number,
  ) {
    super(
      `Number of start ports should match number of end ports, got ${count1} and ${count2}`,
    )
  }
}

export class InvalidBundleError extends BundleRoutingError {
  constructor(
    message: string,
    public bundle: "ports1" | "ports2",
    public portIndex?: number,
  ) {
    super(`${bundle}: ${message}`)
  }
}

export class InvalidPathError extends BundleRoutingError {
  constructor(
    message: string,
    public segment?: Segment,
    public segmentIndex?: number,
  ) {
    super(
      segment
        ? `${message} (segment ${segmentIndex}: ${formatSegment(segment)})`
        : message,
    )
  }
}

export class UnsupportedOrientationPairError extends BundleRoutingError {
  constructor(
    public startAngle: number,
    public endAngle: number,
  ) {
    super(
      `No port sort order for start orientation ${startAngle} and end orientation ${endAngle}`,
    )
  }
}

export class AmbiguousSeparationError extends BundleRoutingError {
  constructor(
    message: string,
    public startOffsets: number[],
  ) {
    super(`${message} Got start offsets [${startOffsets.join(", ")}]`)
  }
}

export class NonManhattanIntersectionError extends BundleRoutingError {
  constructor(
    public segment1: Segment,
    public segment2: Segment,
    public portIndex?: number,
  ) {
    super(
      `Segments should be horizontal/vertical or vertical/horizontal, got ${formatSegment(segment1)} and ${formatSegment(segment2)}` +
        (portIndex === undefined ? "" : ` for port ${portIndex}`),
    )
  }
}

export class BendFeasibilityError extends BundleRoutingError {
  constructor(
    public segmentIndex: number,
    public requiredLength: number,
    public availableLength: number,
  ) {
    super(
      `Route segment ${segmentIndex} is too short for its bends: needs ${requiredLength}, has ${availableLength}`,
    )
  }
}
