import type { Point } from "@tscircuit/math-utils"
import type { BundleRoutingProblem, Port } from "../types"
import { createRng, randomInt, shuffleInPlace } from "./createRng"

export type BundleShape = "s-bend" | "l-bend"

/**
 * Random routable bundle problem on an integer grid. Ports are generated so
 * that ports1[i] and ports2[i] are partners; with `shuffle` both bundles are
 * permuted the same way, which also moves the reference ports into the
 * middle of the bundle.
 *
 * - "s-bend": ports1 face east at x = 0, ports2 face west on the right, the
 *   path jogs vertically at a random x.
 * - "l-bend": ports1 face east at x = 0, ports2 face south along the top,
 *   the path turns once.
 */
export const generateRandomBundleProblem = (opts: {
  randomSeed: number
  numPortPairs: number
  shape?: BundleShape
  pitch?: number
  separation?: number
  shuffle?: boolean
  portWidth?: number
}): BundleRoutingProblem => {
  if (opts.numPortPairs < 1) {
    throw new Error(`numPortPairs must be at least 1, got ${opts.numPortPairs}`)
  }
  if (opts.shuffle && opts.separation) {
    throw new Error(
      "Shuffled bundles have their reference port inside the bundle and cannot use a separation",
    )
  }

  const rng = createRng(opts.randomSeed)
  const n = opts.numPortPairs
  const shape = opts.shape ?? (rng() < 0.5 ? "s-bend" : "l-bend")
  const pitch = opts.pitch ?? randomInt(rng, 2, 10)
  const spread = Math.max(n * pitch, n * (opts.separation ?? 0))
  const width = opts.portWidth ?? 0.5

  const makePort = (
    name: string,
    position: Point,
    orientation: number,
  ): Port => ({ name, position, orientation, width })

  let ports1: Port[] = []
  let ports2: Port[] = []
  let jogX: number | null = null

  const a0 = randomInt(rng, 0, 50)
  for (let k = 0; k < n; k++) {
    ports1.push(makePort(`a${k}`, { x: 0, y: a0 + k * pitch }, 0))
  }

  if (shape === "s-bend") {
    const direction = rng() < 0.5 ? -1 : 1
    const b0 = a0 + direction * (spread + randomInt(rng, 10, 60))
    const W = 2 * spread + randomInt(rng, 40, 140)
    const xm = randomInt(rng, spread + 20, W - spread - 20)
    for (let k = 0; k < n; k++) {
      ports2.push(makePort(`b${k}`, { x: W, y: b0 + k * pitch }, 180))
    }
    jogX = xm
  } else {
    const H = a0 + spread + randomInt(rng, 20, 70)
    const b0 = spread + randomInt(rng, 20, 70)
    for (let k = 0; k < n; k++) {
      ports2.push(
        makePort(`b${k}`, { x: b0 + (n - 1 - k) * pitch, y: H }, 270),
      )
    }
  }

  if (opts.shuffle) {
    const order = shuffleInPlace(
      rng,
      ports1.map((_, i) => i),
    )
    const unshuffled1 = ports1
    const unshuffled2 = ports2
    ports1 = order.map((i) => unshuffled1[i])
    ports2 = order.map((i) => unshuffled2[i])
  }

  // Interior waypoints run between the reference ports chosen above
  const start = ports1[0].position
  const end = ports2[0].position
  const waypoints: Point[] =
    jogX === null
      ? [{ x: end.x, y: start.y }]
      : [
          { x: jogX, y: start.y },
          { x: jogX, y: end.y },
        ]

  return {
    ports1,
    ports2,
    waypoints,
    separation: opts.separation,
  }
}
