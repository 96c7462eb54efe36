import { InvalidBundleError, UnsupportedOrientationPairError } from "./errors"
import type { Port, SortKey } from "./types"

/**
 * Which edge of each bundle comes first for every pair of start/end
 * orientations. Port i of the first bundle, sorted by the first key, connects
 * to port i of the second bundle, sorted by the second key.
 */
export const SORT_KEYS_BY_ORIENTATION_PAIR: Record<string, [SortKey, SortKey]> =
  {
    "0,180": ["Y", "Y"],
    "0,90": ["Y", "X"],
    "0,0": ["Y", "-Y"],
    "0,270": ["Y", "-X"],
    "90,0": ["X", "Y"],
    "90,90": ["X", "-X"],
    "90,180": ["X", "-Y"],
    "90,270": ["X", "X"],
    "180,90": ["Y", "-X"],
    "180,0": ["Y", "Y"],
    "180,270": ["Y", "X"],
    "180,180": ["Y", "-Y"],
    "270,90": ["X", "X"],
    "270,270": ["X", "-X"],
    "270,0": ["X", "-Y"],
    "270,180": ["X", "Y"],
  }

const SORT_KEY_FNS: Record<SortKey, (p: Port) => number> = {
  X: (p) => p.position.x,
  Y: (p) => p.position.y,
  "-X": (p) => -p.position.x,
  "-Y": (p) => -p.position.y,
}

export const normalizeOrientation = (angle: number) =>
  ((Math.trunc(angle) % 360) + 360) % 360

export const getBundleSortKeys = (
  startAngle: number,
  endAngle: number,
): [SortKey, SortKey] => {
  const sortKeys = SORT_KEYS_BY_ORIENTATION_PAIR[`${startAngle},${endAngle}`]
  if (!sortKeys) {
    throw new UnsupportedOrientationPairError(startAngle, endAngle)
  }
  return sortKeys
}

/**
 * Orientation shared by every port of the bundle
 */
export const getBundleOrientation = (
  ports: Port[],
  bundle: "ports1" | "ports2" = "ports1",
): number => {
  if (ports.length === 0) {
    throw new InvalidBundleError("bundle has no ports", bundle)
  }
  const orientation = normalizeOrientation(ports[0].orientation)
  for (let i = 1; i < ports.length; i++) {
    if (normalizeOrientation(ports[i].orientation) !== orientation) {
      throw new InvalidBundleError(
        `all ports must share one orientation, port ${i} faces ${ports[i].orientation} instead of ${orientation}`,
        bundle,
        i,
      )
    }
  }
  return orientation
}

export const sortPortsByKey = (ports: Port[], key: SortKey): Port[] => {
  const keyFn = SORT_KEY_FNS[key]
  return [...ports].sort((a, b) => keyFn(a) - keyFn(b))
}

/**
 * Returns sorted copies of both bundles so that index i of one bundle is the
 * partner of index i of the other.
 */
export const sortBundles = (
  ports1: Port[],
  ports2: Port[],
): { ports1: Port[]; ports2: Port[] } => {
  const [startKey, endKey] = getBundleSortKeys(
    getBundleOrientation(ports1, "ports1"),
    getBundleOrientation(ports2, "ports2"),
  )
  return {
    ports1: sortPortsByKey(ports1, startKey),
    ports2: sortPortsByKey(ports2, endKey),
  }
}
