import { InvalidBundleError, PortCountMismatchError } from "./errors"
import { getBundleOrientation, normalizeOrientation } from "./sortBundles"
import type { Port } from "./types"

const copyPort = (port: Port): Port => ({
  ...port,
  position: { x: port.position.x, y: port.position.y },
  orientation: normalizeOrientation(port.orientation),
})

/**
 * Validated copy of a bundle with orientations folded into [0, 360). The
 * caller's ports are never touched.
 */
export const copyBundle = (
  ports: Port[],
  bundle: "ports1" | "ports2",
): Port[] => {
  if (ports.length === 0) {
    throw new InvalidBundleError("bundle has no ports", bundle)
  }
  ports.forEach((port, i) => {
    if (!Number.isFinite(port.position.x) || !Number.isFinite(port.position.y)) {
      throw new InvalidBundleError(`port ${i} has a non-finite position`, bundle, i)
    }
    if (!(port.width > 0)) {
      throw new InvalidBundleError(
        `port ${i} width must be positive, got ${port.width}`,
        bundle,
        i,
      )
    }
  })
  const copies = ports.map(copyPort)
  getBundleOrientation(copies, bundle)
  return copies
}

export const prepareBundles = (
  ports1: Port[],
  ports2: Port[],
): { ports1: Port[]; ports2: Port[] } => {
  if (ports1.length !== ports2.length) {
    throw new PortCountMismatchError(ports1.length, ports2.length)
  }
  return {
    ports1: copyBundle(ports1, "ports1"),
    ports2: copyBundle(ports2, "ports2"),
  }
}
