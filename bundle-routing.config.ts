/**
 * Tolerances shared by the bundle router. Exposed at the top level so they
 * can be tuned in one place.
 */
export const BUNDLE_ROUTING_CONFIG = {
  /**
   * Two points whose x (or y) differ by less than this form a vertical (or
   * horizontal) segment. Also the tolerance used when comparing snapped
   * endpoints and straight lengths in the reference assembler.
   */
  MANHATTAN_TOLERANCE: 1e-5,

  /**
   * Route segments closer than this are counted as touching by
   * countRouteIntersections.
   */
  INTERSECTION_TOLERANCE: 1e-9,
}
