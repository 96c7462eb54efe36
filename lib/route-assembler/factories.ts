import type { BendFactory, StraightFactory, TaperFactory } from "../types"

/**
 * 90° circular bend entering at o1 (facing west) and leaving at o2 (facing
 * north).
 */
export const bendCircular: BendFactory = ({ radius, crossSection }) => {
  const r = radius ?? crossSection.radius ?? 10
  const { width, layer } = crossSection
  return {
    name: `bend_circular_r${r}`,
    radius: r,
    length: (Math.PI * r) / 2,
    width,
    ports: {
      o1: { name: "o1", position: { x: 0, y: 0 }, orientation: 180, width, layer },
      o2: { name: "o2", position: { x: r, y: r }, orientation: 90, width, layer },
    },
  }
}

export const straight: StraightFactory = ({ length, crossSection, width }) => {
  const w = width ?? crossSection.width
  const { layer } = crossSection
  return {
    name: `straight_l${length}_w${w}`,
    length,
    width: w,
    ports: {
      o1: { name: "o1", position: { x: 0, y: 0 }, orientation: 180, width: w, layer },
      o2: { name: "o2", position: { x: length, y: 0 }, orientation: 0, width: w, layer },
    },
  }
}

export const taper: TaperFactory = ({ length, width1, width2, layer }) => {
  const w2 = width2 ?? width1
  return {
    name: `taper_l${length}_w${width1}_w${w2}`,
    length,
    width: w2,
    ports: {
      o1: { name: "o1", position: { x: 0, y: 0 }, orientation: 180, width: width1, layer },
      o2: { name: "o2", position: { x: length, y: 0 }, orientation: 0, width: w2, layer },
    },
  }
}
