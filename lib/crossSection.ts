import type { CrossSection } from "./types"

export const strip: CrossSection = {
  width: 0.5,
  layer: [1, 0],
  radius: 10,
  autoWiden: false,
  widthWide: 2,
  taperLength: 10,
}

export const crossSection = (overrides: Partial<CrossSection> = {}) => ({
  ...strip,
  ...overrides,
})
