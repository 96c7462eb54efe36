export { generateRandomBundleProblem } from "./generateRandomBundleProblem"
export type { BundleShape } from "./generateRandomBundleProblem"
export { createRng } from "./createRng"
