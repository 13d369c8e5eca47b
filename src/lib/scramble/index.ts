export { createRandom } from "./random";
export type { RandomSource } from "./random";
export { scrambleColumns, scrambleFile } from "./scrambleColumns";
export type { ScrambleOptions } from "./scrambleColumns";
export { shuffle } from "./shuffle";
