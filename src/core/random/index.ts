export { SeededRandom, deriveSeed, normalizeSeed } from './seeded-random.js';
export type { RandomSource, RngState } from './seeded-random.js';
