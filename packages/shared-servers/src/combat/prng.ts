/* eslint-disable unicorn/number-literal-case */
/* eslint-disable unicorn/prefer-code-point */
export type Rng = () => number;

/** FNV-1a hash, used to derive stable seeds from ids. */
export const hashStringToUint32 = (value: string): number => {
  let hash = 2_166_136_261;
  for (let index = 0; index < value.length; index += 1) {
    hash ^= value.charCodeAt(index);
    hash = Math.imul(hash, 16_777_619);
  }
  return hash >>> 0;
};

/** Deterministic generator of floats in [0, 1). */
export const createRng = (seed: number): Rng => {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d_2b_79_f5) >>> 0;
    let result = Math.imul(state ^ (state >>> 15), state | 1);
    result ^= result + Math.imul(result ^ (result >>> 7), result | 61);
    return ((result ^ (result >>> 14)) >>> 0) / 4_294_967_296;
  };
};

/** Integer in [1, 100]. */
export const rollPercentile = (rng: Rng): number => Math.floor(rng() * 100) + 1;
