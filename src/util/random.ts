export type RandomFn = () => number;

export function randInRange(random: RandomFn, min: number, max: number): number {
  return min + random() * (max - min);
}

/** Linear congruential generator, for reproducible runs and tests. */
export function seededRandom(seed: number): RandomFn {
  let state = seed >>> 0;
  return () => {
    state = (1664525 * state + 1013904223) >>> 0;
    return state / 0x100000000;
  };
}
