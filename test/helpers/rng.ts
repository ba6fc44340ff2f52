import type { Rng } from '../../simulation/utils/rng.js';

// Replays the given draws in order, then repeats the last one.
export function sequenceRng(values: number[]): Rng {
  let index = 0;
  return () => {
    const value = values[Math.min(index, values.length - 1)] ?? 0;
    index += 1;
    return value;
  };
}

export const constantRng = (value: number): Rng => () => value;
