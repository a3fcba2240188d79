/** Uniform source of numbers in [0, 1), shaped like `Math.random` */
export type RandomSource = () => number;

export const defaultRandom: RandomSource = () => Math.random();

export function mulberry32(seed: number): RandomSource {
  return function mulberry32Generator() {
    let t = (seed += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Draws an integer uniformly from 1..maxGuess. */
export function drawAssignedNumber(random: RandomSource, maxGuess: number): number {
  const value = Math.floor(random() * maxGuess) + 1;
  return Math.min(Math.max(value, 1), maxGuess);
}
