/**
 * Sources of the pseudo-random positions a sampling checker inspects
 */

import type { RandomSource } from "./types";

export const mathRandomSource: RandomSource = {
  nextIndex: (length) => Math.floor(Math.random() * length),
};

/**
 * Replays a fixed list of picks, wrapping each into range. Used by tests.
 */
export class SequenceRandomSource implements RandomSource {
  private cursor = 0;

  constructor(private readonly picks: readonly number[]) {}

  nextIndex(length: number): number {
    if (this.picks.length === 0) {
      return 0;
    }
    const pick = this.picks[this.cursor % this.picks.length];
    this.cursor += 1;
    return Math.abs(pick) % length;
  }
}

/**
 * Deterministic source seeded with a 32-bit integer (mulberry32)
 */
export function seededRandomSource(seed: number): RandomSource {
  let state = seed >>> 0;
  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
  return {
    nextIndex: (length) => Math.floor(next() * length),
  };
}
