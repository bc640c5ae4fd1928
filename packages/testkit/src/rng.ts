/**
 * Seeded PRNG for fuzz and property tests (xorshift32). Same seed, same
 * sequence, on every platform.
 */
export type Rng = Readonly<{
  /** Next unsigned 32-bit integer. */
  u32: () => number;
  /** Integer in [min, max], inclusive. */
  int: (min: number, max: number) => number;
  /** One element of a non-empty array. */
  pick: <T>(values: readonly T[]) => T;
  /** Fisher-Yates shuffle into a new array. */
  shuffle: <T>(values: readonly T[]) => T[];
  /** True with probability `percent`/100. */
  chance: (percent: number) => boolean;
}>;

export function createRng(seed: number): Rng {
  let state = seed >>> 0 || 0x9e3779b9;

  function u32(): number {
    state ^= state << 13;
    state >>>= 0;
    state ^= state >>> 17;
    state ^= state << 5;
    state >>>= 0;
    return state;
  }

  function int(min: number, max: number): number {
    return min + (u32() % (max - min + 1));
  }

  return Object.freeze({
    u32,
    int,
    pick<T>(values: readonly T[]): T {
      if (values.length === 0) throw new Error("createRng.pick: empty array");
      return values[int(0, values.length - 1)] as T;
    },
    shuffle<T>(values: readonly T[]): T[] {
      const out = [...values];
      for (let i = out.length - 1; i > 0; i--) {
        const j = int(0, i);
        const a = out[i] as T;
        out[i] = out[j] as T;
        out[j] = a;
      }
      return out;
    },
    chance(percent: number): boolean {
      return u32() % 100 < percent;
    },
  });
}
