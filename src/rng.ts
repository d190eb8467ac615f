// src/rng.ts

export interface RandomSource {
  next(): number;
} // returns [0, 1)

export const defaultRandom: RandomSource = { next: () => Math.random() };

// Seeded source for reproducible runs
export function createMulberry32(seed: number): RandomSource {
  let a = seed >>> 0;
  return {
    next() {
      a |= 0;
      a = (a + 0x6d2b79f5) | 0;
      let t = Math.imul(a ^ (a >>> 15), 1 | a);
      t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    },
  };
}

/** Replays a recorded sequence of draws; throws once it runs dry. */
export class ScriptedRandom implements RandomSource {
  private index = 0;

  constructor(private readonly draws: readonly number[]) {
    for (const d of draws) {
      if (!(d >= 0 && d < 1)) throw new RangeError(`draw ${d} is outside [0, 1)`);
    }
  }

  next(): number {
    if (this.index >= this.draws.length) {
      throw new Error(`scripted random exhausted after ${this.draws.length} draws`);
    }
    return this.draws[this.index++];
  }

  get remaining(): number {
    return this.draws.length - this.index;
  }
}

export function chance(probability: number, random: RandomSource): boolean {
  return random.next() < probability;
}

/** Integer in [min, maxExclusive). */
export function randomInt(random: RandomSource, min: number, maxExclusive: number): number {
  return min + Math.floor(random.next() * (maxExclusive - min));
}

export function pickOne<T>(items: readonly T[], random: RandomSource): T {
  if (items.length === 0) throw new RangeError('cannot pick from an empty list');
  return items[randomInt(random, 0, items.length)];
}

export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const out = [...items];
  for (let i = out.length - 1; i > 0; i--) {
    const j = randomInt(random, 0, i + 1);
    [out[i], out[j]] = [out[j], out[i]];
  }
  return out;
}
