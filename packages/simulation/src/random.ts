import seedrandom from "seedrandom";

/** Seeded source of randomness shared by an engine and its agents. */
export interface Random {
  /** Uniform in [0, 1). */
  next(): number;
  /** Integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  /** Uniform in [min, max). */
  uniform(min: number, max: number): number;
  pick<T>(items: readonly T[]): T | undefined;
  /** Up to `count` distinct items, in draw order. */
  sample<T>(items: readonly T[], count: number): T[];
  chance(p: number): boolean;
  /** Picks an entry with probability proportional to its weight; undefined when all weights are zero. */
  weighted<T>(entries: readonly (readonly [T, number])[]): T | undefined;
}

export class SeededRandom implements Random {
  private readonly rng: seedrandom.PRNG;

  constructor(readonly seed: string) {
    this.rng = seedrandom(seed);
  }

  next(): number {
    return this.rng();
  }

  int(min: number, max: number): number {
    return min + Math.floor(this.next() * (max - min + 1));
  }

  uniform(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  pick<T>(items: readonly T[]): T | undefined {
    if (items.length === 0) return undefined;
    return items[Math.floor(this.next() * items.length)];
  }

  sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const out: T[] = [];
    while (out.length < count && pool.length > 0) {
      const [taken] = pool.splice(Math.floor(this.next() * pool.length), 1);
      if (taken !== undefined) out.push(taken);
    }
    return out;
  }

  chance(p: number): boolean {
    return this.next() < p;
  }

  weighted<T>(entries: readonly (readonly [T, number])[]): T | undefined {
    const total = entries.reduce((sum, [, w]) => sum + Math.max(0, w), 0);
    if (total <= 0) return undefined;
    let roll = this.next() * total;
    let last: T | undefined;
    for (const [value, w] of entries) {
      if (w <= 0) continue;
      last = value;
      roll -= w;
      if (roll < 0) return value;
    }
    return last;
  }
}

export function createRandom(seed: string): Random {
  return new SeededRandom(seed);
}
