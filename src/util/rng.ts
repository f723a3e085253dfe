// src/util/rng.ts
import seedrandom from "seedrandom";
import { Faker, base, en, type Randomizer } from "@faker-js/faker";
import type { RNG, RandomSource } from "../types/rng.js";

/**
 * Create a random source whose faker instance reads from the same seeded stream.
 */
export function createRandomSource(seed?: number | string): RandomSource {
  const seedStr = seed != null ? String(seed) : String(Date.now());
  let prng: RNG = seedrandom(seedStr);
  const rng: RNG = () => prng();

  const randomizer: Randomizer = {
    next: () => prng(),
    seed: (value: number | number[]) => {
      prng = seedrandom(Array.isArray(value) ? value.join(",") : String(value));
    },
  };

  return {
    seed: seedStr,
    rng,
    faker: new Faker({ locale: [en, base], randomizer }),
  };
}

/**
 * Pick a random integer in [min, max] inclusive.
 */
export function randomInt(rng: RNG, min: number, max: number): number {
  return Math.floor(rng() * (max - min + 1)) + min;
}

/**
 * Pick a random element from an array.
 */
export function randomPick<T>(rng: RNG, arr: readonly T[]): T {
  if (arr.length === 0) {
    throw new Error("Cannot pick from empty array");
  }
  return arr[Math.floor(rng() * arr.length)]!;
}

/**
 * Weighted random pick. `weights[i]` belongs to `values[i]`.
 */
export function weightedPick<T>(
  rng: RNG,
  values: readonly T[],
  weights: readonly number[],
): T {
  const total = weights.reduce((sum, w) => sum + w, 0);

  if (total <= 0) {
    throw new Error("Total weight must be positive");
  }

  let r = rng() * total;
  for (let i = 0; i < values.length; i++) {
    r -= weights[i] ?? 0;
    if (r < 0) {
      return values[i]!;
    }
  }

  // Floating point leftovers land on the last weighted value
  for (let i = values.length - 1; i >= 0; i--) {
    if ((weights[i] ?? 0) > 0) return values[i]!;
  }
  return values[values.length - 1]!;
}

/**
 * Pick `n` distinct elements from the first `limit` entries of `arr`,
 * without copying it.
 */
export function pickNRandom<T>(
  rng: RNG,
  arr: readonly T[],
  n: number,
  limit = arr.length,
): T[] {
  const size = Math.min(limit, arr.length);
  const result: T[] = [];
  const used = new Set<number>();

  while (result.length < Math.min(n, size)) {
    const idx = Math.floor(rng() * size);
    if (!used.has(idx)) {
      used.add(idx);
      result.push(arr[idx]!);
    }
  }

  return result;
}

/**
 * Generate a random boolean with given probability of true.
 */
export function randomBool(rng: RNG, probability = 0.5): boolean {
  return rng() < probability;
}
