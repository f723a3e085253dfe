// src/types/rng.ts
import type { Faker } from "@faker-js/faker";

export type RNG = () => number;

/**
 * A seeded random source. Every generation call receives one explicitly;
 * `faker` draws from `rng`, so both advance the same stream.
 */
export type RandomSource = {
  seed: string;
  rng: RNG;
  faker: Faker;
};
