import { z } from "zod";
import { emptySeed, modularSeed, randomSeed } from "./lib/life/seed";

export const seeds = {
  modular: modularSeed,
  random: randomSeed,
  empty: emptySeed,
} as const;

export type SeedName = keyof typeof seeds;

export const SeedNameSchema = z.enum(
  Object.keys(seeds) as [SeedName, ...SeedName[]],
);

export const seedNames = Object.keys(seeds) as SeedName[];
