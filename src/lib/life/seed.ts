import Prando from "prando";
import type { UniverseConfig } from "./config";
import { ALIVE, DEAD } from "./life.shared";

export type SeedRule = (grid: Uint8Array, config: UniverseConfig) => void;

export const modularSeed: SeedRule = (grid) => {
  for (let i = 0; i < grid.length; i++) {
    grid[i] = i % 2 === 0 || i % 7 === 0 ? ALIVE : DEAD;
  }
};

export const randomSeed: SeedRule = (grid, { seedKey, density }) => {
  const rng = new Prando(seedKey);
  for (let i = 0; i < grid.length; i++) {
    grid[i] = rng.next() < density ? ALIVE : DEAD;
  }
};

export const emptySeed: SeedRule = (grid) => {
  grid.fill(DEAD);
};
