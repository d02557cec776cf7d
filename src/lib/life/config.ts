import { z } from "zod";
import { SeedNameSchema } from "../../consts";
import { DEFAULT_HEIGHT, DEFAULT_WIDTH, MAX_SIDE } from "./life.shared";

export const UniverseConfigSchema = z.object({
  width: z.number().int().positive().max(MAX_SIDE).default(DEFAULT_WIDTH),
  height: z.number().int().positive().max(MAX_SIDE).default(DEFAULT_HEIGHT),
  seed: SeedNameSchema.default("modular"),
  // Only read by the random seed
  seedKey: z.string().default("life"),
  density: z.number().min(0).max(1).default(0.5),
});

export type UniverseConfig = z.infer<typeof UniverseConfigSchema>;
export type UniverseOptions = z.input<typeof UniverseConfigSchema>;
