import { z } from "zod";
import { SEARCH_ALGORITHMS, SIZE_PRESET_NAMES } from "../types/maze";

const UINT32_MAX = 0xffffffff;

/** Hard ceiling; engines may configure a lower one */
export const MAX_MAZE_DIMENSION = 1000;

const DimensionSchema = z
  .number()
  .int({ error: "Dimensions must be integers" })
  .min(1, { error: "Dimensions must be at least 1" })
  .max(MAX_MAZE_DIMENSION, {
    error: `Dimensions cannot exceed ${MAX_MAZE_DIMENSION}`,
  });

export const SeedSchema = z
  .number()
  .int()
  .min(0, { error: "Seed must be a non-negative integer" })
  .max(UINT32_MAX, { error: "Seed must fit in uint32" });

export const SearchAlgorithmSchema = z.enum(SEARCH_ALGORITHMS);

export const SizePresetSchema = z.enum(SIZE_PRESET_NAMES);

export const MazeConfigSchema = z.object({
  rows: DimensionSchema,
  cols: DimensionSchema,
  seed: SeedSchema.optional(),
  allowSameStartEnd: z.boolean(),
});

export type ValidatedMazeConfig = z.infer<typeof MazeConfigSchema>;
