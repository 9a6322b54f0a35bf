import {
  DEFAULT_MAZE_SIZE,
  MAX_MAZE_DIMENSION,
  type SearchAlgorithm,
} from "@labyrinth/contracts";

const DEFAULT_ALGORITHM: SearchAlgorithm = "astar";

function readMaxDimension(raw: string | undefined): number {
  const parsed = Number(raw);
  if (!raw || !Number.isInteger(parsed) || parsed < 1) return MAX_MAZE_DIMENSION;
  return Math.min(parsed, MAX_MAZE_DIMENSION);
}

export const MAZE_CONFIG = {
  DEFAULTS: {
    ROWS: DEFAULT_MAZE_SIZE,
    COLS: DEFAULT_MAZE_SIZE,
    ALGORITHM: DEFAULT_ALGORITHM,
  },

  LIMITS: {
    MAX_DIMENSION: readMaxDimension(process.env.MAZE_MAX_DIMENSION),
  },

  TRACE: {
    ENABLED: process.env.MAZE_TRACE === "1",
  },
} as const;
