export {
  carveBacktracker,
  type GeneratedMaze,
  generateBacktrackerMaze,
  type GenerationOptions,
  type GenerationStats,
} from "./backtracker";
