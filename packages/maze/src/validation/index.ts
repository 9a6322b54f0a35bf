export {
  type CheckResult,
  checkBoundaryWalls,
  checkSpanningTree,
  checkWallSymmetry,
  type SpanningTreeCheck,
  type Violation,
  type ViolationType,
} from "./invariant-checks";
export { type MazeValidationResult, validateMaze } from "./validate-maze";
