export { type EndpointRole, Maze } from "./maze";
export {
  clearSearchState,
  type CreateMazeOptions,
  createMaze,
  createMazeFromConfig,
  parseAlgorithm,
  setEnd,
  setStart,
  solve,
} from "./operations";
export { MazeSession, type MazeSessionOptions, type SessionSolveOptions } from "./session";
