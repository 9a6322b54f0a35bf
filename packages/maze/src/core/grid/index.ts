export { MazeGrid, NO_PARENT } from "./maze-grid";
export {
  ALL_WALLS,
  type Cell,
  DIRECTION_BY_SIDE,
  DIRECTIONS,
  type Direction,
  type ReadonlyMazeGrid,
  WallBit,
  type Walls,
} from "./types";
