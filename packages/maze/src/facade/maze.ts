import type { Coord } from "@labyrinth/contracts";
import type { MazeGrid } from "../core/grid";
import type { GenerationStats } from "../generation";

export type EndpointRole = "start" | "end";

/**
 * A generated grid plus its designated endpoints.
 *
 * Endpoints change only through the façade's `setStart` / `setEnd`, which
 * validate them first.
 */
export class Maze {
  private startCell: Coord | null = null;
  private endCell: Coord | null = null;

  constructor(
    readonly grid: MazeGrid,
    /** Seed the walls were carved from; regenerating with it reproduces them */
    readonly seed: number,
    readonly allowSameStartEnd: boolean,
    readonly stats: GenerationStats,
  ) {}

  get rows(): number {
    return this.grid.rows;
  }

  get cols(): number {
    return this.grid.cols;
  }

  get start(): Coord | null {
    return this.startCell;
  }

  get end(): Coord | null {
    return this.endCell;
  }

  endpoint(role: EndpointRole): Coord | null {
    return role === "start" ? this.startCell : this.endCell;
  }

  /**
   * @internal Façade use only; performs no validation.
   */
  _assignEndpoint(role: EndpointRole, coord: Coord | null): void {
    if (role === "start") {
      this.startCell = coord;
    } else {
      this.endCell = coord;
    }
  }
}
