import type { MazeError, Result } from "@labyrinth/contracts";
import { describe, expect, it } from "vitest";
import { MazeSession } from "../src/facade";
import type { SearchResult } from "../src/search";
import { DefaultTraceCollector } from "../src/trace";

function readySession(rows = 6, cols = 6): MazeSession {
  const session = new MazeSession();
  session.newMaze(rows, cols, { seed: 17 }).getOrThrow();
  session.setStart(0, 0).getOrThrow();
  session.setEnd(rows - 1, cols - 1).getOrThrow();
  return session;
}

describe("MazeSession", () => {
  it("rejects operations before a maze exists", () => {
    const session = new MazeSession();
    expect(session.maze).toBeNull();
    expect(session.setStart(0, 0).error.code).toBe("NO_ACTIVE_MAZE");
    expect(session.setEnd(0, 0).error.code).toBe("NO_ACTIVE_MAZE");
    expect(session.clearPath().error.code).toBe("NO_ACTIVE_MAZE");
    expect(session.solve("bfs").error.message).toBe(
      "Cannot solve: no maze has been generated",
    );
  });

  it("defaults to a 25x25 maze solved with A*", () => {
    const session = new MazeSession();
    const maze = session.newMaze().getOrThrow();
    expect([maze.rows, maze.cols]).toEqual([25, 25]);

    session.setStart(0, 0).getOrThrow();
    session.setEnd(24, 24).getOrThrow();
    const result = session.solve().getOrThrow();
    expect(result.algorithm).toBe("astar");
    expect(result.found).toBe(true);
  });

  it("replaces the maze wholesale on regeneration", () => {
    const session = readySession();
    const before = session.maze;

    const after = session.newMaze(3, 3, { seed: 2 }).getOrThrow();
    expect(after).not.toBe(before);
    expect(session.maze).toBe(after);
    expect(after.start).toBeNull();
    expect(after.end).toBeNull();
  });

  it("keeps the previous maze when regeneration fails", () => {
    const session = readySession();
    const before = session.maze;
    expect(session.newMaze(0, 3).error.code).toBe("INVALID_DIMENSIONS");
    expect(session.maze).toBe(before);
  });

  it("builds from config input", () => {
    const session = new MazeSession();
    const maze = session.newMazeFromConfig({ preset: "small", seed: 4 }).getOrThrow();
    expect(maze.rows).toBe(15);
    expect(session.maze).toBe(maze);
  });

  it("applies its same-cell policy to every maze", () => {
    const session = new MazeSession({ allowSameStartEnd: true });
    session.newMaze(3, 3, { seed: 1 }).getOrThrow();
    session.setStart(1, 1).getOrThrow();
    expect(session.setEnd(1, 1).isOk()).toBe(true);
    expect(session.solve("bfs").getOrThrow()).toMatchObject({ found: true, length: 1 });
  });

  it("clears the path but keeps endpoints", () => {
    const session = readySession();
    session.solve("bfs").getOrThrow();
    session.clearPath().getOrThrow();

    const maze = session.maze;
    expect(maze?.grid.getCell(0, 0)?.onPath).toBe(false);
    expect(maze?.start).toEqual({ row: 0, col: 0 });
  });

  it("rejects a solve or regeneration started from inside a solve", () => {
    const session = readySession();
    const nested: Result<unknown, MazeError>[] = [];
    let sawSolving = false;

    const outer = session.solve("dijkstra", {
      onVisit: () => {
        if (nested.length > 0) return;
        sawSolving = session.isSolving;
        nested.push(session.solve("bfs"));
        nested.push(session.newMaze(3, 3));
        nested.push(session.clearPath());
      },
    });

    expect(outer.getOrThrow().found).toBe(true);
    expect(sawSolving).toBe(true);
    expect(nested.map((res) => res.error.code)).toEqual([
      "SOLVE_IN_PROGRESS",
      "SOLVE_IN_PROGRESS",
      "SOLVE_IN_PROGRESS",
    ]);
    expect(session.isSolving).toBe(false);
  });

  it("releases the solve guard when an observer throws", () => {
    const session = readySession();
    expect(() =>
      session.solve("bfs", {
        onVisit: () => {
          throw new Error("observer failed");
        },
      }),
    ).toThrow("observer failed");

    expect(session.isSolving).toBe(false);
    const retry: Result<SearchResult, MazeError> = session.solve("bfs");
    expect(retry.isOk()).toBe(true);
  });

  it("routes generation and search through its trace collector", () => {
    const trace = new DefaultTraceCollector();
    const session = new MazeSession({ trace });
    session.newMaze(4, 4, { seed: 6 }).getOrThrow();
    session.setStart(0, 0).getOrThrow();
    session.setEnd(3, 3).getOrThrow();
    const result = session.solve("bfs").getOrThrow();

    expect(trace.getCarveCount()).toBe(15);
    expect(trace.getVisitOrder()).toHaveLength(result.visitedCount);
    expect(session.trace).toBe(trace);
  });

  it("keeps only the current maze's events in the trace", () => {
    const trace = new DefaultTraceCollector();
    const session = new MazeSession({ trace });

    for (const seed of [1, 2, 3]) {
      session.newMaze(5, 5, { seed }).getOrThrow();
      session.setStart(0, 0).getOrThrow();
      session.setEnd(4, 4).getOrThrow();
      session.solve("bfs").getOrThrow();
    }
    session.newMaze(3, 3, { seed: 2 }).getOrThrow();

    // start, 8 carves, end
    expect(trace.getEvents()).toHaveLength(10);
    expect(trace.getCarveCount()).toBe(8);
    expect(trace.getVisitOrder()).toEqual([]);
  });
});
