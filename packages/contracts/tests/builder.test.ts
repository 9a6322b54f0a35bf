import { describe, expect, it } from "vitest";
import { buildMazeConfig, DEFAULT_MAZE_SIZE } from "../src";

describe("buildMazeConfig", () => {
  it("applies the default size", () => {
    const res = buildMazeConfig({});
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual({ rows: 25, cols: 25, allowSameStartEnd: false });
    expect(DEFAULT_MAZE_SIZE).toBe(25);
  });

  it("resolves presets and keeps the seed", () => {
    const res = buildMazeConfig({ preset: "small", seed: 42 });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value).toEqual({ rows: 15, cols: 15, seed: 42, allowSameStartEnd: false });
  });

  it("lets explicit dimensions win over a preset", () => {
    const res = buildMazeConfig({ preset: "large", rows: 10 });
    if (!res.success) throw new Error("unexpected error");
    expect(res.value.rows).toBe(10);
    expect(res.value.cols).toBe(35);
  });

  it("reports bad dimensions as INVALID_DIMENSIONS", () => {
    const res = buildMazeConfig({ rows: 0 });
    expect(res.isErr()).toBe(true);
    expect(res.error.code).toBe("INVALID_DIMENSIONS");
    expect(res.error.message).toBe(
      "Invalid maze dimensions 0x25: dimensions must be at least 1",
    );
    expect(res.error.details).toEqual({ rows: 0, cols: 25 });
  });

  it("rejects fractional dimensions", () => {
    const res = buildMazeConfig({ rows: 4, cols: 2.5 });
    expect(res.error.code).toBe("INVALID_DIMENSIONS");
    expect(res.error.message).toBe("Invalid maze dimensions 4x2.5: dimensions must be integers");
  });

  it("rejects dimensions above the schema ceiling", () => {
    const res = buildMazeConfig({ rows: 1001 });
    expect(res.error.code).toBe("INVALID_DIMENSIONS");
    expect(res.error.message).toBe(
      "Invalid maze dimensions 1001x25: dimensions cannot exceed 1000",
    );
  });

  it("reports other schema issues as CONFIG_INVALID", () => {
    const res = buildMazeConfig({ seed: -1 });
    expect(res.error.code).toBe("CONFIG_INVALID");
    expect(res.error.details?.issues).toEqual([
      { path: "seed", message: "Seed must be a non-negative integer" },
    ]);
  });

  it("enforces a caller-supplied dimension limit", () => {
    const res = buildMazeConfig({ maxDimension: 20 });
    expect(res.isErr()).toBe(true);
    expect(res.error.code).toBe("INVALID_DIMENSIONS");
    expect(res.error.message).toBe(
      "Invalid maze dimensions 25x25: dimensions cannot exceed 20",
    );
  });
});
