import { afterEach, describe, expect, it, vi } from "vitest";

async function loadConfig() {
  vi.resetModules();
  const { MAZE_CONFIG } = await import("../src/config");
  return MAZE_CONFIG;
}

describe("MAZE_CONFIG", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("defaults to a 25x25 A* maze with tracing off", async () => {
    vi.stubEnv("MAZE_MAX_DIMENSION", "");
    vi.stubEnv("MAZE_TRACE", "");
    const config = await loadConfig();

    expect(config.DEFAULTS).toEqual({ ROWS: 25, COLS: 25, ALGORITHM: "astar" });
    expect(config.LIMITS.MAX_DIMENSION).toBe(1000);
    expect(config.TRACE.ENABLED).toBe(false);
  });

  it("reads overrides from the environment", async () => {
    vi.stubEnv("MAZE_MAX_DIMENSION", "40");
    vi.stubEnv("MAZE_TRACE", "1");
    const config = await loadConfig();

    expect(config.LIMITS.MAX_DIMENSION).toBe(40);
    expect(config.TRACE.ENABLED).toBe(true);
  });

  it("ignores unusable dimension limits", async () => {
    for (const raw of ["abc", "0", "2.5", "5000"]) {
      vi.stubEnv("MAZE_MAX_DIMENSION", raw);
      const config = await loadConfig();
      expect(config.LIMITS.MAX_DIMENSION).toBe(1000);
    }
  });
});
