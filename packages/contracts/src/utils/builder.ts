import {
  MazeConfigSchema,
  type ValidatedMazeConfig,
} from "../schemas/maze";
import { MazeError } from "../types/error";
import { SIZE_PRESETS, type SizePreset } from "../types/maze";
import { Err, Ok, type Result } from "../types/result";

export const DEFAULT_MAZE_SIZE = SIZE_PRESETS.medium;

export interface BuildMazeConfigInput {
  rows?: number;
  cols?: number;
  /** Square preset; explicit `rows`/`cols` win over it */
  preset?: SizePreset;
  seed?: number;
  allowSameStartEnd?: boolean;
  /** Lower ceiling for either dimension than the schema's own limit */
  maxDimension?: number;
}

/**
 * Resolve defaults and presets, then validate the result.
 *
 * @example
 * ```typescript
 * buildMazeConfig({ preset: "small", seed: 42 }).value;
 * // { rows: 15, cols: 15, seed: 42, allowSameStartEnd: false }
 * ```
 */
export function buildMazeConfig(
  input: BuildMazeConfigInput,
): Result<ValidatedMazeConfig, MazeError> {
  const side = input.preset ? SIZE_PRESETS[input.preset] : DEFAULT_MAZE_SIZE;
  const candidate = {
    rows: input.rows ?? side,
    cols: input.cols ?? side,
    allowSameStartEnd: input.allowSameStartEnd ?? false,
    ...(input.seed !== undefined && { seed: input.seed }),
  };

  const parsed = MazeConfigSchema.safeParse(candidate);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      path: issue.path.join("."),
      message: issue.message,
    }));

    // Bad rows/cols are a dimension error whichever path they arrive by
    const dimensionIssue = issues.find(
      (issue) => issue.path === "rows" || issue.path === "cols",
    );
    if (dimensionIssue) {
      return Err(
        MazeError.invalidDimensions(
          candidate.rows,
          candidate.cols,
          dimensionIssue.message.toLowerCase(),
        ),
      );
    }

    return Err(MazeError.configInvalid("Maze configuration is invalid", { issues }));
  }

  const limit = input.maxDimension;
  if (limit !== undefined && (parsed.data.rows > limit || parsed.data.cols > limit)) {
    return Err(
      MazeError.invalidDimensions(
        parsed.data.rows,
        parsed.data.cols,
        `dimensions cannot exceed ${limit}`,
      ),
    );
  }

  return Ok(parsed.data);
}
