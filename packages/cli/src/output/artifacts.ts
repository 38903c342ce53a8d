// pattern: Imperative Shell
// DIR/<run_id>/result.json plus DIR/<run_id>/events.jsonl

import { mkdir, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { newRunId } from "../engine/result.js";

import type { ExecutionResult, ScenarioResult } from "../engine/types.js";
import type { Logger } from "pino";

export const RESULT_FILE = "result.json";
export const EVENTS_FILE = "events.jsonl";

export interface ArtifactPaths {
  dir: string;
  result: string;
  events: string;
}

export function artifactPaths(baseDir: string, runId: string): ArtifactPaths {
  const dir = join(baseDir, runId);
  return {
    dir,
    result: join(dir, RESULT_FILE),
    events: join(dir, EVENTS_FILE),
  };
}

function eventLines(results: readonly ExecutionResult[]): string {
  return results.map(result => `${JSON.stringify(result)}\n`).join("");
}

/**
 * Write a single result. Returns the result with its artifact paths filled in,
 * or the original result when the files could not be written.
 */
export async function writeResultArtifacts(
  baseDir: string,
  result: ExecutionResult,
  logger: Logger
): Promise<ExecutionResult> {
  const paths = artifactPaths(baseDir, result.run_id);
  const recorded: ExecutionResult = {
    ...result,
    artifacts: [...result.artifacts, paths.result, paths.events],
  };

  try {
    await mkdir(paths.dir, { recursive: true });
    await writeFile(paths.result, JSON.stringify(recorded, null, 2));
    await writeFile(paths.events, eventLines([recorded]));
  } catch (error) {
    logger.warn({ err: error, dir: paths.dir }, "Failed to write artifacts");
    return result;
  }

  logger.debug({ dir: paths.dir }, "Artifacts written");
  return recorded;
}

/**
 * Write a scenario under a fresh run id, one event line per step. Every step
 * result lists the scenario's artifact paths.
 */
export async function writeScenarioArtifacts(
  baseDir: string,
  result: ScenarioResult,
  logger: Logger
): Promise<ScenarioResult> {
  const paths = artifactPaths(baseDir, newRunId());
  const recorded: ScenarioResult = {
    ...result,
    step_results: result.step_results.map(step => ({
      ...step,
      artifacts: [...step.artifacts, paths.result, paths.events],
    })),
  };

  try {
    await mkdir(paths.dir, { recursive: true });
    await writeFile(paths.result, JSON.stringify(recorded, null, 2));
    await writeFile(paths.events, eventLines(recorded.step_results));
  } catch (error) {
    logger.warn({ err: error, dir: paths.dir }, "Failed to write scenario artifacts");
    return result;
  }

  logger.debug({ dir: paths.dir }, "Scenario artifacts written");
  return recorded;
}

/**
 * Pretty-printed result at an exact path. A failed write is only a warning.
 */
export async function writeResultFile(
  path: string,
  result: ExecutionResult,
  logger: Logger
): Promise<boolean> {
  try {
    await writeFile(path, JSON.stringify(result, null, 2));
    return true;
  } catch (error) {
    logger.warn({ err: error, path }, `Failed to write result to ${path}`);
    return false;
  }
}
