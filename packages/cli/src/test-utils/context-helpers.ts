// pattern: Functional Core
// Test helpers for building ExecutionContext values from fakes

import { pino } from "pino";

import { DEFAULT_CONFIG, type HarnessConfig } from "../config/schema.js";

import { MemoryFilesystem, RecordingClipboard, ScriptedNetwork } from "./fakes.js";

import type { ExecutionContext } from "../engine/context.js";
import type { Logger } from "pino";

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}

/**
 * Creates an ExecutionContext backed by in-memory fakes. Not headless unless asked.
 */
export function createTestContext(
  overrides?: Partial<ExecutionContext>
): ExecutionContext {
  return {
    fs: new MemoryFilesystem(),
    network: new ScriptedNetwork(),
    clipboard: new RecordingClipboard(),
    headless: false,
    config: DEFAULT_CONFIG,
    logger: createSilentLogger(),
    ...overrides,
  };
}

export function createTestConfig(
  overrides?: Partial<HarnessConfig["network"]>
): HarnessConfig {
  return {
    ...DEFAULT_CONFIG,
    network: { ...DEFAULT_CONFIG.network, ...overrides },
  };
}
