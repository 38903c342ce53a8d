// pattern: Functional Core
// Environment facts read from the executing process. Pure over their inputs so
// tests can pass a fabricated platform and environment.

import { arch as osArch, platform as osPlatform } from "node:os";

import type { EnvSummary } from "./types.js";

export type EnvVars = Record<string, string | undefined>;

export const PROXY_ENV_KEYS = [
  "HTTP_PROXY",
  "http_proxy",
  "HTTPS_PROXY",
  "https_proxy",
  "NO_PROXY",
  "no_proxy",
] as const;

/**
 * Name the platform the way results report it
 */
export function currentOs(platform: NodeJS.Platform = osPlatform()): string {
  switch (platform) {
    case "darwin":
      return "macos";
    case "win32":
      return "windows";
    default:
      return platform;
  }
}

/**
 * Heuristic for "no attached interactive display"
 */
export function detectHeadless(
  env: EnvVars = process.env,
  platform: NodeJS.Platform = osPlatform()
): boolean {
  switch (platform) {
    case "linux":
      return env["DISPLAY"] === undefined && env["WAYLAND_DISPLAY"] === undefined;
    case "darwin":
      // An SSH session without X forwarding has no usable display
      return env["SSH_TTY"] !== undefined && env["DISPLAY"] === undefined;
    default:
      return false;
  }
}

/**
 * Snapshot of the proxy-related variables present right now
 */
export function collectProxyEnv(env: EnvVars = process.env): Record<string, string> {
  const out: Record<string, string> = {};
  for (const key of PROXY_ENV_KEYS) {
    const value = env[key];
    if (value !== undefined) {
      out[key] = value;
    }
  }
  return out;
}

// Computed fresh for every result
export function envSummary(): EnvSummary {
  return {
    os: currentOs(),
    arch: osArch(),
    headless: detectHeadless(),
  };
}
