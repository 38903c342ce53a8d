// pattern: Mixed (unavoidable)
// Environment snapshot for the doctor report. buildDoctorReport is pure over
// its sources; gatherDoctorSources does the reading.

import { readFile } from "node:fs/promises";
import * as os from "node:os";

import {
  collectProxyEnv,
  currentOs,
  detectHeadless,
  type EnvVars,
} from "../engine/environment.js";
import { createCommand } from "../utils/command/index.js";

import type { DoctorReport } from "../engine/types.js";
import type { Logger } from "pino";

export interface DoctorSources {
  platform: NodeJS.Platform;
  kernel: string;
  arch: string;
  env: EnvVars;
  userId: number | null;
  effectiveUserId: number | null;
  /** Contents of /etc/os-release on Linux */
  osRelease?: string;
  /** `sw_vers -productVersion` on macOS */
  macVersion?: string;
}

export function prettyNameFromOsRelease(text: string): string | undefined {
  const match = text.match(/^PRETTY_NAME="?(.+?)"?$/m);
  return match?.[1];
}

export function displayServer(
  env: EnvVars,
  platform: NodeJS.Platform
): string | null {
  if (platform === "darwin") {
    return "quartz";
  }
  if (platform !== "linux") {
    return null;
  }

  const wayland = env["WAYLAND_DISPLAY"];
  if (wayland !== undefined) {
    return `wayland (${wayland})`;
  }
  const x11 = env["DISPLAY"];
  if (x11 !== undefined) {
    return `x11 (${x11})`;
  }
  return null;
}

function osVersion(sources: DoctorSources): string {
  switch (sources.platform) {
    case "linux": {
      const pretty =
        sources.osRelease === undefined ? undefined : prettyNameFromOsRelease(sources.osRelease);
      return pretty ?? "unknown";
    }
    case "darwin":
      return sources.macVersion?.trim() || "unknown";
    default:
      return "unknown";
  }
}

export function buildDoctorReport(sources: DoctorSources): DoctorReport {
  return {
    os_name: currentOs(sources.platform),
    os_version: osVersion(sources),
    kernel: sources.kernel,
    arch: sources.arch,
    user_id: sources.userId,
    effective_user_id: sources.effectiveUserId,
    is_admin: sources.effectiveUserId === 0,
    headless: detectHeadless(sources.env, sources.platform),
    session_type: sources.env["XDG_SESSION_TYPE"] ?? null,
    display_server: displayServer(sources.env, sources.platform),
    proxy_env: collectProxyEnv(sources.env),
  };
}

async function readOsRelease(logger: Logger): Promise<string | undefined> {
  try {
    return await readFile("/etc/os-release", "utf8");
  } catch (error) {
    logger.debug({ err: error }, "Could not read /etc/os-release");
    return undefined;
  }
}

async function readMacVersion(logger: Logger): Promise<string | undefined> {
  try {
    return await createCommand("sw_vers", logger).arg("-productVersion").timeout(5000).output();
  } catch (error) {
    logger.debug({ err: error }, "sw_vers did not report a version");
    return undefined;
  }
}

/**
 * Read everything the report needs from the running process and OS
 */
export async function gatherDoctorSources(logger: Logger): Promise<DoctorSources> {
  const platform = os.platform();
  const sources: DoctorSources = {
    platform,
    kernel: os.release(),
    arch: os.arch(),
    env: process.env,
    userId: process.getuid?.() ?? null,
    effectiveUserId: process.geteuid?.() ?? null,
  };

  if (platform === "linux") {
    const osRelease = await readOsRelease(logger);
    if (osRelease !== undefined) sources.osRelease = osRelease;
  } else if (platform === "darwin") {
    const macVersion = await readMacVersion(logger);
    if (macVersion !== undefined) sources.macVersion = macVersion;
  }

  return sources;
}
