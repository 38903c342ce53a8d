// pattern: Imperative Shell

import { Command, InvalidArgumentError, Option } from "@commander-js/extra-typings";

import {
  getCliLogger,
  initializeLogger,
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { setConfigPath } from "./_globals.js";
import { makeCallCommand } from "./call.js";
import { makeCommandsCommand } from "./commands.js";
import { makeDoctorCommand } from "./doctor.js";
import { makeEmitCommand } from "./emit.js";
import { makeProbeCommand } from "./probe.js";
import { makeRunScenarioCommand } from "./run-scenario.js";
import { makeServeCommand } from "./serve.js";

export function parseLogLevel(value: string): LogLevel {
  const level = LOG_LEVELS.find(candidate => candidate === value);
  if (!level) {
    throw new InvalidArgumentError(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return level;
}

export function parseLogFormat(value: string): LogFormat {
  const format = LOG_FORMATS.find(candidate => candidate === value);
  if (!format) {
    throw new InvalidArgumentError(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return format;
}

// Determine defaults based on environment
export function getDefaultLogLevel(env: NodeJS.ProcessEnv = process.env): LogLevel {
  const envLevel = env["APPCTL_LOG_LEVEL"];
  return LOG_LEVELS.find(candidate => candidate === envLevel) ?? "info";
}

export function isNonInteractive(
  env: NodeJS.ProcessEnv = process.env,
  stdoutIsTty: boolean = process.stdout.isTTY
): boolean {
  return !stdoutIsTty || env["APPCTL_NON_INTERACTIVE"] === "1";
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function createProgram() {
  return new Command("appctl")
    .version("0.1.0")
    .description("Headless test harness for filesystem, network and clipboard capabilities")
    .addOption(
      new Option("-l, --log-level <level>", "Set log level")
        .choices(LOG_LEVELS)
        .default(getDefaultLogLevel())
        .argParser(parseLogLevel)
    )
    .addOption(
      new Option("--non-interactive", "Disable colours and terminal-only features").default(
        isNonInteractive()
      )
    )
    .addOption(
      new Option("-f, --format <format>", "Log output format")
        .choices(LOG_FORMATS)
        .default<LogFormat>(isNonInteractive() ? "json" : "nice")
        .argParser(parseLogFormat)
    )
    .addOption(
      new Option("-c, --config <path>", "Harness configuration file (YAML, JSON or TOML)").env(
        "APPCTL_CONFIG"
      )
    )
    .hook("preAction", thisCommand => {
      const options = thisCommand.opts();

      initializeLogger(options.format, options.nonInteractive, options.logLevel);
      setConfigPath(options.config);

      getCliLogger().debug(
        `Log level configured to: ${options.logLevel}, format: ${options.format}, non-interactive: ${options.nonInteractive}`
      );
    })
    .addCommand(makeDoctorCommand())
    .addCommand(makeCallCommand())
    .addCommand(makeProbeCommand())
    .addCommand(makeRunScenarioCommand())
    .addCommand(makeServeCommand())
    .addCommand(makeEmitCommand())
    .addCommand(makeCommandsCommand());
}
