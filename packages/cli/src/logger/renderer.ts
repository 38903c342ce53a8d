// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

interface PinoLogObject {
  level: number;
  time?: number;
  msg?: string;
  [key: string]: unknown;
}

export interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(chalk.yellow(`    ${err.message}`));
  }

  // Serializer already trimmed the stack to an array in nice mode
  if ("stack" in err) {
    const stack = err.stack;
    const stackLines = Array.isArray(stack)
      ? stack
      : typeof stack === "string"
        ? stack.split("\n").slice(1, 9)
        : [];
    for (const line of stackLines) {
      const trimmed = String(line).trim();
      if (trimmed) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmed}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

/**
 * Render a single pino record as one human-readable line
 */
export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  const {
    level,
    msg,
    err,
    component,
    time: _time,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    ...extra
  } = logObj;

  let levelDisplay: string;
  let msgColor: ChalkInstance = chalk.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = chalk.green("+");
      break;
    case 20: // debug
      levelDisplay = chalk.cyan("=");
      break;
    case 30: // info
      levelDisplay = chalk.gray(">");
      break;
    case 40: // warn
      levelDisplay = chalk.yellowBright("W");
      msgColor = chalk.yellow;
      break;
    case 50: // error
      levelDisplay = chalk.inverse.red("E");
      msgColor = chalk.red;
      break;
    case 60: // fatal
      levelDisplay = chalk.inverse.redBright("E");
      msgColor = chalk.red;
      break;
    default:
      levelDisplay = chalk.gray("  LOG  ");
  }

  const scope =
    typeof component === "string" ? `${chalk.magenta(`[${component}]`)} ` : "";
  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, chalk) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${scope}${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export function createRenderer(options: RendererOptions = {}): Transform {
  const chalk = new Chalk({ level: options.colorize === false ? 0 : 1 });

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback) {
      const lines = chunk.toString().split("\n");
      const formattedLines: string[] = [];

      for (const line of lines) {
        if (!line.trim()) continue;
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed)
              ? formatLogObject(parsed, chalk)
              : `${line}\n`
          );
        } catch {
          // Unparseable lines pass through untouched
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
