// pattern: Imperative Shell

import { CapabilityError, CommandError } from "../utils/errors.js";

import type { CommandHandler } from "./types.js";

function stringField(args: unknown, field: string): string {
  if (typeof args === "object" && args !== null && field in args) {
    const value: unknown = Reflect.get(args, field);
    if (typeof value === "string") {
      return value;
    }
  }
  throw CommandError.invalidInput(`missing '${field}' string field`);
}

async function capability<T>(operation: Promise<T>): Promise<T> {
  try {
    return await operation;
  } catch (error) {
    if (error instanceof CapabilityError) {
      throw CommandError.fromCapability(error);
    }
    throw error;
  }
}

export const ping: CommandHandler = async () => ({ pong: true });

/**
 * Invalid UTF-8 sequences are replaced, never rejected
 */
export const readFile: CommandHandler = async (args, context) => {
  const path = stringField(args, "path");
  const bytes = await capability(context.fs.read(path));
  return {
    content: new TextDecoder("utf-8").decode(bytes),
    size_bytes: bytes.byteLength,
  };
};

export const writeFile: CommandHandler = async (args, context) => {
  const path = stringField(args, "path");
  const content = stringField(args, "content");
  const bytes = new TextEncoder().encode(content);
  await capability(context.fs.write(path, bytes));
  return { bytes_written: bytes.byteLength };
};

export const BUILTIN_COMMANDS: Readonly<Record<string, CommandHandler>> = {
  ping,
  read_file: readFile,
  write_file: writeFile,
};
