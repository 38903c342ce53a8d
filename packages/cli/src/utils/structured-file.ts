// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { extname } from "node:path";
import { parse as parseYaml } from "yaml";

import { ValidationError } from "./errors.js";

export type StructuredFormat = "json" | "yaml" | "toml";

/**
 * Pick a document format from a file extension. Unknown extensions read as YAML,
 * which also accepts plain JSON.
 */
export function formatForPath(filePath: string): StructuredFormat {
  switch (extname(filePath).toLowerCase()) {
    case ".json":
      return "json";
    case ".toml":
      return "toml";
    default:
      return "yaml";
  }
}

/**
 * Parse document text into a plain value. Syntax errors become ValidationError.
 */
export function parseStructuredText(
  content: string,
  format: StructuredFormat
): unknown {
  try {
    switch (format) {
      case "json":
        return JSON.parse(content);
      case "toml":
        return parseToml(content);
      case "yaml":
        return parseYaml(content);
    }
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`invalid ${format.toUpperCase()} document: ${detail}`);
  }
}
