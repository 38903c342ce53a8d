// pattern: Functional Core

export type JsonArgument =
  | { ok: true; value: unknown }
  | { ok: false; message: string };

/**
 * Parse a JSON command-line value, e.g. --args '{"path":"/tmp/x"}'
 */
export function parseJsonArgument(text: string, label: string): JsonArgument {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return { ok: false, message: `invalid JSON ${label}: ${detail}` };
  }
}
