// pattern: Functional Core
// One JSON request per line in, one JSON response per line out.

import { type Static, Type } from "@sinclair/typebox";

import { runDoctor } from "../doctor/index.js";
import { ErrorCode, type ErrorInfo, type ExecutionResult } from "../engine/types.js";
import { runProbe } from "../probes/runner.js";
import { compileValidator } from "../utils/ajv.js";
import { ValidationError } from "../utils/errors.js";

import type { CommandRegistry } from "../commands/registry.js";
import type { ExecutionContext } from "../engine/context.js";

/** Stands in for the id of a request that could not be parsed */
export const PLACEHOLDER_ID = "unknown";

export const DaemonRequest = Type.Object({
  id: Type.String(),
  method: Type.String(),
  // Any JSON value; only an object's fields are read
  params: Type.Optional(Type.Unknown()),
});
export type DaemonRequest = Static<typeof DaemonRequest>;

export interface DaemonResponse {
  id: string;
  result?: ExecutionResult;
  error?: ErrorInfo;
}

const validateRequest = compileValidator(DaemonRequest, "Request");

export interface DaemonDeps {
  registry: CommandRegistry;
  context: ExecutionContext;
}

function errorResponse(id: string, message: string): DaemonResponse {
  return { id, error: { code: ErrorCode.InvalidInput, message } };
}

/**
 * Parse a request line. Returns a ready error response when it is not a request.
 */
export function parseRequest(line: string): DaemonRequest | DaemonResponse {
  try {
    return validateRequest(JSON.parse(line));
  } catch (error) {
    if (error instanceof SyntaxError || error instanceof ValidationError) {
      return errorResponse(PLACEHOLDER_ID, `invalid JSON request: ${error.message}`);
    }
    throw error;
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function stringParam(params: Record<string, unknown>, key: string): string {
  const value = params[key];
  return typeof value === "string" ? value : "";
}

export async function dispatchRequest(
  request: DaemonRequest,
  { registry, context }: DaemonDeps
): Promise<DaemonResponse> {
  const params: Record<string, unknown> = isObject(request.params) ? request.params : {};
  let result: ExecutionResult;

  switch (request.method) {
    case "call":
      result = await registry.execute(stringParam(params, "cmd"), params["args"] ?? {}, context);
      break;
    case "probe":
      result = await runProbe(stringParam(params, "target"), context);
      break;
    case "doctor":
      result = await runDoctor(context.logger);
      break;
    default:
      return errorResponse(request.id, `unknown method: ${request.method}`);
  }

  return { id: request.id, result };
}

export async function handleRequestLine(
  line: string,
  deps: DaemonDeps
): Promise<DaemonResponse> {
  const parsed = parseRequest(line);
  if ("method" in parsed) {
    return dispatchRequest(parsed, deps);
  }
  deps.context.logger.warn({ component: "daemon", error: parsed.error }, "Malformed request line");
  return parsed;
}
