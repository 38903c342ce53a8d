// pattern: Functional Core
import AjvModule from "ajv";
import ajvErrorsModule from "ajv-errors";
import ajvFormatsModule from "ajv-formats";

import { ValidationError } from "./errors.js";

import type { Static, TSchema } from "@sinclair/typebox";

// These packages are CommonJS; from ESM the default import is module.exports
const Ajv = AjvModule.default;
const addErrors = ajvErrorsModule.default;
const addFormats = ajvFormatsModule.default;

// Shared AJV instance for the TypeBox schemas in this package
const ajv = new Ajv({
  // Ignore TypeBox's custom attributes (Symbol keys)
  strict: false,
  allowUnionTypes: true,
  // Required for ajv-errors
  allErrors: true,
});

addFormats(ajv, ["uri", "uuid", "date-time"]);

// Allows `errorMessage` on schemas
addErrors(ajv);

/**
 * Compile a TypeBox schema into a function that returns the typed value
 * or throws a ValidationError listing every failure.
 */
export function compileValidator<T extends TSchema>(
  schema: T,
  label: string
): (data: unknown) => Static<T> {
  const validate = ajv.compile<Static<T>>(schema);

  return (data: unknown): Static<T> => {
    if (validate(data)) {
      return data;
    }

    const messages = (validate.errors ?? []).map(
      err => `${err.instancePath || "root"}: ${err.message ?? "invalid"}`
    );
    throw new ValidationError(
      `${label} validation failed: ${messages.join(", ")}`,
      messages
    );
  };
}

export { ajv };
