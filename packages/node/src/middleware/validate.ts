/**
 * Request input validation.
 *
 * Parses the JSON body (or a route parameter) against a zod schema and
 * throws RequestValidationError on failure; the error handler answers 400.
 */

import type { Context } from "hono";
import type { ZodError, ZodTypeAny, output } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { RequestValidationError } from "../types/error.js";

export async function parseBody<S extends ZodTypeAny>(
  c: Context<AppEnv>,
  schema: S,
): Promise<output<S>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch (err) {
    throw new RequestValidationError("Invalid JSON in request body", {
      reason: err instanceof Error ? err.message : String(err),
    });
  }
  return parseValue(schema, body, "Request body validation failed");
}

export function parseValue<S extends ZodTypeAny>(
  schema: S,
  value: unknown,
  message: string,
): output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new RequestValidationError(message, {
      issues: formatZodErrors(result.error),
    });
  }
  return result.data;
}

function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
