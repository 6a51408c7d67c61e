/**
 * Zod validation middleware.
 *
 * Validates the JSON request body against a Zod schema and exposes the
 * parsed value to the handler, typed by the schema.
 * Returns 400 with an error envelope on failure.
 */

import type { MiddlewareHandler } from "hono";
import type { z, ZodError } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { createErrorEnvelope } from "../types/error.js";

type WithBody<S extends z.ZodTypeAny> = AppEnv & {
  Variables: { validatedBody: z.output<S> };
};

/**
 * Validate the JSON request body. On success, sets `validatedBody`.
 */
export function validateBody<S extends z.ZodTypeAny>(
  schema: S,
): MiddlewareHandler<WithBody<S>> {
  return async (c, next) => {
    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid JSON in request body"),
        400,
      );
    }

    const result = schema.safeParse(body);
    if (!result.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Request body validation failed", {
          issues: formatZodErrors(result.error),
        }),
        400,
      );
    }

    c.set("validatedBody", result.data);
    return next();
  };
}

export function formatZodErrors(
  error: ZodError,
): readonly { path: string; message: string }[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message,
  }));
}
