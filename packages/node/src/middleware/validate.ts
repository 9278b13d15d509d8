/**
 * zod validation of request bodies and query strings. Either failure is a
 * 400 VALIDATION_ERROR whose `details.issues` holds one `{ path, message }`
 * per failed field, thrown as ApiError for the error handler to render.
 */

import type { MiddlewareHandler } from "hono";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { AppEnv } from "../types/api-contract.js";
import { ApiError } from "../types/error.js";

type Schema<T> = ZodType<T, ZodTypeDef, unknown>;

/** Environment of a handler that runs after validateBody(). */
export interface ValidatedEnv<T> {
  Variables: AppEnv["Variables"] & { validatedBody: T };
}

function rejection(message: string, error?: ZodError): ApiError {
  const issues = error?.issues.map((issue) => ({ path: issue.path.join("."), message: issue.message }));
  return new ApiError(400, "VALIDATION_ERROR", message, issues === undefined ? undefined : { issues });
}

/** Parsed body lands in `c.get("validatedBody")`. */
export function validateBody<T>(schema: Schema<T>): MiddlewareHandler<ValidatedEnv<T>> {
  return async (c, next) => {
    const raw: unknown = await c.req.json().catch((error: unknown) => {
      throw rejection(`Invalid JSON in request body: ${error instanceof Error ? error.message : String(error)}`);
    });
    const result = schema.safeParse(raw);
    if (!result.success) {
      throw rejection("Request body validation failed", result.error);
    }
    c.set("validatedBody", result.data);
    await next();
  };
}

export function parseQuery<T>(schema: Schema<T>, query: Record<string, string>): T {
  const result = schema.safeParse(query);
  if (!result.success) {
    throw rejection("Invalid query parameters", result.error);
  }
  return result.data;
}
