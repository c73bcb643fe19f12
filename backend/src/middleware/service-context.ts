/**
 * Service Context Middleware
 *
 * Makes the review service available to route handlers through the Hono
 * context, and parses JSON request bodies against the shared schemas.
 */

import type { Context, MiddlewareHandler } from "hono";
import type { z } from "zod";
import { formatZodError } from "@study-loop/shared";
import { ValidationError } from "../errors.js";
import type { ReviewService } from "../review-service.js";

/**
 * Hono environment shared by every API route.
 */
export interface AppEnv {
  Variables: {
    service: ReviewService;
  };
}

/**
 * Middleware that sets the review service in context via
 * c.set("service", service).
 */
export function serviceContext(service: ReviewService): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    c.set("service", service);
    await next();
  };
}

/**
 * Helper to get the review service from context.
 * Use this in route handlers after the middleware runs.
 */
export function getServiceFromContext(c: Context<AppEnv>): ReviewService {
  return c.get("service");
}

/**
 * Read a JSON body and validate it.
 *
 * @throws ValidationError for malformed JSON or a body the schema rejects
 */
export async function readJsonBody<T extends z.ZodTypeAny>(
  c: Context<AppEnv>,
  schema: T
): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new ValidationError("Invalid JSON in request body");
  }

  const result = schema.safeParse(body);
  if (!result.success) {
    throw new ValidationError(formatZodError(result.error));
  }
  return result.data;
}
