/**
 * Global error and not-found handlers.
 *
 * Produces the JSON error envelope for anything a route throws.
 * Hono's HTTPException keeps its status; everything else is a 500
 * with no internal detail in the body.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { createErrorEnvelope } from "../types/error.js";

/**
 * Global error handler. Registered as Hono's onError handler.
 */
export function handleError(err: Error, c: Context): Response {
  if (err instanceof HTTPException) {
    const status = err.status;
    const code = status === 404 ? "NOT_FOUND" : "HTTP_ERROR";
    return c.json(createErrorEnvelope(code, err.message), status);
  }

  return c.json(
    createErrorEnvelope("INTERNAL_ERROR", "Internal server error"),
    500,
  );
}

/**
 * Not-found handler. Registered as Hono's notFound handler.
 */
export function handleNotFound(c: Context): Response {
  return c.json(
    createErrorEnvelope("NOT_FOUND", `No route for ${c.req.method} ${c.req.path}`),
    404,
  );
}
