/**
 * Event query routes.
 *
 * GET /api/v1/events           - List events in global order
 * GET /api/v1/events/types     - Registered event types
 * GET /api/v1/events/integrity - Hash chain verification
 */

import { Hono } from "hono";
import type { AppEnv } from "../types/api-contract.js";
import { EventQuerySchema } from "../types/dto.js";
import { createErrorEnvelope } from "../types/error.js";
import { formatZodErrors } from "../middleware/validate.js";

export function createEventRoutes(): Hono<AppEnv> {
  const routes = new Hono<AppEnv>();

  // GET /api/v1/events?type&fromPosition&limit
  routes.get("/", (c) => {
    const queryResult = EventQuerySchema.safeParse(c.req.query());
    if (!queryResult.success) {
      return c.json(
        createErrorEnvelope("VALIDATION_ERROR", "Invalid query parameters", {
          issues: formatZodErrors(queryResult.error),
        }),
        400,
      );
    }

    const query = queryResult.data;
    const events = c.get("service").readEvents({
      fromPosition: query.fromPosition,
      maxCount: query.limit,
      type: query.type,
    });

    const last = events.at(-1);
    return c.json({
      data: events,
      pagination: {
        count: events.length,
        nextPosition: last !== undefined && events.length === query.limit
          ? last.globalPosition + 1
          : null,
      },
    });
  });

  routes.get("/types", (c) => {
    const schemas = c.get("service").eventTypes();
    return c.json({
      data: schemas.map((s) => ({
        type: s.type,
        version: s.version,
        source: s.source,
        description: s.description,
      })),
    });
  });

  routes.get("/integrity", (c) => {
    return c.json({ data: c.get("service").verifyIntegrity() });
  });

  return routes;
}
