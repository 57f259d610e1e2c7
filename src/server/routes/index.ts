/**
 * API Routes Registration
 */

import { Type } from "@sinclair/typebox";

import { checkConnection } from "../../db/connection.js";
import { registerImageRoutes } from "./images.js";
import { registerSyncRoutes } from "./sync.js";
import { registerUnifiedRoutes } from "./unified.js";

import type { ServerDeps } from "../app.js";
import type { FastifyInstance } from "fastify";

// Health check response schema
const HealthResponseSchema = Type.Object(
  {
    status: Type.Union([Type.Literal("ok"), Type.Literal("degraded")]),
    database: Type.Boolean(),
  },
  {
    examples: [{ status: "ok", database: true }],
  }
);

/**
 * Register all API v1 routes
 */
export async function registerApiRoutes(
  app: FastifyInstance,
  deps: ServerDeps
): Promise<void> {
  // Health check (no version prefix)
  app.get(
    "/health",
    {
      schema: {
        summary: "Health check",
        description: "Returns the health status of the API and its database",
        tags: ["Health"],
        response: {
          200: HealthResponseSchema,
          503: HealthResponseSchema,
        },
      },
    },
    async (_request, reply) => {
      const database = await checkConnection(deps.db);
      return reply
        .status(database ? 200 : 503)
        .send({ status: database ? ("ok" as const) : ("degraded" as const), database });
    }
  );

  // API v1 routes
  await app.register(
    (api, _options, done) => {
      registerSyncRoutes(api, deps);
      registerUnifiedRoutes(api, deps);
      registerImageRoutes(api, deps);
      done();
    },
    { prefix: "/api/v1" }
  );
}
