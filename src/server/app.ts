import Fastify, { type FastifyInstance, type FastifyServerOptions } from "fastify";

import { fastifyLoggerConfig } from "../logger.js";
import { errorHandler } from "./plugins/error-handler.js";
import { registerApiRoutes } from "./routes/index.js";

import type { Database } from "../db/types.js";
import type { SyncOrchestrator } from "../services/sync/orchestrator.js";
import type { Kysely } from "kysely";

export interface ServerDeps {
  db: Kysely<Database>;
  orchestrator: SyncOrchestrator;
}

/**
 * Build the Fastify app without listening, so tests can `inject` into it
 */
export async function buildServer(
  deps: ServerDeps,
  logger: FastifyServerOptions["logger"] = fastifyLoggerConfig
): Promise<FastifyInstance> {
  const app = Fastify({ logger });

  // Register error handler
  await app.register(errorHandler);

  // Register API routes
  await registerApiRoutes(app, deps);

  return app;
}
