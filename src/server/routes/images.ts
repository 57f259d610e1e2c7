/**
 * Image URL API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { createResponseSchema } from "../schemas/common.js";

import type { ServerDeps } from "../app.js";
import type { FastifyInstance } from "fastify";

const RefreshQuerySchema = Type.Object({
  maxWorkers: Type.Optional(Type.Integer({ minimum: 1, maximum: 100 })),
});

type RefreshQuery = Static<typeof RefreshQuerySchema>;

const RefreshResponseSchema = createResponseSchema(
  Type.Object({
    refreshed: Type.Number(),
    presentationUpdated: Type.Number(),
  })
);

const StateCountsSchema = Type.Object({
  NoUrl: Type.Number(),
  Valid: Type.Number(),
  ExpiringSoon: Type.Number(),
  Expired: Type.Number(),
  unrecoverable: Type.Number(),
});

const UrlStatusResponseSchema = createResponseSchema(
  Type.Object({
    building: StateCountsSchema,
    address: StateCountsSchema,
  })
);

export function registerImageRoutes(app: FastifyInstance, deps: ServerDeps): void {
  // POST /images/refresh - Re-sign expiring URLs and update unified markup
  app.post<{ Querystring: RefreshQuery }>(
    "/images/refresh",
    {
      schema: {
        summary: "Refresh signed image URLs",
        description:
          "Re-signs stored image URLs that are expired or within the refresh threshold, then copies them into the unified table",
        tags: ["Images"],
        querystring: RefreshQuerySchema,
        response: {
          200: RefreshResponseSchema,
        },
      },
    },
    async (request) => {
      const refreshed = await deps.orchestrator.refreshExpiredUrls(request.query.maxWorkers);
      const presentationUpdated =
        refreshed > 0 ? await deps.orchestrator.syncPresentationFields() : 0;
      return { data: { refreshed, presentationUpdated } };
    }
  );

  // GET /images/url-status - Stored URLs by state
  app.get(
    "/images/url-status",
    {
      schema: {
        summary: "Inspect signed image URLs",
        description: "Counts stored image URLs by expiry state for each image role",
        tags: ["Images"],
        response: {
          200: UrlStatusResponseSchema,
        },
      },
    },
    async () => {
      const report = await deps.orchestrator.urlManager().inspectUrls();
      return { data: report };
    }
  );
}
