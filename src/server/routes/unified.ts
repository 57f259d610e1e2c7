/**
 * Unified Table API Routes
 */

import { Type, type Static } from "@sinclair/typebox";

import { NotFoundError } from "../plugins/error-handler.js";
import {
  ApiErrorSchema,
  createResponseSchema,
  DocumentSchema,
  NullableString,
} from "../schemas/common.js";

import type { ServerDeps } from "../app.js";
import type { FastifyInstance } from "fastify";

// ============================================================================
// Schemas
// ============================================================================

const RebuildQuerySchema = Type.Object({
  force: Type.Optional(Type.Boolean({ default: false })),
});

type RebuildQuery = Static<typeof RebuildQuerySchema>;

const RebuildResponseSchema = createResponseSchema(
  Type.Object({
    rebuilt: Type.Boolean(),
  })
);

const UuidParamsSchema = Type.Object({
  uuid: Type.String({ minLength: 1 }),
});

type UuidParams = Static<typeof UuidParamsSchema>;

const UnifiedRowSchema = Type.Object({
  uuid: Type.String(),
  instance_id: NullableString,
  submitted_at: NullableString,
  survey_date: NullableString,
  review_state: NullableString,
  submitter_name: NullableString,

  address_plus_code: NullableString,
  street: NullableString,
  town: NullableString,
  district: NullableString,
  property_name: NullableString,
  building_type: NullableString,

  property_location: DocumentSchema,
  property_description: DocumentSchema,
  end_section: DocumentSchema,

  building_image_url: NullableString,
  address_image_url: NullableString,

  person_details: Type.Array(Type.Record(Type.String(), Type.Unknown())),
  person_count: Type.Number(),

  building_image_html: NullableString,
  address_image_html: NullableString,
  source_link_html: NullableString,

  total_rent_gmd: Type.Number(),
  commercial_income: Type.Number(),
  residential_income: Type.Number(),
  business_income: Type.Number(),
  commercial_tax: Type.Number(),
  residential_tax: Type.Number(),
  business_tax: Type.Number(),
  total_tax_liability: Type.Number(),
  amount_paid: Type.Number(),
  owner_status: Type.Union([Type.Literal("Owner"), Type.Literal("No Owner")]),

  processed_at: Type.String(),
});

const UnifiedRowResponseSchema = createResponseSchema(UnifiedRowSchema);

// ============================================================================
// Route Registration
// ============================================================================

export function registerUnifiedRoutes(app: FastifyInstance, deps: ServerDeps): void {
  // POST /unified/rebuild - Rebuild the unified table
  app.post<{ Querystring: RebuildQuery }>(
    "/unified/rebuild",
    {
      schema: {
        summary: "Rebuild the unified table",
        description:
          "Rebuilds submissions_unified from the source tables. Without force an existing table is left as it is.",
        tags: ["Unified"],
        querystring: RebuildQuerySchema,
        response: {
          200: RebuildResponseSchema,
        },
      },
    },
    async (request) => {
      const rebuilt = await deps.orchestrator.rebuildUnified(request.query.force ?? false);
      return { data: { rebuilt } };
    }
  );

  // GET /unified/:uuid - One unified row
  app.get<{ Params: UuidParams }>(
    "/unified/:uuid",
    {
      schema: {
        summary: "Get a unified row",
        description:
          "Returns the unified row of a submission with its nested person list",
        tags: ["Unified"],
        params: UuidParamsSchema,
        response: {
          200: UnifiedRowResponseSchema,
          404: ApiErrorSchema,
        },
      },
    },
    async (request) => {
      const row = await deps.orchestrator.builder.findRow(request.params.uuid);
      if (row === null) {
        throw new NotFoundError(`Unified row ${request.params.uuid} not found`);
      }
      return { data: row };
    }
  );
}
