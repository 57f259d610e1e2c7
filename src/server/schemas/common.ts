/**
 * Common TypeBox schemas for API validation
 */

import { Type, type TSchema } from "@sinclair/typebox";

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

// ============================================================================
// Shared Field Schemas
// ============================================================================

export const NullableString = Type.Union([Type.String(), Type.Null()]);

export const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

export const DocumentSchema = Type.Union([
  Type.Record(Type.String(), Type.Unknown()),
  Type.Null(),
]);

export const SyncStreamSchema = Type.Union([
  Type.Literal("main_submissions"),
  Type.Literal("person_details"),
  Type.Literal("image_processing"),
  Type.Literal("url_refresh"),
  Type.Literal("unified_rebuild"),
]);

export const SyncRunStatusSchema = Type.Union([
  Type.Literal("pending"),
  Type.Literal("in_progress"),
  Type.Literal("success"),
  Type.Literal("error"),
]);
