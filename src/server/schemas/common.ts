/**
 * Common TypeBox schemas for API validation
 */

import { Type, type Static, type TSchema } from "@sinclair/typebox";

import { ENTITY_TYPES, RAIL_NAMES } from "../../types/index.js";

// ============================================================================
// Pagination Schemas
// ============================================================================

export const PaginationQuerySchema = Type.Object({
  limit: Type.Optional(Type.Number({ minimum: 1, maximum: 500, default: 50 })),
  cursor: Type.Optional(Type.String()),
});

export type PaginationQuery = Static<typeof PaginationQuerySchema>;

export const PaginationMetaSchema = Type.Object({
  cursor: Type.Union([Type.String(), Type.Null()]),
  hasMore: Type.Boolean(),
  limit: Type.Number(),
  total: Type.Optional(Type.Number()),
});

// ============================================================================
// Error Schemas
// ============================================================================

export const ApiErrorSchema = Type.Object({
  error: Type.String(),
  message: Type.String(),
  details: Type.Optional(Type.Record(Type.String(), Type.Unknown())),
  requestId: Type.Optional(Type.String()),
});

export type ApiErrorType = Static<typeof ApiErrorSchema>;

// ============================================================================
// Response Wrapper Schemas
// ============================================================================

export function createResponseSchema<T extends TSchema>(dataSchema: T) {
  return Type.Object({
    data: dataSchema,
  });
}

export function createListResponseSchema<T extends TSchema>(itemSchema: T) {
  return Type.Object({
    data: Type.Array(itemSchema),
    meta: Type.Optional(
      Type.Object({
        pagination: Type.Optional(PaginationMetaSchema),
      })
    ),
  });
}

// ============================================================================
// Common Field Schemas
// ============================================================================

export const EntityTypeSchema = Type.Union(
  ENTITY_TYPES.map((type) => Type.Literal(type))
);

export const RailNameSchema = Type.Union(
  RAIL_NAMES.map((rail) => Type.Literal(rail))
);

export const NullableString = Type.Union([Type.String(), Type.Null()]);

export const NullableNumber = Type.Union([Type.Number(), Type.Null()]);

// ============================================================================
// Path Parameter Schemas
// ============================================================================

export const TenantParamSchema = Type.Object({
  tenantId: Type.String({ minLength: 1 }),
});

export type TenantParam = Static<typeof TenantParamSchema>;

export const TenantEntityParamSchema = Type.Object({
  tenantId: Type.String({ minLength: 1 }),
  entityType: EntityTypeSchema,
});

export type TenantEntityParam = Static<typeof TenantEntityParamSchema>;

export const TenantRecordParamSchema = Type.Object({
  tenantId: Type.String({ minLength: 1 }),
  entityType: EntityTypeSchema,
  entityId: Type.String({ minLength: 1 }),
});

export type TenantRecordParam = Static<typeof TenantRecordParamSchema>;

export const TenantRailParamSchema = Type.Object({
  tenantId: Type.String({ minLength: 1 }),
  rail: RailNameSchema,
});

export type TenantRailParam = Static<typeof TenantRailParamSchema>;

export const TenantKeyParamSchema = Type.Object({
  tenantId: Type.String({ minLength: 1 }),
  rail: RailNameSchema,
  entityType: EntityTypeSchema,
});

export type TenantKeyParam = Static<typeof TenantKeyParamSchema>;
