/**
 * Entity Metadata
 *
 * An Entity is a business object that the application manages: Users,
 * Movies, Movie_Quotes. Entities are declared as data, one schema file per
 * entity, and the platform uses that data to:
 *   - Materialize typed field objects per record
 *   - Resolve relationships and their generated tables
 *   - Describe filterable / sortable fields to API consumers
 */

import { z } from "zod";
import { fieldMapSchema, type FieldDescriptor } from "./field.js";
import { relationshipSourceSchema, type RelationshipSource } from "./relationship.js";

// ---------------------------------------------------------------------------
// List configuration
// ---------------------------------------------------------------------------

export const sortConfigSchema = z.object({
  field: z.string().min(1),
  direction: z.enum(["asc", "desc"]),
});

/** Sort direction for default list ordering */
export type SortConfig = z.infer<typeof sortConfigSchema>;

export const paginationConfigSchema = z.object({
  defaultPageSize: z.number().int().positive(),
  maxPageSize: z.number().int().positive(),
});

export type PaginationConfig = z.infer<typeof paginationConfigSchema>;

// ---------------------------------------------------------------------------
// Schema source
// ---------------------------------------------------------------------------

/**
 * The shape of an entity schema file.
 * `relationships` lists relationship names, or inline relationship metadata.
 */
export const entitySchemaSourceSchema = z.object({
  name: z.string().min(1),
  table: z.string().min(1).optional(),
  description: z.string().optional(),
  fields: fieldMapSchema,
  relationships: z.array(z.union([z.string().min(1), relationshipSourceSchema])).optional(),
  searchableFields: z.array(z.string()).optional(),
  sortableFields: z.array(z.string()).optional(),
  defaultSort: sortConfigSchema.optional(),
  pagination: paginationConfigSchema.optional(),
});

export type EntitySchemaSource = z.infer<typeof entitySchemaSourceSchema>;

// ---------------------------------------------------------------------------
// Merged metadata
// ---------------------------------------------------------------------------

/**
 * The minimum a record type needs for runtime materialization.
 * Shared by entities and relationships.
 */
export interface ModelMetadata {
  name: string;
  table: string;
  fields: Record<string, FieldDescriptor>;
}

/**
 * Entity metadata after core fields have been merged in.
 * Core fields come first; entity-declared fields win on name collision.
 */
export interface EntityMetadata extends ModelMetadata {
  description?: string;
  relationships: Array<string | RelationshipSource>;
  searchableFields?: string[];
  sortableFields?: string[];
  defaultSort?: SortConfig;
  pagination?: PaginationConfig;
}

/** Validates merged entity metadata read back from a serialized cache */
export const entityMetadataSchema = entitySchemaSourceSchema.extend({
  table: z.string().min(1),
  relationships: z.array(z.union([z.string().min(1), relationshipSourceSchema])),
});

/** Compact description of an entity for listings */
export interface EntitySummary {
  name: string;
  table: string;
  description: string;
  fieldCount: number;
  relationshipCount: number;
}
