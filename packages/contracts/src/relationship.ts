/**
 * Relationship Definitions
 *
 * Declares how entities relate to each other. A relationship is itself a
 * record type: it owns a generated table and generated foreign-key fields.
 *
 * Raw relationship metadata (`RelationshipSource`) is deliberately loose:
 * the platform's relationship resolver validates the type-specific keys
 * and reports exactly which key is missing.
 */

import { z } from "zod";
import { fieldMapSchema, type FieldDescriptor } from "./field.js";

/** Supported relationship cardinalities */
export const RELATIONSHIP_TYPES = ["OneToOne", "OneToMany", "ManyToMany"] as const;

export type RelationshipType = (typeof RELATIONSHIP_TYPES)[number];

export function isRelationshipType(value: string): value is RelationshipType {
  return (RELATIONSHIP_TYPES as readonly string[]).includes(value);
}

/**
 * Policy applied to related rows when an owning entity is deleted.
 * `softDelete` behaves like `cascade` and exists for call-site clarity.
 */
export const CASCADE_ACTIONS = ["restrict", "cascade", "softDelete"] as const;

export type CascadeAction = (typeof CASCADE_ACTIONS)[number];

export function isCascadeAction(value: string): value is CascadeAction {
  return (CASCADE_ACTIONS as readonly string[]).includes(value);
}

export const relationshipConstraintsSchema = z.object({
  unique: z.boolean().optional(),
  /** Validated by the resolver, so any string is accepted here */
  cascadeDelete: z.string().optional(),
});

/**
 * Relationship metadata as declared in a schema file, or inline in an
 * entity's `relationships` list.
 */
export const relationshipSourceSchema = z.object({
  name: z.string().optional(),
  type: z.string().optional(),
  label: z.string().optional(),
  description: z.string().optional(),
  modelA: z.string().optional(),
  modelB: z.string().optional(),
  modelOne: z.string().optional(),
  modelMany: z.string().optional(),
  /** Fields stored on the relationship row (core fields are merged in on load) */
  fields: fieldMapSchema.optional(),
  /** Extra non-key columns, merged after the generated key fields */
  additionalFields: fieldMapSchema.optional(),
  constraints: relationshipConstraintsSchema.optional(),
});

export type RelationshipSource = z.infer<typeof relationshipSourceSchema>;

/** The participants of a validated relationship, discriminated by type */
export type RelationshipParticipants =
  | { type: "OneToOne"; modelA: string; modelB: string }
  | { type: "OneToMany"; modelOne: string; modelMany: string }
  | { type: "ManyToMany"; modelA: string; modelB: string };

/** Relationship metadata whose type-specific keys have been confirmed */
export type ValidatedRelationship = RelationshipParticipants & {
  name: string;
  label?: string;
  description?: string;
  fields: Record<string, FieldDescriptor>;
  additionalFields: Record<string, FieldDescriptor>;
  cascadeDelete: CascadeAction;
  unique: boolean;
};

/**
 * A relationship after table-name and key-field generation.
 * `fields` holds declared fields, then generated keys, then additional fields.
 */
export type ResolvedRelationship = ValidatedRelationship & {
  tableName: string;
  /** Generated foreign-key field names, in participant order */
  keyFields: string[];
};

/**
 * An entry of `allRelationships()`. Relationships declared inline in an
 * entity schema carry the owning entity's name.
 */
export type RelationshipEntry = RelationshipSource & {
  sourceEntity?: string;
};
