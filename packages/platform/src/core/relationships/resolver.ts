/**
 * Relationship Resolver
 *
 * Pure functions over relationship metadata:
 *   unvalidated → validateRelationshipMetadata → validated
 *   validated   → resolveRelationship          → resolved (table + key fields)
 *
 * Table names follow `rel_{1|N}_{a}_{1|M}_{b}` and are cut to 64 characters
 * with no disambiguation; the Metadata Engine reports names that collide.
 */

import {
  isCascadeAction,
  isRelationshipType,
  type FieldDescriptor,
  type FieldMap,
  type Logger,
  type RelationshipParticipants,
  type RelationshipSource,
  type ResolvedRelationship,
  type ValidatedRelationship,
} from "@schemata/contracts";
import { SchemaError } from "../errors/index.js";

export const MAX_TABLE_NAME_LENGTH = 64;

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

function requireKey(
  source: RelationshipSource,
  key: "name" | "type" | "modelA" | "modelB" | "modelOne" | "modelMany"
): string {
  const value = source[key];
  if (value === undefined || value.trim() === "") {
    const subject = source.name ?? "(unnamed)";
    throw new SchemaError(`Relationship "${subject}" is missing required key "${key}"`, {
      subject,
      key,
    });
  }
  return value;
}

function participantsOf(source: RelationshipSource, type: string): RelationshipParticipants {
  if (!isRelationshipType(type)) {
    throw new SchemaError(
      `Relationship "${source.name}" has unknown type "${type}". Expected OneToOne, OneToMany or ManyToMany`,
      { subject: source.name, key: type }
    );
  }
  switch (type) {
    case "OneToOne":
      return { type, modelA: requireKey(source, "modelA"), modelB: requireKey(source, "modelB") };
    case "OneToMany":
      return { type, modelOne: requireKey(source, "modelOne"), modelMany: requireKey(source, "modelMany") };
    case "ManyToMany":
      return { type, modelA: requireKey(source, "modelA"), modelB: requireKey(source, "modelB") };
  }
}

/**
 * Confirms the type-specific keys are present.
 * Throws SchemaError naming the first missing key, the unknown type, or the
 * unknown cascade action. Cascade defaults to restrict.
 */
export function validateRelationshipMetadata(source: RelationshipSource): ValidatedRelationship {
  const name = requireKey(source, "name");
  const type = requireKey(source, "type");
  const participants = participantsOf(source, type);

  const cascadeDelete = source.constraints?.cascadeDelete ?? "restrict";
  if (!isCascadeAction(cascadeDelete)) {
    throw new SchemaError(
      `Relationship "${name}" has unknown cascade action "${cascadeDelete}". Expected restrict, cascade or softDelete`,
      { subject: name, key: cascadeDelete }
    );
  }

  return {
    ...participants,
    name,
    label: source.label,
    description: source.description,
    fields: source.fields ?? {},
    additionalFields: source.additionalFields ?? {},
    cascadeDelete,
    unique: source.constraints?.unique ?? false,
  };
}

// ---------------------------------------------------------------------------
// Generation
// ---------------------------------------------------------------------------

/** The table name before truncation */
export function untruncatedTableName(relationship: RelationshipParticipants): string {
  switch (relationship.type) {
    case "OneToOne":
      return `rel_1_${relationship.modelA.toLowerCase()}_1_${relationship.modelB.toLowerCase()}`;
    case "OneToMany":
      return `rel_1_${relationship.modelOne.toLowerCase()}_M_${relationship.modelMany.toLowerCase()}`;
    case "ManyToMany":
      return `rel_N_${relationship.modelA.toLowerCase()}_M_${relationship.modelB.toLowerCase()}`;
  }
}

export function generateTableName(relationship: RelationshipParticipants): string {
  return untruncatedTableName(relationship).slice(0, MAX_TABLE_NAME_LENGTH);
}

function keyField(
  name: string,
  participant: string,
  rules: string[]
): FieldDescriptor {
  return {
    name,
    type: "ID",
    label: `${participant} ID`,
    required: true,
    relatedModel: participant,
    relatedFieldName: "id",
    validationRules: rules,
  };
}

/** The generated foreign-key descriptors, in participant order */
export function generateKeyFields(relationship: RelationshipParticipants): FieldDescriptor[] {
  switch (relationship.type) {
    case "OneToOne":
      return [
        keyField(`${relationship.modelA.toLowerCase()}_id`, relationship.modelA, ["Unique", "ForeignKeyExists"]),
        keyField(`${relationship.modelB.toLowerCase()}_id`, relationship.modelB, ["Unique", "ForeignKeyExists"]),
      ];
    case "OneToMany":
      return [
        keyField(`one_${relationship.modelOne.toLowerCase()}_id`, relationship.modelOne, ["ForeignKeyExists"]),
        keyField(`many_${relationship.modelMany.toLowerCase()}_id`, relationship.modelMany, ["ForeignKeyExists"]),
      ];
    case "ManyToMany":
      return [
        keyField(`${relationship.modelA.toLowerCase()}_id`, relationship.modelA, ["ForeignKeyExists"]),
        keyField(`${relationship.modelB.toLowerCase()}_id`, relationship.modelB, ["ForeignKeyExists"]),
      ];
  }
}

/**
 * Validates and resolves raw metadata.
 * Fields are merged as: declared fields, generated keys, additional fields.
 * An additional field named like a generated key is dropped with a warning.
 */
export function resolveRelationship(
  source: RelationshipSource,
  options: { logger?: Logger } = {}
): ResolvedRelationship {
  const validated = validateRelationshipMetadata(source);
  const keys = generateKeyFields(validated);
  const keyNames = keys.map((key) => key.name);

  const fields: FieldMap = { ...validated.fields };
  for (const key of keys) {
    fields[key.name] = key;
  }
  for (const [fieldName, field] of Object.entries(validated.additionalFields)) {
    if (keyNames.includes(fieldName)) {
      options.logger?.warn("Additional field collides with a generated key and was dropped", {
        relationship: validated.name,
        field: fieldName,
      });
      continue;
    }
    fields[fieldName] = field;
  }

  return {
    ...validated,
    fields,
    tableName: generateTableName(validated),
    keyFields: keyNames,
  };
}

// ---------------------------------------------------------------------------
// Lookup
// ---------------------------------------------------------------------------

/** Raw or resolved relationship metadata */
export type RelationshipLike = { type: string } & Pick<
  RelationshipSource,
  "modelA" | "modelB" | "modelOne" | "modelMany"
>;

/**
 * The key field holding the given participant's id.
 * Participant names compare case-insensitively. For a OneToMany whose two
 * sides are the same entity, the "one" side wins.
 */
export function modelIdField(relationship: RelationshipLike, participant: string): string {
  const lower = participant.toLowerCase();
  const matches = (value: string | undefined): boolean => value?.toLowerCase() === lower;

  switch (relationship.type) {
    case "OneToOne":
    case "ManyToMany":
      if (matches(relationship.modelA) || matches(relationship.modelB)) return `${lower}_id`;
      break;
    case "OneToMany":
      if (matches(relationship.modelOne)) return `one_${lower}_id`;
      if (matches(relationship.modelMany)) return `many_${lower}_id`;
      break;
    default:
      throw new SchemaError(`Unknown relationship type "${relationship.type}"`, {
        key: relationship.type,
      });
  }

  throw new SchemaError(`"${participant}" does not participate in this ${relationship.type} relationship`, {
    key: participant,
  });
}
