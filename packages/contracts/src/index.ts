/**
 * @schemata/contracts
 *
 * Public API: the shared boundary between platform and domain.
 * Both sides import from this package. Neither imports from the other.
 */

// Field types and operators
export type { FieldType, FilterOperator } from "./field-types.js";
export {
  FIELD_TYPES,
  FILTER_OPERATORS,
  OPERATOR_DESCRIPTIONS,
  isFieldType,
  normalizeFieldType,
  zodSchemaForFieldType,
} from "./field-types.js";

// Field descriptors
export type {
  FieldDescriptor,
  FieldEntry,
  FieldMap,
  FieldOverrides,
} from "./field.js";
export {
  fieldTypeSchema,
  fieldDescriptorSchema,
  fieldEntrySchema,
  fieldMapSchema,
} from "./field.js";

// Entities
export type {
  EntitySchemaSource,
  EntityMetadata,
  EntitySummary,
  ModelMetadata,
  PaginationConfig,
  SortConfig,
} from "./entity.js";
export {
  entitySchemaSourceSchema,
  entityMetadataSchema,
  paginationConfigSchema,
  sortConfigSchema,
} from "./entity.js";

// Relationships
export type {
  CascadeAction,
  RelationshipEntry,
  RelationshipParticipants,
  RelationshipSource,
  RelationshipType,
  ResolvedRelationship,
  ValidatedRelationship,
} from "./relationship.js";
export {
  CASCADE_ACTIONS,
  RELATIONSHIP_TYPES,
  isCascadeAction,
  isRelationshipType,
  relationshipConstraintsSchema,
  relationshipSourceSchema,
} from "./relationship.js";

// Catalog descriptors
export type { FieldTypeDescriptor, ValidationRuleDescriptor } from "./catalog.js";
export { fieldTypeDescriptorSchema, validationRuleDescriptorSchema } from "./catalog.js";

// Option providers
export type { FieldOptions, OptionProvider } from "./options.js";
export { defineOptionProvider } from "./options.js";

// Runtime contracts (provided by the host application)
export type {
  Criteria,
  CurrentUserProvider,
  DatabaseConnector,
  FindParams,
  Logger,
  PersistableModel,
  Row,
} from "./context.js";
export { NOT_NULL } from "./context.js";
