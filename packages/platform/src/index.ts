/**
 * @schemata/platform
 *
 * The metadata engine. Loads entity and relationship schemas, merges core
 * fields, catalogs field types and validation rules, and materializes
 * records and relationships at runtime.
 */

// Config
export {
  loadConfig,
  DEFAULT_CACHE_FILE,
  DEFAULT_MODELS_DIR,
  DEFAULT_RELATIONSHIPS_DIR,
  type PlatformConfig,
} from "./core/config/index.js";

// Logging & observability
export { createLogger, describeError } from "./core/logging/index.js";
export {
  initObservability,
  captureException,
  captureMessage,
  setObservabilityContext,
  flushObservability,
  getObservabilityProvider,
  setObservabilityProvider,
  resetObservability,
  ConsoleObservabilityProvider,
  SilentObservabilityProvider,
  type ObservabilityProvider,
  type ObservabilityContext,
  type ObservabilitySeverity,
} from "./core/observability/index.js";

// Errors
export {
  MetadataError,
  ConfigurationError,
  SchemaError,
  NotFoundError,
  ConstraintError,
  type MetadataErrorCode,
} from "./core/errors/index.js";

// Metadata
export { MetadataEngine, resolveEntityIdentifier, type EngineState, type MetadataEngineOptions } from "./core/metadata/engine.js";
export { MetadataCacheStore, CACHE_FORMAT_VERSION, type MetadataSnapshot } from "./core/metadata/cache-store.js";
export {
  CoreFieldsProvider,
  DEFAULT_CORE_FIELDS_TEMPLATE,
  type CoreFieldOwner,
  type CoreFieldsProviderOptions,
  type ModelClass,
} from "./core/metadata/core-fields.js";
export {
  FieldTypeCatalog,
  describeClassName,
  extractFieldTypeFromClassName,
  type FieldTypeCatalogOptions,
} from "./core/metadata/field-type-catalog.js";
export { ValidationRuleCatalog, type ValidationRuleCatalogOptions } from "./core/metadata/validation-rule-catalog.js";
export { OptionProviderRegistry } from "./core/metadata/option-providers.js";
export { metadataFilePath, scanSchemaDirectory, type SchemaSourceKind } from "./core/metadata/schema-sources.js";

// Fields
export { FieldBase, BASE_OPERATORS } from "./core/fields/field-base.js";
export { FieldFactory, type FieldFactoryOptions } from "./core/fields/field-factory.js";
export { FIELD_IMPLEMENTATIONS, type FieldClass } from "./core/fields/registry.js";
export { TextField, BigTextField, EmailField, PasswordField } from "./core/fields/text-fields.js";
export { IntegerField, FloatField, BooleanField } from "./core/fields/numeric-fields.js";
export { DateField, DateTimeField } from "./core/fields/date-fields.js";
export { EnumField, RadioButtonSetField, MultiEnumField } from "./core/fields/choice-fields.js";
export { IDField, RelatedRecordField } from "./core/fields/reference-fields.js";
export { ImageField, VideoField } from "./core/fields/media-fields.js";

// Validation rules
export {
  ValidationRule,
  extractRuleNameFromClassName,
  isBlank,
  type ValidationContext,
} from "./core/validation/rule.js";
export {
  VALIDATION_RULES,
  RequiredValidation,
  EmailValidation,
  AlphanumericValidation,
  URLValidation,
  DateTimeValidation,
  OptionsValidation,
  UniqueValidation,
  ForeignKeyExistsValidation,
  type ValidationRuleClass,
} from "./core/validation/rules.js";

// Relationships
export {
  MAX_TABLE_NAME_LENGTH,
  validateRelationshipMetadata,
  untruncatedTableName,
  generateTableName,
  generateKeyFields,
  resolveRelationship,
  modelIdField,
  type RelationshipLike,
} from "./core/relationships/resolver.js";
export { Relationship, type RelatedPage } from "./core/relationships/relationship.js";

// Entity runtime
export {
  EntityModel,
  SYSTEM_USER_ID,
  type EntityModelMetadata,
  type ModelContext,
} from "./core/entity-manager/entity-model.js";
export { ModelFactory, type EntityModelClass, type ModelFactoryOptions } from "./core/entity-manager/model-factory.js";

// Persistence
export { MemoryDatabaseConnector } from "./core/database/memory-connector.js";
