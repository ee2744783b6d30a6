/**
 * Metadata Engine
 *
 * Owns the merged entity and relationship metadata for the process.
 *
 *   cold ──load──▶ loading ──▶ warm
 *    ▲                          │
 *    └──── clear / reload ──────┘
 *
 * The first lookup (or an explicit reload) triggers a full load: the disk
 * cache is used when present and valid; otherwise every schema source is
 * scanned, core fields are merged in, option providers are resolved, the
 * aggregate is validated and the result is written back to the disk cache.
 *
 * Once warm, lookups never touch the disk. A name that is not in the cache
 * is a NotFoundError; there is no fallback scan.
 */

import {
  entitySchemaSourceSchema,
  relationshipSourceSchema,
  type EntityMetadata,
  type EntitySchemaSource,
  type EntitySummary,
  type FieldMap,
  type FieldTypeDescriptor,
  type Logger,
  type RelationshipEntry,
  type RelationshipSource,
  type ValidationRuleDescriptor,
} from "@schemata/contracts";
import type { PlatformConfig } from "../config/index.js";
import { NotFoundError, SchemaError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import { resolveRelationship } from "../relationships/resolver.js";
import { MetadataCacheStore, type MetadataSnapshot } from "./cache-store.js";
import { CoreFieldsProvider, type CoreFieldOwner, type ModelClass } from "./core-fields.js";
import { FieldTypeCatalog } from "./field-type-catalog.js";
import { OptionProviderRegistry } from "./option-providers.js";
import { metadataFilePath, scanSchemaDirectory } from "./schema-sources.js";
import { ValidationRuleCatalog } from "./validation-rule-catalog.js";

export type EngineState = "cold" | "loading" | "warm";

export interface MetadataEngineOptions {
  coreFields?: CoreFieldsProvider;
  rules?: ValidationRuleCatalog;
  fieldTypes?: FieldTypeCatalog;
  optionProviders?: OptionProviderRegistry;
  /** Entity name → model class; drives inheritance-aware core fields */
  modelClasses?: Record<string, ModelClass>;
  logger?: Logger;
}

const IDENTIFIER_SEPARATORS = /[\\/.:]/;

/**
 * "App\\Models\\Movies", "models/Movies", "models.Movies" → "Movies".
 * Pure; does not check that the entity exists.
 */
export function resolveEntityIdentifier(raw: string): string {
  const segments = raw.split(IDENTIFIER_SEPARATORS).filter((segment) => segment !== "");
  return segments.length > 0 ? segments[segments.length - 1] : raw;
}

export class MetadataEngine {
  readonly coreFields: CoreFieldsProvider;
  readonly rules: ValidationRuleCatalog;
  readonly fieldTypes: FieldTypeCatalog;
  readonly optionProviders: OptionProviderRegistry;

  private readonly config: PlatformConfig;
  private readonly cacheStore: MetadataCacheStore | null;
  private readonly modelClasses = new Map<string, ModelClass>();
  private readonly logger: Logger;

  private snapshot: MetadataSnapshot | null = null;
  private pending: Promise<MetadataSnapshot> | null = null;
  private currentState: EngineState = "cold";
  /** Bumped on every clear so that a load started earlier cannot warm the engine */
  private generation = 0;
  /** Set by an explicit clear: the next load rescans sources */
  private bypassDiskCache = false;

  constructor(config: PlatformConfig, options: MetadataEngineOptions = {}) {
    this.config = config;
    this.logger = options.logger ?? createLogger("metadata-engine");
    this.coreFields =
      options.coreFields ??
      new CoreFieldsProvider({
        templatePath: config.coreFieldsTemplate ?? undefined,
        logger: this.logger,
      });
    this.rules = options.rules ?? new ValidationRuleCatalog({ logger: this.logger });
    this.fieldTypes = options.fieldTypes ?? new FieldTypeCatalog({ rules: this.rules, logger: this.logger });
    this.optionProviders = options.optionProviders ?? new OptionProviderRegistry({ logger: this.logger });
    this.cacheStore =
      config.cacheFile === null ? null : new MetadataCacheStore(config.cacheFile, { logger: this.logger });

    for (const [name, modelClass] of Object.entries(options.modelClasses ?? {})) {
      this.modelClasses.set(name, modelClass);
    }
  }

  get state(): EngineState {
    return this.currentState;
  }

  // -------------------------------------------------------------------------
  // Model classes
  // -------------------------------------------------------------------------

  /** Associates an entity with its model class; takes effect on the next load */
  registerModelClass(name: string, modelClass: ModelClass): void {
    this.modelClasses.set(name, modelClass);
  }

  modelClassFor(name: string): ModelClass | undefined {
    return this.modelClasses.get(resolveEntityIdentifier(name));
  }

  private coreFieldOwner(name: string): CoreFieldOwner {
    return this.modelClasses.get(name) ?? name;
  }

  // -------------------------------------------------------------------------
  // Loading
  // -------------------------------------------------------------------------

  /**
   * The full metadata snapshot. Warm: the same object, no I/O.
   * Callers that arrive while a load is running share its result.
   */
  loadAllMetadata(): Promise<MetadataSnapshot> {
    if (this.snapshot) return Promise.resolve(this.snapshot);
    if (this.pending) return this.pending;

    const generation = this.generation;
    this.currentState = "loading";

    const pending = this.load().then(
      (snapshot) => {
        if (generation === this.generation) {
          this.snapshot = snapshot;
          this.currentState = "warm";
          this.pending = null;
        }
        return snapshot;
      },
      (err: unknown) => {
        if (generation === this.generation) {
          this.currentState = "cold";
          this.pending = null;
        }
        throw err;
      }
    );
    this.pending = pending;
    return pending;
  }

  /** Drops every cache and loads again from schema sources */
  async reload(): Promise<MetadataSnapshot> {
    this.clearAllCaches();
    return this.loadAllMetadata();
  }

  private async load(): Promise<MetadataSnapshot> {
    if (this.cacheStore && !this.bypassDiskCache) {
      const cached = await this.cacheStore.read();
      if (cached) {
        this.logger.debug("Using cached metadata", {
          entities: Object.keys(cached.entities).length,
          relationships: Object.keys(cached.relationships).length,
        });
        return cached;
      }
    }

    this.logger.info("Rebuilding metadata from schema sources", {
      modelsDir: this.config.modelsDir,
      relationshipsDir: this.config.relationshipsDir,
    });

    const entitySources = await scanSchemaDirectory(
      this.config.modelsDir,
      "entity",
      entitySchemaSourceSchema,
      this.logger
    );
    const relationshipSources = await scanSchemaDirectory(
      this.config.relationshipsDir,
      "relationship",
      relationshipSourceSchema,
      this.logger
    );

    const entities: Record<string, EntityMetadata> = {};
    for (const [name, source] of entitySources) {
      entities[name] = this.mergeEntity(name, source);
    }

    const standard = this.coreFields.standardCoreFields();
    const relationships: Record<string, RelationshipSource> = {};
    for (const [name, source] of relationshipSources) {
      relationships[name] = { ...source, name, fields: { ...standard, ...source.fields } };
    }

    for (const entity of Object.values(entities)) {
      entity.fields = await this.resolveOptions(entity.name, entity.fields);
    }
    for (const [name, relationship] of Object.entries(relationships)) {
      relationship.fields = await this.resolveOptions(name, relationship.fields ?? {});
    }

    this.validateAggregate(entities, relationships);

    const snapshot: MetadataSnapshot = {
      entities,
      relationships,
      fieldTypes: this.fieldTypes.toRecord(),
    };

    if (this.cacheStore) await this.cacheStore.write(snapshot);
    this.bypassDiskCache = false;

    this.logger.info("Metadata loaded", {
      entities: Object.keys(entities).length,
      relationships: Object.keys(relationships).length,
      fieldTypes: Object.keys(snapshot.fieldTypes).length,
    });
    return snapshot;
  }

  /**
   * Core fields first; fields declared by the entity win on collision.
   * Inline relationships get the standard core fields like standalone ones.
   */
  private mergeEntity(name: string, source: EntitySchemaSource): EntityMetadata {
    const standard = this.coreFields.standardCoreFields();
    return {
      ...source,
      name,
      table: source.table ?? name.toLowerCase(),
      fields: { ...this.coreFields.allCoreFieldsForModel(this.coreFieldOwner(name)), ...source.fields },
      relationships: (source.relationships ?? []).map((reference) =>
        typeof reference === "string" ? reference : { ...reference, fields: { ...standard, ...reference.fields } }
      ),
    };
  }

  /** Replaces the options of fields that name a provider; failures keep the declared options */
  private async resolveOptions(owner: string, fields: FieldMap): Promise<FieldMap> {
    const resolved: FieldMap = {};
    for (const [key, field] of Object.entries(fields)) {
      if (field.optionsProvider === undefined) {
        resolved[key] = field;
        continue;
      }
      const options = await this.optionProviders.resolve(field.optionsProvider);
      if (options === null) {
        this.logger.warn("Keeping declared options after provider failure", {
          owner,
          field: key,
          provider: field.optionsProvider,
        });
      }
      resolved[key] = options === null ? field : { ...field, options };
    }
    return resolved;
  }

  // -------------------------------------------------------------------------
  // Aggregate validation
  // -------------------------------------------------------------------------

  /**
   * Cross-file checks. Invalid relationships (standalone or inline) are
   * dropped; everything else is reported and left in place.
   */
  private validateAggregate(
    entities: Record<string, EntityMetadata>,
    relationships: Record<string, RelationshipSource>
  ): void {
    const tables = new Map<string, string>();
    const claimTable = (tableName: string, relationship: string): void => {
      const owner = tables.get(tableName);
      if (owner !== undefined) {
        this.logger.error("Relationship table names collide", {
          tableName,
          relationships: [owner, relationship],
        });
        return;
      }
      tables.set(tableName, relationship);
    };

    for (const [name, source] of Object.entries(relationships)) {
      const resolved = this.tryResolve(name, source);
      if (!resolved) {
        delete relationships[name];
        continue;
      }
      claimTable(resolved.tableName, name);
      for (const participant of resolved.participants) {
        if (!Object.hasOwn(entities, participant)) {
          this.logger.warn("Relationship references an unknown entity", { relationship: name, entity: participant });
        }
      }
      this.checkRules(name, resolved.fields);
    }

    for (const entity of Object.values(entities)) {
      this.checkRules(entity.name, entity.fields);

      entity.relationships = entity.relationships.filter((reference) => {
        if (typeof reference === "string") {
          if (!Object.hasOwn(relationships, reference)) {
            this.logger.warn("Entity references an undeclared relationship", {
              entity: entity.name,
              relationship: reference,
            });
          }
          return true;
        }
        const key = `${entity.name}.${reference.name ?? "(unnamed)"}`;
        const resolved = this.tryResolve(key, reference);
        if (!resolved) return false;
        claimTable(resolved.tableName, key);
        return true;
      });
    }
  }

  private tryResolve(
    name: string,
    source: RelationshipSource
  ): { tableName: string; participants: string[]; fields: FieldMap } | null {
    try {
      const resolved = resolveRelationship(source, { logger: this.logger });
      const participants =
        resolved.type === "OneToMany" ? [resolved.modelOne, resolved.modelMany] : [resolved.modelA, resolved.modelB];
      return { tableName: resolved.tableName, participants, fields: resolved.fields };
    } catch (err) {
      if (!(err instanceof SchemaError)) throw err;
      this.logger.error("Dropping invalid relationship", { relationship: name, error: err.message });
      return null;
    }
  }

  private checkRules(owner: string, fields: FieldMap): void {
    for (const field of Object.values(fields)) {
      for (const rule of field.validationRules ?? []) {
        if (!this.rules.has(rule)) {
          this.logger.warn("Field names an unknown validation rule", { owner, field: field.name, rule });
        }
      }
    }
  }

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  /** Exact, case-sensitive. Namespace prefixes are stripped first. */
  async entityMetadata(name: string): Promise<EntityMetadata> {
    const { entities } = await this.loadAllMetadata();
    const resolved = resolveEntityIdentifier(name);
    if (!Object.hasOwn(entities, resolved)) {
      this.logger.warn("Entity metadata not found", { requested: resolved, available: Object.keys(entities) });
      throw new NotFoundError("entity", resolved, Object.keys(entities));
    }
    return entities[resolved];
  }

  /** Exact, case-sensitive */
  async relationshipMetadata(name: string): Promise<RelationshipSource> {
    const { relationships } = await this.loadAllMetadata();
    if (!Object.hasOwn(relationships, name)) {
      this.logger.warn("Relationship metadata not found", {
        requested: name,
        available: Object.keys(relationships),
      });
      throw new NotFoundError("relationship", name, Object.keys(relationships));
    }
    return relationships[name];
  }

  async availableEntities(): Promise<string[]> {
    return Object.keys((await this.loadAllMetadata()).entities);
  }

  async entityExists(name: string): Promise<boolean> {
    const { entities } = await this.loadAllMetadata();
    return Object.hasOwn(entities, resolveEntityIdentifier(name));
  }

  /**
   * Standalone relationships by name, plus relationships declared inline
   * in an entity, keyed "<Entity>.<relationship>" and tagged with the entity.
   */
  async allRelationships(): Promise<Record<string, RelationshipEntry>> {
    const { entities, relationships } = await this.loadAllMetadata();
    const all: Record<string, RelationshipEntry> = { ...relationships };

    for (const entity of Object.values(entities)) {
      entity.relationships.forEach((reference, index) => {
        if (typeof reference === "string") return;
        all[`${entity.name}.${reference.name ?? index}`] = { ...reference, sourceEntity: entity.name };
      });
    }
    return all;
  }

  async fieldTypeDefinitions(): Promise<Record<string, FieldTypeDescriptor>> {
    return (await this.loadAllMetadata()).fieldTypes;
  }

  /** Rule descriptors come from the catalog, not the cache */
  validationRuleDefinitions(): Record<string, ValidationRuleDescriptor> {
    return Object.fromEntries(this.rules.scan());
  }

  async entitySummaries(): Promise<EntitySummary[]> {
    const { entities } = await this.loadAllMetadata();
    return Object.values(entities)
      .map((entity) => ({
        name: entity.name,
        table: entity.table,
        description: entity.description ?? "",
        fieldCount: Object.keys(entity.fields).length,
        relationshipCount: entity.relationships.length,
      }))
      .sort((a, b) => a.name.localeCompare(b.name));
  }

  buildEntityMetadataPath(name: string): string {
    return metadataFilePath(this.config.modelsDir, resolveEntityIdentifier(name));
  }

  buildRelationshipMetadataPath(name: string): string {
    return metadataFilePath(this.config.relationshipsDir, name);
  }

  // -------------------------------------------------------------------------
  // Invalidation
  // -------------------------------------------------------------------------

  /**
   * Forgets the loaded snapshot and the entity's merged core fields.
   * The whole engine returns to cold; the next lookup rescans sources.
   */
  clearCacheForEntity(name: string): void {
    const resolved = resolveEntityIdentifier(name);
    this.coreFields.clearCacheForModel(this.coreFieldOwner(resolved));
    this.invalidate();
    this.logger.info("Metadata cache cleared for entity", { entity: resolved });
  }

  clearAllCaches(): void {
    this.coreFields.clearCache();
    this.invalidate();
    this.logger.info("All metadata caches cleared");
  }

  private invalidate(): void {
    this.snapshot = null;
    this.pending = null;
    this.currentState = "cold";
    this.generation += 1;
    this.bypassDiskCache = true;
  }
}
