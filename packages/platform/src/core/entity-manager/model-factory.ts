/**
 * Model Factory
 *
 * Builds entity and relationship runtimes from the Metadata Engine's
 * snapshot. Entities with a registered model class get an instance of that
 * class; all others get a plain EntityModel.
 */

import type {
  CurrentUserProvider,
  DatabaseConnector,
  EntityMetadata,
  Logger,
  RelationshipSource,
  Row,
} from "@schemata/contracts";
import { NotFoundError } from "../errors/index.js";
import { FieldFactory } from "../fields/field-factory.js";
import { createLogger } from "../logging/index.js";
import type { MetadataSnapshot } from "../metadata/cache-store.js";
import type { MetadataEngine } from "../metadata/engine.js";
import { Relationship } from "../relationships/relationship.js";
import { EntityModel, type ModelContext } from "./entity-model.js";

export type EntityModelClass = new (metadata: EntityMetadata, context: ModelContext) => EntityModel;

export interface ModelFactoryOptions {
  connector: DatabaseConnector;
  fields?: FieldFactory;
  currentUser?: CurrentUserProvider;
  logger?: Logger;
}

export class ModelFactory {
  readonly engine: MetadataEngine;
  private readonly context: ModelContext;
  private readonly classes = new Map<string, EntityModelClass>();
  private readonly tables = new Map<string, string>();
  private tablesFrom: MetadataSnapshot | null = null;
  private readonly logger: Logger;

  constructor(engine: MetadataEngine, options: ModelFactoryOptions) {
    this.engine = engine;
    this.logger = options.logger ?? createLogger("model-factory");
    this.context = {
      connector: options.connector,
      fields: options.fields ?? new FieldFactory({ rules: engine.rules, logger: this.logger }),
      logger: this.logger,
      currentUser: options.currentUser,
      tableFor: (entityName) => this.tables.get(entityName),
      relationshipsOf: (model) => this.relationshipsOf(model),
    };
  }

  /**
   * Instances of `name` are built from `modelClass`. The class also owns the
   * entity's model-specific core fields from the next metadata load on.
   */
  registerModelClass(name: string, modelClass: EntityModelClass): void {
    this.classes.set(name, modelClass);
    this.engine.registerModelClass(name, modelClass);
  }

  /** Keeps the entity → table map in step with the engine's snapshot */
  private async syncTables(): Promise<void> {
    const snapshot = await this.engine.loadAllMetadata();
    if (snapshot === this.tablesFrom) return;
    this.tables.clear();
    for (const entity of Object.values(snapshot.entities)) this.tables.set(entity.name, entity.table);
    this.tablesFrom = snapshot;
  }

  private async metadataFor(name: string): Promise<EntityMetadata> {
    await this.syncTables();
    return this.engine.entityMetadata(name);
  }

  /** A new, empty record of the entity */
  async create(name: string): Promise<EntityModel> {
    const metadata = await this.metadataFor(name);
    const ModelImpl = this.classes.get(metadata.name) ?? EntityModel;
    return new ModelImpl(metadata, this.context);
  }

  /** The active record with the given id, or null */
  async retrieve(name: string, id: unknown): Promise<EntityModel | null> {
    const model = await this.create(name);
    const rows = await this.context.connector.find(model, { id, deleted_at: null }, [], { limit: 1 });
    if (rows.length === 0) return null;
    return model.populateFromRow(rows[0]);
  }

  async fromRows(name: string, rows: Row[]): Promise<EntityModel[]> {
    const models: EntityModel[] = [];
    for (const row of rows) {
      models.push((await this.create(name)).populateFromRow(row));
    }
    return models;
  }

  /** A relationship runtime from a standalone name or inline metadata */
  async relationship(reference: string | RelationshipSource): Promise<Relationship> {
    const source = typeof reference === "string" ? await this.engine.relationshipMetadata(reference) : reference;
    await this.syncTables();
    return new Relationship(source, this.context);
  }

  /**
   * Runtimes for every relationship the model's entity declares.
   * A reference to a relationship that was never loaded is skipped.
   */
  async relationshipsOf(model: EntityModel): Promise<Relationship[]> {
    const relationships: Relationship[] = [];
    for (const reference of model.metadata.relationships ?? []) {
      try {
        relationships.push(await this.relationship(reference));
      } catch (err) {
        if (!(err instanceof NotFoundError)) throw err;
        this.logger.warn("Skipping undeclared relationship", { entity: model.name, relationship: err.requested });
      }
    }
    return relationships;
  }
}
