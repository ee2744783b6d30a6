/**
 * Entity Model
 *
 * One record of an entity. Field objects are materialized lazily from the
 * shared metadata the first time a field is touched; the model never owns
 * or copies the metadata itself.
 *
 * Persistence goes through the DatabaseConnector. Deleting runs the cascade
 * policy of every relationship the entity declares, then soft-deletes.
 */

import type {
  CurrentUserProvider,
  DatabaseConnector,
  FieldDescriptor,
  Logger,
  ModelMetadata,
  PersistableModel,
  RelationshipSource,
  Row,
} from "@schemata/contracts";
import { SchemaError } from "../errors/index.js";
import type { FieldBase } from "../fields/field-base.js";
import type { FieldFactory } from "../fields/field-factory.js";
import type { Relationship } from "../relationships/relationship.js";

/** Audit fields fall back to this user id when nobody is signed in */
export const SYSTEM_USER_ID = "system";

/** What every model shares: persistence, field construction, audit user */
export interface ModelContext {
  connector: DatabaseConnector;
  fields: FieldFactory;
  logger: Logger;
  currentUser?: CurrentUserProvider;
  /** Entity name → table, for rules that look up related rows */
  tableFor?: (entityName: string) => string | undefined;
  /** Relationship runtimes for the relationships an entity declares */
  relationshipsOf?: (model: EntityModel) => Promise<Relationship[]>;
}

export type EntityModelMetadata = ModelMetadata & {
  relationships?: Array<string | RelationshipSource>;
};

export function timestamp(): string {
  return new Date().toISOString();
}

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined || value === "";
}

export class EntityModel implements PersistableModel {
  readonly metadata: EntityModelMetadata;
  protected readonly context: ModelContext;
  protected readonly logger: Logger;
  private fields = new Map<string, FieldBase>();
  private errors: Record<string, string[]> = {};
  private relationshipCache: Promise<Relationship[]> | null = null;

  constructor(metadata: EntityModelMetadata, context: ModelContext) {
    this.metadata = metadata;
    this.context = context;
    this.logger = context.logger;
  }

  get name(): string {
    return this.metadata.name;
  }

  get tableName(): string {
    return this.metadata.table;
  }

  // -------------------------------------------------------------------------
  // Fields
  // -------------------------------------------------------------------------

  hasField(fieldName: string): boolean {
    return Object.hasOwn(this.metadata.fields, fieldName);
  }

  fieldNames(): string[] {
    return Object.keys(this.metadata.fields);
  }

  fieldDescriptor(fieldName: string): FieldDescriptor {
    if (!this.hasField(fieldName)) {
      throw new SchemaError(`${this.name} has no field "${fieldName}"`, {
        subject: this.name,
        key: fieldName,
      });
    }
    return this.metadata.fields[fieldName];
  }

  /** The live field, created on first access */
  field(fieldName: string): FieldBase {
    let field = this.fields.get(fieldName);
    if (!field) {
      field = this.context.fields.create(this.fieldDescriptor(fieldName));
      this.fields.set(fieldName, field);
    }
    return field;
  }

  /** The field's value, or undefined for a name the entity does not declare */
  get(fieldName: string): unknown {
    return this.hasField(fieldName) ? this.field(fieldName).getValue() : undefined;
  }

  set(fieldName: string, value: unknown): void {
    this.field(fieldName).setValue(value);
  }

  /** Sets every column the entity declares; other columns are ignored */
  populateFromRow(row: Row): this {
    for (const [fieldName, value] of Object.entries(row)) {
      if (this.hasField(fieldName)) this.set(fieldName, value);
    }
    return this;
  }

  /** Values of persisted fields, in declaration order */
  toRow(): Row {
    const row: Row = {};
    for (const fieldName of this.fieldNames()) {
      if (this.metadata.fields[fieldName].isDBField === false) continue;
      row[fieldName] = this.get(fieldName) ?? null;
    }
    return row;
  }

  /** Every field value, persisted or not */
  toJSON(): Row {
    return Object.fromEntries(this.fieldNames().map((fieldName) => [fieldName, this.get(fieldName) ?? null]));
  }

  /** Discards every value so the instance can hold another row */
  protected resetValues(): void {
    this.fields = new Map();
    this.errors = {};
  }

  // -------------------------------------------------------------------------
  // Validation
  // -------------------------------------------------------------------------

  async validate(skipRules: readonly string[] = []): Promise<boolean> {
    this.errors = {};
    for (const fieldName of this.fieldNames()) {
      const field = this.field(fieldName);
      const valid = await field.validate(
        { model: this, connector: this.context.connector, tableFor: this.context.tableFor },
        skipRules
      );
      if (!valid) this.errors[fieldName] = field.validationErrors();
    }
    return Object.keys(this.errors).length === 0;
  }

  /** Field name → messages from the last validate() */
  validationErrors(): Record<string, string[]> {
    return structuredClone(this.errors);
  }

  private async validateForPersistence(operation: string, skipRules: readonly string[] = []): Promise<boolean> {
    if (await this.validate(skipRules)) return true;
    this.logger.error("Cannot persist model with validation errors", {
      entity: this.name,
      operation,
      errors: this.errors,
    });
    return false;
  }

  // -------------------------------------------------------------------------
  // Audit
  // -------------------------------------------------------------------------

  protected currentUserId(): string {
    return this.context.currentUser?.currentUserId() ?? SYSTEM_USER_ID;
  }

  /** Sets only the fields this model declares */
  protected stamp(values: Record<string, unknown>): void {
    for (const [fieldName, value] of Object.entries(values)) {
      if (this.hasField(fieldName)) this.set(fieldName, value);
    }
  }

  protected requireId(operation: string): unknown {
    const id = this.get("id");
    if (isAbsent(id)) {
      throw new SchemaError(`Cannot ${operation} ${this.name} without an id`, { subject: this.name, key: "id" });
    }
    return id;
  }

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  /** Assigns an id when missing, stamps audit fields, validates and inserts */
  async create(): Promise<boolean> {
    if (!(await this.prepareCreate())) return false;
    return this.context.connector.create(this);
  }

  /** The id, stamps and validation of create(), without the insert */
  protected async prepareCreate(skipRules: readonly string[] = []): Promise<boolean> {
    if (isAbsent(this.get("id"))) this.set("id", crypto.randomUUID());
    const now = timestamp();
    const user = this.currentUserId();
    this.stamp({ created_at: now, updated_at: now, created_by: user, updated_by: user });
    return this.validateForPersistence("create", skipRules);
  }

  async update(): Promise<boolean> {
    this.requireId("update");
    this.stamp({ updated_at: timestamp(), updated_by: this.currentUserId() });

    if (!(await this.validateForPersistence("update"))) return false;
    return this.context.connector.update(this);
  }

  /**
   * Applies each declared relationship's cascade policy (or `cascadeAction`
   * for all of them), then soft-deletes. Every `restrict` policy is checked
   * first, so active related rows throw ConstraintError before any link of
   * another relationship is retired.
   */
  async delete(cascadeAction?: string): Promise<boolean> {
    this.requireId("delete");
    const policies = (await this.relationships()).map(
      (relationship) => [relationship, cascadeAction ?? relationship.cascadeDelete] as const
    );

    for (const [relationship, action] of policies) {
      if (action === "restrict") await relationship.handleModelDeletion(this, action);
    }
    for (const [relationship, action] of policies) {
      if (action !== "restrict") await relationship.handleModelDeletion(this, action);
    }
    return this.softDelete();
  }

  async softDelete(): Promise<boolean> {
    this.requireId("delete");
    this.stamp({ deleted_at: timestamp(), deleted_by: this.currentUserId() });
    return this.context.connector.softDelete(this);
  }

  /** Clears the soft-delete stamps and saves */
  async restore(): Promise<boolean> {
    this.requireId("restore");
    this.stamp({ deleted_at: null, deleted_by: null });
    return this.update();
  }

  async hardDelete(): Promise<boolean> {
    this.requireId("delete");
    return this.context.connector.hardDelete(this);
  }

  // -------------------------------------------------------------------------
  // Relationships
  // -------------------------------------------------------------------------

  /** Runtimes for the declared relationships, built once per instance */
  relationships(): Promise<Relationship[]> {
    if (!this.relationshipCache) {
      const resolve = this.context.relationshipsOf;
      this.relationshipCache = resolve ? resolve(this) : Promise.resolve([]);
    }
    return this.relationshipCache;
  }

  async relationship(name: string): Promise<Relationship | undefined> {
    return (await this.relationships()).find((relationship) => relationship.name === name);
  }
}
