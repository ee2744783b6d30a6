/**
 * Relationship
 *
 * A relationship is a record type of its own: a generated table holding one
 * row per link between two entity records. Construction runs the resolver
 * lifecycle (unvalidated → validated → resolved), so an instance that exists
 * is always ready.
 *
 * Row-level operations (remove, updateRelation) load the found row into this
 * same instance, stamp it and save it. They never build a second instance.
 */

import {
  NOT_NULL,
  type CascadeAction,
  type FindParams,
  type RelationshipSource,
  type RelationshipType,
  type ResolvedRelationship,
  type Row,
} from "@schemata/contracts";
import { EntityModel, timestamp, type ModelContext } from "../entity-manager/entity-model.js";
import { ConstraintError, SchemaError } from "../errors/index.js";
import { describeError } from "../logging/index.js";
import { modelIdField, resolveRelationship } from "./resolver.js";

export interface RelatedPage {
  records: Row[];
  pagination: {
    currentPage: number;
    perPage: number;
    total: number;
    hasMore: boolean;
    totalPages: number;
  };
}

export class Relationship extends EntityModel {
  readonly resolved: ResolvedRelationship;

  constructor(source: RelationshipSource, context: ModelContext) {
    const resolved = resolveRelationship(source, { logger: context.logger });
    super({ name: resolved.name, table: resolved.tableName, fields: resolved.fields }, context);
    this.resolved = resolved;
  }

  get type(): RelationshipType {
    return this.resolved.type;
  }

  get cascadeDelete(): CascadeAction {
    return this.resolved.cascadeDelete;
  }

  /** Entity names on each side, in declaration order */
  get participants(): [string, string] {
    return this.resolved.type === "OneToMany"
      ? [this.resolved.modelOne, this.resolved.modelMany]
      : [this.resolved.modelA, this.resolved.modelB];
  }

  /** The key column that holds the given entity's id */
  modelIdField(participant: string | EntityModel): string {
    return modelIdField(this.resolved, typeof participant === "string" ? participant : participant.name);
  }

  private pairCriteria(a: EntityModel, b: EntityModel): Record<string, unknown> {
    return {
      [this.modelIdField(a)]: a.get("id"),
      [this.modelIdField(b)]: b.get("id"),
      deleted_at: null,
    };
  }

  private pairLog(a: EntityModel, b: EntityModel): Record<string, unknown> {
    return {
      relationship: this.name,
      type: this.type,
      modelA: a.name,
      modelAId: a.get("id"),
      modelB: b.name,
      modelBId: b.get("id"),
    };
  }

  // -------------------------------------------------------------------------
  // Queries
  // -------------------------------------------------------------------------

  /** Active link rows for the model; at most one for OneToOne */
  async relatedRecords(model: EntityModel): Promise<Row[]> {
    const params: FindParams = this.type === "OneToOne" ? { limit: 1 } : {};
    const records = await this.context.connector.find(
      this,
      { [this.modelIdField(model)]: model.get("id"), deleted_at: null },
      [],
      params
    );
    this.logger.debug("Related records loaded", {
      relationship: this.name,
      entity: model.name,
      entityId: model.get("id"),
      found: records.length,
    });
    return records;
  }

  /** Active link rows with caller-supplied paging */
  activeRecords(model: EntityModel, params: FindParams = {}): Promise<Row[]> {
    return this.context.connector.find(this, { [this.modelIdField(model)]: model.get("id"), deleted_at: null }, [], params);
  }

  /** Soft-deleted link rows */
  deletedRecords(model: EntityModel, params: FindParams = {}): Promise<Row[]> {
    return this.context.connector.find(
      this,
      { [this.modelIdField(model)]: model.get("id"), deleted_at: NOT_NULL },
      [],
      params
    );
  }

  activeRelatedCount(model: EntityModel): Promise<number> {
    return this.context.connector.count(this, { [this.modelIdField(model)]: model.get("id"), deleted_at: null });
  }

  async relatedPaginated(model: EntityModel, page = 1, perPage = 20): Promise<RelatedPage> {
    const currentPage = Math.max(1, Math.floor(page));
    const size = Math.max(1, Math.floor(perPage));
    const offset = (currentPage - 1) * size;

    const total = await this.activeRelatedCount(model);
    const records = await this.activeRecords(model, { limit: size, offset });

    return {
      records,
      pagination: {
        currentPage,
        perPage: size,
        total,
        hasMore: offset + size < total,
        totalPages: Math.ceil(total / size),
      },
    };
  }

  async has(a: EntityModel, b: EntityModel): Promise<boolean> {
    const rows = await this.context.connector.find(this, this.pairCriteria(a, b), ["id"], { limit: 1 });
    return rows.length > 0;
  }

  // -------------------------------------------------------------------------
  // Mutations
  // -------------------------------------------------------------------------

  /**
   * Links two records. OneToOne retires any existing link of either record
   * once the new row has validated; the other types refuse a link that
   * already exists.
   */
  async add(a: EntityModel, b: EntityModel, additionalData: Row = {}): Promise<boolean> {
    if (this.type !== "OneToOne" && (await this.has(a, b))) {
      this.logger.warn("Relationship already exists", this.pairLog(a, b));
      return false;
    }

    this.resetValues();
    this.set(this.modelIdField(a), a.get("id"));
    this.set(this.modelIdField(b), b.get("id"));
    for (const [fieldName, value] of Object.entries(additionalData)) {
      if (this.hasField(fieldName) && !this.resolved.keyFields.includes(fieldName)) {
        this.set(fieldName, value);
      }
    }

    if (this.type === "OneToOne") {
      // Unique waits for create(): the only rows it could clash with are retired here.
      if (!(await this.prepareCreate(["Unique"]))) return false;
      await this.softDeleteRelationship(a);
      await this.softDeleteRelationship(b);
    }

    const created = await this.create();
    if (created) this.logger.info("Relationship added", this.pairLog(a, b));
    return created;
  }

  /**
   * Soft-deletes the active link between two records. The found row is
   * loaded into this instance, stamped and saved. False when no link exists.
   */
  async remove(a: EntityModel, b: EntityModel): Promise<boolean> {
    const row = await this.findPair(a, b);
    if (!row) {
      this.logger.warn("Relationship not found for removal", this.pairLog(a, b));
      return false;
    }

    this.resetValues();
    this.populateFromRow(row);
    this.stamp({ deleted_at: timestamp(), deleted_by: this.currentUserId() });

    const updated = await this.context.connector.update(this);
    if (updated) this.logger.info("Relationship removed", this.pairLog(a, b));
    return updated;
  }

  /** Changes non-key columns of the active link between two records */
  async updateRelation(a: EntityModel, b: EntityModel, data: Row): Promise<boolean> {
    const row = await this.findPair(a, b);
    if (!row) {
      this.logger.warn("Relationship not found for update", this.pairLog(a, b));
      return false;
    }

    this.resetValues();
    this.populateFromRow(row);
    for (const [fieldName, value] of Object.entries(data)) {
      if (this.resolved.keyFields.includes(fieldName)) continue;
      this.set(fieldName, value);
    }
    return this.update();
  }

  private async findPair(a: EntityModel, b: EntityModel): Promise<Row | undefined> {
    const rows = await this.context.connector.find(this, this.pairCriteria(a, b), [], { limit: 1 });
    return rows[0];
  }

  /** Soft-deletes every active link of the model; returns the count */
  async softDeleteRelationship(model: EntityModel): Promise<number> {
    const fieldName = this.modelIdField(model);
    try {
      const updated = await this.context.connector.bulkSoftDeleteByFieldValue(
        this,
        fieldName,
        model.get("id"),
        this.currentUserId()
      );
      this.logger.debug("Soft-deleted relationship rows", {
        relationship: this.name,
        entity: model.name,
        entityId: model.get("id"),
        updated,
      });
      return updated;
    } catch (err) {
      this.logger.error("Bulk soft delete of relationship rows failed", {
        relationship: this.name,
        entity: model.name,
        entityId: model.get("id"),
        error: describeError(err),
      });
      throw err;
    }
  }

  // -------------------------------------------------------------------------
  // Cascade
  // -------------------------------------------------------------------------

  /**
   * Applies a cascade action for a record that is about to be deleted.
   *   restrict            ConstraintError while active links exist
   *   cascade, softDelete soft-delete every active link
   */
  async handleModelDeletion(model: EntityModel, action: string): Promise<boolean> {
    switch (action) {
      case "restrict": {
        const activeCount = await this.activeRelatedCount(model);
        if (activeCount > 0) {
          throw new ConstraintError(
            `Cannot delete ${model.name} "${String(model.get("id"))}": ${activeCount} active ${this.name} record(s) depend on it`,
            { relationship: this.name, entity: model.name, entityId: String(model.get("id")), activeCount }
          );
        }
        return true;
      }
      case "cascade":
      case "softDelete":
        await this.softDeleteRelationship(model);
        return true;
      default:
        throw new SchemaError(`Unknown cascade action "${action}" for relationship "${this.name}"`, {
          subject: this.name,
          key: action,
        });
    }
  }
}
