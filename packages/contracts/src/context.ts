/**
 * Runtime Contracts
 *
 * Interfaces the platform consumes but does not implement in production:
 * the structured logger, the Database Connector and the current-user source.
 * Host applications provide concrete implementations.
 */

/**
 * Structured logger.
 * Platform components use this instead of console.log.
 */
export interface Logger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

// ---------------------------------------------------------------------------
// Database Connector
// ---------------------------------------------------------------------------

/** A row as stored in, or read from, a table */
export type Row = Record<string, unknown>;

/**
 * Marker value for "column IS NOT NULL" in find criteria.
 * A criteria value of `null` means "column IS NULL".
 */
export const NOT_NULL = "__NOT_NULL__";

/** Equality criteria keyed by column name */
export type Criteria = Record<string, unknown>;

export interface FindParams {
  limit?: number;
  offset?: number;
  orderBy?: { field: string; direction: "asc" | "desc" };
}

/**
 * What the connector needs from a model or relationship instance:
 * where it lives and what it holds.
 */
export interface PersistableModel {
  readonly name: string;
  readonly tableName: string;
  get(fieldName: string): unknown;
  /** Values of persisted fields only */
  toRow(): Row;
}

/**
 * Persistence boundary. The platform never builds SQL; it hands models and
 * criteria to a connector. Calls carry no timeout or retry policy of their own.
 */
export interface DatabaseConnector {
  find(
    model: PersistableModel,
    criteria: Criteria,
    fields?: string[],
    params?: FindParams
  ): Promise<Row[]>;

  /** Insert the model's row. */
  create(model: PersistableModel): Promise<boolean>;

  /** Update the row identified by the model's id. */
  update(model: PersistableModel): Promise<boolean>;

  /** Persist the model's deleted_at / deleted_by stamps. */
  softDelete(model: PersistableModel): Promise<boolean>;

  /** Permanently remove the row identified by the model's id. */
  hardDelete(model: PersistableModel): Promise<boolean>;

  recordExists(table: string, criteria: Criteria): Promise<boolean>;

  count(model: PersistableModel, criteria: Criteria): Promise<number>;

  /**
   * Soft-delete every active row whose `fieldName` equals `value`.
   * Returns the number of rows updated.
   */
  bulkSoftDeleteByFieldValue(
    model: PersistableModel,
    fieldName: string,
    value: unknown,
    deletedBy: string | null
  ): Promise<number>;
}

// ---------------------------------------------------------------------------
// Current user
// ---------------------------------------------------------------------------

/** Supplies the acting user's id for created_by / updated_by / deleted_by */
export interface CurrentUserProvider {
  currentUserId(): string | null;
}
