/**
 * In-Memory Database Connector
 *
 * Implements the DatabaseConnector contract over per-table arrays. Used by
 * tests and local experimentation; nothing is persisted across processes.
 *
 * Criteria are equality matches. `null` matches a missing or null column,
 * `NOT_NULL` matches any value that is present.
 */

import {
  NOT_NULL,
  type Criteria,
  type DatabaseConnector,
  type FindParams,
  type Logger,
  type PersistableModel,
  type Row,
} from "@schemata/contracts";
import { createLogger } from "../logging/index.js";

function isAbsent(value: unknown): boolean {
  return value === null || value === undefined;
}

function matches(row: Row, criteria: Criteria): boolean {
  return Object.entries(criteria).every(([column, expected]) => {
    const actual = row[column];
    if (expected === null) return isAbsent(actual);
    if (expected === NOT_NULL) return !isAbsent(actual);
    return actual === expected;
  });
}

function compare(a: unknown, b: unknown): number {
  if (isAbsent(a) && isAbsent(b)) return 0;
  if (isAbsent(a)) return -1;
  if (isAbsent(b)) return 1;
  if (typeof a === "number" && typeof b === "number") return a - b;
  return String(a).localeCompare(String(b));
}

function project(row: Row, fields: string[] | undefined): Row {
  if (!fields || fields.length === 0) return { ...row };
  const projected: Row = {};
  for (const field of fields) {
    projected[field] = row[field] ?? null;
  }
  return projected;
}

export class MemoryDatabaseConnector implements DatabaseConnector {
  private readonly tables = new Map<string, Row[]>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger("memory-connector");
  }

  // -------------------------------------------------------------------------
  // Test helpers
  // -------------------------------------------------------------------------

  /** Appends copies of the given rows to a table */
  seed(table: string, rows: Row[]): void {
    this.table(table).push(...rows.map((row) => ({ ...row })));
  }

  /** Copies of every row in a table, soft-deleted rows included */
  rows(table: string): Row[] {
    return this.table(table).map((row) => ({ ...row }));
  }

  private table(name: string): Row[] {
    let rows = this.tables.get(name);
    if (!rows) {
      rows = [];
      this.tables.set(name, rows);
    }
    return rows;
  }

  private indexOf(model: PersistableModel): number {
    const id = model.get("id");
    if (isAbsent(id)) return -1;
    return this.table(model.tableName).findIndex((row) => row.id === id);
  }

  // -------------------------------------------------------------------------
  // DatabaseConnector
  // -------------------------------------------------------------------------

  async find(model: PersistableModel, criteria: Criteria, fields?: string[], params: FindParams = {}): Promise<Row[]> {
    let rows = this.table(model.tableName).filter((row) => matches(row, criteria));

    const { orderBy } = params;
    if (orderBy) {
      const direction = orderBy.direction === "desc" ? -1 : 1;
      rows = [...rows].sort((a, b) => compare(a[orderBy.field], b[orderBy.field]) * direction);
    }

    const offset = params.offset ?? 0;
    const end = params.limit === undefined ? undefined : offset + params.limit;
    return rows.slice(offset, end).map((row) => project(row, fields));
  }

  async create(model: PersistableModel): Promise<boolean> {
    const row = model.toRow();
    if (!isAbsent(row.id) && this.indexOf(model) !== -1) {
      this.logger.warn("Refusing to create a row with a duplicate id", { table: model.tableName, id: row.id });
      return false;
    }
    this.table(model.tableName).push(row);
    return true;
  }

  async update(model: PersistableModel): Promise<boolean> {
    const index = this.indexOf(model);
    if (index === -1) return false;
    const rows = this.table(model.tableName);
    rows[index] = { ...rows[index], ...model.toRow() };
    return true;
  }

  async softDelete(model: PersistableModel): Promise<boolean> {
    const index = this.indexOf(model);
    if (index === -1) return false;
    const rows = this.table(model.tableName);
    rows[index] = {
      ...rows[index],
      deleted_at: model.get("deleted_at"),
      deleted_by: model.get("deleted_by"),
    };
    return true;
  }

  async hardDelete(model: PersistableModel): Promise<boolean> {
    const index = this.indexOf(model);
    if (index === -1) return false;
    this.table(model.tableName).splice(index, 1);
    return true;
  }

  async recordExists(table: string, criteria: Criteria): Promise<boolean> {
    return this.table(table).some((row) => matches(row, criteria));
  }

  async count(model: PersistableModel, criteria: Criteria): Promise<number> {
    return this.table(model.tableName).filter((row) => matches(row, criteria)).length;
  }

  async bulkSoftDeleteByFieldValue(
    model: PersistableModel,
    fieldName: string,
    value: unknown,
    deletedBy: string | null
  ): Promise<number> {
    const deletedAt = new Date().toISOString();
    let updated = 0;
    for (const row of this.table(model.tableName)) {
      if (row[fieldName] === value && isAbsent(row.deleted_at)) {
        row.deleted_at = deletedAt;
        row.deleted_by = deletedBy;
        updated += 1;
      }
    }
    return updated;
  }
}
