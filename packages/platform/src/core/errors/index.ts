/**
 * Error Taxonomy
 *
 * Every failure the platform raises is one of four typed errors. Callers
 * branch on `instanceof` or on `code`; `toJSON()` gives API layers a
 * serializable payload without knowing the subclasses.
 *
 * Contained failures (a malformed schema file, a field type that fails to
 * instantiate) are logged, never thrown. See the Metadata Engine.
 */

export type MetadataErrorCode =
  | "CONFIGURATION_ERROR"
  | "SCHEMA_ERROR"
  | "NOT_FOUND"
  | "CONSTRAINT_VIOLATION";

/** Base class for all platform errors */
export abstract class MetadataError extends Error {
  abstract readonly code: MetadataErrorCode;

  toJSON(): Record<string, unknown> {
    return { name: this.name, code: this.code, message: this.message };
  }
}

// ---------------------------------------------------------------------------
// ConfigurationError
// ---------------------------------------------------------------------------

/**
 * A required external source (template file, schema directory, setting) is
 * missing or malformed. Always fatal.
 */
export class ConfigurationError extends MetadataError {
  readonly code = "CONFIGURATION_ERROR" as const;
  /** The path or setting that was missing or malformed */
  readonly source: string | undefined;

  constructor(message: string, options: { source?: string; cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = "ConfigurationError";
    this.source = options.source;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), source: this.source };
  }
}

// ---------------------------------------------------------------------------
// SchemaError
// ---------------------------------------------------------------------------

/**
 * Entity or relationship metadata failed structural validation: a missing
 * required key, an unknown type, an unknown cascade action.
 */
export class SchemaError extends MetadataError {
  readonly code = "SCHEMA_ERROR" as const;
  /** Entity, relationship or field the error is about */
  readonly subject: string | undefined;
  /** The missing or unknown key or value */
  readonly key: string | undefined;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    options: { subject?: string; key?: string; details?: Record<string, unknown> } = {}
  ) {
    super(message);
    this.name = "SchemaError";
    this.subject = options.subject;
    this.key = options.key;
    this.details = options.details ?? {};
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), subject: this.subject, key: this.key, details: this.details };
  }
}

// ---------------------------------------------------------------------------
// NotFoundError
// ---------------------------------------------------------------------------

/** A lookup against the warm cache named something that does not exist */
export class NotFoundError extends MetadataError {
  readonly code = "NOT_FOUND" as const;
  readonly kind: "entity" | "relationship";
  readonly requested: string;
  /** Sorted list of names that do exist */
  readonly available: readonly string[];

  constructor(kind: "entity" | "relationship", requested: string, available: readonly string[]) {
    const sorted = [...available].sort();
    super(
      `${kind === "entity" ? "Entity" : "Relationship"} "${requested}" not found. ` +
        `Available: ${sorted.length > 0 ? sorted.join(", ") : "(none)"}`
    );
    this.name = "NotFoundError";
    this.kind = kind;
    this.requested = requested;
    this.available = sorted;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      kind: this.kind,
      requested: this.requested,
      available: [...this.available],
    };
  }
}

// ---------------------------------------------------------------------------
// ConstraintError
// ---------------------------------------------------------------------------

/**
 * A `restrict` cascade policy blocked a deletion because active related
 * rows exist. Expected and user-facing.
 */
export class ConstraintError extends MetadataError {
  readonly code = "CONSTRAINT_VIOLATION" as const;
  readonly relationship: string;
  readonly entity: string;
  readonly entityId: string;
  readonly activeCount: number;

  constructor(
    message: string,
    details: { relationship: string; entity: string; entityId: string; activeCount: number }
  ) {
    super(message);
    this.name = "ConstraintError";
    this.relationship = details.relationship;
    this.entity = details.entity;
    this.entityId = details.entityId;
    this.activeCount = details.activeCount;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      relationship: this.relationship,
      entity: this.entity,
      entityId: this.entityId,
      activeCount: this.activeCount,
    };
  }
}
