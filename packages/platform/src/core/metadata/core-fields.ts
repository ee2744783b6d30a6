/**
 * Core Fields Provider
 *
 * Every entity carries a set of framework fields: id, audit timestamps and
 * soft-delete markers. The standard set comes from a JSON template; model
 * classes may register additional core fields, which their subclasses
 * inherit.
 *
 * Owners are either model class constructors (inheritance-aware) or plain
 * entity names (no ancestry).
 */

import fs from "node:fs";
import { fileURLToPath } from "node:url";
import {
  fieldMapSchema,
  type FieldDescriptor,
  type FieldMap,
  type FieldOverrides,
  type Logger,
} from "@schemata/contracts";
import { ConfigurationError } from "../errors/index.js";
import { createLogger, describeError } from "../logging/index.js";

/** Any model class, concrete or abstract */
export type ModelClass = abstract new (...args: never[]) => unknown;

export type CoreFieldOwner = string | ModelClass;

/** The template shipped with the platform */
export const DEFAULT_CORE_FIELDS_TEMPLATE = fileURLToPath(
  new URL("./templates/core-fields.json", import.meta.url)
);

const PROTECTED_KEYS = ["name", "type"] as const;

const REQUIRED_CORE_FIELD_KEYS = ["name", "type", "label", "isDBField"] as const;

export interface CoreFieldsProviderOptions {
  templatePath?: string;
  logger?: Logger;
}

export class CoreFieldsProvider {
  private templatePath: string;
  private readonly logger: Logger;
  private standard: FieldMap | null = null;
  /** Fields registered directly on each owner */
  private readonly registry = new Map<unknown, FieldMap>();
  /** Merged standard + model-specific fields per owner */
  private readonly cache = new Map<unknown, FieldMap>();

  constructor(options: CoreFieldsProviderOptions = {}) {
    this.templatePath = options.templatePath ?? DEFAULT_CORE_FIELDS_TEMPLATE;
    this.logger = options.logger ?? createLogger("core-fields");
  }

  /**
   * The standard core fields from the template.
   * Read once per provider; later edits to the file are not seen.
   */
  standardCoreFields(): FieldMap {
    if (!this.standard) {
      this.standard = this.readTemplate();
      this.logger.debug("Loaded standard core fields", {
        templatePath: this.templatePath,
        fields: Object.keys(this.standard),
      });
    }
    return cloneFields(this.standard);
  }

  /**
   * Store (or overwrite) the additional core fields of one owner.
   * Drops the merged cache of that owner and of every cached subclass.
   */
  registerModelCoreFields(owner: CoreFieldOwner, fields: FieldMap): void {
    const normalized: FieldMap = {};
    for (const [key, field] of Object.entries(fields)) {
      normalized[key] = { ...field, name: key };
    }
    this.registry.set(owner, normalized);

    for (const cached of [...this.cache.keys()]) {
      if (hierarchyOf(cached).includes(owner)) {
        this.cache.delete(cached);
      }
    }

    this.logger.debug("Registered model core fields", {
      owner: ownerName(owner),
      fields: Object.keys(normalized),
    });
  }

  /**
   * Fields registered on the owner and on every ancestor class.
   * Base class first, so the most-derived registration wins.
   */
  modelCoreFields(owner: CoreFieldOwner): FieldMap {
    const merged: FieldMap = {};
    for (const level of hierarchyOf(owner)) {
      const fields = this.registry.get(level);
      if (fields) Object.assign(merged, cloneFields(fields));
    }
    return merged;
  }

  /** Standard core fields overlaid with the owner's model-specific ones */
  allCoreFieldsForModel(owner: CoreFieldOwner): FieldMap {
    let merged = this.cache.get(owner);
    if (!merged) {
      merged = { ...this.standardCoreFields(), ...this.modelCoreFields(owner) };
      this.cache.set(owner, merged);
      this.logger.debug("Generated core fields for model", {
        owner: ownerName(owner),
        fieldCount: Object.keys(merged).length,
      });
    }
    return cloneFields(merged);
  }

  /**
   * A core field with caller overrides applied.
   * `name` and `type` never change; attempts are logged and ignored.
   * Returns null when the owner has no such core field.
   */
  coreFieldWithOverrides(
    fieldName: string,
    owner: CoreFieldOwner,
    overrides: FieldOverrides = {}
  ): FieldDescriptor | null {
    const coreFields = this.allCoreFieldsForModel(owner);
    const field = Object.hasOwn(coreFields, fieldName) ? coreFields[fieldName] : undefined;
    if (!field) {
      this.logger.warn("Core field not found for override", {
        fieldName,
        owner: ownerName(owner),
        availableFields: Object.keys(coreFields),
      });
      return null;
    }

    const { name, type, ...allowed } = overrides;
    const attempted = { name, type };
    for (const key of PROTECTED_KEYS) {
      if (attempted[key] !== undefined) {
        this.logger.warn("Attempted to override protected core field property", {
          fieldName,
          protectedKey: key,
          attemptedValue: attempted[key],
        });
      }
    }

    return { ...field, ...allowed, name: field.name, type: field.type };
  }

  /**
   * True if the field is a standard core field, or (when an owner is given)
   * one of that owner's merged core fields.
   */
  isCoreField(fieldName: string, owner?: CoreFieldOwner): boolean {
    if (Object.hasOwn(this.standardCoreFields(), fieldName)) return true;
    return owner !== undefined && Object.hasOwn(this.allCoreFieldsForModel(owner), fieldName);
  }

  coreFieldNames(owner: CoreFieldOwner): string[] {
    return Object.keys(this.allCoreFieldsForModel(owner));
  }

  /** Checks that a core field declares name, type, label and isDBField */
  validateCoreFieldMetadata(candidate: Record<string, unknown>): boolean {
    for (const key of REQUIRED_CORE_FIELD_KEYS) {
      if (candidate[key] === undefined || candidate[key] === null) {
        this.logger.warn("Core field metadata validation failed", {
          missingKey: key,
          field: candidate,
        });
        return false;
      }
    }
    return true;
  }

  /** Drops every merged entry and the loaded template. Registrations stay. */
  clearCache(): void {
    this.cache.clear();
    this.standard = null;
    this.logger.debug("Cleared all core fields cache");
  }

  clearCacheForModel(owner: CoreFieldOwner): void {
    this.cache.delete(owner);
    this.logger.debug("Cleared core fields cache for model", { owner: ownerName(owner) });
  }

  /** Points the provider at another template; the next read reloads it */
  setTemplatePath(templatePath: string): void {
    this.templatePath = templatePath;
    this.standard = null;
    this.cache.clear();
    this.logger.debug("Updated core fields template path", { templatePath });
  }

  // -------------------------------------------------------------------------
  // Internals
  // -------------------------------------------------------------------------

  private readTemplate(): FieldMap {
    let raw: string;
    try {
      raw = fs.readFileSync(this.templatePath, "utf8");
    } catch (err) {
      this.logger.error("Core fields template not found", {
        templatePath: this.templatePath,
        error: describeError(err),
      });
      throw new ConfigurationError(`Core fields template not found at: ${this.templatePath}`, {
        source: this.templatePath,
        cause: err,
      });
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      throw new ConfigurationError(`Core fields template is not valid JSON: ${this.templatePath}`, {
        source: this.templatePath,
        cause: err,
      });
    }

    if (typeof data !== "object" || data === null || Array.isArray(data)) {
      this.logger.error("Core fields template returned invalid data", {
        templatePath: this.templatePath,
      });
      throw new ConfigurationError("Core fields template must contain a map of fields", {
        source: this.templatePath,
      });
    }

    const parsed = fieldMapSchema.safeParse(data);
    if (!parsed.success) {
      throw new ConfigurationError(
        `Core fields template has invalid entries: ${parsed.error.issues
          .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
          .join("; ")}`,
        { source: this.templatePath }
      );
    }
    return parsed.data;
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/**
 * The owner followed by its ancestor classes, base first.
 * A string owner is its own hierarchy.
 */
function hierarchyOf(owner: unknown): unknown[] {
  const chain: unknown[] = [];
  let current: unknown = owner;
  while (current !== null && current !== undefined && current !== Function.prototype) {
    chain.push(current);
    if (typeof current !== "function") break;
    current = Object.getPrototypeOf(current);
  }
  return chain.reverse();
}

function ownerName(owner: CoreFieldOwner): string {
  return typeof owner === "string" ? owner : owner.name;
}

function cloneFields(fields: FieldMap): FieldMap {
  const copy: FieldMap = {};
  for (const [key, field] of Object.entries(fields)) {
    copy[key] = structuredClone(field);
  }
  return copy;
}
