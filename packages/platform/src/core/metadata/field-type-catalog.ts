/**
 * Field Type Catalog
 *
 * Introspects the registered field implementations once. Each type is
 * probed by instantiating its class with a configuration carrying only a
 * name and the type; the probe's UI component and default operators become
 * the type's descriptor.
 */

import {
  FIELD_TYPES,
  normalizeFieldType,
  type FieldType,
  type FieldTypeDescriptor,
  type Logger,
} from "@schemata/contracts";
import { FIELD_IMPLEMENTATIONS, type FieldClass } from "../fields/registry.js";
import { createLogger, describeError } from "../logging/index.js";
import { ValidationRuleCatalog } from "./validation-rule-catalog.js";

/** "DateTimeField" → "DateTime". Returns undefined for non-field class names. */
export function extractFieldTypeFromClassName(className: string): FieldType | undefined {
  if (!className.endsWith("Field")) return undefined;
  return normalizeFieldType(className);
}

/** "DateTimeField" → "date time field", "IDField" → "id field" */
export function describeClassName(className: string): string {
  return className
    .replace(/([a-z0-9])([A-Z])/g, "$1 $2")
    .replace(/([A-Z]+)([A-Z][a-z])/g, "$1 $2")
    .toLowerCase();
}

export interface FieldTypeCatalogOptions {
  implementations?: Partial<Record<FieldType, FieldClass>>;
  rules?: ValidationRuleCatalog;
  logger?: Logger;
}

export class FieldTypeCatalog {
  private readonly implementations: Partial<Record<FieldType, FieldClass>>;
  private readonly rules: ValidationRuleCatalog;
  private readonly logger: Logger;
  private descriptors: Map<FieldType, FieldTypeDescriptor> | null = null;

  constructor(options: FieldTypeCatalogOptions = {}) {
    this.implementations = options.implementations ?? FIELD_IMPLEMENTATIONS;
    this.logger = options.logger ?? createLogger("field-types");
    this.rules = options.rules ?? new ValidationRuleCatalog({ logger: this.logger });
  }

  /**
   * Describes every registered type. A type whose probe throws is logged
   * and left out; the rest of the scan continues.
   */
  scan(): Map<FieldType, FieldTypeDescriptor> {
    if (this.descriptors) return this.descriptors;

    const descriptors = new Map<FieldType, FieldTypeDescriptor>();
    for (const type of FIELD_TYPES) {
      const FieldImpl = this.implementations[type];
      if (!FieldImpl) continue;

      const declaredType = extractFieldTypeFromClassName(FieldImpl.name);
      if (declaredType !== undefined && declaredType !== type) {
        this.logger.warn("Field class name does not match its registered type", {
          type,
          implementingClass: FieldImpl.name,
        });
      }

      try {
        const probe = new FieldImpl({ name: `${type.toLowerCase()}_probe`, type });
        descriptors.set(type, {
          type,
          implementingClass: FieldImpl.name,
          description: describeClassName(FieldImpl.name),
          uiComponentHint: probe.uiComponent(),
          supportedOperators: probe.supportedOperators(),
          applicableValidationRules: this.rules.rulesForFieldType(type),
        });
      } catch (err) {
        this.logger.warn("Skipping field type that failed to instantiate", {
          type,
          implementingClass: FieldImpl.name,
          error: describeError(err),
        });
      }
    }

    this.descriptors = descriptors;
    this.logger.debug("Discovered field types", { types: [...descriptors.keys()] });
    return descriptors;
  }

  descriptor(type: FieldType): FieldTypeDescriptor | undefined {
    return this.scan().get(type);
  }

  /** Descriptors keyed by type name, in declaration order */
  toRecord(): Record<string, FieldTypeDescriptor> {
    return Object.fromEntries(this.scan());
  }
}
