/**
 * Field Factory
 *
 * Materializes descriptors into live fields, wiring each field's rule names
 * through the Validation Rule Catalog.
 */

import type { FieldDescriptor, FieldType, Logger } from "@schemata/contracts";
import type { FieldBase } from "./field-base.js";
import { FIELD_IMPLEMENTATIONS, type FieldClass } from "./registry.js";
import { createLogger } from "../logging/index.js";
import { ValidationRuleCatalog } from "../metadata/validation-rule-catalog.js";

export interface FieldFactoryOptions {
  rules?: ValidationRuleCatalog;
  implementations?: Readonly<Record<FieldType, FieldClass>>;
  logger?: Logger;
}

export class FieldFactory {
  readonly rules: ValidationRuleCatalog;
  private readonly implementations: Readonly<Record<FieldType, FieldClass>>;
  private readonly logger: Logger;

  constructor(options: FieldFactoryOptions = {}) {
    this.logger = options.logger ?? createLogger("fields");
    this.rules = options.rules ?? new ValidationRuleCatalog({ logger: this.logger });
    this.implementations = options.implementations ?? FIELD_IMPLEMENTATIONS;
  }

  create(descriptor: FieldDescriptor): FieldBase {
    const FieldImpl = this.implementations[descriptor.type];
    return new FieldImpl(descriptor, { rules: this.rules, logger: this.logger });
  }
}
