/**
 * Field Base
 *
 * A live field: one descriptor, one value, and the validation rules its
 * descriptor names. Each concrete field type declares its UI component and
 * default filter operators and may coerce raw values (form strings, driver
 * output) into its canonical representation.
 */

import type { z } from "zod";
import {
  OPERATOR_DESCRIPTIONS,
  zodSchemaForFieldType,
  type FieldDescriptor,
  type FieldType,
  type FilterOperator,
  type Logger,
} from "@schemata/contracts";
import { SchemaError } from "../errors/index.js";
import { createLogger } from "../logging/index.js";
import type { ValidationRuleCatalog } from "../metadata/validation-rule-catalog.js";
import type { ValidationContext, ValidationRule } from "../validation/rule.js";

export interface FieldOptions {
  /** Resolves the descriptor's rule names; without it no rules are wired */
  rules?: ValidationRuleCatalog;
  logger?: Logger;
}

export const BASE_OPERATORS: readonly FilterOperator[] = ["equals", "notEquals", "isNull", "isNotNull"];

export abstract class FieldBase {
  readonly descriptor: FieldDescriptor;
  protected readonly logger: Logger;
  private readonly rules: ValidationRule[] = [];
  private value: unknown = null;
  private errors: string[] = [];

  constructor(descriptor: FieldDescriptor, options: FieldOptions = {}) {
    this.descriptor = descriptor;
    this.logger = options.logger ?? createLogger("fields");
    if (descriptor.defaultValue !== undefined) {
      this.value = this.coerce(descriptor.defaultValue);
    }
    if (options.rules) {
      this.wireRules(options.rules);
    }
  }

  get name(): string {
    return this.descriptor.name;
  }

  get type(): FieldType {
    return this.descriptor.type;
  }

  /** Name of the UI component that renders this field */
  abstract uiComponent(): string;

  /** Operators used when the descriptor does not list its own */
  protected defaultOperators(): readonly FilterOperator[] {
    return BASE_OPERATORS;
  }

  supportedOperators(): FilterOperator[] {
    return [...(this.descriptor.operators ?? this.defaultOperators())];
  }

  supportsOperator(operator: string): boolean {
    return this.supportedOperators().some((op) => op === operator);
  }

  operatorDescriptions(): Partial<Record<FilterOperator, string>> {
    const descriptions: Partial<Record<FilterOperator, string>> = {};
    for (const op of this.supportedOperators()) {
      descriptions[op] = OPERATOR_DESCRIPTIONS[op];
    }
    return descriptions;
  }

  // -------------------------------------------------------------------------
  // Value
  // -------------------------------------------------------------------------

  getValue(): unknown {
    return this.value;
  }

  setValue(value: unknown): void {
    this.value = this.coerce(value);
  }

  /** Raw input → canonical value. Identity unless a type overrides it. */
  protected coerce(value: unknown): unknown {
    return value;
  }

  /** Zod schema the value must satisfy when present */
  valueSchema(): z.ZodTypeAny {
    return zodSchemaForFieldType(this.type, {
      required: false,
      enumValues: Object.keys(this.descriptor.options ?? {}),
    });
  }

  // -------------------------------------------------------------------------
  // Flags
  // -------------------------------------------------------------------------

  isDBField(): boolean {
    return this.descriptor.isDBField !== false;
  }

  isRequired(): boolean {
    return this.descriptor.required === true;
  }

  isReadOnly(): boolean {
    return this.descriptor.readOnly === true;
  }

  isUnique(): boolean {
    return this.descriptor.unique === true;
  }

  // -------------------------------------------------------------------------
  // Validation
  // -------------------------------------------------------------------------

  /** Names of the rules wired into this field */
  ruleNames(): string[] {
    return this.rules.map((rule) => rule.name);
  }

  /**
   * Checks the value's shape, then runs every wired rule not named in
   * `skipRules`. Errors from the last run are available from validationErrors().
   */
  async validate(
    context: Omit<ValidationContext, "field"> = {},
    skipRules: readonly string[] = []
  ): Promise<boolean> {
    this.errors = [];
    const label = this.descriptor.label ?? this.name;

    if (this.value !== null && this.value !== undefined && !this.valueSchema().safeParse(this.value).success) {
      this.errors.push(`${label} is not a valid ${this.type} value.`);
    }

    for (const rule of this.rules) {
      if (skipRules.includes(rule.name)) continue;
      const valid = await rule.validate(this.value, { ...context, field: this.descriptor });
      if (!valid) this.errors.push(rule.formatError(label));
    }

    return this.errors.length === 0;
  }

  validationErrors(): string[] {
    return [...this.errors];
  }

  private wireRules(catalog: ValidationRuleCatalog): void {
    for (const ruleName of this.descriptor.validationRules ?? []) {
      try {
        this.rules.push(catalog.create(ruleName));
      } catch (err) {
        if (!(err instanceof SchemaError)) throw err;
        this.logger.warn("Skipping unknown validation rule", {
          field: this.name,
          rule: ruleName,
        });
      }
    }
  }
}
