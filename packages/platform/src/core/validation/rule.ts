/**
 * Validation Rule Base
 *
 * A validation rule checks one field value. Rules are wired into fields by
 * name ("Required", "Email") through the Validation Rule Catalog; a rule's
 * name is its class name without the "Validation" suffix.
 */

import type {
  DatabaseConnector,
  FieldDescriptor,
  FieldType,
  PersistableModel,
} from "@schemata/contracts";

const RULE_CLASS_SUFFIX = "Validation";

/** What a rule may consult besides the value itself */
export interface ValidationContext {
  field: FieldDescriptor;
  /** The record being validated, when validation runs through a model */
  model?: PersistableModel;
  /** Needed by rules that look at stored rows (Unique, ForeignKeyExists) */
  connector?: DatabaseConnector;
  /** Maps an entity name to its table; defaults to the lower-cased name */
  tableFor?: (entityName: string) => string | undefined;
}

/**
 * "EmailValidation" → "Email".
 * A class name without the suffix is returned unchanged.
 */
export function extractRuleNameFromClassName(className: string): string {
  return className.endsWith(RULE_CLASS_SUFFIX) && className.length > RULE_CLASS_SUFFIX.length
    ? className.slice(0, -RULE_CLASS_SUFFIX.length)
    : className;
}

export abstract class ValidationRule {
  abstract readonly description: string;
  /** Message template; `{fieldName}` is replaced when formatted */
  abstract readonly errorMessage: string;
  /** Field types this rule is meaningful for */
  abstract readonly appliesTo: readonly FieldType[];

  /** The short rule name used in field metadata */
  get name(): string {
    return extractRuleNameFromClassName(this.constructor.name);
  }

  abstract validate(value: unknown, context: ValidationContext): boolean | Promise<boolean>;

  /**
   * Body of a `(value, fieldName, options) => boolean` function the client
   * may evaluate. Empty when the rule can only run on the server.
   */
  clientSideExpression(): string {
    return "";
  }

  formatError(fieldName: string): string {
    return this.errorMessage.replaceAll("{fieldName}", fieldName);
  }
}

/** Null, undefined and the empty string carry no value to check */
export function isBlank(value: unknown): boolean {
  return value === null || value === undefined || value === "";
}
