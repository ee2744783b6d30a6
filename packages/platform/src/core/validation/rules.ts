/**
 * Built-in Validation Rules
 *
 * Every rule except Required passes a blank value; presence is Required's
 * job alone.
 */

import { z } from "zod";
import { FIELD_TYPES, type FieldType } from "@schemata/contracts";
import { ValidationRule, isBlank, type ValidationContext } from "./rule.js";

const TEXT_TYPES: readonly FieldType[] = ["Text", "BigText"];

export class RequiredValidation extends ValidationRule {
  readonly description = "Value must be present";
  readonly errorMessage = "{fieldName} is required.";
  readonly appliesTo = FIELD_TYPES;

  validate(value: unknown): boolean {
    if (isBlank(value)) return false;
    return !(Array.isArray(value) && value.length === 0);
  }

  override clientSideExpression(): string {
    return "return !(value === null || value === undefined || value === '' || (Array.isArray(value) && value.length === 0));";
  }
}

const emailSchema = z.string().email();

export class EmailValidation extends ValidationRule {
  readonly description = "Value must be a valid email address";
  readonly errorMessage = "{fieldName} must be a valid email address.";
  readonly appliesTo: readonly FieldType[] = ["Email", ...TEXT_TYPES];

  validate(value: unknown): boolean {
    return isBlank(value) || emailSchema.safeParse(value).success;
  }

  override clientSideExpression(): string {
    return "return value === null || value === undefined || value === '' || /^[^\\s@]+@[^\\s@]+\\.[^\\s@]+$/.test(String(value));";
  }
}

export class AlphanumericValidation extends ValidationRule {
  readonly description = "Value may contain only letters, digits and spaces";
  readonly errorMessage = "{fieldName} may contain only letters and numbers.";
  readonly appliesTo = TEXT_TYPES;

  validate(value: unknown): boolean {
    if (isBlank(value)) return true;
    return typeof value === "string" && /^[A-Za-z0-9 ]+$/.test(value) && value.trim() !== "";
  }

  override clientSideExpression(): string {
    return "return value === null || value === undefined || value === '' || (/^[A-Za-z0-9 ]+$/.test(String(value)) && String(value).trim() !== '');";
  }
}

const urlSchema = z.string().url();

export class URLValidation extends ValidationRule {
  readonly description = "Value must be a valid URL";
  readonly errorMessage = "{fieldName} must be a valid URL.";
  readonly appliesTo: readonly FieldType[] = ["Image", "Video", "Text"];

  validate(value: unknown): boolean {
    return isBlank(value) || urlSchema.safeParse(value).success;
  }

  override clientSideExpression(): string {
    return "if (value === null || value === undefined || value === '') return true; try { new URL(String(value)); return true; } catch (e) { return false; }";
  }
}

const isoDateTimeSchema = z.string().datetime({ offset: true });
const SQL_DATETIME = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/;

/**
 * Accepts ISO 8601 timestamps and "YYYY-MM-DD HH:MM:SS".
 * Calendar overflow ("2024-02-30 10:00:00") is rejected.
 */
export class DateTimeValidation extends ValidationRule {
  readonly description = "Value must be a valid date and time";
  readonly errorMessage = "{fieldName} must be a valid date and time.";
  readonly appliesTo: readonly FieldType[] = ["DateTime"];

  validate(value: unknown): boolean {
    if (isBlank(value)) return true;
    if (typeof value !== "string") return false;
    if (isoDateTimeSchema.safeParse(value).success) return true;

    const match = SQL_DATETIME.exec(value);
    if (!match) return false;
    const [, year, month, day, hour, minute, second] = match.map(Number);
    const date = new Date(Date.UTC(year, month - 1, day, hour, minute, second));
    return (
      date.getUTCFullYear() === year &&
      date.getUTCMonth() === month - 1 &&
      date.getUTCDate() === day &&
      date.getUTCHours() === hour &&
      date.getUTCMinutes() === minute &&
      date.getUTCSeconds() === second
    );
  }

  override clientSideExpression(): string {
    return "return value === null || value === undefined || value === '' || !Number.isNaN(Date.parse(String(value).replace(' ', 'T')));";
  }
}

/**
 * Value must be one of the field's option keys.
 * For MultiEnum every element is checked. A field without options accepts anything.
 */
export class OptionsValidation extends ValidationRule {
  readonly description = "Value must be one of the field's options";
  readonly errorMessage = "{fieldName} must be one of the allowed options.";
  readonly appliesTo: readonly FieldType[] = ["Enum", "MultiEnum", "RadioButtonSet"];

  validate(value: unknown, context: ValidationContext): boolean {
    const options = context.field.options;
    if (!options || Object.keys(options).length === 0) return true;
    if (isBlank(value)) return true;

    const values = Array.isArray(value) ? value : [value];
    return values.every((v) => typeof v === "string" && Object.hasOwn(options, v));
  }

  override clientSideExpression(): string {
    return "if (value === null || value === undefined || value === '' || !options) return true; return (Array.isArray(value) ? value : [value]).every(function (v) { return Object.prototype.hasOwnProperty.call(options, v); });";
  }
}

/**
 * No other active row may hold the same value.
 * Without a connector and a model there is nothing to compare against.
 */
export class UniqueValidation extends ValidationRule {
  readonly description = "Value must be unique among active records";
  readonly errorMessage = "{fieldName} must be unique.";
  readonly appliesTo: readonly FieldType[] = [
    "ID",
    "Text",
    "Email",
    "Integer",
    "Float",
    "Date",
    "DateTime",
    "RelatedRecord",
  ];

  async validate(value: unknown, context: ValidationContext): Promise<boolean> {
    if (isBlank(value) || !context.connector || !context.model) return true;

    const rows = await context.connector.find(
      context.model,
      { [context.field.name]: value, deleted_at: null },
      ["id"]
    );
    const ownId = context.model.get("id");
    return rows.every((row) => ownId !== undefined && ownId !== null && row.id === ownId);
  }
}

/** A foreign key must reference an existing row of the related entity */
export class ForeignKeyExistsValidation extends ValidationRule {
  readonly description = "Referenced record must exist";
  readonly errorMessage = "The selected {fieldName} does not exist.";
  readonly appliesTo: readonly FieldType[] = ["ID", "RelatedRecord"];

  async validate(value: unknown, context: ValidationContext): Promise<boolean> {
    const relatedModel = context.field.relatedModel;
    if (isBlank(value) || !relatedModel || !context.connector) return true;

    const table = context.tableFor?.(relatedModel) ?? relatedModel.toLowerCase();
    const keyField = context.field.relatedFieldName ?? "id";
    return context.connector.recordExists(table, { [keyField]: value });
  }
}

/** Every rule class the platform ships, in catalog order */
export const VALIDATION_RULES = [
  RequiredValidation,
  EmailValidation,
  AlphanumericValidation,
  URLValidation,
  DateTimeValidation,
  OptionsValidation,
  UniqueValidation,
  ForeignKeyExistsValidation,
] as const;

export type ValidationRuleClass = new () => ValidationRule;
