/**
 * Field Types
 *
 * Defines the available field types for entity schemas, the filter operators
 * a field can support, and the Zod value schema for each type. This is the
 * single source of truth for what kind of data an entity field can hold.
 */

import { z } from "zod";

/**
 * All supported field types.
 * Each maps to exactly one field implementation in the platform.
 */
export const FIELD_TYPES = [
  "ID",
  "Text",
  "BigText",
  "Email",
  "Integer",
  "Float",
  "Boolean",
  "Date",
  "DateTime",
  "Enum",
  "MultiEnum",
  "RelatedRecord",
  "Image",
  "Video",
  "Password",
  "RadioButtonSet",
] as const;

export type FieldType = (typeof FIELD_TYPES)[number];

export function isFieldType(value: string): value is FieldType {
  return (FIELD_TYPES as readonly string[]).includes(value);
}

/**
 * Normalizes a type name as written in a schema file.
 * Accepts the short name ("DateTime") or the implementation-style name
 * ("DateTimeField"). Returns undefined for anything else.
 */
export function normalizeFieldType(raw: string): FieldType | undefined {
  const short = raw.endsWith("Field") ? raw.slice(0, -"Field".length) : raw;
  return isFieldType(short) ? short : undefined;
}

// ---------------------------------------------------------------------------
// Filter operators
// ---------------------------------------------------------------------------

export const FILTER_OPERATORS = [
  "equals",
  "notEquals",
  "contains",
  "startsWith",
  "endsWith",
  "in",
  "notIn",
  "greaterThan",
  "greaterThanOrEqual",
  "lessThan",
  "lessThanOrEqual",
  "between",
  "isNull",
  "isNotNull",
  "overlap",
  "containsAll",
  "containsNone",
] as const;

export type FilterOperator = (typeof FILTER_OPERATORS)[number];

/** Human-readable description of every operator, for API and UI consumers */
export const OPERATOR_DESCRIPTIONS: Record<FilterOperator, string> = {
  equals: "Exact match",
  notEquals: "Not equal to",
  contains: "Text contains value",
  startsWith: "Text starts with value",
  endsWith: "Text ends with value",
  in: "Value is in list",
  notIn: "Value is not in list",
  greaterThan: "Greater than",
  greaterThanOrEqual: "Greater than or equal to",
  lessThan: "Less than",
  lessThanOrEqual: "Less than or equal to",
  between: "Between two values",
  isNull: "Field is empty/null",
  isNotNull: "Field is not empty/null",
  overlap: "Array values overlap",
  containsAll: "Array contains all values",
  containsNone: "Array contains none of the values",
};

// ---------------------------------------------------------------------------
// Value schemas
// ---------------------------------------------------------------------------

/** "YYYY-MM-DD HH:MM:SS", as SQL drivers return timestamps */
const SQL_DATETIME = /^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/;

/**
 * Returns the Zod schema for a value of the given field type.
 * Used by field implementations to type-check values before rules run.
 */
export function zodSchemaForFieldType(
  type: FieldType,
  options?: { required?: boolean; enumValues?: string[] }
): z.ZodTypeAny {
  const required = options?.required ?? false;
  const [firstValue, ...otherValues] = options?.enumValues ?? [];
  const choice = firstValue === undefined ? z.string() : z.enum([firstValue, ...otherValues]);

  let schema: z.ZodTypeAny;

  switch (type) {
    case "ID":
    case "RelatedRecord":
      schema = z.string().min(1).or(z.number().int().positive());
      break;
    case "Text":
    case "BigText":
    case "Password":
      schema = z.string();
      break;
    case "Email":
      schema = z.string().email();
      break;
    case "Image":
    case "Video":
      schema = z.string().url();
      break;
    case "Integer":
      schema = z.number().int();
      break;
    case "Float":
      schema = z.number();
      break;
    case "Boolean":
      schema = z.boolean();
      break;
    case "Date":
      schema = z.string().date();
      break;
    case "DateTime":
      schema = z.union([z.string().datetime({ offset: true }), z.string().regex(SQL_DATETIME)]);
      break;
    case "Enum":
    case "RadioButtonSet":
      schema = choice;
      break;
    case "MultiEnum":
      schema = z.array(choice);
      break;
  }

  return required ? schema : schema.optional().nullable();
}
