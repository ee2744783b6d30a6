import type { FilterOperator } from "@schemata/contracts";
import { FieldBase } from "./field-base.js";

const RANGE_OPERATORS: readonly FilterOperator[] = [
  "equals",
  "notEquals",
  "greaterThan",
  "greaterThanOrEqual",
  "lessThan",
  "lessThanOrEqual",
  "between",
  "isNull",
  "isNotNull",
];

/** Stored as "YYYY-MM-DD" */
export class DateField extends FieldBase {
  uiComponent(): string {
    return "DatePicker";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return RANGE_OPERATORS;
  }

  protected override coerce(value: unknown): unknown {
    return value instanceof Date ? value.toISOString().slice(0, 10) : value;
  }
}

/** Stored as an ISO 8601 UTC timestamp */
export class DateTimeField extends FieldBase {
  uiComponent(): string {
    return "DateTimePicker";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return RANGE_OPERATORS;
  }

  protected override coerce(value: unknown): unknown {
    return value instanceof Date ? value.toISOString() : value;
  }
}
