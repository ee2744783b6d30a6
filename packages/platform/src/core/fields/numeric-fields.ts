import type { FilterOperator } from "@schemata/contracts";
import { FieldBase } from "./field-base.js";

const NUMERIC_OPERATORS: readonly FilterOperator[] = [
  "equals",
  "notEquals",
  "greaterThan",
  "greaterThanOrEqual",
  "lessThan",
  "lessThanOrEqual",
  "between",
  "in",
  "notIn",
  "isNull",
  "isNotNull",
];

export class IntegerField extends FieldBase {
  uiComponent(): string {
    return "NumberInput";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return NUMERIC_OPERATORS;
  }

  protected override coerce(value: unknown): unknown {
    if (typeof value === "string" && /^-?\d+$/.test(value.trim())) {
      const parsed = Number.parseInt(value, 10);
      // Left as a string past 2^53 so validation reports it instead of rounding.
      if (Number.isSafeInteger(parsed)) return parsed;
    }
    return value;
  }
}

export class FloatField extends FieldBase {
  uiComponent(): string {
    return "NumberInput";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return NUMERIC_OPERATORS;
  }

  protected override coerce(value: unknown): unknown {
    if (typeof value === "string" && value.trim() !== "" && Number.isFinite(Number(value))) {
      return Number(value);
    }
    return value;
  }
}

export class BooleanField extends FieldBase {
  uiComponent(): string {
    return "Checkbox";
  }

  protected override coerce(value: unknown): unknown {
    if (value === 1 || value === "1" || value === "true") return true;
    if (value === 0 || value === "0" || value === "false") return false;
    return value;
  }
}
