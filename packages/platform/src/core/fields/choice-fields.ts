import type { FilterOperator } from "@schemata/contracts";
import { FieldBase } from "./field-base.js";

const SINGLE_CHOICE_OPERATORS: readonly FilterOperator[] = [
  "equals",
  "notEquals",
  "in",
  "notIn",
  "isNull",
  "isNotNull",
];

export class EnumField extends FieldBase {
  uiComponent(): string {
    return "Select";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return SINGLE_CHOICE_OPERATORS;
  }
}

export class RadioButtonSetField extends FieldBase {
  uiComponent(): string {
    return "RadioButtonSet";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return SINGLE_CHOICE_OPERATORS;
  }
}

/**
 * Holds an array of option keys.
 * Accepts a JSON array string or a comma-separated list as raw input.
 */
export class MultiEnumField extends FieldBase {
  uiComponent(): string {
    return "MultiSelect";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return ["overlap", "containsAll", "containsNone", "isNull", "isNotNull"];
  }

  protected override coerce(value: unknown): unknown {
    if (typeof value !== "string") return value;
    const trimmed = value.trim();
    if (trimmed === "") return [];
    if (trimmed.startsWith("[")) {
      const parsed = parseJsonArray(trimmed);
      if (parsed) return parsed;
    }
    return trimmed
      .split(",")
      .map((part) => part.trim())
      .filter((part) => part !== "");
  }
}

function parseJsonArray(text: string): unknown[] | null {
  try {
    const parsed: unknown = JSON.parse(text);
    return Array.isArray(parsed) ? parsed : null;
  } catch {
    return null;
  }
}
