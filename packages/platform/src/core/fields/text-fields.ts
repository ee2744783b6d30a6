import type { FilterOperator } from "@schemata/contracts";
import { FieldBase } from "./field-base.js";

const TEXT_OPERATORS: readonly FilterOperator[] = [
  "equals",
  "notEquals",
  "contains",
  "startsWith",
  "endsWith",
  "in",
  "notIn",
  "isNull",
  "isNotNull",
];

/** Scalars arrive as numbers from some drivers; text fields keep strings */
function toText(value: unknown): unknown {
  return typeof value === "number" || typeof value === "bigint" ? String(value) : value;
}

export class TextField extends FieldBase {
  uiComponent(): string {
    return "TextInput";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return TEXT_OPERATORS;
  }

  protected override coerce(value: unknown): unknown {
    return toText(value);
  }
}

export class BigTextField extends FieldBase {
  uiComponent(): string {
    return "TextArea";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return ["contains", "startsWith", "endsWith", "isNull", "isNotNull"];
  }

  protected override coerce(value: unknown): unknown {
    return toText(value);
  }
}

export class EmailField extends FieldBase {
  uiComponent(): string {
    return "EmailInput";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return TEXT_OPERATORS;
  }

  /** Addresses compare case-insensitively, so they are stored lower-cased */
  protected override coerce(value: unknown): unknown {
    return typeof value === "string" ? value.trim().toLowerCase() : value;
  }
}

/** Passwords are never filtered on, only checked for presence */
export class PasswordField extends FieldBase {
  uiComponent(): string {
    return "PasswordInput";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return ["isNull", "isNotNull"];
  }
}
