import type { FilterOperator } from "@schemata/contracts";
import { FieldBase } from "./field-base.js";

const KEY_OPERATORS: readonly FilterOperator[] = [
  "equals",
  "notEquals",
  "in",
  "notIn",
  "isNull",
  "isNotNull",
];

/** Primary and foreign keys */
export class IDField extends FieldBase {
  uiComponent(): string {
    return "HiddenInput";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return KEY_OPERATORS;
  }
}

/**
 * A reference to a row of `relatedModel`, shown through `displayFieldName`.
 */
export class RelatedRecordField extends FieldBase {
  uiComponent(): string {
    return "RelatedRecordSelect";
  }

  protected override defaultOperators(): readonly FilterOperator[] {
    return KEY_OPERATORS;
  }

  relatedModel(): string | undefined {
    return this.descriptor.relatedModel;
  }

  relatedFieldName(): string {
    return this.descriptor.relatedFieldName ?? "id";
  }

  displayFieldName(): string | undefined {
    return this.descriptor.displayFieldName;
  }
}
