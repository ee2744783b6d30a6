/**
 * Field Implementations Registry
 *
 * One concrete class per field type. The Field Type Catalog introspects
 * this table, and the Field Factory instantiates from it. FieldBase is not
 * listed; it cannot be instantiated.
 */

import type { FieldDescriptor, FieldType } from "@schemata/contracts";
import type { FieldBase, FieldOptions } from "./field-base.js";
import { BigTextField, EmailField, PasswordField, TextField } from "./text-fields.js";
import { BooleanField, FloatField, IntegerField } from "./numeric-fields.js";
import { DateField, DateTimeField } from "./date-fields.js";
import { EnumField, MultiEnumField, RadioButtonSetField } from "./choice-fields.js";
import { IDField, RelatedRecordField } from "./reference-fields.js";
import { ImageField, VideoField } from "./media-fields.js";

export type FieldClass = new (descriptor: FieldDescriptor, options?: FieldOptions) => FieldBase;

export const FIELD_IMPLEMENTATIONS: Readonly<Record<FieldType, FieldClass>> = {
  ID: IDField,
  Text: TextField,
  BigText: BigTextField,
  Email: EmailField,
  Integer: IntegerField,
  Float: FloatField,
  Boolean: BooleanField,
  Date: DateField,
  DateTime: DateTimeField,
  Enum: EnumField,
  MultiEnum: MultiEnumField,
  RelatedRecord: RelatedRecordField,
  Image: ImageField,
  Video: VideoField,
  Password: PasswordField,
  RadioButtonSet: RadioButtonSetField,
};
