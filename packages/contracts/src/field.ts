/**
 * Field Descriptor
 *
 * The declarative description of one field: its type, constraints, options
 * and supported operators. Descriptors are data, not live objects. The
 * platform materializes them into field instances on demand.
 *
 * Schema files are untrusted input, so every descriptor passes through
 * `fieldDescriptorSchema` before the platform reads it.
 */

import { z } from "zod";
import {
  FILTER_OPERATORS,
  normalizeFieldType,
  type FieldType,
} from "./field-types.js";

/** Accepts "Text" or "TextField" and yields the short FieldType */
export const fieldTypeSchema = z.string().transform((raw, ctx): FieldType => {
  const type = normalizeFieldType(raw);
  if (!type) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unknown field type "${raw}"`,
    });
    return z.NEVER;
  }
  return type;
});

const fieldProperties = {
  type: fieldTypeSchema,
  label: z.string().optional(),
  description: z.string().optional(),
  required: z.boolean().optional(),
  readOnly: z.boolean().optional(),
  unique: z.boolean().optional(),
  /** Controls whether the field is persisted. Defaults to true. */
  isDBField: z.boolean().optional(),
  nullable: z.boolean().optional(),
  isPrimaryKey: z.boolean().optional(),
  validationRules: z.array(z.string().min(1)).optional(),
  /** Overrides the implementation's default operator list */
  operators: z.array(z.enum(FILTER_OPERATORS)).optional(),
  defaultValue: z.unknown().optional(),
  /** For Enum, MultiEnum and RadioButtonSet: stored value → display label */
  options: z.record(z.string(), z.string()).optional(),
  /** Name of a registered option provider that supplies `options` at load time */
  optionsProvider: z.string().min(1).optional(),
  relatedModel: z.string().min(1).optional(),
  relatedFieldName: z.string().min(1).optional(),
  displayFieldName: z.string().min(1).optional(),
  maxLength: z.number().int().positive().optional(),
  searchable: z.boolean().optional(),
};

/** A complete field descriptor, name included */
export const fieldDescriptorSchema = z.object({
  name: z.string().min(1),
  ...fieldProperties,
});

export type FieldDescriptor = z.infer<typeof fieldDescriptorSchema>;

/**
 * A field entry inside a schema file's `fields` map.
 * The name may be omitted; the map key supplies it.
 */
export const fieldEntrySchema = z.object({
  name: z.string().min(1).optional(),
  ...fieldProperties,
});

export type FieldEntry = z.infer<typeof fieldEntrySchema>;

/**
 * A `fields` map from a schema file, normalized so every descriptor carries
 * its own name. An entry whose name disagrees with its key is rejected.
 */
export const fieldMapSchema = z
  .record(z.string().min(1), fieldEntrySchema)
  .transform((entries, ctx): Record<string, FieldDescriptor> => {
    const fields: Record<string, FieldDescriptor> = {};
    for (const [key, entry] of Object.entries(entries)) {
      if (entry.name !== undefined && entry.name !== key) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [key, "name"],
          message: `Field name "${entry.name}" does not match its key "${key}"`,
        });
        continue;
      }
      fields[key] = { ...entry, name: key };
    }
    return fields;
  });

export type FieldMap = Record<string, FieldDescriptor>;

/**
 * Properties a caller may override on an existing field.
 * `name` and `type` are accepted here so that an attempt to change them can
 * be detected and reported; the platform never applies them.
 */
export type FieldOverrides = Partial<Omit<FieldDescriptor, "name" | "type">> & {
  name?: string;
  type?: string;
};
