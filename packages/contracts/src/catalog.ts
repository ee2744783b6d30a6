/**
 * Catalog Descriptors
 *
 * Read-only descriptions of the field types and validation rules the
 * platform discovered at startup. API and UI consumers use these to build
 * filter widgets and client-side validation without knowing the platform's
 * internals.
 */

import { z } from "zod";
import { FIELD_TYPES, FILTER_OPERATORS } from "./field-types.js";

export const validationRuleDescriptorSchema = z.object({
  /** Short rule name used in field metadata (e.g., "Email") */
  name: z.string().min(1),
  implementingClass: z.string().min(1),
  description: z.string(),
  /** A JavaScript function body the client may evaluate; empty when server-only */
  clientSideExpression: z.string(),
  /** Field types the rule is meaningful for */
  appliesTo: z.array(z.enum(FIELD_TYPES)),
});

export type ValidationRuleDescriptor = z.infer<typeof validationRuleDescriptorSchema>;

export const fieldTypeDescriptorSchema = z.object({
  /** Short type name (e.g., "Text") */
  type: z.enum(FIELD_TYPES),
  implementingClass: z.string().min(1),
  description: z.string(),
  /** Name of the UI component that renders this type */
  uiComponentHint: z.string().min(1),
  supportedOperators: z.array(z.enum(FILTER_OPERATORS)),
  applicableValidationRules: z.array(validationRuleDescriptorSchema),
});

export type FieldTypeDescriptor = z.infer<typeof fieldTypeDescriptorSchema>;
