/**
 * Field Descriptor — Test Suite
 *
 * Schema files are untrusted input. These tests pin down what the field
 * descriptor schemas accept, normalize and reject.
 */

import { describe, it, expect } from "vitest";
import { fieldDescriptorSchema, fieldMapSchema, fieldTypeSchema } from "./field.js";

describe("fieldTypeSchema", () => {
  it("normalizes implementation-style type names", () => {
    expect(fieldTypeSchema.parse("IDField")).toBe("ID");
    expect(fieldTypeSchema.parse("Email")).toBe("Email");
  });

  it("reports unknown types by name", () => {
    const result = fieldTypeSchema.safeParse("Hacked");
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.message).toBe('Unknown field type "Hacked"');
    }
  });
});

describe("fieldDescriptorSchema", () => {
  it("requires a non-empty name", () => {
    expect(fieldDescriptorSchema.safeParse({ name: "", type: "Text" }).success).toBe(false);
    expect(fieldDescriptorSchema.safeParse({ type: "Text" }).success).toBe(false);
  });

  it("keeps optional properties as declared", () => {
    const field = fieldDescriptorSchema.parse({
      name: "status",
      type: "Enum",
      options: { draft: "Draft", done: "Done" },
      validationRules: ["Options"],
      operators: ["equals", "in"],
    });
    expect(field).toEqual({
      name: "status",
      type: "Enum",
      options: { draft: "Draft", done: "Done" },
      validationRules: ["Options"],
      operators: ["equals", "in"],
    });
  });

  it("rejects unknown operators", () => {
    const result = fieldDescriptorSchema.safeParse({ name: "t", type: "Text", operators: ["like"] });
    expect(result.success).toBe(false);
  });
});

describe("fieldMapSchema", () => {
  it("fills each descriptor's name from its key", () => {
    const fields = fieldMapSchema.parse({
      title: { type: "Text", required: true },
      rating: { name: "rating", type: "IntegerField" },
    });
    expect(fields).toEqual({
      title: { name: "title", type: "Text", required: true },
      rating: { name: "rating", type: "Integer" },
    });
  });

  it("preserves declaration order", () => {
    const fields = fieldMapSchema.parse({ b: { type: "Text" }, a: { type: "Text" } });
    expect(Object.keys(fields)).toEqual(["b", "a"]);
  });

  it("rejects an entry whose name disagrees with its key", () => {
    const result = fieldMapSchema.safeParse({ title: { name: "heading", type: "Text" } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(["title", "name"]);
    }
  });
});
