import { describe, it, expect } from "vitest";
import {
  ConfigurationError,
  ConstraintError,
  MetadataError,
  NotFoundError,
  SchemaError,
} from "./index.js";

describe("error taxonomy", () => {
  it("sets name and code on every subclass", () => {
    const errors = [
      new ConfigurationError("missing"),
      new SchemaError("bad"),
      new NotFoundError("entity", "X", []),
      new ConstraintError("blocked", { relationship: "r", entity: "E", entityId: "1", activeCount: 1 }),
    ];
    expect(errors.map((e) => [e.name, e.code])).toEqual([
      ["ConfigurationError", "CONFIGURATION_ERROR"],
      ["SchemaError", "SCHEMA_ERROR"],
      ["NotFoundError", "NOT_FOUND"],
      ["ConstraintError", "CONSTRAINT_VIOLATION"],
    ]);
    for (const error of errors) {
      expect(error).toBeInstanceOf(MetadataError);
      expect(error).toBeInstanceOf(Error);
    }
  });

  it("ConfigurationError keeps its source and cause", () => {
    const cause = new Error("ENOENT");
    const error = new ConfigurationError("Template missing", { source: "/tmp/core.json", cause });
    expect(error.source).toBe("/tmp/core.json");
    expect(error.cause).toBe(cause);
    expect(error.toJSON()).toEqual({
      name: "ConfigurationError",
      code: "CONFIGURATION_ERROR",
      message: "Template missing",
      source: "/tmp/core.json",
    });
  });

  it("SchemaError carries the offending key", () => {
    const error = new SchemaError('Unknown relationship type "Bogus"', { subject: "r", key: "Bogus" });
    expect(error.key).toBe("Bogus");
    expect(error.subject).toBe("r");
    expect(error.details).toEqual({});
  });

  it("NotFoundError sorts the available names into its message", () => {
    const error = new NotFoundError("entity", "DoesNotExist", ["Users", "Movies"]);
    expect(error.available).toEqual(["Movies", "Users"]);
    expect(error.message).toBe('Entity "DoesNotExist" not found. Available: Movies, Users');
  });

  it("NotFoundError reports an empty set", () => {
    const error = new NotFoundError("relationship", "x", []);
    expect(error.message).toBe('Relationship "x" not found. Available: (none)');
  });

  it("ConstraintError serializes its details", () => {
    const error = new ConstraintError("blocked", {
      relationship: "movies_movie_quotes",
      entity: "Movies",
      entityId: "m1",
      activeCount: 2,
    });
    expect(error.toJSON()).toEqual({
      name: "ConstraintError",
      code: "CONSTRAINT_VIOLATION",
      message: "blocked",
      relationship: "movies_movie_quotes",
      entity: "Movies",
      entityId: "m1",
      activeCount: 2,
    });
  });
});
