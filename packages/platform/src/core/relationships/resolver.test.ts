/**
 * Relationship Resolver — Test Suite
 *
 * Table-name and key-field generation are pure string rules; every literal
 * case below is what downstream tables are named after.
 */

import { describe, it, expect, vi } from "vitest";
import {
  MAX_TABLE_NAME_LENGTH,
  generateKeyFields,
  generateTableName,
  modelIdField,
  resolveRelationship,
  untruncatedTableName,
  validateRelationshipMetadata,
} from "./resolver.js";
import { SchemaError } from "../errors/index.js";

const moviesQuotes = {
  name: "movies_movie_quotes",
  type: "OneToMany",
  modelOne: "Movies",
  modelMany: "Movie_Quotes",
};

// ---------------------------------------------------------------------------
// Validation
// ---------------------------------------------------------------------------

describe("validateRelationshipMetadata", () => {
  it("accepts complete metadata and defaults the cascade action", () => {
    const validated = validateRelationshipMetadata(moviesQuotes);
    expect(validated).toMatchObject({
      name: "movies_movie_quotes",
      type: "OneToMany",
      modelOne: "Movies",
      modelMany: "Movie_Quotes",
      cascadeDelete: "restrict",
      unique: false,
      fields: {},
      additionalFields: {},
    });
  });

  it("rejects a OneToMany missing modelOne, naming the key", () => {
    const { modelOne: _omit, ...source } = moviesQuotes;
    expect(() => validateRelationshipMetadata(source)).toThrow(SchemaError);
    try {
      validateRelationshipMetadata(source);
    } catch (err) {
      expect(err).toBeInstanceOf(SchemaError);
      if (err instanceof SchemaError) expect(err.key).toBe("modelOne");
    }
  });

  it("rejects an unknown type, naming it", () => {
    expect(() => validateRelationshipMetadata({ name: "x", type: "Bogus", modelA: "A", modelB: "B" })).toThrow(
      /"Bogus"/
    );
  });

  it("requires name and type", () => {
    expect(() => validateRelationshipMetadata({ type: "OneToOne" })).toThrow(
      'Relationship "(unnamed)" is missing required key "name"'
    );
    expect(() => validateRelationshipMetadata({ name: "x" })).toThrow('Relationship "x" is missing required key "type"');
  });

  it("requires both participants of OneToOne and ManyToMany", () => {
    expect(() => validateRelationshipMetadata({ name: "x", type: "OneToOne", modelA: "Users" })).toThrow(
      'missing required key "modelB"'
    );
    expect(() => validateRelationshipMetadata({ name: "x", type: "ManyToMany", modelB: "Roles" })).toThrow(
      'missing required key "modelA"'
    );
  });

  it("treats a blank participant as missing", () => {
    expect(() =>
      validateRelationshipMetadata({ name: "x", type: "ManyToMany", modelA: " ", modelB: "Roles" })
    ).toThrow('missing required key "modelA"');
  });

  it("rejects an unknown cascade action", () => {
    expect(() =>
      validateRelationshipMetadata({ ...moviesQuotes, constraints: { cascadeDelete: "explode" } })
    ).toThrow('unknown cascade action "explode"');
  });

  it("keeps declared constraints", () => {
    const validated = validateRelationshipMetadata({
      ...moviesQuotes,
      constraints: { cascadeDelete: "softDelete", unique: true },
    });
    expect(validated.cascadeDelete).toBe("softDelete");
    expect(validated.unique).toBe(true);
  });
});

// ---------------------------------------------------------------------------
// Table names
// ---------------------------------------------------------------------------

describe("generateTableName", () => {
  it("follows the per-type patterns", () => {
    expect(generateTableName({ type: "OneToMany", modelOne: "Movies", modelMany: "Movie_Quotes" })).toBe(
      "rel_1_movies_M_movie_quotes"
    );
    expect(generateTableName({ type: "OneToOne", modelA: "Users", modelB: "Profiles" })).toBe(
      "rel_1_users_1_profiles"
    );
    expect(generateTableName({ type: "ManyToMany", modelA: "Users", modelB: "Roles" })).toBe("rel_N_users_M_roles");
  });

  it("truncates a 70-character name to its first 64 characters", () => {
    const relationship = { type: "ManyToMany" as const, modelA: "x".repeat(30), modelB: "y".repeat(31) };
    const full = untruncatedTableName(relationship);
    expect(full).toHaveLength(70);

    const truncated = generateTableName(relationship);
    expect(truncated).toHaveLength(MAX_TABLE_NAME_LENGTH);
    expect(truncated).toBe(full.slice(0, 64));
  });

  it("leaves a 64-character name intact", () => {
    const relationship = { type: "OneToOne" as const, modelA: "a".repeat(27), modelB: "b".repeat(28) };
    expect(generateTableName(relationship)).toBe(untruncatedTableName(relationship));
    expect(generateTableName(relationship)).toHaveLength(64);
  });
});

// ---------------------------------------------------------------------------
// Key fields
// ---------------------------------------------------------------------------

describe("generateKeyFields", () => {
  it("prefixes OneToMany keys with their side", () => {
    const [one, many] = generateKeyFields({ type: "OneToMany", modelOne: "Movies", modelMany: "Movie_Quotes" });
    expect(one).toEqual({
      name: "one_movies_id",
      type: "ID",
      label: "Movies ID",
      required: true,
      relatedModel: "Movies",
      relatedFieldName: "id",
      validationRules: ["ForeignKeyExists"],
    });
    expect(many.name).toBe("many_movie_quotes_id");
    expect(many.label).toBe("Movie_Quotes ID");
  });

  it("makes OneToOne keys unique", () => {
    const keys = generateKeyFields({ type: "OneToOne", modelA: "Users", modelB: "Profiles" });
    expect(keys.map((key) => key.name)).toEqual(["users_id", "profiles_id"]);
    expect(keys[0].validationRules).toEqual(["Unique", "ForeignKeyExists"]);
  });

  it("names ManyToMany keys after each participant", () => {
    const keys = generateKeyFields({ type: "ManyToMany", modelA: "Users", modelB: "Roles" });
    expect(keys.map((key) => key.name)).toEqual(["users_id", "roles_id"]);
    expect(keys[1].validationRules).toEqual(["ForeignKeyExists"]);
  });
});

// ---------------------------------------------------------------------------
// Resolution
// ---------------------------------------------------------------------------

describe("resolveRelationship", () => {
  it("merges declared fields, generated keys, then additional fields", () => {
    const resolved = resolveRelationship({
      name: "users_roles",
      type: "ManyToMany",
      modelA: "Users",
      modelB: "Roles",
      fields: { id: { name: "id", type: "ID" } },
      additionalFields: { granted_at: { name: "granted_at", type: "DateTime" } },
    });

    expect(resolved.tableName).toBe("rel_N_users_M_roles");
    expect(resolved.keyFields).toEqual(["users_id", "roles_id"]);
    expect(Object.keys(resolved.fields)).toEqual(["id", "users_id", "roles_id", "granted_at"]);
  });

  it("drops an additional field that collides with a generated key", () => {
    const logger = { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
    const resolved = resolveRelationship(
      {
        ...moviesQuotes,
        additionalFields: {
          one_movies_id: { name: "one_movies_id", type: "Text", label: "Shadow" },
          note: { name: "note", type: "Text" },
        },
      },
      { logger }
    );

    expect(resolved.fields.one_movies_id.type).toBe("ID");
    expect(resolved.fields.one_movies_id.label).toBe("Movies ID");
    expect(resolved.fields.note.type).toBe("Text");
    expect(logger.warn).toHaveBeenCalledWith("Additional field collides with a generated key and was dropped", {
      relationship: "movies_movie_quotes",
      field: "one_movies_id",
    });
  });

  it("generated keys replace declared fields of the same name", () => {
    const resolved = resolveRelationship({
      ...moviesQuotes,
      fields: { many_movie_quotes_id: { name: "many_movie_quotes_id", type: "Text" } },
    });
    expect(resolved.fields.many_movie_quotes_id.type).toBe("ID");
  });
});

// ---------------------------------------------------------------------------
// Model-ID fields
// ---------------------------------------------------------------------------

describe("modelIdField", () => {
  it("maps OneToMany participants to their side's key", () => {
    const resolved = resolveRelationship(moviesQuotes);
    expect(modelIdField(resolved, "Movies")).toBe("one_movies_id");
    expect(modelIdField(resolved, "Movie_Quotes")).toBe("many_movie_quotes_id");
  });

  it("matches participants case-insensitively", () => {
    expect(modelIdField(moviesQuotes, "movies")).toBe("one_movies_id");
  });

  it("maps OneToOne and ManyToMany participants to {name}_id", () => {
    expect(modelIdField({ type: "ManyToMany", modelA: "Users", modelB: "Roles" }, "Roles")).toBe("roles_id");
    expect(modelIdField({ type: "OneToOne", modelA: "Users", modelB: "Profiles" }, "Users")).toBe("users_id");
  });

  it("raises SchemaError for an unknown type", () => {
    expect(() => modelIdField({ type: "Bogus", modelA: "A" }, "A")).toThrow('Unknown relationship type "Bogus"');
  });

  it("raises SchemaError for a non-participant", () => {
    expect(() => modelIdField(moviesQuotes, "Users")).toThrow(SchemaError);
  });
});
