/**
 * Metadata Engine — Test Suite
 *
 * Each test builds a throwaway schema tree under the OS temp dir.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { PlatformConfig } from "../config/index.js";
import { ConfigurationError, NotFoundError } from "../errors/index.js";
import { MetadataEngine, resolveEntityIdentifier } from "./engine.js";
import { OptionProviderRegistry } from "./option-providers.js";

function testLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

const STANDARD_FIELDS = [
  "id",
  "created_at",
  "updated_at",
  "deleted_at",
  "created_by",
  "created_by_name",
  "updated_by",
  "updated_by_name",
  "deleted_by",
  "deleted_by_name",
];

function writeSchema(dir: string, sub: string, content: unknown): void {
  fs.mkdirSync(path.join(dir, sub), { recursive: true });
  const body = typeof content === "string" ? content : JSON.stringify(content);
  fs.writeFileSync(path.join(dir, sub, `${sub}_metadata.json`), body);
}

describe("MetadataEngine", () => {
  let root: string;
  let config: PlatformConfig;
  let logger: ReturnType<typeof testLogger>;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "engine-test-"));
    logger = testLogger();
    config = {
      modelsDir: path.join(root, "entities"),
      relationshipsDir: path.join(root, "relationships"),
      cacheFile: path.join(root, "cache", "metadata_cache.json"),
      coreFieldsTemplate: null,
    };

    writeSchema(config.modelsDir, "movies", {
      name: "Movies",
      description: "Films in the catalog",
      fields: {
        title: { type: "Text", required: true, validationRules: ["Required"] },
        genre: { type: "Enum", optionsProvider: "genres", options: { drama: "Drama" } },
      },
      relationships: [
        "movies_movie_quotes",
        { name: "movies_posters", type: "OneToOne", modelA: "Movies", modelB: "Posters" },
      ],
    });
    writeSchema(config.modelsDir, "movie_quotes", {
      name: "Movie_Quotes",
      fields: {
        id: { type: "ID", label: "Quote ID" },
        quote: { type: "BigText", validationRules: ["Shouting"] },
      },
    });
    writeSchema(config.relationshipsDir, "movies_movie_quotes", {
      name: "movies_movie_quotes",
      type: "OneToMany",
      modelOne: "Movies",
      modelMany: "Movie_Quotes",
      constraints: { cascadeDelete: "cascade" },
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  function engineWith(overrides: Partial<PlatformConfig> = {}, optionProviders?: OptionProviderRegistry) {
    return new MetadataEngine({ ...config, ...overrides }, { logger, optionProviders });
  }

  // -------------------------------------------------------------------------
  // Load lifecycle
  // -------------------------------------------------------------------------

  describe("loadAllMetadata()", () => {
    it("moves from cold through loading to warm", async () => {
      const engine = engineWith();
      expect(engine.state).toBe("cold");

      const loading = engine.loadAllMetadata();
      expect(engine.state).toBe("loading");

      await loading;
      expect(engine.state).toBe("warm");
    });

    it("returns the same snapshot without touching the disk once warm", async () => {
      const engine = engineWith({ cacheFile: null });
      const first = await engine.loadAllMetadata();

      fs.rmSync(config.modelsDir, { recursive: true, force: true });
      const second = await engine.loadAllMetadata();

      expect(second).toBe(first);
      expect(Object.keys(second.entities)).toEqual(["Movie_Quotes", "Movies"]);
    });

    it("shares one load between concurrent callers", async () => {
      const engine = engineWith();
      const [a, b] = await Promise.all([engine.loadAllMetadata(), engine.loadAllMetadata()]);
      expect(a).toBe(b);
    });

    it("merges core fields ahead of the entity's own fields", async () => {
      const engine = engineWith();
      const movies = await engine.entityMetadata("Movies");

      expect(Object.keys(movies.fields)).toEqual([...STANDARD_FIELDS, "title", "genre"]);
      expect(movies.table).toBe("movies");
    });

    it("lets an entity-declared field win over a core field of the same name", async () => {
      const engine = engineWith();
      const quotes = await engine.entityMetadata("Movie_Quotes");

      expect(quotes.fields.id.label).toBe("Quote ID");
      expect(Object.keys(quotes.fields)[0]).toBe("id");
    });

    it("merges the standard core fields into relationships", async () => {
      const engine = engineWith();
      const relationship = await engine.relationshipMetadata("movies_movie_quotes");
      expect(Object.keys(relationship.fields ?? {})).toEqual(STANDARD_FIELDS);
    });

    it("excludes a malformed schema file and keeps the rest", async () => {
      writeSchema(config.modelsDir, "broken", "{ not json");
      const engine = engineWith();

      expect(await engine.availableEntities()).toEqual(["Movie_Quotes", "Movies"]);
      expect(logger.error).toHaveBeenCalledWith(
        "Skipping malformed entity schema file",
        expect.objectContaining({ file: path.join(config.modelsDir, "broken", "broken_metadata.json") })
      );
    });

    it("raises ConfigurationError for a missing schema directory and stays cold", async () => {
      const engine = engineWith({ modelsDir: path.join(root, "nowhere") });

      await expect(engine.loadAllMetadata()).rejects.toBeInstanceOf(ConfigurationError);
      expect(engine.state).toBe("cold");
    });
  });

  // -------------------------------------------------------------------------
  // Disk cache
  // -------------------------------------------------------------------------

  describe("disk cache", () => {
    it("lets a fresh engine load from the cache file written by another", async () => {
      await engineWith().loadAllMetadata();
      expect(fs.existsSync(path.join(root, "cache", "metadata_cache.json"))).toBe(true);

      fs.rmSync(config.modelsDir, { recursive: true, force: true });
      const engine = engineWith();

      expect(await engine.entityExists("Movies")).toBe(true);
    });

    it("skips the cache file after an explicit clear", async () => {
      await engineWith().loadAllMetadata();
      fs.rmSync(config.modelsDir, { recursive: true, force: true });

      const engine = engineWith();
      await engine.loadAllMetadata();
      engine.clearAllCaches();

      await expect(engine.loadAllMetadata()).rejects.toBeInstanceOf(ConfigurationError);
    });
  });

  // -------------------------------------------------------------------------
  // Option providers
  // -------------------------------------------------------------------------

  describe("option providers", () => {
    it("replaces a field's options with the provider's result", async () => {
      const registry = new OptionProviderRegistry({ logger });
      registry.register("genres", () => ({ drama: "Drama", comedy: "Comedy" }));

      const movies = await engineWith({}, registry).entityMetadata("Movies");
      expect(movies.fields.genre.options).toEqual({ drama: "Drama", comedy: "Comedy" });
    });

    it("keeps the declared options when the provider is unknown", async () => {
      const movies = await engineWith().entityMetadata("Movies");

      expect(movies.fields.genre.options).toEqual({ drama: "Drama" });
      expect(logger.warn).toHaveBeenCalledWith("Keeping declared options after provider failure", {
        owner: "Movies",
        field: "genre",
        provider: "genres",
      });
    });
  });

  // -------------------------------------------------------------------------
  // Aggregate validation
  // -------------------------------------------------------------------------

  describe("aggregate validation", () => {
    it("drops a relationship of unknown type", async () => {
      writeSchema(config.relationshipsDir, "weird", { name: "weird", type: "Bogus", modelA: "Movies", modelB: "Movies" });
      const engine = engineWith();

      await expect(engine.relationshipMetadata("weird")).rejects.toBeInstanceOf(NotFoundError);
      expect(logger.error).toHaveBeenCalledWith("Dropping invalid relationship", {
        relationship: "weird",
        error: 'Relationship "weird" has unknown type "Bogus". Expected OneToOne, OneToMany or ManyToMany',
      });
    });

    it("reports references to undeclared relationships", async () => {
      writeSchema(config.modelsDir, "roles", { name: "Roles", fields: {}, relationships: ["users_roles"] });
      await engineWith().loadAllMetadata();

      expect(logger.warn).toHaveBeenCalledWith("Entity references an undeclared relationship", {
        entity: "Roles",
        relationship: "users_roles",
      });
    });

    it("reports unknown validation rule names", async () => {
      await engineWith().loadAllMetadata();

      expect(logger.warn).toHaveBeenCalledWith("Field names an unknown validation rule", {
        owner: "Movie_Quotes",
        field: "quote",
        rule: "Shouting",
      });
    });

    it("reports table names that collide after truncation", async () => {
      const longName = "x".repeat(60);
      writeSchema(config.relationshipsDir, "first", { name: "first", type: "OneToOne", modelA: longName, modelB: "First" });
      writeSchema(config.relationshipsDir, "second", { name: "second", type: "OneToOne", modelA: longName, modelB: "Second" });
      await engineWith().loadAllMetadata();

      expect(logger.error).toHaveBeenCalledWith("Relationship table names collide", {
        tableName: `rel_1_${"x".repeat(58)}`,
        relationships: ["first", "second"],
      });
    });
  });

  // -------------------------------------------------------------------------
  // Lookups
  // -------------------------------------------------------------------------

  describe("lookups", () => {
    it("raises NotFoundError listing the names that do exist", async () => {
      const engine = engineWith();
      const error = await engine.entityMetadata("DoesNotExist").catch((err: unknown) => err);

      expect(error).toBeInstanceOf(NotFoundError);
      if (!(error instanceof NotFoundError)) return;
      expect(error.available).toEqual(["Movie_Quotes", "Movies"]);
      expect(error.available).not.toContain("DoesNotExist");
    });

    it("matches entity names case-sensitively", async () => {
      const engine = engineWith();
      await expect(engine.entityMetadata("movies")).rejects.toBeInstanceOf(NotFoundError);
      expect(await engine.entityExists("Movies")).toBe(true);
      expect(await engine.entityExists("movies")).toBe(false);
    });

    it("strips namespace prefixes before lookup", async () => {
      const movies = await engineWith().entityMetadata("App\\Models\\Movies");
      expect(movies.name).toBe("Movies");
    });

    it("lists standalone and inline relationships together", async () => {
      const all = await engineWith().allRelationships();

      expect(Object.keys(all)).toEqual(["movies_movie_quotes", "Movies.movies_posters"]);
      expect(all["Movies.movies_posters"].sourceEntity).toBe("Movies");
      expect(all.movies_movie_quotes.sourceEntity).toBeUndefined();
    });

    it("describes every field type", async () => {
      const types = await engineWith().fieldTypeDefinitions();
      expect(types.Email.uiComponentHint).toBe("EmailInput");
      expect(Object.keys(types)).toHaveLength(16);
    });

    it("summarizes entities sorted by name", async () => {
      const summaries = await engineWith().entitySummaries();

      expect(summaries).toEqual([
        { name: "Movie_Quotes", table: "movie_quotes", description: "", fieldCount: 11, relationshipCount: 0 },
        { name: "Movies", table: "movies", description: "Films in the catalog", fieldCount: 12, relationshipCount: 2 },
      ]);
    });

    it("builds conventional metadata file paths", () => {
      const engine = engineWith();

      expect(engine.buildEntityMetadataPath("Movie_Quotes")).toBe(
        path.join(config.modelsDir, "movie_quotes", "movie_quotes_metadata.json")
      );
      expect(engine.buildRelationshipMetadataPath("Users_Roles")).toBe(
        path.join(config.relationshipsDir, "users_roles", "users_roles_metadata.json")
      );
    });

    it("exposes the validation rule catalog", () => {
      expect(Object.keys(engineWith().validationRuleDefinitions())).toContain("ForeignKeyExists");
    });
  });

  // -------------------------------------------------------------------------
  // Model classes and invalidation
  // -------------------------------------------------------------------------

  describe("model classes", () => {
    it("merges core fields registered on the entity's model class", async () => {
      class MoviesModel {}
      const engine = engineWith();
      engine.registerModelClass("Movies", MoviesModel);
      engine.coreFields.registerModelCoreFields(MoviesModel, {
        imdb_id: { name: "imdb_id", type: "Text", label: "IMDb ID" },
      });

      const movies = await engine.entityMetadata("Movies");
      expect(Object.keys(movies.fields)).toEqual([...STANDARD_FIELDS, "imdb_id", "title", "genre"]);
      expect(engine.modelClassFor("Movies")).toBe(MoviesModel);
    });
  });

  describe("invalidation", () => {
    it("clearCacheForEntity returns the engine to cold and rescans on next use", async () => {
      const engine = engineWith();
      await engine.loadAllMetadata();

      writeSchema(config.modelsDir, "roles", { name: "Roles", fields: {} });
      engine.clearCacheForEntity("Movies");
      expect(engine.state).toBe("cold");

      expect(await engine.availableEntities()).toEqual(["Movie_Quotes", "Movies", "Roles"]);
    });

    it("reload() picks up changed schema files", async () => {
      const engine = engineWith();
      await engine.loadAllMetadata();

      writeSchema(config.modelsDir, "movies", { name: "Movies", table: "films", fields: {} });
      await engine.reload();

      expect((await engine.entityMetadata("Movies")).table).toBe("films");
    });
  });
});

describe("resolveEntityIdentifier()", () => {
  it.each([
    ["Movies", "Movies"],
    ["App\\Models\\Movies", "Movies"],
    ["models/Movie_Quotes", "Movie_Quotes"],
    ["models.Users", "Users"],
    ["schema:Roles", "Roles"],
    ["Users/", "Users"],
  ])("%s → %s", (raw, expected) => {
    expect(resolveEntityIdentifier(raw)).toBe(expected);
  });
});
