/**
 * Entity Model & Model Factory — Test Suite
 *
 * Runs against a temporary schema tree and the in-memory connector.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { MemoryDatabaseConnector } from "../database/memory-connector.js";
import { SchemaError } from "../errors/index.js";
import { MetadataEngine } from "../metadata/engine.js";
import { EntityModel, SYSTEM_USER_ID } from "./entity-model.js";
import { ModelFactory } from "./model-factory.js";

function testLogger() {
  return { info: vi.fn(), warn: vi.fn(), error: vi.fn(), debug: vi.fn() };
}

function writeSchema(dir: string, sub: string, content: unknown): void {
  fs.mkdirSync(path.join(dir, sub), { recursive: true });
  fs.writeFileSync(path.join(dir, sub, `${sub}_metadata.json`), JSON.stringify(content));
}

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/;

describe("EntityModel", () => {
  let root: string;
  let logger: ReturnType<typeof testLogger>;
  let engine: MetadataEngine;
  let connector: MemoryDatabaseConnector;
  let factory: ModelFactory;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), "entity-model-test-"));
    const modelsDir = path.join(root, "entities");
    const relationshipsDir = path.join(root, "relationships");

    writeSchema(modelsDir, "users", {
      name: "Users",
      fields: {
        username: { type: "Text", label: "Username", required: true, validationRules: ["Required"] },
        email: { type: "Email", validationRules: ["Email"] },
      },
    });
    writeSchema(modelsDir, "movies", {
      name: "Movies",
      fields: {
        title: { type: "Text" },
        year: { type: "Integer" },
      },
    });
    fs.mkdirSync(relationshipsDir);

    logger = testLogger();
    engine = new MetadataEngine(
      { modelsDir, relationshipsDir, cacheFile: null, coreFieldsTemplate: null },
      { logger }
    );
    connector = new MemoryDatabaseConnector({ logger });
    factory = new ModelFactory(engine, {
      connector,
      logger,
      currentUser: { currentUserId: () => "user-1" },
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  // -------------------------------------------------------------------------
  // Field access
  // -------------------------------------------------------------------------

  describe("fields", () => {
    it("exposes the merged field set and table", async () => {
      const movie = await factory.create("Movies");

      expect(movie.name).toBe("Movies");
      expect(movie.tableName).toBe("movies");
      expect(movie.hasField("id")).toBe(true);
      expect(movie.hasField("year")).toBe(true);
      expect(movie.field("year").uiComponent()).toBe("NumberInput");
    });

    it("coerces values through the field implementation", async () => {
      const user = await factory.create("Users");
      user.set("email", "  Ada@Example.COM ");
      expect(user.get("email")).toBe("ada@example.com");
    });

    it("rejects writes to undeclared fields", async () => {
      const movie = await factory.create("Movies");
      expect(() => movie.set("rating", 5)).toThrow(SchemaError);
      expect(movie.get("rating")).toBeUndefined();
    });

    it("populates from a row and ignores unknown columns", async () => {
      const movie = await factory.create("Movies");
      movie.populateFromRow({ id: "m1", title: "Heat", director: "Mann" });

      expect(movie.get("title")).toBe("Heat");
      expect(movie.toJSON()).not.toHaveProperty("director");
    });

    it("leaves non-persisted fields out of the row", async () => {
      const movie = await factory.create("Movies");
      const row = movie.toRow();

      expect(row).not.toHaveProperty("created_by_name");
      expect(Object.keys(row)).toEqual([
        "id",
        "created_at",
        "updated_at",
        "deleted_at",
        "created_by",
        "updated_by",
        "deleted_by",
        "title",
        "year",
      ]);
    });
  });

  // -------------------------------------------------------------------------
  // Persistence
  // -------------------------------------------------------------------------

  describe("create()", () => {
    it("assigns an id and stamps audit fields with the current user", async () => {
      const movie = await factory.create("Movies");
      movie.set("title", "Heat");

      expect(await movie.create()).toBe(true);

      const [row] = connector.rows("movies");
      expect(row.id).toMatch(UUID);
      expect(row.created_by).toBe("user-1");
      expect(row.updated_by).toBe("user-1");
      expect(row.created_at).toBe(row.updated_at);
    });

    it("falls back to the system user when nobody is signed in", async () => {
      const anonymous = new ModelFactory(engine, { connector, logger });
      const movie = await anonymous.create("Movies");

      await movie.create();
      expect(movie.get("created_by")).toBe(SYSTEM_USER_ID);
    });

    it("refuses to persist a record with validation errors", async () => {
      const user = await factory.create("Users");
      user.set("email", "not-an-email");

      expect(await user.create()).toBe(false);
      expect(user.validationErrors()).toEqual({
        username: ["Username is required."],
        email: ["email is not a valid Email value.", "email must be a valid email address."],
      });
      expect(connector.rows("users")).toEqual([]);
      expect(logger.error).toHaveBeenCalledWith(
        "Cannot persist model with validation errors",
        expect.objectContaining({ entity: "Users", operation: "create" })
      );
    });
  });

  describe("update and delete", () => {
    it("requires an id", async () => {
      const movie = await factory.create("Movies");
      await expect(movie.update()).rejects.toThrow('Cannot update Movies without an id');
      await expect(movie.delete()).rejects.toBeInstanceOf(SchemaError);
    });

    it("updates the stored row", async () => {
      const movie = await factory.create("Movies");
      movie.set("title", "Heat");
      await movie.create();

      movie.set("year", "1995");
      expect(await movie.update()).toBe(true);
      expect(connector.rows("movies")[0].year).toBe(1995);
    });

    it("soft-deletes, hides the record from retrieve() and restores it", async () => {
      const movie = await factory.create("Movies");
      await movie.create();
      const id = movie.get("id");

      expect(await movie.delete()).toBe(true);
      expect(connector.rows("movies")[0].deleted_by).toBe("user-1");
      expect(await factory.retrieve("Movies", id)).toBeNull();

      expect(await movie.restore()).toBe(true);
      expect((await factory.retrieve("Movies", id))?.get("id")).toBe(id);
    });

    it("hard-deletes the row", async () => {
      const movie = await factory.create("Movies");
      await movie.create();

      expect(await movie.hardDelete()).toBe(true);
      expect(connector.rows("movies")).toEqual([]);
    });
  });

  // -------------------------------------------------------------------------
  // Model factory
  // -------------------------------------------------------------------------

  describe("ModelFactory", () => {
    it("builds registered model classes", async () => {
      class MoviesModel extends EntityModel {
        displayTitle(): string {
          return `${String(this.get("title"))} (${String(this.get("year"))})`;
        }
      }
      factory.registerModelClass("Movies", MoviesModel);

      const movie = await factory.create("Movies");
      movie.populateFromRow({ title: "Heat", year: 1995 });

      expect(movie).toBeInstanceOf(MoviesModel);
      if (!(movie instanceof MoviesModel)) return;
      expect(movie.displayTitle()).toBe("Heat (1995)");
      expect(engine.modelClassFor("Movies")).toBe(MoviesModel);
    });

    it("materializes rows into models", async () => {
      const movies = await factory.fromRows("Movies", [
        { id: "m1", title: "Heat" },
        { id: "m2", title: "Alien" },
      ]);
      expect(movies.map((movie) => movie.get("title"))).toEqual(["Heat", "Alien"]);
    });

    it("retrieves nothing for an unknown id", async () => {
      expect(await factory.retrieve("Movies", "missing")).toBeNull();
    });
  });
});
