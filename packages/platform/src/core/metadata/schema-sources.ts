/**
 * Schema Sources
 *
 * Entity and relationship schema files are discovered by directory
 * convention: one subdirectory per entity or relationship, holding a single
 * `<sub>_metadata.json` file.
 *
 *   schema/entities/movies/movies_metadata.json
 *   schema/relationships/movies_movie_quotes/movies_movie_quotes_metadata.json
 *
 * A file that cannot be read or parsed is logged and skipped; the rest of the
 * scan continues. Only a missing directory is fatal.
 */

import fs from "node:fs/promises";
import path from "node:path";
import type { z } from "zod";
import type { Logger } from "@schemata/contracts";
import { ConfigurationError } from "../errors/index.js";
import { describeError } from "../logging/index.js";

export const METADATA_FILE_SUFFIX = "_metadata.json";

export type SchemaSourceKind = "entity" | "relationship";

/** `{dir}/{name}/{name}_metadata.json`, with the name lower-cased */
export function metadataFilePath(dir: string, name: string): string {
  const lower = name.toLowerCase();
  return path.join(dir, lower, `${lower}${METADATA_FILE_SUFFIX}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

async function listSubdirectories(dir: string, kind: SchemaSourceKind): Promise<string[]> {
  let entries;
  try {
    entries = await fs.readdir(dir, { withFileTypes: true });
  } catch (err) {
    throw new ConfigurationError(`The ${kind} schema directory "${dir}" could not be read`, {
      source: dir,
      cause: err,
    });
  }
  return entries
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Reads every schema file under `dir` and parses it with `schema`.
 * Results are keyed by the declared `name`, or the subdirectory name when
 * the file declares none. The first file wins when two declare the same name.
 */
export async function scanSchemaDirectory<T extends { name?: string }>(
  dir: string,
  kind: SchemaSourceKind,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  logger: Logger
): Promise<Map<string, T>> {
  const results = new Map<string, T>();
  const origins = new Map<string, string>();

  for (const sub of await listSubdirectories(dir, kind)) {
    const file = path.join(dir, sub, `${sub}${METADATA_FILE_SUFFIX}`);

    let raw: string;
    try {
      raw = await fs.readFile(file, "utf8");
    } catch (err) {
      logger.warn(`Skipping ${kind} directory without a metadata file`, {
        directory: path.join(dir, sub),
        error: describeError(err),
      });
      continue;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      logger.error(`Skipping malformed ${kind} schema file`, { file, error: describeError(err) });
      continue;
    }
    if (!isRecord(data)) {
      logger.error(`Skipping ${kind} schema file that is not an object`, { file });
      continue;
    }

    const parsed = schema.safeParse(typeof data.name === "string" ? data : { ...data, name: sub });
    if (!parsed.success) {
      logger.error(`Skipping invalid ${kind} schema file`, {
        file,
        issues: parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      continue;
    }

    const name = parsed.data.name ?? sub;
    const existing = origins.get(name);
    if (existing !== undefined) {
      logger.warn(`Duplicate ${kind} name; keeping the first definition`, {
        name,
        kept: existing,
        ignored: file,
      });
      continue;
    }

    origins.set(name, file);
    results.set(name, parsed.data);
  }

  return results;
}
