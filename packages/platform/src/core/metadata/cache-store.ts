/**
 * Metadata Cache Store
 *
 * Persists a loaded metadata snapshot as one JSON file so the next process
 * can skip scanning schema sources. The file is not locked; concurrent
 * writers race and the last one wins.
 */

import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import {
  entityMetadataSchema,
  fieldTypeDescriptorSchema,
  relationshipSourceSchema,
  type EntityMetadata,
  type FieldTypeDescriptor,
  type Logger,
  type RelationshipSource,
} from "@schemata/contracts";
import { createLogger, describeError } from "../logging/index.js";

/** Bumped whenever the serialized shape changes; older files are ignored */
export const CACHE_FORMAT_VERSION = 1;

export interface MetadataSnapshot {
  entities: Record<string, EntityMetadata>;
  relationships: Record<string, RelationshipSource>;
  fieldTypes: Record<string, FieldTypeDescriptor>;
}

const cacheFileSchema = z.object({
  version: z.literal(CACHE_FORMAT_VERSION),
  generatedAt: z.string(),
  entities: z.record(z.string(), entityMetadataSchema),
  relationships: z.record(z.string(), relationshipSourceSchema),
  fieldTypes: z.record(z.string(), fieldTypeDescriptorSchema),
});

export class MetadataCacheStore {
  readonly filePath: string;
  private readonly logger: Logger;

  constructor(filePath: string, options: { logger?: Logger } = {}) {
    this.filePath = filePath;
    this.logger = options.logger ?? createLogger("metadata-cache");
  }

  /**
   * The cached snapshot, or null when the file is missing, unreadable,
   * from another format version, or fails validation.
   */
  async read(): Promise<MetadataSnapshot | null> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, "utf8");
    } catch (err) {
      if (isMissingFile(err)) return null;
      this.logger.warn("Metadata cache unreadable", { file: this.filePath, error: describeError(err) });
      return null;
    }

    let data: unknown;
    try {
      data = JSON.parse(raw);
    } catch (err) {
      this.logger.warn("Metadata cache is not valid JSON", { file: this.filePath, error: describeError(err) });
      return null;
    }

    const parsed = cacheFileSchema.safeParse(data);
    if (!parsed.success) {
      this.logger.warn("Metadata cache failed validation; ignoring it", {
        file: this.filePath,
        issues: parsed.error.issues.slice(0, 5).map((issue) => `${issue.path.join(".")}: ${issue.message}`),
      });
      return null;
    }

    const { entities, relationships, fieldTypes } = parsed.data;
    return { entities, relationships, fieldTypes };
  }

  /** Writes the snapshot. Failures are logged, never thrown. */
  async write(snapshot: MetadataSnapshot): Promise<boolean> {
    const payload = {
      version: CACHE_FORMAT_VERSION,
      generatedAt: new Date().toISOString(),
      ...snapshot,
    };
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      await fs.writeFile(this.filePath, JSON.stringify(payload, null, 2), "utf8");
      this.logger.debug("Metadata cache written", { file: this.filePath });
      return true;
    } catch (err) {
      this.logger.warn("Failed to write metadata cache", { file: this.filePath, error: describeError(err) });
      return false;
    }
  }

  /** Removes the cache file; a missing file is not an error */
  async clear(): Promise<void> {
    await fs.rm(this.filePath, { force: true });
  }
}

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ENOENT";
}
