/**
 * Platform Configuration
 *
 * Loads metadata locations from environment variables with sensible defaults.
 * All config is validated at startup. Fail fast if misconfigured.
 */

import path from "node:path";
import { ConfigurationError } from "../errors/index.js";

export interface PlatformConfig {
  /** Absolute path of the directory holding one subdirectory per entity */
  modelsDir: string;
  /** Absolute path of the directory holding one subdirectory per relationship */
  relationshipsDir: string;
  /** Absolute path of the serialized metadata cache, or null when disabled */
  cacheFile: string | null;
  /** Absolute path of a core fields template overriding the bundled one */
  coreFieldsTemplate: string | null;
}

export const DEFAULT_MODELS_DIR = "schema/entities";
export const DEFAULT_RELATIONSHIPS_DIR = "schema/relationships";
export const DEFAULT_CACHE_FILE = "cache/metadata_cache.json";

/**
 * Loads configuration from the given environment (process.env by default).
 * Relative paths resolve against METADATA_ROOT, or the working directory.
 * Throws ConfigurationError for a directory setting that is set but blank.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): PlatformConfig {
  const root = path.resolve(env.METADATA_ROOT ?? process.cwd());

  const requiredPath = (key: string, fallback: string): string => {
    const value = env[key] ?? fallback;
    if (value.trim() === "") {
      throw new ConfigurationError(`${key} must not be empty. See .env.example.`, { source: key });
    }
    return path.resolve(root, value);
  };

  const optionalPath = (value: string | undefined): string | null =>
    value === undefined || value.trim() === "" ? null : path.resolve(root, value);

  return {
    modelsDir: requiredPath("METADATA_MODELS_DIR", DEFAULT_MODELS_DIR),
    relationshipsDir: requiredPath("METADATA_RELATIONSHIPS_DIR", DEFAULT_RELATIONSHIPS_DIR),
    cacheFile: optionalPath(env.METADATA_CACHE_FILE ?? DEFAULT_CACHE_FILE),
    coreFieldsTemplate: optionalPath(env.CORE_FIELDS_TEMPLATE),
  };
}
