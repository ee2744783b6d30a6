/**
 * Bootstrap
 *
 * Wires the platform engine with the domain layer.
 * This is the SINGLE place where platform meets domain.
 *
 * Sequence:
 *   1. Load .env and config
 *   2. Register option providers
 *   3. Register model classes and their core fields
 *   4. Load metadata (warms the engine)
 */

import path from "node:path";
import { fileURLToPath } from "node:url";
import dotenv from "dotenv";
import type { CurrentUserProvider, DatabaseConnector, Logger } from "@schemata/contracts";
import {
  MemoryDatabaseConnector,
  MetadataEngine,
  ModelFactory,
  OptionProviderRegistry,
  createLogger,
  initObservability,
  loadConfig,
  type PlatformConfig,
} from "@schemata/platform";
import { AuditableModel } from "./entities/auditable.model.js";
import { modelClasses } from "./entities/index.js";
import { TIMEZONE_PROVIDER, timezoneOptions } from "./options/timezones.js";

/** The domain package directory; schema paths resolve against it by default */
export const DOMAIN_ROOT = fileURLToPath(new URL("..", import.meta.url));

export interface BootstrapOptions {
  /** Replaces process.env; no .env file is read when given */
  env?: NodeJS.ProcessEnv;
  /** Path of the .env file; defaults to the monorepo root */
  envFile?: string;
  connector?: DatabaseConnector;
  currentUser?: CurrentUserProvider;
  logger?: Logger;
}

export interface Domain {
  config: PlatformConfig;
  engine: MetadataEngine;
  factory: ModelFactory;
  connector: DatabaseConnector;
}

/**
 * Initializes the domain.
 * Call once at startup.
 */
export async function bootstrap(options: BootstrapOptions = {}): Promise<Domain> {
  let env = options.env;
  if (!env) {
    dotenv.config({ path: options.envFile ?? path.resolve(DOMAIN_ROOT, "../../.env") });
    env = process.env;
  }

  initObservability(env);
  const logger = options.logger ?? createLogger("domain");
  const config = loadConfig({ METADATA_ROOT: DOMAIN_ROOT, ...env });

  const optionProviders = new OptionProviderRegistry({ logger });
  optionProviders.register(TIMEZONE_PROVIDER, timezoneOptions);

  const engine = new MetadataEngine(config, { optionProviders, logger });
  AuditableModel.registerCoreFields(engine.coreFields);

  const connector = options.connector ?? new MemoryDatabaseConnector({ logger });
  const factory = new ModelFactory(engine, { connector, currentUser: options.currentUser, logger });
  for (const [name, modelClass] of Object.entries(modelClasses)) {
    factory.registerModelClass(name, modelClass);
  }

  await engine.loadAllMetadata();
  logger.info("Domain ready", { entities: await engine.availableEntities() });

  return { config, engine, factory, connector };
}
