/**
 * Option Provider Registry
 *
 * Named sources of choice-field options. A field names its provider in
 * `optionsProvider`; the Metadata Engine resolves it on load. Providers are
 * registered explicitly; nothing is looked up by class or method name.
 */

import type { FieldOptions, Logger, OptionProvider } from "@schemata/contracts";
import { SchemaError } from "../errors/index.js";
import { createLogger, describeError } from "../logging/index.js";

export class OptionProviderRegistry {
  private readonly providers = new Map<string, OptionProvider>();
  private readonly logger: Logger;

  constructor(options: { logger?: Logger } = {}) {
    this.logger = options.logger ?? createLogger("option-providers");
  }

  /** Throws SchemaError if the name is taken */
  register(name: string, provider: OptionProvider): void {
    if (this.providers.has(name)) {
      throw new SchemaError(`Option provider "${name}" is already registered`, { key: name });
    }
    this.providers.set(name, provider);
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  names(): string[] {
    return [...this.providers.keys()];
  }

  /**
   * Calls the named provider. Returns null (and logs) when the provider is
   * unknown, throws, or yields something other than a string map.
   */
  async resolve(name: string): Promise<FieldOptions | null> {
    const provider = this.providers.get(name);
    if (!provider) {
      this.logger.warn("Unknown option provider", { provider: name, available: this.names() });
      return null;
    }

    try {
      const options = await provider();
      if (!isStringMap(options)) {
        this.logger.warn("Option provider returned invalid options", { provider: name });
        return null;
      }
      return options;
    } catch (err) {
      this.logger.error("Option provider failed", { provider: name, error: describeError(err) });
      return null;
    }
  }
}

function isStringMap(value: unknown): value is FieldOptions {
  return (
    typeof value === "object" &&
    value !== null &&
    !Array.isArray(value) &&
    Object.values(value).every((label) => typeof label === "string")
  );
}
