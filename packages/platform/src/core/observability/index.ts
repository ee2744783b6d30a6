/**
 * Observability Module
 *
 * Captures errors and operational messages from the metadata platform.
 * Follows the provider pattern: pluggable backends with a console fallback.
 *
 * Built-in providers:
 *   - ConsoleObservabilityProvider (structured console output, the default)
 *   - SilentObservabilityProvider (drops everything; for CLI and batch runs)
 *
 * A host application installs its own backend with setObservabilityProvider().
 *
 * Usage:
 *   import { initObservability, captureException, captureMessage } from "@schemata/platform";
 *
 *   initObservability();  // Call once at startup; reads OBSERVABILITY_PROVIDER
 *
 *   captureException(error, { entity: "Movies" });
 *   captureMessage("Schema file skipped", "warning", { file: "movies_metadata.json" });
 */

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type ObservabilitySeverity = "fatal" | "error" | "warning" | "info" | "debug";

/** Context tags attached to every event for filtering */
export interface ObservabilityContext {
  userId?: string;
  [key: string]: unknown;
}

/** The provider contract. Every observability backend implements this. */
export interface ObservabilityProvider {
  /** Provider name (for logging) */
  readonly name: string;

  captureException(error: Error, context?: ObservabilityContext): void;

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void;

  /** Set context merged into all subsequent captures */
  setContext(context: ObservabilityContext): void;

  /** Flush pending events to the backend (for graceful shutdown) */
  flush(timeoutMs?: number): Promise<void>;
}

// ---------------------------------------------------------------------------
// Console Provider
// ---------------------------------------------------------------------------

export class ConsoleObservabilityProvider implements ObservabilityProvider {
  readonly name = "console";
  private context: ObservabilityContext = {};

  captureException(error: Error, context?: ObservabilityContext): void {
    console.error(
      JSON.stringify({
        level: "error",
        context: "observability",
        event: "exception",
        errorName: error.name,
        message: error.message,
        stack: error.stack,
        ...this.context,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  captureMessage(
    message: string,
    level: ObservabilitySeverity,
    context?: ObservabilityContext
  ): void {
    const logFn =
      level === "fatal" || level === "error"
        ? console.error
        : level === "warning"
          ? console.warn
          : level === "debug"
            ? console.debug
            : console.log;

    logFn(
      JSON.stringify({
        level,
        context: "observability",
        event: "message",
        message,
        ...this.context,
        ...context,
        timestamp: new Date().toISOString(),
      })
    );
  }

  setContext(context: ObservabilityContext): void {
    this.context = { ...this.context, ...context };
  }

  async flush(): Promise<void> {
    // Console writes are synchronous
  }
}

// ---------------------------------------------------------------------------
// Silent Provider
// ---------------------------------------------------------------------------

export class SilentObservabilityProvider implements ObservabilityProvider {
  readonly name = "silent";

  captureException(): void {}

  captureMessage(): void {}

  setContext(): void {}

  async flush(): Promise<void> {}
}

// ---------------------------------------------------------------------------
// State
// ---------------------------------------------------------------------------

let provider: ObservabilityProvider = new ConsoleObservabilityProvider();

// ---------------------------------------------------------------------------
// Initialization
// ---------------------------------------------------------------------------

/**
 * Initialize the observability module.
 * Reads OBSERVABILITY_PROVIDER from the given environment:
 *   - "silent" → SilentObservabilityProvider
 *   - anything else → ConsoleObservabilityProvider
 *
 * Safe to call multiple times. Never throws.
 */
export function initObservability(env: NodeJS.ProcessEnv = process.env): void {
  provider =
    env.OBSERVABILITY_PROVIDER === "silent"
      ? new SilentObservabilityProvider()
      : new ConsoleObservabilityProvider();
}

// ---------------------------------------------------------------------------
// Public API (delegates to provider)
// ---------------------------------------------------------------------------

export function captureException(error: Error, context?: ObservabilityContext): void {
  provider.captureException(error, context);
}

export function captureMessage(
  message: string,
  level: ObservabilitySeverity = "info",
  context?: ObservabilityContext
): void {
  provider.captureMessage(message, level, context);
}

export function setObservabilityContext(context: ObservabilityContext): void {
  provider.setContext(context);
}

/** Flush pending events (call during graceful shutdown) */
export async function flushObservability(timeoutMs?: number): Promise<void> {
  await provider.flush(timeoutMs);
}

/** Get the current observability provider (for testing/inspection) */
export function getObservabilityProvider(): ObservabilityProvider {
  return provider;
}

export function setObservabilityProvider(p: ObservabilityProvider): void {
  provider = p;
}

// ---------------------------------------------------------------------------
// Testing Helpers
// ---------------------------------------------------------------------------

/** Reset observability module state (for testing only) */
export function resetObservability(): void {
  provider = new ConsoleObservabilityProvider();
}
