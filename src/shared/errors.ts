/**
 * Error types for configuration and template resolution.
 *
 * Template resolution itself degrades to warnings; only the conditions
 * below abort startup.
 */

export class NbstageError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.name = "NbstageError";
    this.code = code;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Invalid command-line option, env value, or unsafe filesystem target. */
export class ConfigError extends NbstageError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", details);
    this.name = "ConfigError";
  }
}

/** A template's base_template chain leads back to itself. */
export class TemplateChainError extends NbstageError {
  public readonly chain: string[];

  constructor(chain: string[]) {
    super(
      `Template inheritance cycle: ${chain.join(" -> ")}`,
      "TEMPLATE_CHAIN_CYCLE",
      { chain },
    );
    this.name = "TemplateChainError";
    this.chain = chain;
  }
}

export function formatError(err: unknown): string {
  if (err instanceof NbstageError) return `${err.name} [${err.code}]: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
