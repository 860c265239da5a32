/**
 * Error helpers shared by termfolio packages.
 */

/** Raised when configuration cannot be read or fails schema validation. */
export class ConfigError extends Error {
  constructor(
    message: string,
    readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
  }
}

/** Normalise any thrown value into a log-friendly message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
