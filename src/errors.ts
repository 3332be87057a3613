/**
 * Base class for every error the engine raises.
 *
 * Each subclass sets a stable `name` and `code` so callers can branch on the
 * failure kind without string-matching messages.
 */
export abstract class ProvisionerError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Raised for caller bugs rather than bad data (e.g. an unknown protocol tag).
 * Never recoverable by retrying with the same input.
 */
export abstract class ProgrammingError extends ProvisionerError {
  readonly fatal = true;
}

/**
 * Render an unknown thrown value as a message string.
 */
export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
