/**
 * Error taxonomy. Messages here are for logs only; responses carry fixed diagnostics.
 */

export class WafError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A directives file is missing or unreadable. Fatal at startup. */
export class DirectivesNotFoundError extends WafError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`WAF directives file not found: ${path}`, { cause });
    this.path = path;
  }
}

/** The engine factory rejected the assembled configuration. Recorded once, never retried. */
export class WafInitializationError extends WafError {}

/** The native request could not be projected into a RequestView. */
export class RequestConversionError extends WafError {}

/** Reading the request body into the engine, or evaluating it, failed. */
export class EngineIOError extends WafError {}
