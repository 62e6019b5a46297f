/**
 * Error taxonomy for the curation pipeline.
 *
 * Only ConfigurationError is fatal for a whole invocation; everything else
 * aborts a single item, source or operation.
 */

export class NotFoundError extends Error {
  constructor(
    readonly entity: string,
    readonly key: string | number,
  ) {
    super(`${entity} not found: ${key}`);
    this.name = "NotFoundError";
  }
}

const EXCERPT_LENGTH = 200;

export class ParseError extends Error {
  readonly excerpt: string;

  constructor(message: string, input: string) {
    const excerpt = input.slice(0, EXCERPT_LENGTH);
    super(`${message}: ${excerpt}${input.length > EXCERPT_LENGTH ? "..." : ""}`);
    this.name = "ParseError";
    this.excerpt = excerpt;
  }
}

export class TimeoutError extends Error {
  constructor(
    readonly operation: string,
    readonly timeoutMs: number,
  ) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = "TimeoutError";
  }
}

/** A collaborator process or API call failed for a reason other than a timeout. */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

export class IntegrityViolationError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "IntegrityViolationError";
  }
}

export class ConfigurationError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration:\n${issues.map((i) => `  - ${i}`).join("\n")}`);
    this.name = "ConfigurationError";
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
