/**
 * Failures of a single request. `message` is safe to show to the user; the
 * underlying error is kept as `cause` for the logs.
 */
export class TranslationError extends Error {
  constructor(message = 'The question could not be translated into SQL.', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TranslationError';
  }
}

export class QueryExecutionError extends Error {
  constructor(message = 'The generated SQL could not be executed.', options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'QueryExecutionError';
  }
}

export class ExportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExportError';
  }
}

export function describeCause(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
