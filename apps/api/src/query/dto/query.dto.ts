/**
 * Request bodies for the query routes. Form posts and JSON bodies are both
 * loosely typed on the wire, so every field is optional and checked by
 * `requiredText`.
 */

export class AskQuestionDto {
  /** Natural language question to translate to SQL. */
  question?: unknown;
}

export class ExecuteSqlDto {
  /** SQL to run as-is. */
  sql?: unknown;
}

export class DownloadDto {
  /** SQL of the query whose rows are exported. */
  sql?: unknown;
  /** `csv` (default), `xlsx` or `excel`. */
  format?: unknown;
}

/** The trimmed string, or null when absent, not a string, or blank. */
export function requiredText(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed ? trimmed : null;
}
