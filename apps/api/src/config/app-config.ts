import type { LogLevel } from '@nestjs/common';

export type DatabaseConfig = {
  host: string;
  database: string;
  user: string;
  password: string;
  port: number;
};

export type TranslatorConfig = {
  apiKey: string;
  baseUrl?: string;
  model: string;
};

export type AppConfig = {
  readonly database: Readonly<DatabaseConfig>;
  readonly translator: Readonly<TranslatorConfig>;
  readonly http: { readonly port: number };
  readonly logLevels: readonly LogLevel[];
};

export const APP_CONFIG = Symbol('APP_CONFIG');

export const DEFAULT_MODEL = 'gpt-4o-mini';
export const DEFAULT_HTTP_PORT = 4000;

const DATABASE_VARS = ['PG_HOST', 'PG_DATABASE', 'PG_USER', 'PG_PASSWORD', 'PG_PORT'] as const;

const LOG_LEVELS: LogLevel[] = ['error', 'warn', 'log', 'debug', 'verbose'];

export class ConfigError extends Error {
  constructor(readonly problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function parsePort(name: string, raw: string, problems: string[]): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
    problems.push(`${name} must be an integer between 1 and 65535 (got "${raw}")`);
  }
  return port;
}

/** Nest log levels from the most severe down to `raw`. */
function logLevelsUpTo(raw: string, problems: string[]): LogLevel[] {
  const index = LOG_LEVELS.findIndex((l) => l === raw);
  if (index < 0) {
    problems.push(`LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')} (got "${raw}")`);
    return LOG_LEVELS.slice(0, 3);
  }
  return LOG_LEVELS.slice(0, index + 1);
}

function envReader(env: Env): (name: string) => string {
  return (name) => env[name]?.trim() ?? '';
}

function readDatabaseConfig(env: Env, problems: string[]): DatabaseConfig {
  const read = envReader(env);
  for (const name of DATABASE_VARS) {
    if (!read(name)) problems.push(`${name} is required`);
  }
  return {
    host: read('PG_HOST'),
    database: read('PG_DATABASE'),
    user: read('PG_USER'),
    // not trimmed
    password: env.PG_PASSWORD ?? '',
    port: read('PG_PORT') ? parsePort('PG_PORT', read('PG_PORT'), problems) : 0,
  };
}

/** Connection settings alone, for the seed and reset scripts. */
export function loadDatabaseConfig(env: Env): Readonly<DatabaseConfig> {
  const problems: string[] = [];
  const database = readDatabaseConfig(env, problems);
  if (problems.length > 0) throw new ConfigError(problems);
  return Object.freeze(database);
}

/**
 * Builds the process-wide configuration from environment variables.
 * Throws a ConfigError listing every missing or malformed variable; there are
 * no fallback credentials.
 */
export function loadConfig(env: Env): AppConfig {
  const problems: string[] = [];
  const read = envReader(env);

  const database = readDatabaseConfig(env, problems);
  if (!read('OPENAI_API_KEY')) problems.push('OPENAI_API_KEY is required');
  const httpPort = read('PORT') ? parsePort('PORT', read('PORT'), problems) : DEFAULT_HTTP_PORT;
  const logLevels = logLevelsUpTo(read('LOG_LEVEL') || 'log', problems);

  if (problems.length > 0) throw new ConfigError(problems);

  const baseUrl = read('OPENAI_BASE_URL');
  return Object.freeze({
    database: Object.freeze(database),
    translator: Object.freeze({
      apiKey: read('OPENAI_API_KEY'),
      baseUrl: baseUrl || undefined,
      model: read('OPENAI_MODEL') || DEFAULT_MODEL,
    }),
    http: Object.freeze({ port: httpPort }),
    logLevels: Object.freeze(logLevels),
  });
}
