import { ConfigError, loadConfig, loadDatabaseConfig } from './app-config';

const VALID_ENV = {
  PG_HOST: 'db.local',
  PG_DATABASE: 'shop',
  PG_USER: 'app',
  PG_PASSWORD: 'test-secret',
  PG_PORT: '5432',
  OPENAI_API_KEY: 'test-key',
};

function problemsOf(fn: () => unknown): string[] {
  try {
    fn();
  } catch (err) {
    if (err instanceof ConfigError) return err.problems;
    throw err;
  }
  throw new Error('expected a ConfigError');
}

describe('loadConfig', () => {
  it('builds a frozen config with defaults for the optional settings', () => {
    const config = loadConfig(VALID_ENV);

    expect(config.database).toEqual({
      host: 'db.local',
      database: 'shop',
      user: 'app',
      password: 'test-secret',
      port: 5432,
    });
    expect(config.translator).toEqual({ apiKey: 'test-key', baseUrl: undefined, model: 'gpt-4o-mini' });
    expect(config.http.port).toBe(4000);
    expect(config.logLevels).toEqual(['error', 'warn', 'log']);
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.database)).toBe(true);
  });

  it('reads the optional settings when present', () => {
    const config = loadConfig({
      ...VALID_ENV,
      OPENAI_BASE_URL: 'http://localhost:11434/v1',
      OPENAI_MODEL: 'llama3',
      PORT: '8080',
      LOG_LEVEL: 'debug',
    });

    expect(config.translator).toEqual({
      apiKey: 'test-key',
      baseUrl: 'http://localhost:11434/v1',
      model: 'llama3',
    });
    expect(config.http.port).toBe(8080);
    expect(config.logLevels).toEqual(['error', 'warn', 'log', 'debug']);
  });

  it('names every missing variable instead of falling back to placeholders', () => {
    expect(problemsOf(() => loadConfig({}))).toEqual([
      'PG_HOST is required',
      'PG_DATABASE is required',
      'PG_USER is required',
      'PG_PASSWORD is required',
      'PG_PORT is required',
      'OPENAI_API_KEY is required',
    ]);
  });

  it('treats blank values as missing', () => {
    expect(problemsOf(() => loadConfig({ ...VALID_ENV, PG_HOST: '   ' }))).toEqual(['PG_HOST is required']);
  });

  it('rejects malformed ports and log levels', () => {
    expect(
      problemsOf(() => loadConfig({ ...VALID_ENV, PG_PORT: 'abc', PORT: '70000', LOG_LEVEL: 'loud' })),
    ).toEqual([
      'PG_PORT must be an integer between 1 and 65535 (got "abc")',
      'PORT must be an integer between 1 and 65535 (got "70000")',
      'LOG_LEVEL must be one of error, warn, log, debug, verbose (got "loud")',
    ]);
  });

  it('puts every problem in the error message', () => {
    expect(() => loadConfig({ ...VALID_ENV, OPENAI_API_KEY: '' })).toThrow(
      'Invalid configuration:\n  - OPENAI_API_KEY is required',
    );
  });
});

describe('loadDatabaseConfig', () => {
  it('does not need the translator credential', () => {
    const { OPENAI_API_KEY: _unused, ...dbOnly } = VALID_ENV;
    expect(loadDatabaseConfig(dbOnly).port).toBe(5432);
  });
});
