import { Client, CustomTypesConfig, FieldDef, QueryArrayConfig, QueryArrayResult } from 'pg';
import type { DatabaseConfig } from '../config';

export const DB_CONNECTION_FACTORY = Symbol('DB_CONNECTION_FACTORY');

export type RawField = { name: string; dataTypeID: number };

/** One result set as the server sent it: field descriptions plus positional rows. */
export type RawResult = { fields: RawField[]; rows: unknown[][] };

export interface DbConnection {
  query(text: string): Promise<RawResult>;
  close(): Promise<void>;
}

export type ConnectionFactory = () => Promise<DbConnection>;

/** Every column arrives in the server's text form; cells are typed from that text. */
function serverText(value: string | Buffer): string {
  return typeof value === 'string' ? value : value.toString('utf8');
}

export const SERVER_TEXT_TYPES: CustomTypesConfig = { getTypeParser: () => serverText };

type QueryArrayOutcome = QueryArrayResult<unknown[]> | QueryArrayResult<unknown[]>[];

/** The slice of `pg.Client` a connection uses. */
export interface PgSession {
  query(config: QueryArrayConfig): Promise<QueryArrayOutcome>;
  end(): Promise<void>;
}

export class PgConnection implements DbConnection {
  constructor(private readonly session: PgSession) {}

  static async open(config: DatabaseConfig): Promise<PgConnection> {
    const client = new Client({
      host: config.host,
      database: config.database,
      user: config.user,
      password: config.password,
      port: config.port,
    });
    await client.connect();
    return new PgConnection({
      query: (queryConfig) => client.query(queryConfig),
      end: () => client.end(),
    });
  }

  async query(text: string): Promise<RawResult> {
    const outcome = await this.session.query({ text, rowMode: 'array', types: SERVER_TEXT_TYPES });
    // Several statements in one string produce one result per statement.
    const results: QueryArrayResult<unknown[]>[] = Array.isArray(outcome) ? outcome : [outcome];
    const last = results.at(-1);
    if (!last) return { fields: [], rows: [] };
    return {
      fields: last.fields.map((f: FieldDef) => ({ name: f.name, dataTypeID: f.dataTypeID })),
      rows: last.rows,
    };
  }

  async close(): Promise<void> {
    await this.session.end();
  }
}

export function pgConnectionFactory(config: DatabaseConfig): ConnectionFactory {
  return () => PgConnection.open(config);
}
