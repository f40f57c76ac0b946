import { Inject, Injectable, Logger } from '@nestjs/common';
import { APP_CONFIG, AppConfig } from '../config';
import { ConnectionFactory, DB_CONNECTION_FACTORY } from '../db';
import { QueryExecutionError, describeCause } from '../query/errors';

export type TableInfo = {
  name: string;
  /** `"column (data type)"`, in ordinal order. */
  columns: string[];
};

export type SchemaInfo = {
  database: string;
  tables: TableInfo[];
};

export const PUBLIC_COLUMNS_SQL = `
  SELECT table_name, column_name, data_type
  FROM information_schema.columns
  WHERE table_schema = 'public'
  ORDER BY table_name, ordinal_position
`;

@Injectable()
export class SchemaService {
  private readonly logger = new Logger(SchemaService.name);

  constructor(
    @Inject(APP_CONFIG) private readonly config: AppConfig,
    @Inject(DB_CONNECTION_FACTORY) private readonly connect: ConnectionFactory,
  ) {}

  async describe(): Promise<SchemaInfo> {
    let rows: unknown[][];
    try {
      const connection = await this.connect();
      try {
        rows = (await connection.query(PUBLIC_COLUMNS_SQL)).rows;
      } finally {
        await connection.close();
      }
    } catch (err: unknown) {
      this.logger.warn(`Schema introspection failed: ${describeCause(err)}`);
      throw new QueryExecutionError('Could not read the database schema.', { cause: err });
    }

    const tables = new Map<string, string[]>();
    for (const [table, column, dataType] of rows) {
      const name = String(table);
      const columns = tables.get(name) ?? [];
      columns.push(`${String(column)} (${String(dataType)})`);
      tables.set(name, columns);
    }
    return {
      database: this.config.database.database,
      tables: [...tables].map(([name, columns]) => ({ name, columns })),
    };
  }
}
