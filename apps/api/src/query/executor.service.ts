import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConnectionFactory, DB_CONNECTION_FACTORY, DbConnection } from '../db';
import { QueryExecutionError, describeCause } from './errors';
import { ResultSet, toResultSet } from './result-set';

@Injectable()
export class QueryExecutorService {
  private readonly logger = new Logger(QueryExecutorService.name);

  constructor(@Inject(DB_CONNECTION_FACTORY) private readonly connect: ConnectionFactory) {}

  /**
   * Runs `sql` as-is on a fresh connection and returns every row. The
   * connection is closed before this resolves or rejects.
   */
  async execute(sql: string): Promise<ResultSet> {
    let connection: DbConnection;
    try {
      connection = await this.connect();
    } catch (err: unknown) {
      this.logger.warn(`Could not connect to the database: ${describeCause(err)}`);
      throw new QueryExecutionError(undefined, { cause: err });
    }

    try {
      const result = toResultSet(await connection.query(sql));
      this.logger.log(`Query returned ${result.rows.length} row(s).`);
      return result;
    } catch (err: unknown) {
      this.logger.warn(`Query failed: ${describeCause(err)}`);
      throw new QueryExecutionError(undefined, { cause: err });
    } finally {
      await this.close(connection);
    }
  }

  private async close(connection: DbConnection): Promise<void> {
    try {
      await connection.close();
    } catch (err: unknown) {
      this.logger.warn(`Closing the connection failed: ${describeCause(err)}`);
    }
  }
}
