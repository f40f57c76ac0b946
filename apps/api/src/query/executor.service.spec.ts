import { FakeDatabase } from '../../test/fakes';
import { QueryExecutionError } from './errors';
import { QueryExecutorService } from './executor.service';
import { formatCell } from './result-set';

describe('QueryExecutorService', () => {
  it('runs the statement as given and returns every row in order', async () => {
    const db = new FakeDatabase();
    const executor = new QueryExecutorService(db.factory);

    const result = await executor.execute('SELECT * FROM customers LIMIT 5;');

    expect(db.connections).toHaveLength(1);
    expect(db.connections[0].queries).toEqual(['SELECT * FROM customers LIMIT 5;']);
    expect(result.columns).toEqual(['id', 'first_name', 'last_name', 'email', 'city', 'signup_date']);
    expect(result.rows).toHaveLength(5);
    expect(result.rows[0]).toEqual([
      { kind: 'integer', value: 1n },
      { kind: 'text', value: 'Alice' },
      { kind: 'text', value: 'Johnson' },
      { kind: 'text', value: 'alice@example.com' },
      { kind: 'text', value: 'New York' },
      { kind: 'date', value: '2022-01-15' },
    ]);
    expect(result.rows.map((row) => formatCell(row[0]))).toEqual(['1', '2', '3', '4', '5']);
  });

  it('closes the connection after a successful query', async () => {
    const db = new FakeDatabase();

    await new QueryExecutorService(db.factory).execute('SELECT 1');

    expect(db.connections[0].closed).toBe(true);
  });

  it('closes the connection and hides the database message when the SQL is invalid', async () => {
    const db = new FakeDatabase(new Error('syntax error at or near "SELEC"'));

    const error = await new QueryExecutorService(db.factory).execute('SELEC 1').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryExecutionError);
    expect(error).toMatchObject({ message: 'The generated SQL could not be executed.' });
    expect(db.connections[0].closed).toBe(true);
  });

  it('reports a connection failure as an execution failure', async () => {
    const db = new FakeDatabase();
    db.connectError = new Error('connect ECONNREFUSED 127.0.0.1:5432');

    await expect(new QueryExecutorService(db.factory).execute('SELECT 1')).rejects.toBeInstanceOf(
      QueryExecutionError,
    );
    expect(db.connections).toHaveLength(0);
  });
});
