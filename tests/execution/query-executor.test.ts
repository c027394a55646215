import { describe, expect, it, vi } from 'vitest';
import { QueryExecutor } from '../../src/core/execution/query-executor.js';
import { isQueryError, QueryError } from '../../src/core/errors.js';
import { FakeConnection, FakeSource, resultOf, type StatementHandler } from '../helpers/fake-connection.js';

const failOn = (bad: string): StatementHandler => text =>
  text === bad ? new Error('column "bad" does not exist') : undefined;

const setup = (handler?: StatementHandler) => {
  const connection = new FakeConnection(handler);
  const source = new FakeSource(connection);
  return { connection, source };
};

describe('QueryExecutor (auto-commit)', () => {
  it('runs a lone statement without an explicit transaction', async () => {
    const connection = new FakeConnection(text =>
      text === 'SELECT 1 AS one' ? resultOf(['one'], [[1]], [23]) : undefined
    );
    const executor = new QueryExecutor(new FakeSource(connection));

    const result = await executor.execute('SELECT 1 AS one');

    expect(connection.sql).toEqual(['SELECT 1 AS one']);
    expect(result?.toRecords()).toEqual([{ one: 1 }]);
    expect(result?.column('one')?.kind).toBe('integer');
  });

  it('wraps several statements in BEGIN/COMMIT and returns the last result', async () => {
    const connection = new FakeConnection(text =>
      text === 'SELECT a FROM t' ? resultOf(['a'], [[1]], [23]) : undefined
    );
    const executor = new QueryExecutor(new FakeSource(connection));

    const result = await executor.execute('CREATE TABLE t (a int); INSERT INTO t VALUES (1); SELECT a FROM t;');

    expect(connection.sql).toEqual([
      'BEGIN',
      'CREATE TABLE t (a int)',
      'INSERT INTO t VALUES (1)',
      'SELECT a FROM t',
      'COMMIT'
    ]);
    expect(result?.row(0)).toEqual([1]);
  });

  it('returns null when the last statement has no result set', async () => {
    const connection = new FakeConnection(text =>
      text === 'SELECT 1' ? resultOf(['?column?'], [[1]], [23]) : undefined
    );
    const executor = new QueryExecutor(new FakeSource(connection));

    await expect(executor.execute('SELECT 1; CREATE TABLE x (a int)')).resolves.toBeNull();
  });

  it('rolls back and reports the 1-based index of the failing statement', async () => {
    const { connection, source } = setup(failOn('SELECT bad'));
    const executor = new QueryExecutor(source);

    const error = await executor.execute('SELECT 1; SELECT bad; SELECT 3').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(QueryError);
    if (!(error instanceof QueryError)) return;
    expect(error.statementIndex).toBe(2);
    expect(error.statement).toBe('SELECT bad');
    expect(error.message).toBe('Statement 2 failed: column "bad" does not exist');
    expect(connection.sql).toEqual(['BEGIN', 'SELECT 1', 'SELECT bad', 'ROLLBACK']);
  });

  it('reports index 1 for a failing lone statement', async () => {
    const { connection, source } = setup(failOn('SELECT bad'));
    const executor = new QueryExecutor(source);

    await expect(executor.execute('SELECT bad')).rejects.toMatchObject({ statementIndex: 1 });
    expect(connection.sql).toEqual(['SELECT bad']);
  });

  it('does not touch the connection for empty input', async () => {
    const { source } = setup();
    const executor = new QueryExecutor(source);

    await expect(executor.execute(' ; ;\n')).resolves.toBeNull();
    expect(source.acquireCount).toBe(0);
  });

  it('binds parameters without splitting', async () => {
    const { connection, source } = setup();
    const executor = new QueryExecutor(source);

    await executor.executeStatement("INSERT INTO t VALUES ($1) -- a;b", ['x']);

    expect(connection.calls).toEqual([{ text: "INSERT INTO t VALUES ($1) -- a;b", params: ['x'] }]);
  });

  it('closes the connection when the rollback itself fails', async () => {
    const connection = new FakeConnection(text =>
      text === 'SELECT bad' || text === 'ROLLBACK' ? new Error('connection lost') : undefined
    );
    const executor = new QueryExecutor(new FakeSource(connection));

    await expect(executor.execute('SELECT 1; SELECT bad')).rejects.toBeInstanceOf(QueryError);
    expect(connection.closeCount).toBe(1);
  });

  it('keeps the statement failure when closing after a failed rollback also fails', async () => {
    const closeFailure = new Error('socket already destroyed');
    const connection = new FakeConnection(text =>
      text === 'SELECT bad' || text === 'ROLLBACK' ? new Error('connection lost') : undefined
    );
    connection.close = async () => {
      throw closeFailure;
    };
    const onCleanupError = vi.fn();
    const executor = new QueryExecutor(new FakeSource(connection), { onCleanupError });

    await expect(executor.execute('SELECT 1; SELECT bad')).rejects.toMatchObject({
      name: 'QueryError',
      statementIndex: 2
    });
    expect(onCleanupError).toHaveBeenCalledWith(closeFailure);
  });

  it('reports a failed BEGIN as a QueryError', async () => {
    const { connection, source } = setup(text => (text === 'BEGIN' ? new Error('out of shared memory') : undefined));
    const executor = new QueryExecutor(source);

    const error = await executor.execute('SELECT 1; SELECT 2').catch((e: unknown) => e);

    expect(isQueryError(error)).toBe(true);
    if (!isQueryError(error)) return;
    expect(error.statement).toBe('BEGIN');
    expect(error.message).toBe('Statement 1 failed: out of shared memory');
    expect(connection.sql).toEqual(['BEGIN']);
  });

  it('returns the action result from runInTransaction', async () => {
    const { connection, source } = setup();
    const executor = new QueryExecutor(source);

    const value = await executor.runInTransaction(async conn => {
      await conn.query('UPDATE t SET a = 1');
      return 42;
    });

    expect(value).toBe(42);
    expect(connection.sql).toEqual(['BEGIN', 'UPDATE t SET a = 1', 'COMMIT']);
  });
});

describe('QueryExecutor (auto-commit off)', () => {
  it('keeps one transaction open and bounds each call by a savepoint', async () => {
    const { connection, source } = setup();
    const executor = new QueryExecutor(source, { autoCommit: false });

    await executor.execute('INSERT INTO t VALUES (1)');
    expect(executor.inTransaction).toBe(true);
    await executor.execute('INSERT INTO t VALUES (2); INSERT INTO t VALUES (3)');
    await executor.commit();

    expect(executor.inTransaction).toBe(false);
    expect(connection.sql).toEqual([
      'BEGIN',
      'SAVEPOINT pg_tabular_sp_1',
      'INSERT INTO t VALUES (1)',
      'RELEASE SAVEPOINT pg_tabular_sp_1',
      'SAVEPOINT pg_tabular_sp_2',
      'INSERT INTO t VALUES (2)',
      'INSERT INTO t VALUES (3)',
      'RELEASE SAVEPOINT pg_tabular_sp_2',
      'COMMIT'
    ]);
  });

  it('undoes only the failing call', async () => {
    const { connection, source } = setup(failOn('SELECT bad'));
    const executor = new QueryExecutor(source, { autoCommit: false });

    await executor.execute('INSERT INTO t VALUES (1)');
    await expect(executor.execute('SELECT bad')).rejects.toBeInstanceOf(QueryError);
    expect(executor.inTransaction).toBe(true);
    await executor.rollback();

    expect(connection.sql.slice(4)).toEqual([
      'SAVEPOINT pg_tabular_sp_2',
      'SELECT bad',
      'ROLLBACK TO SAVEPOINT pg_tabular_sp_2',
      'ROLLBACK'
    ]);
  });

  it('reports a failed BEGIN and stays outside a transaction', async () => {
    const { source } = setup(text => (text === 'BEGIN' ? new Error('cannot begin') : undefined));
    const executor = new QueryExecutor(source, { autoCommit: false });

    await expect(executor.execute('INSERT INTO t VALUES (1)')).rejects.toMatchObject({
      name: 'QueryError',
      statement: 'BEGIN'
    });
    expect(executor.inTransaction).toBe(false);
  });

  it('commits and rolls back nothing when no transaction is open', async () => {
    const { connection, source } = setup();
    const executor = new QueryExecutor(source, { autoCommit: false });

    await executor.commit();
    await executor.rollback();

    expect(connection.sql).toEqual([]);
    expect(source.acquireCount).toBe(0);
  });

  it('forgets a transaction whose connection has closed', async () => {
    const { connection, source } = setup();
    const executor = new QueryExecutor(source, { autoCommit: false });

    await executor.execute('INSERT INTO t VALUES (1)');
    connection.closed = true;

    expect(executor.inTransaction).toBe(false);
    await expect(executor.commit()).resolves.toBeUndefined();
  });
});
