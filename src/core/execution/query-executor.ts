import type { ConnectionSource, PostgresConnection, StatementResult } from '../connection/connection.js';
import { QueryError } from '../errors.js';
import { splitStatements } from '../sql/statement-splitter.js';
import type { DataTable } from './data-table.js';
import { toDataTable } from './result-set.js';

/** One statement plus its bound values. */
export interface Statement {
  text: string;
  params?: readonly unknown[];
}

export interface QueryExecutorOptions {
  /** Commit after every successful call (default true) */
  autoCommit?: boolean;
  /** Receives a failure to close a session after a failed rollback */
  onCleanupError?: (error: unknown) => void;
}

/**
 * Runs SQL against the single connection handed out by a {@link ConnectionSource}.
 *
 * With auto-commit on, a lone statement runs in the server's implicit
 * transaction and anything bigger is wrapped in `BEGIN`/`COMMIT`. With
 * auto-commit off, the first statement opens a transaction that stays open
 * until {@link commit} or {@link rollback}; each call inside it is bounded by
 * a savepoint so a failure undoes that call only.
 */
export class QueryExecutor {
  autoCommit: boolean;

  /** Connection holding the open explicit transaction */
  private transaction: PostgresConnection | null = null;
  private savepointSeq = 0;
  private readonly onCleanupError?: (error: unknown) => void;

  constructor(
    private readonly connections: ConnectionSource,
    options: QueryExecutorOptions = {}
  ) {
    this.autoCommit = options.autoCommit ?? true;
    this.onCleanupError = options.onCleanupError;
  }

  get inTransaction(): boolean {
    return this.transaction !== null && !this.transaction.closed;
  }

  /**
   * Splits `sql` on `;` and runs every statement, all-or-nothing.
   *
   * @returns The last statement's result set, or `null` when the last
   * statement produced none (or `sql` held no statement at all)
   * @throws QueryError carrying the 1-based index of the failing statement
   */
  async execute(sql: string): Promise<DataTable | null> {
    return this.executeStatements(splitStatements(sql).map(text => ({ text })));
  }

  /**
   * Runs one parameterized statement as-is, without splitting.
   */
  async executeStatement(text: string, params?: readonly unknown[]): Promise<DataTable | null> {
    return this.executeStatements([{ text, params }]);
  }

  /**
   * Same contract as {@link execute} for statements that are already split,
   * so generated SQL holding quoted `;` is never cut apart.
   */
  async executeStatements(statements: readonly Statement[]): Promise<DataTable | null> {
    if (statements.length === 0) {
      return null;
    }
    return toDataTable(await this.run(statements));
  }

  /**
   * Runs `action` inside a transaction scope on the current connection:
   * `BEGIN`/`COMMIT` under auto-commit, a savepoint inside the open
   * transaction otherwise. Any error rolls the scope back and is rethrown.
   */
  async runInTransaction<T>(action: (connection: PostgresConnection) => Promise<T>): Promise<T> {
    const connection = await this.connections.acquire();

    if (this.autoCommit && !this.inTransaction) {
      await this.runStatement(connection, { text: 'BEGIN' }, 1);
      try {
        const result = await action(connection);
        await connection.query('COMMIT');
        return result;
      } catch (error) {
        await this.abandon(connection, 'ROLLBACK');
        throw error;
      }
    }

    await this.ensureTransaction(connection);
    const savepoint = `pg_tabular_sp_${++this.savepointSeq}`;
    await this.runStatement(connection, { text: `SAVEPOINT ${savepoint}` }, 1);
    try {
      const result = await action(connection);
      await connection.query(`RELEASE SAVEPOINT ${savepoint}`);
      return result;
    } catch (error) {
      await this.abandon(connection, `ROLLBACK TO SAVEPOINT ${savepoint}`);
      throw error;
    }
  }

  /**
   * Commits the open transaction, if any.
   */
  async commit(): Promise<void> {
    await this.finishTransaction('COMMIT');
  }

  /**
   * Rolls back the open transaction, if any.
   */
  async rollback(): Promise<void> {
    await this.finishTransaction('ROLLBACK');
  }

  private async run(statements: readonly Statement[]): Promise<StatementResult> {
    if (statements.length === 1 && this.autoCommit && !this.inTransaction) {
      const connection = await this.connections.acquire();
      return this.runStatement(connection, statements[0], 1);
    }

    return this.runInTransaction(async connection => {
      let last: StatementResult = { fields: [], rows: [] };
      for (const [index, statement] of statements.entries()) {
        last = await this.runStatement(connection, statement, index + 1);
      }
      return last;
    });
  }

  private async runStatement(
    connection: PostgresConnection,
    statement: Statement,
    position: number
  ): Promise<StatementResult> {
    try {
      return await connection.query(statement.text, statement.params);
    } catch (cause) {
      throw new QueryError(position, statement.text, { cause });
    }
  }

  private async ensureTransaction(connection: PostgresConnection): Promise<void> {
    if (this.transaction === connection && !connection.closed) {
      return;
    }
    // a transaction left on an earlier, closed connection died with it
    this.transaction = null;
    await this.runStatement(connection, { text: 'BEGIN' }, 1);
    this.transaction = connection;
  }

  private async finishTransaction(command: 'COMMIT' | 'ROLLBACK'): Promise<void> {
    const connection = this.transaction;
    this.transaction = null;
    if (!connection || connection.closed) {
      return;
    }
    await connection.query(command);
  }

  /**
   * Rolls back after a failure. If even that fails the session is unusable, so
   * it is closed; the server discards the transaction with it. Never throws:
   * the caller rethrows the failure that got it here.
   */
  private async abandon(connection: PostgresConnection, command: string): Promise<void> {
    try {
      await connection.query(command);
    } catch {
      if (this.transaction === connection) {
        this.transaction = null;
      }
      try {
        await connection.close();
      } catch (closeError) {
        this.onCleanupError?.(closeError);
      }
    }
  }
}
