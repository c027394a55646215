import type { ConnectionConfig, ConnectionFactory } from '../core/connection/connection.js';
import { ConnectionManager } from '../core/connection/connection-manager.js';
import { createPgConnection } from '../core/connection/pg-connection.js';
import { PostgresCatalog } from '../core/ddl/postgres-catalog.js';
import { TableProvisioner, type ExistingTablePolicy, type ProvisionAction } from '../core/ddl/table-provisioner.js';
import { assertBatchSize, DEFAULT_BATCH_SIZE, insertBatched } from '../core/dml/batch-insert.js';
import type { DataTable } from '../core/execution/data-table.js';
import { QueryExecutor } from '../core/execution/query-executor.js';
import { createQueryLoggingConnection, type QueryLogger } from '../core/execution/query-logger.js';
import { resolveTableName } from '../core/sql/identifiers.js';

/**
 * Options for creating a {@link PostgresClient}.
 */
export interface PostgresClientOptions {
  /** The target to connect to */
  connection: ConnectionConfig;
  /** Produces live connections; defaults to a `pg.Client` factory */
  connectionFactory?: ConnectionFactory;
  /** Commit after every successful call (default true) */
  autoCommit?: boolean;
  /** Rows per insert transaction (default 1000) */
  batchSize?: number;
  /** Existing-table handling when inserting without `overwrite` (default `truncate`) */
  existingTablePolicy?: ExistingTablePolicy;
  /** Receives every statement sent to the database */
  logger?: QueryLogger;
  /**
   * Receives cleanup failures that are never thrown: those of
   * {@link PostgresClient.dispose}, and a failed close after a failed rollback
   */
  onCleanupError?: (error: unknown) => void;
}

export interface InsertTableOptions {
  /** Drop and recreate an existing table instead of emptying it */
  overwrite?: boolean;
  /** Overrides the client's batch size for this call */
  batchSize?: number;
}

export interface InsertTableResult {
  action: ProvisionAction;
  rowCount: number;
  batchCount: number;
}

/**
 * Data-access client for one PostgreSQL target. Owns a single connection,
 * opened on first use and reopened after it closes.
 */
export class PostgresClient {
  private readonly connections: ConnectionManager;
  private readonly executor: QueryExecutor;
  private readonly catalog: PostgresCatalog;
  private readonly provisioner: TableProvisioner;
  private readonly batchSize: number;
  private readonly onCleanupError?: (error: unknown) => void;

  constructor(options: PostgresClientOptions) {
    const factory = options.connectionFactory ?? createPgConnection;
    const logger = options.logger;
    this.connections = new ConnectionManager(options.connection, async config =>
      createQueryLoggingConnection(await factory(config), logger)
    );
    this.executor = new QueryExecutor(this.connections, {
      autoCommit: options.autoCommit,
      onCleanupError: options.onCleanupError
    });
    this.catalog = new PostgresCatalog(this.executor);
    this.provisioner = new TableProvisioner(this.executor, this.catalog, {
      existingTablePolicy: options.existingTablePolicy
    });
    this.batchSize = assertBatchSize(options.batchSize ?? DEFAULT_BATCH_SIZE);
    this.onCleanupError = options.onCleanupError;
  }

  get autoCommit(): boolean {
    return this.executor.autoCommit;
  }

  set autoCommit(value: boolean) {
    this.executor.autoCommit = value;
  }

  /** True while an explicit (auto-commit off) transaction is open */
  get inTransaction(): boolean {
    return this.executor.inTransaction;
  }

  /**
   * Runs one or more `;`-separated statements in a single transaction.
   *
   * Splitting is naive: do not use several statements in one call when any of
   * them holds a literal `;` inside a string or comment.
   *
   * @returns The last statement's rows, or `null` when it returned none
   * @throws QueryError with the 1-based index of the failing statement
   */
  async query(sql: string): Promise<DataTable | null> {
    return this.executor.execute(sql);
  }

  /**
   * Runs a single statement with bound parameters, without splitting.
   */
  async execute(sql: string, params?: readonly unknown[]): Promise<DataTable | null> {
    return this.executor.executeStatement(sql, params);
  }

  /**
   * Writes `table` to `qualifiedName` (`schema.table` or bare `table` in
   * `public`), creating the schema and table as needed.
   *
   * Batches commit independently: a failure leaves earlier batches in place.
   * With `overwrite` the old table is already gone by then.
   */
  async insertTable(
    table: DataTable,
    qualifiedName: string,
    options: InsertTableOptions = {}
  ): Promise<InsertTableResult> {
    const batchSize = assertBatchSize(options.batchSize ?? this.batchSize);
    const action = await this.provisioner.ensureTable(table, qualifiedName, options.overwrite ?? false);
    if (action === 'skipped') {
      return { action, rowCount: 0, batchCount: 0 };
    }
    const result = await insertBatched(this.executor, table, qualifiedName, batchSize);
    return { action, ...result };
  }

  async listSchemas(): Promise<DataTable> {
    return this.catalog.listSchemas();
  }

  async createSchema(name: string): Promise<void> {
    await this.catalog.createSchema(name);
  }

  async dropSchema(name: string, cascade = false): Promise<void> {
    await this.catalog.dropSchema(name, cascade);
  }

  async schemaExists(name: string): Promise<boolean> {
    return this.catalog.schemaExists(name);
  }

  async listTables(schema = 'public'): Promise<DataTable> {
    return this.catalog.listTables(schema);
  }

  /**
   * Column metadata for `name`, given as `schema.table` or as a bare table
   * with an optional schema (default `public`).
   */
  async describeTable(name: string, schema?: string): Promise<DataTable> {
    return this.catalog.describeTable(resolveTableName(name, schema));
  }

  async tableExists(name: string, schema?: string): Promise<boolean> {
    return this.catalog.tableExists(resolveTableName(name, schema));
  }

  async commit(): Promise<void> {
    await this.executor.commit();
  }

  async rollback(): Promise<void> {
    await this.executor.rollback();
  }

  /**
   * Closes the connection. Idempotent; the next operation reconnects.
   */
  async close(): Promise<void> {
    await this.connections.close();
  }

  /**
   * Best-effort teardown: commits an open transaction under auto-commit (rolls
   * it back otherwise), then closes. Never throws.
   */
  async dispose(): Promise<void> {
    try {
      if (this.executor.autoCommit) {
        await this.executor.commit();
      } else {
        await this.executor.rollback();
      }
    } catch (error) {
      this.onCleanupError?.(error);
    }

    try {
      await this.connections.close();
    } catch (error) {
      this.onCleanupError?.(error);
    }
  }
}

/**
 * Opens a client, runs `action` with it and disposes the client on every exit path.
 */
export const withPostgresClient = async <T>(
  options: PostgresClientOptions,
  action: (client: PostgresClient) => Promise<T>
): Promise<T> => {
  const client = new PostgresClient(options);
  try {
    return await action(client);
  } finally {
    await client.dispose();
  }
};
