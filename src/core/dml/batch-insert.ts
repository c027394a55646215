import type { DataTable } from '../execution/data-table.js';
import type { QueryExecutor } from '../execution/query-executor.js';
import { ConfigurationError, ConnectionError, InsertError } from '../errors.js';
import { escapeIdentifier, formatQualifiedName, parseQualifiedName, type QualifiedName } from '../sql/identifiers.js';

export const DEFAULT_BATCH_SIZE = 1000;

/** PostgreSQL's limit on bind parameters in one statement. */
export const MAX_BIND_PARAMETERS = 65535;

export interface BatchInsertResult {
  rowCount: number;
  batchCount: number;
}

/** A parameterized multi-row INSERT ready to send. */
export interface InsertStatement {
  text: string;
  params: unknown[];
}

/**
 * Largest number of rows one statement can carry without exceeding the
 * bind-parameter limit.
 */
export const maxRowsPerStatement = (columnCount: number): number =>
  Math.max(1, Math.floor(MAX_BIND_PARAMETERS / Math.max(1, columnCount)));

/**
 * @throws ConfigurationError unless `batchSize` is a positive integer
 */
export const assertBatchSize = (batchSize: number): number => {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new ConfigurationError([`batchSize must be a positive integer, got ${batchSize}`]);
  }
  return batchSize;
};

const toParameter = (value: unknown): unknown => (value === undefined ? null : value);

/**
 * Builds `INSERT INTO <table> (<columns>) VALUES ($1, $2), ($3, $4), ...` for
 * rows `[start, end)` of `table`. Cells are always bound, never inlined.
 */
export const buildInsertStatement = (
  name: QualifiedName,
  table: DataTable,
  start: number,
  end: number
): InsertStatement => {
  const columnList = table.columns.map(column => escapeIdentifier(column.name)).join(', ');
  const params: unknown[] = [];
  const tuples: string[] = [];

  for (let row = start; row < end; row++) {
    const placeholders: string[] = [];
    for (const column of table.columns) {
      params.push(toParameter(column.values[row]));
      placeholders.push(`$${params.length}`);
    }
    tuples.push(`(${placeholders.join(', ')})`);
  }

  return {
    text: `INSERT INTO ${formatQualifiedName(name)} (${columnList}) VALUES ${tuples.join(', ')}`,
    params
  };
};

/**
 * Splits rows `[start, end)` into statements that respect the bind-parameter limit.
 */
export const buildChunkStatements = (
  name: QualifiedName,
  table: DataTable,
  start: number,
  end: number
): InsertStatement[] => {
  const step = maxRowsPerStatement(table.columnCount);
  const statements: InsertStatement[] = [];
  for (let from = start; from < end; from += step) {
    statements.push(buildInsertStatement(name, table, from, Math.min(from + step, end)));
  }
  return statements;
};

/**
 * Inserts every row of `table` into an existing table, `batchSize` rows per
 * transaction.
 *
 * Each batch commits on its own (under auto-commit), so a failure rolls back
 * only the failing batch; batches before it stay committed.
 *
 * @throws InsertError carrying the 1-based index of the failing batch
 */
export const insertBatched = async (
  executor: QueryExecutor,
  table: DataTable,
  qualifiedTableName: string,
  batchSize: number = DEFAULT_BATCH_SIZE
): Promise<BatchInsertResult> => {
  assertBatchSize(batchSize);
  const name = parseQualifiedName(qualifiedTableName);
  if (table.rowCount === 0 || table.columnCount === 0) {
    return { rowCount: 0, batchCount: 0 };
  }

  let batchCount = 0;
  for (let start = 0; start < table.rowCount; start += batchSize) {
    const end = Math.min(start + batchSize, table.rowCount);
    batchCount++;
    const statements = buildChunkStatements(name, table, start, end);
    try {
      await executor.runInTransaction(async connection => {
        for (const statement of statements) {
          await connection.query(statement.text, statement.params);
        }
      });
    } catch (cause) {
      if (cause instanceof ConnectionError) throw cause;
      throw new InsertError(`${name.schema}.${name.table}`, batchCount, { cause });
    }
  }

  return { rowCount: table.rowCount, batchCount };
};
