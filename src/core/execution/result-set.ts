import type { StatementResult } from '../connection/connection.js';
import { DataTable, type ColumnKind } from './data-table.js';

/** PostgreSQL type OIDs that map onto a {@link ColumnKind}. */
const KIND_BY_OID: ReadonlyMap<number, ColumnKind> = new Map<number, ColumnKind>([
  [16, 'boolean'],
  [20, 'integer'],
  [21, 'integer'],
  [23, 'integer'],
  [700, 'float'],
  [701, 'float'],
  [1114, 'timestamp'],
  [1184, 'timestamptz'],
  [19, 'text'],
  [25, 'text'],
  [1042, 'text'],
  [1043, 'text']
]);

export const columnKindForOid = (oid: number): ColumnKind | undefined => KIND_BY_OID.get(oid);

/**
 * Makes result column names unique: the second `id` becomes `id_2`, and so on.
 */
export const uniqueColumnNames = (names: readonly string[]): string[] => {
  const taken = new Set<string>();
  return names.map(name => {
    let candidate = name;
    for (let n = 2; taken.has(candidate); n++) {
      candidate = `${name}_${n}`;
    }
    taken.add(candidate);
    return candidate;
  });
};

/**
 * True when the statement produced a row description, i.e. a result set.
 */
export const hasResultSet = (result: StatementResult): boolean => result.fields.length > 0;

/**
 * Materializes a statement result into a {@link DataTable}, or `null` when the
 * statement produced no row description.
 */
export const toDataTable = (result: StatementResult): DataTable | null => {
  if (!hasResultSet(result)) {
    return null;
  }
  return DataTable.fromRows(
    uniqueColumnNames(result.fields.map(field => field.name)),
    result.rows,
    result.fields.map(field => columnKindForOid(field.dataTypeID))
  );
};
