import type { ColumnKind, DataColumn, DataTable } from '../execution/data-table.js';

/** Target column type keywords produced by inference. */
export const PostgresColumnType = {
  INTEGER: 'INTEGER',
  BIGINT: 'BIGINT',
  DOUBLE: 'DOUBLE PRECISION',
  BOOLEAN: 'BOOLEAN',
  TIMESTAMP: 'TIMESTAMP',
  TIMESTAMPTZ: 'TIMESTAMP WITH TIME ZONE',
  TEXT: 'TEXT',
  VARCHAR_255: 'VARCHAR(255)'
} as const;

export type PostgresColumnType = (typeof PostgresColumnType)[keyof typeof PostgresColumnType];

export interface ColumnTypeDeclaration {
  name: string;
  type: PostgresColumnType;
}

export const INT32_MIN = -2147483648;
export const INT32_MAX = 2147483647;
export const VARCHAR_LIMIT = 255;

/**
 * Detected kind of a column. `null` marks a column without non-null values,
 * `'mixed'` one whose values do not share a kind.
 */
export type DetectedKind = ColumnKind | 'mixed' | null;

const isNullish = (value: unknown): value is null | undefined => value === null || value === undefined;

const kindOfValue = (value: unknown): ColumnKind | 'mixed' => {
  if (typeof value === 'bigint') return 'integer';
  if (typeof value === 'number') return Number.isInteger(value) ? 'integer' : 'float';
  if (typeof value === 'boolean') return 'boolean';
  if (typeof value === 'string') return 'text';
  if (value instanceof Date) return 'timestamp';
  return 'mixed';
};

/**
 * Detects a column kind from its values. A declared kind always wins.
 * Integer and float values together read as float.
 */
export const detectColumnKind = (column: DataColumn): DetectedKind => {
  if (column.kind) return column.kind;

  let detected: DetectedKind = null;
  for (const value of column.values) {
    if (isNullish(value)) continue;
    const kind = kindOfValue(value);
    if (detected === null || detected === kind) {
      detected = kind;
    } else if (
      (detected === 'integer' && kind === 'float') ||
      (detected === 'float' && kind === 'integer')
    ) {
      detected = 'float';
    } else {
      return 'mixed';
    }
  }
  return detected;
};

const fitsInt32 = (value: unknown): boolean => {
  if (typeof value === 'bigint') {
    return value >= BigInt(INT32_MIN) && value <= BigInt(INT32_MAX);
  }
  if (typeof value === 'number') {
    return value >= INT32_MIN && value <= INT32_MAX;
  }
  return true;
};

/** Length in code points, the unit PostgreSQL counts characters in. */
const characterLength = (value: string): number => Array.from(value).length;

const maxTextLength = (values: readonly unknown[]): number => {
  let max = 0;
  for (const value of values) {
    if (typeof value === 'string') {
      max = Math.max(max, characterLength(value));
    }
  }
  return max;
};

/**
 * Maps one column to its PostgreSQL type.
 */
export const inferColumnType = (column: DataColumn): PostgresColumnType => {
  const kind = detectColumnKind(column);
  switch (kind) {
    case 'integer':
      return column.values.every(fitsInt32) ? PostgresColumnType.INTEGER : PostgresColumnType.BIGINT;
    case 'float':
      return PostgresColumnType.DOUBLE;
    case 'boolean':
      return PostgresColumnType.BOOLEAN;
    case 'timestamp':
      return PostgresColumnType.TIMESTAMP;
    case 'timestamptz':
      return PostgresColumnType.TIMESTAMPTZ;
    case 'categorical':
      return PostgresColumnType.TEXT;
    case 'text':
    case null:
      return maxTextLength(column.values) <= VARCHAR_LIMIT
        ? PostgresColumnType.VARCHAR_255
        : PostgresColumnType.TEXT;
    case 'mixed':
      return PostgresColumnType.TEXT;
  }
};

/**
 * Derives the column type declaration for every column of `table`, in order.
 */
export const inferColumnTypes = (table: DataTable): ColumnTypeDeclaration[] =>
  table.columns.map(column => ({ name: column.name, type: inferColumnType(column) }));

/**
 * Record view of {@link inferColumnTypes}, keyed by column name.
 */
export const inferColumnTypeMap = (table: DataTable): Record<string, PostgresColumnType> =>
  Object.fromEntries(inferColumnTypes(table).map(decl => [decl.name, decl.type]));
