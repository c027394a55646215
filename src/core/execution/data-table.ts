/**
 * Value kinds a column can declare. JavaScript carries no column dtype, so a
 * kind is either declared by whoever built the table or detected from values.
 */
export type ColumnKind =
  | 'integer'
  | 'float'
  | 'boolean'
  | 'timestamp'
  | 'timestamptz'
  | 'categorical'
  | 'text';

export interface DataColumn {
  name: string;
  values: readonly unknown[];
  /** Declared kind; wins over detection from values */
  kind?: ColumnKind;
}

/** Column spec accepted by {@link DataTable.fromColumns} in record form. */
export type ColumnInput = readonly unknown[] | { values: readonly unknown[]; kind?: ColumnKind };

const isColumnList = (
  columns: readonly DataColumn[] | Record<string, ColumnInput>
): columns is readonly DataColumn[] => Array.isArray(columns);

const isValueList = (input: ColumnInput): input is readonly unknown[] => Array.isArray(input);

const freezeColumn = (column: DataColumn): DataColumn =>
  Object.freeze({
    name: column.name,
    values: Object.freeze([...column.values]),
    ...(column.kind ? { kind: column.kind } : {})
  });

/**
 * In-memory, column-oriented table. Used both for query results and for data
 * staged for insertion. Instances are immutable.
 */
export class DataTable {
  readonly columns: readonly DataColumn[];
  readonly rowCount: number;

  constructor(columns: readonly DataColumn[]) {
    const seen = new Set<string>();
    for (const column of columns) {
      if (seen.has(column.name)) {
        throw new RangeError(`Duplicate column "${column.name}"`);
      }
      seen.add(column.name);
    }

    const rowCount = columns.length > 0 ? columns[0].values.length : 0;
    const ragged = columns.find(column => column.values.length !== rowCount);
    if (ragged) {
      throw new RangeError(
        `Column "${ragged.name}" has ${ragged.values.length} values, expected ${rowCount}`
      );
    }

    this.columns = Object.freeze(columns.map(freezeColumn));
    this.rowCount = rowCount;
  }

  static empty(): DataTable {
    return new DataTable([]);
  }

  static fromColumns(columns: readonly DataColumn[] | Record<string, ColumnInput>): DataTable {
    if (isColumnList(columns)) {
      return new DataTable(columns);
    }
    return new DataTable(
      Object.entries(columns).map(([name, input]) =>
        isValueList(input)
          ? { name, values: input }
          : { name, values: input.values, kind: input.kind }
      )
    );
  }

  /**
   * Builds a table from row arrays. Does not check column names for
   * uniqueness beyond the constructor's rule, so result sets with repeated
   * names must be disambiguated by the caller.
   */
  static fromRows(
    columnNames: readonly string[],
    rows: readonly (readonly unknown[])[],
    kinds: readonly (ColumnKind | undefined)[] = []
  ): DataTable {
    return new DataTable(
      columnNames.map((name, index) => ({
        name,
        values: rows.map(row => row[index]),
        kind: kinds[index]
      }))
    );
  }

  /**
   * Builds a table from plain objects. Column order follows `columnOrder`
   * when given, otherwise first appearance across the records.
   */
  static fromRecords(records: readonly Record<string, unknown>[], columnOrder?: readonly string[]): DataTable {
    const names = columnOrder ? [...columnOrder] : [];
    if (!columnOrder) {
      const seen = new Set<string>();
      for (const record of records) {
        for (const key of Object.keys(record)) {
          if (!seen.has(key)) {
            seen.add(key);
            names.push(key);
          }
        }
      }
    }
    return new DataTable(
      names.map(name => ({ name, values: records.map(record => record[name] ?? null) }))
    );
  }

  get columnCount(): number {
    return this.columns.length;
  }

  get columnNames(): string[] {
    return this.columns.map(column => column.name);
  }

  column(name: string): DataColumn | undefined {
    return this.columns.find(column => column.name === name);
  }

  row(index: number): unknown[] {
    if (!Number.isInteger(index) || index < 0 || index >= this.rowCount) {
      throw new RangeError(`Row ${index} is out of range (0..${this.rowCount - 1})`);
    }
    return this.columns.map(column => column.values[index]);
  }

  *rows(): IterableIterator<unknown[]> {
    for (let i = 0; i < this.rowCount; i++) {
      yield this.columns.map(column => column.values[i]);
    }
  }

  toRecords(): Record<string, unknown>[] {
    const records: Record<string, unknown>[] = [];
    for (let i = 0; i < this.rowCount; i++) {
      const record: Record<string, unknown> = {};
      for (const column of this.columns) {
        record[column.name] = column.values[i];
      }
      records.push(record);
    }
    return records;
  }

  /**
   * Returns rows `[start, end)` as a new table with the same columns and kinds.
   */
  slice(start: number, end?: number): DataTable {
    return new DataTable(
      this.columns.map(column => ({
        name: column.name,
        values: column.values.slice(start, end),
        kind: column.kind
      }))
    );
  }
}
