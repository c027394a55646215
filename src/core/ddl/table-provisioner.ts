import type { DataTable } from '../execution/data-table.js';
import type { QueryExecutor } from '../execution/query-executor.js';
import { AlreadyExistsError } from '../errors.js';
import { escapeIdentifier, formatQualifiedName, parseQualifiedName, type QualifiedName } from '../sql/identifiers.js';
import type { PostgresCatalog } from './postgres-catalog.js';
import { inferColumnTypes, type ColumnTypeDeclaration } from './type-inference.js';

/**
 * What to do with a table that already exists when `overwrite` is off:
 * empty it (`truncate`) or refuse (`fail`, raising AlreadyExistsError).
 */
export type ExistingTablePolicy = 'truncate' | 'fail';

/** Outcome of {@link TableProvisioner.ensureTable}. */
export type ProvisionAction = 'skipped' | 'created' | 'recreated' | 'truncated';

export interface TableProvisionerOptions {
  existingTablePolicy?: ExistingTablePolicy;
}

/**
 * Renders a column definition for SQL.
 */
export const renderColumnDefinition = (column: ColumnTypeDeclaration): string =>
  `${escapeIdentifier(column.name)} ${column.type}`;

/**
 * Generates SQL to create a table.
 */
export const generateCreateTableSql = (name: QualifiedName, columns: readonly ColumnTypeDeclaration[]): string =>
  `CREATE TABLE ${formatQualifiedName(name)} (${columns.map(renderColumnDefinition).join(', ')})`;

export const generateDropTableSql = (name: QualifiedName): string =>
  `DROP TABLE IF EXISTS ${formatQualifiedName(name)}`;

export const generateTruncateTableSql = (name: QualifiedName): string =>
  `TRUNCATE TABLE ${formatQualifiedName(name)}`;

/**
 * Makes sure a destination schema and table exist and are ready to receive
 * the rows of a {@link DataTable}.
 */
export class TableProvisioner {
  private readonly existingTablePolicy: ExistingTablePolicy;

  constructor(
    private readonly executor: QueryExecutor,
    private readonly catalog: PostgresCatalog,
    options: TableProvisionerOptions = {}
  ) {
    this.existingTablePolicy = options.existingTablePolicy ?? 'truncate';
  }

  /**
   * Creates the schema when missing, then:
   * - missing table: create it from inferred column types
   * - existing table, `overwrite`: drop and recreate in one transaction
   * - existing table, no `overwrite`: truncate (or fail, per policy)
   *
   * A table without rows is a no-op.
   *
   * @throws InvalidIdentifierError before any SQL when the name is malformed
   * @throws AlreadyExistsError under the `fail` policy
   */
  async ensureTable(table: DataTable, qualifiedName: string, overwrite = false): Promise<ProvisionAction> {
    const name = parseQualifiedName(qualifiedName);
    if (table.rowCount === 0) {
      return 'skipped';
    }

    if (!(await this.catalog.schemaExists(name.schema))) {
      await this.catalog.createSchema(name.schema);
    }

    const exists = await this.catalog.tableExists(name);
    if (!exists) {
      await this.executor.executeStatement(generateCreateTableSql(name, inferColumnTypes(table)));
      return 'created';
    }

    if (overwrite) {
      await this.executor.executeStatements([
        { text: generateDropTableSql(name) },
        { text: generateCreateTableSql(name, inferColumnTypes(table)) }
      ]);
      return 'recreated';
    }

    if (this.existingTablePolicy === 'fail') {
      throw new AlreadyExistsError(name.schema, name.table);
    }
    await this.executor.executeStatement(generateTruncateTableSql(name));
    return 'truncated';
  }
}
