import type { QueryExecutor } from '../execution/query-executor.js';
import { DataTable } from '../execution/data-table.js';
import { catalogName, escapeIdentifier, type QualifiedName } from '../sql/identifiers.js';

// Catalog lookups compare names as bound literals, folded the way the server
// folds them; only DDL positions are escaped as identifiers.

const LIST_SCHEMAS_SQL = `SELECT schema_name
FROM information_schema.schemata
WHERE schema_name <> 'information_schema' AND schema_name NOT LIKE 'pg\\_%'
ORDER BY schema_name`;

const SCHEMA_EXISTS_SQL = `SELECT 1 FROM information_schema.schemata WHERE schema_name = $1`;

const LIST_TABLES_SQL = `SELECT table_name
FROM information_schema.tables
WHERE table_schema = $1 AND table_type = 'BASE TABLE'
ORDER BY table_name`;

const TABLE_EXISTS_SQL = `SELECT 1 FROM information_schema.tables WHERE table_schema = $1 AND table_name = $2`;

const DESCRIBE_TABLE_SQL = `SELECT column_name, data_type, is_nullable, column_default, character_maximum_length
FROM information_schema.columns
WHERE table_schema = $1 AND table_name = $2
ORDER BY ordinal_position`;

const catalogParams = (name: QualifiedName): string[] => [catalogName(name.schema), catalogName(name.table)];

const orEmpty = (table: DataTable | null, columnNames: string[]): DataTable =>
  table ?? DataTable.fromRows(columnNames, []);

/**
 * Catalog introspection and schema-level DDL over `information_schema`.
 */
export class PostgresCatalog {
  constructor(private readonly executor: QueryExecutor) {}

  async listSchemas(): Promise<DataTable> {
    return orEmpty(await this.executor.executeStatement(LIST_SCHEMAS_SQL), ['schema_name']);
  }

  async schemaExists(schema: string): Promise<boolean> {
    const result = await this.executor.executeStatement(SCHEMA_EXISTS_SQL, [catalogName(schema)]);
    return (result?.rowCount ?? 0) > 0;
  }

  async createSchema(schema: string): Promise<void> {
    await this.executor.executeStatement(`CREATE SCHEMA IF NOT EXISTS ${escapeIdentifier(schema)}`);
  }

  async dropSchema(schema: string, cascade = false): Promise<void> {
    const suffix = cascade ? ' CASCADE' : '';
    await this.executor.executeStatement(`DROP SCHEMA IF EXISTS ${escapeIdentifier(schema)}${suffix}`);
  }

  async listTables(schema = 'public'): Promise<DataTable> {
    return orEmpty(await this.executor.executeStatement(LIST_TABLES_SQL, [catalogName(schema)]), ['table_name']);
  }

  async tableExists(name: QualifiedName): Promise<boolean> {
    const result = await this.executor.executeStatement(TABLE_EXISTS_SQL, catalogParams(name));
    return (result?.rowCount ?? 0) > 0;
  }

  /**
   * Column metadata of a table in ordinal order; empty when the table is missing.
   */
  async describeTable(name: QualifiedName): Promise<DataTable> {
    return orEmpty(
      await this.executor.executeStatement(DESCRIBE_TABLE_SQL, catalogParams(name)),
      ['column_name', 'data_type', 'is_nullable', 'column_default', 'character_maximum_length']
    );
  }
}
