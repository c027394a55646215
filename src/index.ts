export * from './client/postgres-client.js';

export * from './core/errors.js';

export * from './core/connection/connection.js';
export * from './core/connection/connection-manager.js';
export * from './core/connection/config.js';
export * from './core/connection/pg-connection.js';

export * from './core/sql/identifiers.js';
export * from './core/sql/statement-splitter.js';

export * from './core/execution/data-table.js';
export * from './core/execution/result-set.js';
export * from './core/execution/query-executor.js';
export * from './core/execution/query-logger.js';

export * from './core/ddl/type-inference.js';
export * from './core/ddl/postgres-catalog.js';
export * from './core/ddl/table-provisioner.js';

export * from './core/dml/batch-insert.js';
