/**
 * Base class for every error raised by pg-tabular.
 */
export class PgTabularError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Extracts a readable message from an unknown thrown value.
 */
export const describeCause = (cause: unknown): string => {
  if (cause instanceof Error) return cause.message;
  if (
    typeof cause === 'object' &&
    cause !== null &&
    'message' in cause &&
    typeof cause.message === 'string'
  ) {
    return cause.message;
  }
  return String(cause);
};

/**
 * Raised when the connection factory fails to produce a live connection.
 * Never retried.
 */
export class ConnectionError extends PgTabularError {
  readonly host: string;
  readonly port: number;
  readonly database: string;

  constructor(
    target: { host: string; port: number; database: string },
    options?: ErrorOptions
  ) {
    super(
      `Failed to connect to ${target.host}:${target.port}/${target.database}: ${describeCause(options?.cause)}`,
      options
    );
    this.host = target.host;
    this.port = target.port;
    this.database = target.database;
  }
}

/**
 * Raised before any SQL is issued when a schema/table name cannot be parsed.
 */
export class InvalidIdentifierError extends PgTabularError {
  readonly identifier: string;

  constructor(identifier: string, reason: string) {
    super(`Invalid identifier "${identifier}": ${reason}`);
    this.identifier = identifier;
  }
}

/**
 * Raised when a statement of a `query` call fails. The whole call has been
 * rolled back by the time this is thrown.
 */
export class QueryError extends PgTabularError {
  /** 1-based position of the failing statement */
  readonly statementIndex: number;
  readonly statement: string;

  constructor(statementIndex: number, statement: string, options?: ErrorOptions) {
    super(`Statement ${statementIndex} failed: ${describeCause(options?.cause)}`, options);
    this.statementIndex = statementIndex;
    this.statement = statement;
  }
}

/**
 * Raised when an insert batch fails. Only that batch is rolled back; batches
 * before it stay committed.
 */
export class InsertError extends PgTabularError {
  /** 1-based position of the failing batch */
  readonly batchIndex: number;
  readonly table: string;

  constructor(table: string, batchIndex: number, options?: ErrorOptions) {
    super(`Insert batch ${batchIndex} into ${table} failed: ${describeCause(options?.cause)}`, options);
    this.batchIndex = batchIndex;
    this.table = table;
  }
}

/**
 * Raised by the `fail` existing-table policy instead of truncating.
 */
export class AlreadyExistsError extends PgTabularError {
  readonly schema: string;
  readonly table: string;

  constructor(schema: string, table: string) {
    super(`Table ${schema}.${table} already exists`);
    this.schema = schema;
    this.table = table;
  }
}

export class ConfigurationError extends PgTabularError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

export const isQueryError = (error: unknown): error is QueryError => error instanceof QueryError;

export const isInsertError = (error: unknown): error is InsertError => error instanceof InsertError;

export const isConnectionError = (error: unknown): error is ConnectionError =>
  error instanceof ConnectionError;
