import type { PostgresConnection } from '../connection/connection.js';

/**
 * Represents a single SQL statement log entry
 */
export interface QueryLogEntry {
  /** The SQL statement about to be executed */
  sql: string;
  /** Parameters bound to the statement */
  params?: readonly unknown[];
}

/**
 * Function type for query logging callbacks
 * @param entry - The query log entry to process
 */
export type QueryLogger = (entry: QueryLogEntry) => void;

/**
 * Creates a wrapped connection that logs every statement before sending it
 * @param connection - Connection to wrap
 * @param logger - Optional logger function to receive query log entries
 * @returns The connection itself when no logger is given
 */
export const createQueryLoggingConnection = (
  connection: PostgresConnection,
  logger?: QueryLogger
): PostgresConnection => {
  if (!logger) {
    return connection;
  }

  return {
    async query(text, params) {
      logger(params && params.length > 0 ? { sql: text, params } : { sql: text });
      return connection.query(text, params);
    },
    get closed() {
      return connection.closed;
    },
    close: () => connection.close()
  };
};
