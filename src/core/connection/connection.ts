/**
 * Parameters identifying one PostgreSQL target. One value per target; pass
 * it to the client constructor.
 */
export interface ConnectionConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  /** Milliseconds to wait for the connection to be established */
  connectionTimeoutMillis?: number;
}

/** Field metadata reported by the row description of a result. */
export interface FieldDescription {
  name: string;
  /** PostgreSQL type OID */
  dataTypeID: number;
}

/**
 * Raw result of one statement. `fields` is empty when the statement produced
 * no row description (DDL, DML without RETURNING).
 */
export interface StatementResult {
  fields: FieldDescription[];
  rows: unknown[][];
}

/**
 * A single live session with the database.
 */
export interface PostgresConnection {
  /**
   * Runs exactly one statement. Values are always bound as parameters.
   */
  query(text: string, params?: readonly unknown[]): Promise<StatementResult>;

  /** True once the session has ended, locally or remotely */
  readonly closed: boolean;

  close(): Promise<void>;
}

/**
 * Produces a live connection for a target. Called only on lazy (re)connect.
 */
export type ConnectionFactory = (config: ConnectionConfig) => Promise<PostgresConnection>;

/**
 * Something that can hand out the current live connection.
 */
export interface ConnectionSource {
  acquire(): Promise<PostgresConnection>;
}
