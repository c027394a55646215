import { ConnectionError } from '../errors.js';
import type { ConnectionConfig, ConnectionFactory, ConnectionSource, PostgresConnection } from './connection.js';

/**
 * Owns at most one live connection. The connection is opened on first use and
 * transparently reopened whenever the stored one reports itself closed.
 */
export class ConnectionManager implements ConnectionSource {
  private current: PostgresConnection | null = null;
  private pending: Promise<PostgresConnection> | null = null;

  constructor(
    private readonly config: ConnectionConfig,
    private readonly factory: ConnectionFactory
  ) {}

  /** The live connection, if one is open right now. */
  get connection(): PostgresConnection | null {
    return this.current && !this.current.closed ? this.current : null;
  }

  async acquire(): Promise<PostgresConnection> {
    const live = this.connection;
    if (live) return live;

    // concurrent first callers share one connect
    if (!this.pending) {
      this.pending = this.open().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  }

  /**
   * Closes the current connection. Safe to call repeatedly; a later
   * {@link acquire} opens a new one.
   */
  async close(): Promise<void> {
    const connection = this.current;
    this.current = null;
    if (connection && !connection.closed) {
      await connection.close();
    }
  }

  private async open(): Promise<PostgresConnection> {
    try {
      this.current = await this.factory(this.config);
      return this.current;
    } catch (cause) {
      throw new ConnectionError(this.config, { cause });
    }
  }
}
