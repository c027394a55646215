import type {
  ConnectionSource,
  PostgresConnection,
  StatementResult
} from '../../src/core/connection/connection.js';

export type StatementHandler = (text: string, params?: readonly unknown[]) => StatementResult | Error | undefined;

export interface RecordedCall {
  text: string;
  params?: readonly unknown[];
}

export const NO_ROWS: StatementResult = { fields: [], rows: [] };

/**
 * Result with text columns (OID 25) unless OIDs are given.
 */
export const resultOf = (names: string[], rows: unknown[][], oids: number[] = []): StatementResult => ({
  fields: names.map((name, i) => ({ name, dataTypeID: oids[i] ?? 25 })),
  rows
});

/**
 * In-process stand-in for a database session that records every statement.
 * The handler may return a result, an Error to throw, or nothing (no rows).
 */
export class FakeConnection implements PostgresConnection {
  readonly calls: RecordedCall[] = [];
  closed = false;
  closeCount = 0;

  constructor(private readonly handler: StatementHandler = () => undefined) {}

  get sql(): string[] {
    return this.calls.map(call => call.text);
  }

  async query(text: string, params?: readonly unknown[]): Promise<StatementResult> {
    if (this.closed) {
      throw new Error('Connection terminated');
    }
    this.calls.push(params ? { text, params } : { text });
    const outcome = this.handler(text, params);
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome ?? NO_ROWS;
  }

  async close(): Promise<void> {
    this.closed = true;
    this.closeCount++;
  }
}

export class FakeSource implements ConnectionSource {
  acquireCount = 0;

  constructor(readonly connection: FakeConnection) {}

  async acquire(): Promise<PostgresConnection> {
    this.acquireCount++;
    return this.connection;
  }
}

export interface CatalogState {
  schemas: string[];
  /** `schema.table` entries */
  tables: string[];
}

const found = (hit: boolean): StatementResult => resultOf(['?column?'], hit ? [[1]] : [], [23]);

/**
 * Answers the catalog existence probes from `state`; other statements fall
 * through to `next`.
 */
export const catalogHandler = (state: CatalogState, next: StatementHandler = () => undefined): StatementHandler =>
  (text, params) => {
    if (text.startsWith('SELECT 1 FROM information_schema.schemata')) {
      return found(state.schemas.includes(String(params?.[0])));
    }
    if (text.startsWith('SELECT 1 FROM information_schema.tables')) {
      return found(state.tables.includes(`${String(params?.[0])}.${String(params?.[1])}`));
    }
    return next(text, params);
  };

/** Statements other than catalog existence probes. */
export const withoutProbes = (sql: readonly string[]): string[] =>
  sql.filter(text => !text.startsWith('SELECT 1 FROM information_schema.'));
