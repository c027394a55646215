import pg from 'pg';

import type { ConnectionConfig, ConnectionFactory, PostgresConnection, StatementResult } from './connection.js';

const SAFE_INT_REGEX = /^(-)?[0-8]?\d{1,15}$/;

/**
 * Parses an int8 as a number while it stays a safe integer, else as a bigint.
 */
export const parseInt8 = (value: string): number | bigint => {
  if (SAFE_INT_REGEX.test(value)) {
    return Number(value);
  }
  const parsed = BigInt(value);
  return parsed >= BigInt(Number.MIN_SAFE_INTEGER) && parsed <= BigInt(Number.MAX_SAFE_INTEGER)
    ? Number(parsed)
    : parsed;
};

const createTypeOverrides = (): pg.TypeOverrides => {
  const types = new pg.TypeOverrides();
  types.setTypeParser(pg.types.builtins.INT8, parseInt8);
  return types;
};

/**
 * Wraps a connected `pg.Client`. The session counts as closed once the client
 * emits `end` or `error`.
 */
export const wrapPgClient = (client: pg.Client): PostgresConnection => {
  let closed = false;
  client.on('end', () => {
    closed = true;
  });
  client.on('error', () => {
    // the next acquire() opens a fresh client
    closed = true;
  });

  return {
    async query(text, params): Promise<StatementResult> {
      const result = await client.query<unknown[], unknown[]>({
        text,
        values: params ? [...params] : undefined,
        rowMode: 'array'
      });
      return {
        fields: result.fields.map(field => ({ name: field.name, dataTypeID: field.dataTypeID })),
        rows: result.rows
      };
    },
    get closed() {
      return closed;
    },
    async close() {
      if (closed) return;
      closed = true;
      await client.end();
    }
  };
};

/**
 * Default {@link ConnectionFactory}, backed by `pg.Client`.
 */
export const createPgConnection: ConnectionFactory = async (config: ConnectionConfig) => {
  const client = new pg.Client({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    connectionTimeoutMillis: config.connectionTimeoutMillis,
    types: createTypeOverrides()
  });
  await client.connect();
  return wrapPgClient(client);
};
