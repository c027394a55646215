import { ConfigurationError } from '../errors.js';
import type { ConnectionConfig } from './connection.js';

export const DEFAULT_PORT = 5432;

/** Environment variables read by {@link connectionConfigFromEnv}. */
export const ConnectionEnvKeys = {
  host: 'PG_HOST',
  port: 'PG_PORT',
  database: 'PG_DBNAME',
  user: 'PG_USER',
  password: 'PG_PASSWORD'
} as const;

type Env = Readonly<Record<string, string | undefined>>;

/**
 * Builds a {@link ConnectionConfig} from environment variables. Opt-in: the
 * client never reads the environment by itself.
 *
 * `PG_PORT` may be omitted and defaults to 5432; every other variable is
 * required.
 *
 * @throws ConfigurationError listing every missing or malformed variable
 */
export const connectionConfigFromEnv = (env: Env = process.env): ConnectionConfig => {
  const issues: string[] = [];

  const required = (key: string): string => {
    const value = env[key];
    if (value === undefined || value === '') {
      issues.push(`${key} is not set`);
      return '';
    }
    return value;
  };

  const host = required(ConnectionEnvKeys.host);
  const database = required(ConnectionEnvKeys.database);
  const user = required(ConnectionEnvKeys.user);
  const password = required(ConnectionEnvKeys.password);

  const rawPort = env[ConnectionEnvKeys.port];
  let port = DEFAULT_PORT;
  if (rawPort !== undefined && rawPort !== '') {
    port = Number(rawPort);
    if (!Number.isInteger(port) || port < 1 || port > 65535) {
      issues.push(`${ConnectionEnvKeys.port} must be a port number, got "${rawPort}"`);
    }
  }

  if (issues.length > 0) {
    throw new ConfigurationError(issues);
  }
  return { host, port, database, user, password };
};
