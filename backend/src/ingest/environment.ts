import { BackendUnresolvedError } from '../errors.js';
import type { BackendConfig, ConnectionParams, SslMode } from './types.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export const URL_VARIABLE = 'DATABASE_URL';
export const DISCRETE_VARIABLES = {
  host: 'POSTGRES_HOST',
  port: 'POSTGRES_PORT',
  user: 'POSTGRES_USER',
  password: 'POSTGRES_PASSWORD',
  database: 'POSTGRES_DB',
  ssl: 'POSTGRES_SSL',
} as const;

/** Used for the discrete variables the operator leaves out. */
export const DISCRETE_DEFAULTS = {
  port: 5432,
  user: 'postgres',
  database: 'frpdb',
} as const;

export const LOCAL_DEFAULT: BackendConfig = Object.freeze({
  kind: 'local-default',
  connection: Object.freeze({
    host: 'localhost',
    port: 5432,
    user: 'frp',
    password: 'frppass',
    database: 'frpdb',
    ssl: false,
  }),
});

const SSL_MODES: readonly SslMode[] = ['require', 'no-verify', 'verify-ca', 'verify-full'];
const ENABLED_FLAGS = new Set(['true', '1', 'on']);

function read(env: EnvSource, key: string): string | undefined {
  const value = env[key];
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  return trimmed.length ? trimmed : undefined;
}

function parsePort(raw: string, source: string): number {
  if (!/^\d+$/.test(raw)) {
    throw new BackendUnresolvedError(`${source} port "${raw}" is not a number`, { source });
  }
  const port = Number(raw);
  if (port < 1 || port > 65535) {
    throw new BackendUnresolvedError(`${source} port ${port} is out of range`, { source });
  }
  return port;
}

/** `true`/`1`/`on` mean `require`; libpq mode names are kept; anything else is off. */
function parseSslMode(raw: string | undefined): SslMode | false {
  if (!raw) return false;
  const normalized = raw.toLowerCase();
  if (ENABLED_FLAGS.has(normalized)) return 'require';
  return SSL_MODES.find((mode) => mode === normalized) ?? false;
}

function fromUrl(raw: string): BackendConfig {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    throw new BackendUnresolvedError(`${URL_VARIABLE} is not a valid connection URL`, { source: URL_VARIABLE });
  }
  if (url.protocol !== 'postgres:' && url.protocol !== 'postgresql:') {
    throw new BackendUnresolvedError(`${URL_VARIABLE} uses unsupported scheme ${url.protocol}`, {
      source: URL_VARIABLE,
    });
  }
  const database = decodeURIComponent(url.pathname.replace(/^\//, ''));
  if (!url.hostname || !url.username || !database) {
    throw new BackendUnresolvedError(`${URL_VARIABLE} must name a host, a user and a database`, {
      source: URL_VARIABLE,
    });
  }

  const connection: ConnectionParams = {
    host: url.hostname,
    port: url.port ? parsePort(url.port, URL_VARIABLE) : DISCRETE_DEFAULTS.port,
    user: decodeURIComponent(url.username),
    database,
    ssl: parseSslMode(url.searchParams.get('sslmode') ?? url.searchParams.get('ssl') ?? undefined),
  };
  if (url.password) {
    connection.password = decodeURIComponent(url.password);
  }
  return Object.freeze({ kind: 'managed-cloud', connection: Object.freeze(connection) });
}

function fromDiscrete(env: EnvSource): BackendConfig | null {
  const host = read(env, DISCRETE_VARIABLES.host);
  const port = read(env, DISCRETE_VARIABLES.port);
  const user = read(env, DISCRETE_VARIABLES.user);
  const password = read(env, DISCRETE_VARIABLES.password);
  const database = read(env, DISCRETE_VARIABLES.database);
  const ssl = read(env, DISCRETE_VARIABLES.ssl);

  if (!host) {
    if ([port, user, password, database, ssl].every((value) => value === undefined)) return null;
    // no host: the given variables override the local default one by one
    const base = LOCAL_DEFAULT.connection;
    const connection: ConnectionParams = {
      host: base.host,
      port: port ? parsePort(port, DISCRETE_VARIABLES.port) : base.port,
      user: user ?? base.user,
      database: database ?? base.database,
      ssl: parseSslMode(ssl),
    };
    const resolvedPassword = password ?? base.password;
    if (resolvedPassword !== undefined) {
      connection.password = resolvedPassword;
    }
    return Object.freeze({ kind: 'explicit-env', connection: Object.freeze(connection) });
  }
  if (password && !user) {
    throw new BackendUnresolvedError(
      `${DISCRETE_VARIABLES.password} is set but ${DISCRETE_VARIABLES.user} is not`,
      { variables: [DISCRETE_VARIABLES.password] }
    );
  }

  const connection: ConnectionParams = {
    host,
    port: port ? parsePort(port, DISCRETE_VARIABLES.port) : DISCRETE_DEFAULTS.port,
    user: user ?? DISCRETE_DEFAULTS.user,
    database: database ?? DISCRETE_DEFAULTS.database,
    ssl: parseSslMode(ssl),
  };
  if (password) {
    connection.password = password;
  }
  return Object.freeze({ kind: 'explicit-env', connection: Object.freeze(connection) });
}

/**
 * Resolve the storage backend from, in order: a connection URL, the discrete
 * host/port/user/password/database variables, the local default. A URL wins
 * outright. Discrete variables without a host are applied on top of the local
 * default.
 */
export function resolveBackendConfig(env: EnvSource): BackendConfig {
  const url = read(env, URL_VARIABLE);
  if (url) {
    return fromUrl(url);
  }
  return fromDiscrete(env) ?? LOCAL_DEFAULT;
}

/** `user@host:port/database`, safe for logs. */
export function describeBackend(config: BackendConfig): string {
  const { user, host, port, database } = config.connection;
  return `${user}@${host}:${port}/${database}`;
}
