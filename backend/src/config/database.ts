import { Knex } from 'knex';
import path from 'path';
import type { Database as SqliteConnection } from 'sqlite3';
import { logger } from '../utils/logger';

interface PoolConfig {
  min: number;
  max: number;
  createTimeoutMillis: number;
  acquireTimeoutMillis: number;
  idleTimeoutMillis: number;
  reapIntervalMillis: number;
  createRetryIntervalMillis: number;
  propagateCreateError: boolean;
}

type AfterCreateCallback = (err: Error | null, conn: SqliteConnection) => void;

const getPoolConfig = (env: string): PoolConfig => {
  const baseConfig: PoolConfig = {
    min: parseInt(process.env.DB_POOL_MIN || '2'),
    max: parseInt(process.env.DB_POOL_MAX || '10'),
    createTimeoutMillis: parseInt(process.env.DB_CREATE_TIMEOUT || '30000'),
    acquireTimeoutMillis: parseInt(process.env.DB_ACQUIRE_TIMEOUT || '60000'),
    idleTimeoutMillis: parseInt(process.env.DB_IDLE_TIMEOUT || '30000'),
    reapIntervalMillis: parseInt(process.env.DB_REAP_INTERVAL || '10000'),
    createRetryIntervalMillis: parseInt(process.env.DB_CREATE_RETRY_INTERVAL || '200'),
    propagateCreateError: false,
  };

  switch (env) {
    case 'production':
      return {
        ...baseConfig,
        min: parseInt(process.env.DB_POOL_MIN || '5'),
        max: parseInt(process.env.DB_POOL_MAX || '30'),
      };
    case 'test':
      // A single connection keeps every query on the same in-memory database
      return {
        ...baseConfig,
        min: 1,
        max: 1,
        idleTimeoutMillis: 1000,
      };
    default:
      return baseConfig;
  }
};

const getPgConnection = (): Knex.PgConnectionConfig => {
  const primaryUrl = process.env.DATABASE_URL;
  const sslMode = process.env.DATABASE_SSL_MODE || 'prefer';

  if (!primaryUrl) {
    throw new Error('DATABASE_URL is required for PostgreSQL');
  }

  return {
    connectionString: primaryUrl,
    ssl: sslMode === 'require' ? { rejectUnauthorized: false } : sslMode !== 'disable',
    statement_timeout: parseInt(process.env.DB_STATEMENT_TIMEOUT || '30000'),
    query_timeout: parseInt(process.env.DB_QUERY_TIMEOUT || '30000'),
    application_name: process.env.DB_APPLICATION_NAME || 'locomotive-risk-engine',
  };
};

const enableForeignKeys = (conn: SqliteConnection, done: AfterCreateCallback): void => {
  conn.run('PRAGMA foreign_keys = ON', (err: Error | null) => done(err, conn));
};

const usesPostgres = process.env.DATABASE_TYPE === 'postgresql';

const migrations: Knex.MigratorConfig = {
  directory: path.join(__dirname, '../../../database/migrations'),
  loadExtensions: ['.js', '.ts'],
};

const seeds: Knex.SeederConfig = {
  directory: path.join(__dirname, '../../../database/seeders'),
  loadExtensions: ['.js', '.ts'],
};

const fileBackedConfig = (env: string): Knex.Config => ({
  client: usesPostgres ? 'pg' : 'sqlite3',
  connection: usesPostgres
    ? getPgConnection()
    : {
        filename: process.env.DATABASE_URL || path.join(__dirname, '../../database.sqlite'),
      },
  useNullAsDefault: !usesPostgres,
  migrations,
  seeds,
  pool: {
    ...getPoolConfig(env),
    ...(!usesPostgres && { afterCreate: enableForeignKeys }),
  },
  acquireConnectionTimeout: parseInt(process.env.DB_ACQUIRE_TIMEOUT || '60000'),
  debug: env !== 'production' && process.env.DEBUG_SQL === 'true',
});

const config: Record<string, Knex.Config> = {
  development: fileBackedConfig('development'),

  test: {
    client: 'sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    migrations,
    seeds,
    pool: {
      ...getPoolConfig('test'),
      afterCreate: enableForeignKeys,
    },
  },

  staging: fileBackedConfig('staging'),

  production: fileBackedConfig('production'),
};

const environment = process.env.NODE_ENV || 'development';

const validateConfig = (selected: Knex.Config, env: string): void => {
  if (!selected.client) {
    throw new Error(`Database client not specified for environment: ${env}`);
  }

  if (selected.pool && selected.pool.max && selected.pool.min && selected.pool.max < selected.pool.min) {
    throw new Error(`Invalid pool configuration: max (${selected.pool.max}) < min (${selected.pool.min})`);
  }

  logger.info('Database configuration validated', {
    environment: env,
    client: selected.client,
    poolMin: selected.pool?.min,
    poolMax: selected.pool?.max,
  });
};

const selectedConfig = config[environment];
if (!selectedConfig) {
  throw new Error(`No database configuration found for environment: ${environment}`);
}

validateConfig(selectedConfig, environment);

export const dbConfig = selectedConfig;
export default config;
