/**
 * Environment variable helper for DelegationBroker
 * Maps the deployment environment to a PostgreSQL-backed broker
 */

import pg from 'pg';
import type { PoolConfig } from 'pg';
import { z } from 'zod';
import type { BrokerConfigInput } from './config.js';
import { DelegationBroker } from './delegation/broker.js';
import { parseLogLevel } from './logging/logger.js';
import type { Logger } from './logging/types.js';
import {
  PostgresDelegationStorage,
  type Queryable,
} from './storage/postgres.js';

const { Pool } = pg;

export type EnvironmentVariables = {
  DATABASE_URL?: string;
  PGHOST?: string;
  PGPORT?: string;
  PGUSER?: string;
  PGPASSWORD?: string;
  PGDATABASE?: string;
  EXCHANGE_TTL_SECONDS?: string;
  PROVIDER_TIMEOUT_MS?: string;
  LOG_LEVEL?: string;
  [key: string]: string | undefined;
};

export type FromEnvironmentOptions = {
  /** Defaults to process.env */
  env?: EnvironmentVariables;
  /**
   * Connection pool to use instead of one built from the environment.
   * The caller then owns its lifecycle.
   */
  pool?: Queryable;
  logger?: Logger;
};

const positiveInt = z.coerce.number().int().positive();

const NumericEnvironmentSchema = z.object({
  PGPORT: positiveInt.optional(),
  EXCHANGE_TTL_SECONDS: positiveInt.optional(),
  PROVIDER_TIMEOUT_MS: positiveInt.optional(),
});

const present = (value: string | undefined) => {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
};

function numericEnvironment(env: EnvironmentVariables) {
  return NumericEnvironmentSchema.parse({
    PGPORT: present(env.PGPORT),
    EXCHANGE_TTL_SECONDS: present(env.EXCHANGE_TTL_SECONDS),
    PROVIDER_TIMEOUT_MS: present(env.PROVIDER_TIMEOUT_MS),
  });
}

/**
 * Broker settings from EXCHANGE_TTL_SECONDS, PROVIDER_TIMEOUT_MS and LOG_LEVEL.
 * Unset variables leave the defaults in place.
 * @throws ZodError on malformed numbers, Error on an unknown LOG_LEVEL
 */
export function configFromEnvironment(
  env: EnvironmentVariables
): BrokerConfigInput {
  const numbers = numericEnvironment(env);
  const config: BrokerConfigInput = {};

  if (numbers.EXCHANGE_TTL_SECONDS !== undefined) {
    config.exchangeTTLSeconds = numbers.EXCHANGE_TTL_SECONDS;
  }
  if (numbers.PROVIDER_TIMEOUT_MS !== undefined) {
    config.timeouts = { response: numbers.PROVIDER_TIMEOUT_MS };
  }

  const levelName = present(env.LOG_LEVEL);
  if (levelName) {
    const level = parseLogLevel(levelName);
    if (level === undefined) {
      throw new Error(`Unknown LOG_LEVEL "${levelName}"`);
    }
    config.logLevel = level;
  }

  return config;
}

/**
 * Connection settings: DATABASE_URL wins over the individual PG* variables
 */
export function poolConfigFromEnvironment(
  env: EnvironmentVariables
): PoolConfig {
  const connectionString = present(env.DATABASE_URL);
  if (connectionString) {
    return { connectionString };
  }

  const config: PoolConfig = {};
  const host = present(env.PGHOST);
  const user = present(env.PGUSER);
  const database = present(env.PGDATABASE);
  const { PGPORT: port } = numericEnvironment(env);

  if (host) config.host = host;
  if (port !== undefined) config.port = port;
  if (user) config.user = user;
  // Passwords are taken verbatim
  if (env.PGPASSWORD !== undefined) config.password = env.PGPASSWORD;
  if (database) config.database = database;

  return config;
}

/**
 * Create a PostgreSQL-backed DelegationBroker from environment variables
 *
 * - DATABASE_URL, or PGHOST / PGPORT / PGUSER / PGPASSWORD / PGDATABASE
 * - EXCHANGE_TTL_SECONDS -> exchangeTTLSeconds
 * - PROVIDER_TIMEOUT_MS -> timeouts.response
 * - LOG_LEVEL -> logLevel
 */
export function fromEnvironment(
  options: FromEnvironmentOptions = {}
): DelegationBroker {
  return build(options).broker;
}

/**
 * Async version that also applies the database schema
 */
export async function fromEnvironmentAsync(
  options: FromEnvironmentOptions = {}
): Promise<DelegationBroker> {
  const { broker, storage } = build(options);
  await storage.migrate();
  return broker;
}

function build(options: FromEnvironmentOptions) {
  const env = options.env ?? process.env;
  const config = configFromEnvironment(env);
  const pool = options.pool ?? new Pool(poolConfigFromEnvironment(env));
  const storage = new PostgresDelegationStorage(pool);

  const broker = new DelegationBroker({
    storage,
    config,
    logger: options.logger,
  });

  return { broker, storage };
}
