/**
 * OAuth Delegation Broker
 * Main entry point
 */

export const version = '0.1.0';

// Orchestration
export { DelegationBroker } from './delegation/broker.js';
export type { DelegationBrokerOptions } from './delegation/broker.js';
export {
  fromEnvironment,
  fromEnvironmentAsync,
  configFromEnvironment,
  poolConfigFromEnvironment,
} from './from-environment.js';
export type {
  EnvironmentVariables,
  FromEnvironmentOptions,
} from './from-environment.js';

// Components
export { AppDirectory } from './apps/app-directory.js';
export { ExchangeLedger, EXCHANGE_ID_LENGTH } from './exchanges/exchange-ledger.js';
export { TokenStore } from './tokens/token-store.js';
export type { TokenStoreDependencies } from './tokens/token-store.js';
export { TokenEndpointClient } from './oauth/token-endpoint.js';
export { buildAuthorizationURL, createPKCEPair } from './oauth/authorization-url.js';
export type { PKCEPair } from './oauth/authorization-url.js';
export { getProvider, isServiceName } from './providers/registry.js';
export type { ProviderDefinition } from './providers/registry.js';

// Storage
export { MemoryDelegationStorage } from './storage/memory.js';
export { PostgresDelegationStorage, SCHEMA_FILE } from './storage/postgres.js';
export type { Queryable } from './storage/postgres.js';
export { UniqueViolationError } from './storage/types.js';
export type {
  AppStorage,
  ExchangeStorage,
  TokenStorage,
  DelegationStorage,
} from './storage/types.js';

// Configuration
export {
  BrokerConfigSchema,
  validate,
  safeValidate,
  DEFAULT_EXCHANGE_TTL_SECONDS,
  DEFAULT_TOKEN_EXPIRY_LEEWAY_SECONDS,
} from './config.js';
export type { BrokerConfig, BrokerConfigInput } from './config.js';

// Types
export { SERVICE_NAMES, APP_STATUSES } from './types.js';
export type {
  App,
  AppStatus,
  NewApp,
  Exchange,
  Token,
  ServiceName,
  ClientConfig,
  ClientAuthMethod,
  ProviderEndpoint,
  ProviderQuirks,
  TokenGrant,
  DelegationError,
  DelegationErrorCode,
  CallOptions,
} from './types.js';

// Utilities
export {
  ErrorNormalizer,
  createDelegationError,
  isDelegationError,
} from './utils/error-normalizer.js';
export { serializeApp, serializeToken } from './serialize.js';
export type { SerializedApp, SerializedToken } from './serialize.js';

// Logging
export { LogLevel, LogDestination } from './logging/types.js';
export type { Logger, LogMeta, LogTransport } from './logging/types.js';
export {
  DefaultLogger,
  DELEGATION_REDACTION_PATHS,
  parseLogLevel,
} from './logging/logger.js';

export default {
  version,
};
