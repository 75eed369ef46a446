/**
 * Consolidated test fixtures
 */

import type { ClientConfig, NewApp, Token } from '../types.js';

// ============================================================================
// APP REGISTRATIONS
// ============================================================================

export const appData = {
  yandex: {
    id: 'abc',
    service: 'yandex',
    password: 'test-secret',
    callbackURL: 'https://broker.example.com/callback/yandex',
  } satisfies NewApp,

  google: {
    id: 'google-client',
    service: 'google',
    password: 'test-secret',
    callbackURL: 'https://broker.example.com/callback/google',
  } satisfies NewApp,

  mail: {
    id: 'mail-client',
    service: 'mail',
    password: 'test-secret',
    callbackURL: 'https://broker.example.com/callback/mail',
  } satisfies NewApp,

  vk: {
    id: 'vk-client',
    service: 'vk',
    password: 'test-secret',
    callbackURL: 'https://broker.example.com/callback/vk',
  } satisfies NewApp,
};

export const createNewApp = (overrides: Partial<NewApp> = {}): NewApp => ({
  ...appData.yandex,
  ...overrides,
});

// ============================================================================
// CLIENT CONFIGURATIONS
// ============================================================================

export const createClientConfig = (
  overrides: Partial<ClientConfig> = {}
): ClientConfig => ({
  service: 'yandex',
  clientId: 'abc',
  clientSecret: 'test-secret',
  scopes: ['mail:imap_ro'],
  redirectURL: 'https://broker.example.com/callback/yandex',
  endpoint: {
    authURL: 'https://oauth.yandex.com/authorize',
    tokenURL: 'https://oauth.yandex.com/token',
  },
  quirks: {
    requiresPKCE: true,
    supportsRefreshTokens: true,
    clientAuthMethod: 'client_secret_basic',
  },
  ...overrides,
});

// ============================================================================
// TOKENS
// ============================================================================

export const createToken = (overrides: Partial<Token> = {}): Token => ({
  userID: 42,
  service: 'yandex',
  tokenType: 'Bearer',
  accessToken: 'test-access-token',
  refreshToken: 'test-refresh-token',
  expiry: new Date(Date.now() + 3600 * 1000),
  createdAt: new Date(),
  ...overrides,
});

// ============================================================================
// PROVIDER RESPONSES
// ============================================================================

export const providerResponses = {
  grant: {
    access_token: 'test-access-token',
    token_type: 'bearer',
    refresh_token: 'test-refresh-token',
    expires_in: 3600,
  },

  rotated: {
    access_token: 'rotated-access-token',
    token_type: 'bearer',
    refresh_token: 'rotated-refresh-token',
    expires_in: 3600,
  },

  /** Refresh answer from a provider that does not rotate refresh tokens */
  accessOnly: {
    access_token: 'fresh-access-token',
    expires_in: 3600,
  },

  invalidGrant: {
    error: 'invalid_grant',
    error_description: 'Code has expired',
  },
};

// ============================================================================
// MODULE EXPORT DATA
// ============================================================================

export const moduleData = {
  expectedVersion: '0.1.0',
  expectedExports: [
    'version',
    'DelegationBroker',
    'fromEnvironment',
    'MemoryDelegationStorage',
    'PostgresDelegationStorage',
    'ErrorNormalizer',
    'DefaultLogger',
    'serializeApp',
    'serializeToken',
    'default',
  ],
};
