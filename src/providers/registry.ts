/**
 * Provider Registry
 * Fixed table mapping each supported service to its OAuth2 endpoint,
 * static scopes and quirks.
 */

import type {
  ProviderEndpoint,
  ProviderQuirks,
  ServiceName,
} from '../types.js';
import { createDelegationError } from '../utils/error-normalizer.js';

export type ProviderDefinition = {
  service: ServiceName;
  endpoint: ProviderEndpoint;
  scopes: readonly string[];
  quirks: ProviderQuirks;
};

const PROVIDERS: Record<ServiceName, ProviderDefinition> = {
  yandex: {
    service: 'yandex',
    endpoint: {
      authURL: 'https://oauth.yandex.com/authorize',
      tokenURL: 'https://oauth.yandex.com/token',
    },
    scopes: ['mail:imap_ro'],
    quirks: {
      requiresPKCE: true,
      supportsRefreshTokens: true,
      clientAuthMethod: 'client_secret_basic',
    },
  },
  google: {
    service: 'google',
    endpoint: {
      authURL: 'https://accounts.google.com/o/oauth2/auth',
      tokenURL: 'https://oauth2.googleapis.com/token',
    },
    scopes: [
      'https://www.googleapis.com/auth/gmail.addons.current.message.readonly',
    ],
    quirks: {
      requiresPKCE: true,
      supportsRefreshTokens: true,
      clientAuthMethod: 'client_secret_post',
    },
  },
  mail: {
    service: 'mail',
    endpoint: {
      authURL: 'https://o2.mail.ru/login',
      tokenURL: 'https://o2.mail.ru/token',
    },
    scopes: [],
    quirks: {
      requiresPKCE: false,
      supportsRefreshTokens: true,
      clientAuthMethod: 'client_secret_basic',
    },
  },
  vk: {
    service: 'vk',
    endpoint: {
      authURL: 'https://oauth.vk.com/authorize',
      tokenURL: 'https://oauth.vk.com/access_token',
    },
    scopes: [],
    quirks: {
      requiresPKCE: false,
      // Offline VK tokens do not expire and come without a refresh token
      supportsRefreshTokens: false,
      clientAuthMethod: 'client_secret_post',
    },
  },
};

export function isServiceName(value: unknown): value is ServiceName {
  return typeof value === 'string' && Object.hasOwn(PROVIDERS, value);
}

/**
 * Look up the provider for a service key
 * @throws {DelegationError} service_unsupported for keys outside the registry
 */
export function getProvider(service: string): ProviderDefinition {
  if (!isServiceName(service)) {
    throw createDelegationError(
      'service_unsupported',
      `Service "${service}" is not supported`,
      { service, stage: 'resolveProvider' }
    );
  }
  return PROVIDERS[service];
}
