/**
 * Delegation Broker
 * Coordinates the App Directory, Exchange Ledger and Token Store for the
 * user-facing flows: start delegation, complete delegation, fetch and refresh
 * the resulting token, plus app administration.
 */

import { AppDirectory } from '../apps/app-directory.js';
import { BaseModel } from '../base-model.js';
import { validate, type BrokerConfigInput } from '../config.js';
import { ExchangeLedger } from '../exchanges/exchange-ledger.js';
import type { Logger } from '../logging/types.js';
import {
  buildAuthorizationURL,
  createPKCEPair,
} from '../oauth/authorization-url.js';
import { TokenEndpointClient } from '../oauth/token-endpoint.js';
import { MemoryDelegationStorage } from '../storage/memory.js';
import type { DelegationStorage } from '../storage/types.js';
import { TokenStore } from '../tokens/token-store.js';
import type { App, CallOptions, NewApp, Token } from '../types.js';

export type DelegationBrokerOptions = {
  /** Persistent storage; required when NODE_ENV is production */
  storage?: DelegationStorage;
  config?: BrokerConfigInput;
  /** Parent logger; each component logs through a child bound to its name */
  logger?: Logger;
};

// user_id columns are PostgreSQL `integer`
const MIN_USER_ID = -(2 ** 31);
const MAX_USER_ID = 2 ** 31 - 1;

function isUserID(value: number): boolean {
  return Number.isInteger(value) && value >= MIN_USER_ID && value <= MAX_USER_ID;
}

export class DelegationBroker extends BaseModel {
  protected readonly component = 'delegation-broker';

  public readonly apps: AppDirectory;
  public readonly exchanges: ExchangeLedger;
  public readonly tokens: TokenStore;

  public constructor(options: DelegationBrokerOptions = {}) {
    super(validate(options.config ?? {}), options.logger);

    const storage = this.enforceProductionStorage(options.storage);
    const childLogger = (component: string) =>
      options.logger?.child({ component });

    this.apps = new AppDirectory(
      storage,
      this.config,
      childLogger('app-directory')
    );
    this.exchanges = new ExchangeLedger(
      storage,
      this.config,
      childLogger('exchange-ledger')
    );
    this.tokens = new TokenStore(
      {
        storage,
        exchanges: this.exchanges,
        apps: this.apps,
        endpoint: new TokenEndpointClient(
          this.config,
          childLogger('token-endpoint')
        ),
      },
      this.config,
      childLogger('token-store')
    );
  }

  /**
   * Issue the provider authorization URL for `userID` on `service`.
   * The URL's `state` parameter names a freshly minted exchange.
   * @throws {DelegationError} invalid_request, not_found, service_unsupported, internal_error
   */
  public async startDelegation(
    service: string,
    userID: number,
    options: CallOptions = {}
  ): Promise<string> {
    const context = { service, stage: 'startDelegation' };
    if (!isUserID(userID)) {
      throw this.createStandardError(
        'invalid_request',
        'userID must be a 32-bit integer',
        context
      );
    }

    const client = await this.apps.resolveClientConfig(service);
    const pkce = client.quirks.requiresPKCE
      ? await this.guard(context, createPKCEPair)
      : undefined;
    this.checkAborted(options.signal, context);

    const exchange = await this.exchanges.create(
      client.service,
      userID,
      pkce?.codeVerifier ?? null
    );

    this.logger.info('Delegation started', {
      stage: 'startDelegation',
      service: client.service,
      userID,
      pkce: Boolean(pkce),
    });

    return buildAuthorizationURL(client, exchange.id, pkce);
  }

  /**
   * Handle the provider callback
   * @param code - Authorization code from the callback
   * @param exchangeID - The callback's `state` parameter
   * @returns The user the token now belongs to
   * @throws {DelegationError} not_found, service_unsupported, internal_error
   */
  public async completeDelegation(
    code: string,
    exchangeID: string,
    options: CallOptions = {}
  ): Promise<number> {
    return this.tokens.create(code, exchangeID, options);
  }

  /**
   * @throws {DelegationError} not_found, internal_error
   */
  public async fetchToken(userID: number, service: string): Promise<Token> {
    return this.tokens.get(userID, service);
  }

  /**
   * Rotate the token for `(userID, service)`; returns post-rotation values
   * @throws {DelegationError} not_found, service_unsupported, internal_error
   */
  public async refreshToken(
    userID: number,
    service: string,
    options: CallOptions = {}
  ): Promise<Token> {
    return this.tokens.refresh(userID, service, options);
  }

  public async createApp(input: NewApp): Promise<string> {
    return this.apps.create(input);
  }

  public async setAppStatus(id: string, status: string): Promise<App> {
    return this.apps.setStatus(id, status);
  }

  public async resolveAppByService(service: string): Promise<App> {
    return this.apps.resolveByService(service);
  }

  public async resolveAppByID(id: string): Promise<App> {
    return this.apps.resolveByID(id);
  }

  /**
   * Purge abandoned exchanges; meant to be called periodically by the host
   */
  public async cleanupExpiredExchanges(before?: Date): Promise<number> {
    return this.exchanges.cleanupExpired(before);
  }

  /**
   * Refuse the in-memory fallback in production; elsewhere warn and use it.
   * @throws {DelegationError} internal_error in production without storage
   */
  private enforceProductionStorage(
    storage: DelegationStorage | undefined
  ): DelegationStorage {
    if (storage) return storage;

    if (process.env.NODE_ENV === 'production') {
      throw this.createStandardError(
        'internal_error',
        'Persistent storage is required in production; in-memory storage is not allowed',
        { stage: 'initialize' }
      );
    }

    this.logger.warn(
      'No storage provided; using in-memory storage (not for production)',
      { stage: 'initialize' }
    );
    return new MemoryDelegationStorage();
  }
}
