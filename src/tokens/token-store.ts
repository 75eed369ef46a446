/**
 * Token Store
 * Delegated token material per `(userID, service)`: creation through the
 * authorization-code grant and rotation through the refresh grant.
 */

import type { AppDirectory } from '../apps/app-directory.js';
import { BaseModel } from '../base-model.js';
import type { BrokerConfig } from '../config.js';
import type { ExchangeLedger } from '../exchanges/exchange-ledger.js';
import type { Logger } from '../logging/types.js';
import type { TokenEndpointClient } from '../oauth/token-endpoint.js';
import type { TokenStorage } from '../storage/types.js';
import type { CallOptions, Token } from '../types.js';
import { ErrorNormalizer } from '../utils/error-normalizer.js';

export type TokenStoreDependencies = {
  storage: TokenStorage;
  exchanges: ExchangeLedger;
  apps: AppDirectory;
  endpoint: TokenEndpointClient;
};

export class TokenStore extends BaseModel {
  protected readonly component = 'token-store';

  private readonly storage: TokenStorage;
  private readonly exchanges: ExchangeLedger;
  private readonly apps: AppDirectory;
  private readonly endpoint: TokenEndpointClient;

  public constructor(
    deps: TokenStoreDependencies,
    config: BrokerConfig,
    logger?: Logger
  ) {
    super(config, logger);
    this.storage = deps.storage;
    this.exchanges = deps.exchanges;
    this.apps = deps.apps;
    this.endpoint = deps.endpoint;
  }

  /**
   * @throws {DelegationError} not_found, internal_error
   */
  public async get(userID: number, service: string): Promise<Token> {
    const token = await this.guard({ service, stage: 'getToken' }, () =>
      this.storage.findToken(userID, service)
    );
    if (!token) {
      throw this.createStandardError('not_found', 'Token not found', {
        service,
        stage: 'getToken',
      });
    }
    return token;
  }

  /**
   * Complete a delegation: consume the exchange named by `exchangeID`,
   * trade `code` for token material and upsert it for the exchange's user.
   *
   * The exchange is deleted once the grant succeeds, before the token is
   * written; a failed deletion is logged and ignored. A failed grant leaves
   * the exchange in place. The signal is honoured up to the provider call.
   *
   * @returns The user the token was stored for
   * @throws {DelegationError} not_found, service_unsupported, internal_error
   */
  public async create(
    code: string,
    exchangeID: string,
    options: CallOptions = {}
  ): Promise<number> {
    const exchange = await this.exchanges.get(exchangeID);
    const client = await this.apps.resolveClientConfig(exchange.service);
    const context = { service: exchange.service, stage: 'createToken' };
    this.checkAborted(options.signal, context);

    const grant = await this.endpoint.exchangeCode(
      client,
      code,
      exchange.codeVerifier,
      options
    );

    // The provider has consumed the code; from here the grant is kept even
    // if the signal fires.
    try {
      await this.exchanges.delete(exchange.id);
    } catch (e) {
      this.logger.warn('Exchange cleanup failed after grant', {
        ...context,
        error: ErrorNormalizer.describe(e),
      });
    }

    const token: Token = {
      userID: exchange.userID,
      service: exchange.service,
      tokenType: grant.tokenType,
      accessToken: grant.accessToken,
      refreshToken: grant.refreshToken,
      expiry: grant.expiry,
      createdAt: new Date(),
    };

    await this.guard(context, () => this.storage.upsertToken(token));

    this.logger.info('Token stored', {
      ...context,
      userID: token.userID,
      hasRefreshToken: token.refreshToken.length > 0,
    });

    return exchange.userID;
  }

  /**
   * Rotate the stored token for `(userID, service)` and return the
   * post-rotation values.
   *
   * A token that is still valid is returned as is, without a provider call.
   * The write is a compare-and-set on the refresh token read at the start;
   * when a concurrent refresh got there first, its row is returned instead
   * of being overwritten.
   *
   * @throws {DelegationError} not_found, service_unsupported, internal_error
   */
  public async refresh(
    userID: number,
    service: string,
    options: CallOptions = {}
  ): Promise<Token> {
    const current = await this.get(userID, service);
    const client = await this.apps.resolveClientConfig(current.service);
    const context = { service: current.service, stage: 'refreshToken' };

    if (this.isStillValid(current)) {
      this.logger.debug('Stored token still valid; refresh skipped', {
        ...context,
        userID,
      });
      return current;
    }

    if (!client.quirks.supportsRefreshTokens) {
      throw this.createStandardError(
        'internal_error',
        'Token expired and the provider does not issue refresh tokens',
        context
      );
    }
    if (!current.refreshToken) {
      throw this.createStandardError(
        'internal_error',
        'Token expired and no refresh token is available',
        context
      );
    }
    this.checkAborted(options.signal, context);

    const grant = await this.endpoint.refreshToken(
      client,
      current.refreshToken,
      options
    );

    const next: Token = {
      userID: current.userID,
      service: current.service,
      tokenType: grant.tokenType,
      accessToken: grant.accessToken,
      // Providers that do not rotate keep the refresh token already held
      refreshToken: grant.refreshToken || current.refreshToken,
      expiry: grant.expiry,
      createdAt: new Date(),
    };

    const written = await this.guard(context, () =>
      this.storage.replaceTokenIfCurrent(next, current.refreshToken)
    );

    if (written) {
      this.logger.info('Token rotated', {
        ...context,
        userID,
        rotatedRefreshToken: next.refreshToken !== current.refreshToken,
      });
      return next;
    }

    this.logger.warn('Concurrent refresh won; returning stored token', {
      ...context,
      userID,
    });
    return this.get(userID, current.service);
  }

  private isStillValid(token: Token): boolean {
    if (token.expiry === null) return true;
    const leewayMs = this.config.tokenExpiryLeewaySeconds * 1000;
    return token.expiry.getTime() - leewayMs > Date.now();
  }
}
