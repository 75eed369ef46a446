/**
 * Exchange Ledger
 * Short-lived, single-use records binding an OAuth `state` to the user and
 * service that started a delegation.
 */

import { BaseModel } from '../base-model.js';
import type { BrokerConfig } from '../config.js';
import type { Logger } from '../logging/types.js';
import type { ExchangeStorage } from '../storage/types.js';
import type { Exchange, ServiceName } from '../types.js';
import { randomString } from '../utils/random.js';

/** Length of the generated exchange id (≈190 bits over [0-9a-zA-Z]) */
export const EXCHANGE_ID_LENGTH = 32;

export class ExchangeLedger extends BaseModel {
  protected readonly component = 'exchange-ledger';

  public constructor(
    private readonly storage: ExchangeStorage,
    config: BrokerConfig,
    logger?: Logger
  ) {
    super(config, logger);
  }

  /**
   * Mint and persist a new exchange
   * @param codeVerifier - PKCE verifier to keep until the callback, if any
   */
  public async create(
    service: ServiceName,
    userID: number,
    codeVerifier: string | null = null
  ): Promise<Exchange> {
    const createdAt = new Date();
    const exchange: Exchange = {
      id: randomString(EXCHANGE_ID_LENGTH),
      service,
      userID,
      codeVerifier,
      createdAt,
      expiresAt: new Date(
        createdAt.getTime() + this.config.exchangeTTLSeconds * 1000
      ),
    };

    await this.guard({ service, stage: 'createExchange' }, () =>
      this.storage.insertExchange(exchange)
    );

    this.logger.debug('Exchange created', {
      stage: 'createExchange',
      service,
      userID,
      expiresAt: exchange.expiresAt.toISOString(),
    });

    return exchange;
  }

  /**
   * Look up an exchange. Expired rows are reported as absent.
   * @throws {DelegationError} not_found
   */
  public async get(id: string): Promise<Exchange> {
    const exchange = await this.guard({ stage: 'getExchange' }, () =>
      this.storage.findExchange(id)
    );

    if (!exchange) {
      throw this.createStandardError('not_found', 'Exchange not found', {
        stage: 'getExchange',
      });
    }

    if (exchange.expiresAt.getTime() <= Date.now()) {
      this.logger.info('Exchange expired', {
        stage: 'getExchange',
        service: exchange.service,
        userID: exchange.userID,
      });
      throw this.createStandardError('not_found', 'Exchange not found', {
        service: exchange.service,
        stage: 'getExchange',
      });
    }

    return exchange;
  }

  /**
   * Remove an exchange; removing an unknown id is a no-op
   */
  public async delete(id: string): Promise<void> {
    await this.guard({ stage: 'deleteExchange' }, () =>
      this.storage.deleteExchange(id)
    );
  }

  /**
   * Purge exchanges that expired before `before`
   * @returns Number of purged exchanges
   */
  public async cleanupExpired(before: Date = new Date()): Promise<number> {
    const removed = await this.guard({ stage: 'cleanupExchanges' }, () =>
      this.storage.deleteExchangesExpiredBefore(before)
    );
    if (removed > 0) {
      this.logger.info('Expired exchanges removed', {
        stage: 'cleanupExchanges',
        removed,
      });
    }
    return removed;
  }
}
