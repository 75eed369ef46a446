/**
 * Storage contracts for the delegation core
 */

import type { App, AppStatus, Exchange, Token } from '../types.js';

/**
 * Persistence for registered client applications
 */
export interface AppStorage {
  /** Exact lookup, any status */
  findAppByID(id: string): Promise<App | null>;

  /** Lookup restricted to apps whose status is `enable` */
  findEnabledAppByService(service: string): Promise<App | null>;

  /**
   * Insert a new app
   * @throws {UniqueViolationError} when the id is already taken
   */
  insertApp(app: App): Promise<void>;

  /**
   * Set the status of an app
   * @returns The updated app, or null when no app has that id
   */
  updateAppStatus(id: string, status: AppStatus): Promise<App | null>;
}

/**
 * Persistence for single-use exchange correlation records
 */
export interface ExchangeStorage {
  insertExchange(exchange: Exchange): Promise<void>;

  findExchange(id: string): Promise<Exchange | null>;

  /** Removing an id that does not exist is a no-op */
  deleteExchange(id: string): Promise<void>;

  /**
   * Remove exchanges that expired before the given instant
   * @returns Number of removed rows
   */
  deleteExchangesExpiredBefore(before: Date): Promise<number>;
}

/**
 * Persistence for delegated tokens keyed by `(userID, service)`
 */
export interface TokenStorage {
  findToken(userID: number, service: string): Promise<Token | null>;

  /** Insert, or overwrite every field of the row with the same key */
  upsertToken(token: Token): Promise<void>;

  /**
   * Replace the token material only if the stored refresh token still equals
   * `expectedRefreshToken`
   * @returns Whether the row was written
   */
  replaceTokenIfCurrent(
    token: Token,
    expectedRefreshToken: string
  ): Promise<boolean>;
}

export type DelegationStorage = AppStorage & ExchangeStorage & TokenStorage;

/**
 * Raised by storage backends when a primary key or unique constraint rejects a write
 */
export class UniqueViolationError extends Error {
  constructor(
    public readonly table: string,
    public readonly key: string
  ) {
    super(`Duplicate key "${key}" in ${table}`);
    this.name = 'UniqueViolationError';
  }
}
