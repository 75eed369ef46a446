import type { App, AppStatus, Exchange, Token } from '../types.js';
import { UniqueViolationError, type DelegationStorage } from './types.js';

const tokenKey = (userID: number, service: string) => `${userID}:${service}`;

/**
 * In-process storage backend.
 * Suitable for development and tests; state is lost with the process.
 */
export class MemoryDelegationStorage implements DelegationStorage {
  private apps = new Map<string, App>();
  private exchanges = new Map<string, Exchange>();
  private tokens = new Map<string, Token>();

  async findAppByID(id: string): Promise<App | null> {
    const app = this.apps.get(id);
    return app ? { ...app } : null;
  }

  async findEnabledAppByService(service: string): Promise<App | null> {
    let newest: App | null = null;
    for (const app of this.apps.values()) {
      if (app.service !== service || app.status !== 'enable') continue;
      if (!newest || app.createdAt.getTime() > newest.createdAt.getTime()) {
        newest = app;
      }
    }
    return newest ? { ...newest } : null;
  }

  async insertApp(app: App): Promise<void> {
    if (this.apps.has(app.id)) {
      throw new UniqueViolationError('apps', app.id);
    }
    this.apps.set(app.id, { ...app });
  }

  async updateAppStatus(id: string, status: AppStatus): Promise<App | null> {
    const app = this.apps.get(id);
    if (!app) return null;
    app.status = status;
    return { ...app };
  }

  async insertExchange(exchange: Exchange): Promise<void> {
    if (this.exchanges.has(exchange.id)) {
      throw new UniqueViolationError('exchanges', exchange.id);
    }
    this.exchanges.set(exchange.id, { ...exchange });
  }

  async findExchange(id: string): Promise<Exchange | null> {
    const exchange = this.exchanges.get(id);
    return exchange ? { ...exchange } : null;
  }

  async deleteExchange(id: string): Promise<void> {
    this.exchanges.delete(id);
  }

  async deleteExchangesExpiredBefore(before: Date): Promise<number> {
    let removed = 0;
    for (const [id, exchange] of this.exchanges.entries()) {
      if (exchange.expiresAt.getTime() < before.getTime()) {
        this.exchanges.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async findToken(userID: number, service: string): Promise<Token | null> {
    const token = this.tokens.get(tokenKey(userID, service));
    return token ? { ...token } : null;
  }

  async upsertToken(token: Token): Promise<void> {
    this.tokens.set(tokenKey(token.userID, token.service), { ...token });
  }

  async replaceTokenIfCurrent(
    token: Token,
    expectedRefreshToken: string
  ): Promise<boolean> {
    const key = tokenKey(token.userID, token.service);
    const current = this.tokens.get(key);
    if (!current || current.refreshToken !== expectedRefreshToken) {
      return false;
    }
    this.tokens.set(key, { ...token });
    return true;
  }
}
