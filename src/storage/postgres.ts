/**
 * PostgreSQL backend for the delegation core.
 * Every statement is parameterized; rows are validated on the way out.
 */

import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { APP_STATUSES, SERVICE_NAMES } from '../types.js';
import type { App, AppStatus, Exchange, Token } from '../types.js';
import { UniqueViolationError, type DelegationStorage } from './types.js';

const UNIQUE_VIOLATION = '23505';

export const SCHEMA_FILE = fileURLToPath(
  new URL('../../sql/schema.sql', import.meta.url)
);

/**
 * The subset of `pg.Pool` / `pg.Client` this backend relies on
 */
export interface Queryable {
  query(
    text: string,
    values?: unknown[]
  ): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

const AppRow = z.object({
  id: z.string(),
  service: z.string(),
  password: z.string(),
  callback_url: z.string(),
  expiry: z.date().nullable(),
  created_at: z.date(),
  status: z.enum(APP_STATUSES),
});

const ExchangeRow = z.object({
  id: z.string(),
  service: z.enum(SERVICE_NAMES),
  user_id: z.number().int(),
  code_verifier: z.string().nullable(),
  created_at: z.date(),
  expires_at: z.date(),
});

const TokenRow = z.object({
  user_id: z.number().int(),
  service: z.enum(SERVICE_NAMES),
  token_type: z.string(),
  access_token: z.string(),
  refresh_token: z.string(),
  expiry: z.date().nullable(),
  created_at: z.date(),
});

const APP_COLUMNS =
  'id, service, password, callback_url, expiry, created_at, status';
const EXCHANGE_COLUMNS =
  'id, service, user_id, code_verifier, created_at, expires_at';
const TOKEN_COLUMNS =
  'user_id, service, token_type, access_token, refresh_token, expiry, created_at';

function toApp(row: unknown): App {
  const r = AppRow.parse(row);
  return {
    id: r.id,
    service: r.service,
    password: r.password,
    callbackURL: r.callback_url,
    expiry: r.expiry,
    createdAt: r.created_at,
    status: r.status,
  };
}

function toExchange(row: unknown): Exchange {
  const r = ExchangeRow.parse(row);
  return {
    id: r.id,
    service: r.service,
    userID: r.user_id,
    codeVerifier: r.code_verifier,
    createdAt: r.created_at,
    expiresAt: r.expires_at,
  };
}

function toToken(row: unknown): Token {
  const r = TokenRow.parse(row);
  return {
    userID: r.user_id,
    service: r.service,
    tokenType: r.token_type,
    accessToken: r.access_token,
    refreshToken: r.refresh_token,
    expiry: r.expiry,
    createdAt: r.created_at,
  };
}

function isUniqueViolation(e: unknown): boolean {
  return (
    e !== null &&
    typeof e === 'object' &&
    'code' in e &&
    e.code === UNIQUE_VIOLATION
  );
}

export class PostgresDelegationStorage implements DelegationStorage {
  constructor(private readonly db: Queryable) {}

  /**
   * Apply sql/schema.sql. Statements are idempotent.
   */
  async migrate(): Promise<void> {
    const ddl = await readFile(SCHEMA_FILE, 'utf8');
    await this.db.query(ddl);
  }

  async findAppByID(id: string): Promise<App | null> {
    const { rows } = await this.db.query(
      `SELECT ${APP_COLUMNS} FROM auth.apps WHERE id = $1`,
      [id]
    );
    return rows.length > 0 ? toApp(rows[0]) : null;
  }

  async findEnabledAppByService(service: string): Promise<App | null> {
    const { rows } = await this.db.query(
      `SELECT ${APP_COLUMNS} FROM auth.apps
       WHERE service = $1 AND status = $2
       ORDER BY created_at DESC
       LIMIT 1`,
      [service, 'enable']
    );
    return rows.length > 0 ? toApp(rows[0]) : null;
  }

  async insertApp(app: App): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO auth.apps (${APP_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6, $7)`,
        [
          app.id,
          app.service,
          app.password,
          app.callbackURL,
          app.expiry,
          app.createdAt,
          app.status,
        ]
      );
    } catch (e) {
      if (isUniqueViolation(e)) {
        throw new UniqueViolationError('apps', app.id);
      }
      throw e;
    }
  }

  async updateAppStatus(id: string, status: AppStatus): Promise<App | null> {
    const { rows } = await this.db.query(
      `UPDATE auth.apps SET status = $2 WHERE id = $1
       RETURNING ${APP_COLUMNS}`,
      [id, status]
    );
    return rows.length > 0 ? toApp(rows[0]) : null;
  }

  async insertExchange(exchange: Exchange): Promise<void> {
    try {
      await this.db.query(
        `INSERT INTO auth.exchanges (${EXCHANGE_COLUMNS})
         VALUES ($1, $2, $3, $4, $5, $6)`,
        [
          exchange.id,
          exchange.service,
          exchange.userID,
          exchange.codeVerifier,
          exchange.createdAt,
          exchange.expiresAt,
        ]
      );
    } catch (e) {
      if (isUniqueViolation(e)) {
        throw new UniqueViolationError('exchanges', exchange.id);
      }
      throw e;
    }
  }

  async findExchange(id: string): Promise<Exchange | null> {
    const { rows } = await this.db.query(
      `SELECT ${EXCHANGE_COLUMNS} FROM auth.exchanges WHERE id = $1`,
      [id]
    );
    return rows.length > 0 ? toExchange(rows[0]) : null;
  }

  async deleteExchange(id: string): Promise<void> {
    await this.db.query('DELETE FROM auth.exchanges WHERE id = $1', [id]);
  }

  async deleteExchangesExpiredBefore(before: Date): Promise<number> {
    const { rowCount } = await this.db.query(
      'DELETE FROM auth.exchanges WHERE expires_at < $1',
      [before]
    );
    return rowCount ?? 0;
  }

  async findToken(userID: number, service: string): Promise<Token | null> {
    const { rows } = await this.db.query(
      `SELECT ${TOKEN_COLUMNS} FROM auth.tokens
       WHERE user_id = $1 AND service = $2`,
      [userID, service]
    );
    return rows.length > 0 ? toToken(rows[0]) : null;
  }

  async upsertToken(token: Token): Promise<void> {
    await this.db.query(
      `INSERT INTO auth.tokens (${TOKEN_COLUMNS})
       VALUES ($1, $2, $3, $4, $5, $6, $7)
       ON CONFLICT (user_id, service) DO UPDATE
       SET token_type = excluded.token_type,
           access_token = excluded.access_token,
           refresh_token = excluded.refresh_token,
           expiry = excluded.expiry,
           created_at = excluded.created_at`,
      [
        token.userID,
        token.service,
        token.tokenType,
        token.accessToken,
        token.refreshToken,
        token.expiry,
        token.createdAt,
      ]
    );
  }

  async replaceTokenIfCurrent(
    token: Token,
    expectedRefreshToken: string
  ): Promise<boolean> {
    const { rowCount } = await this.db.query(
      `UPDATE auth.tokens
       SET token_type = $3,
           access_token = $4,
           refresh_token = $5,
           expiry = $6,
           created_at = $7
       WHERE user_id = $1 AND service = $2 AND refresh_token = $8`,
      [
        token.userID,
        token.service,
        token.tokenType,
        token.accessToken,
        token.refreshToken,
        token.expiry,
        token.createdAt,
        expectedRefreshToken,
      ]
    );
    return rowCount === 1;
  }
}
