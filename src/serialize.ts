/**
 * JSON shapes rendered at the HTTP boundary
 */

import type { App, AppStatus, Token } from './types.js';

export type SerializedApp = {
  id: string;
  service: string;
  callback_URL: string;
  expiry: string | null;
  created_at: string;
  status: AppStatus;
};

export type SerializedToken = {
  user_id: number;
  service: string;
  token_type: string;
  access_token: string;
  refresh_token: string;
  expiry: string | null;
  created_at: string;
};

/**
 * Public form of an App. The client secret is never included.
 */
export function serializeApp(app: App): SerializedApp {
  return {
    id: app.id,
    service: app.service,
    callback_URL: app.callbackURL,
    expiry: app.expiry ? app.expiry.toISOString() : null,
    created_at: app.createdAt.toISOString(),
    status: app.status,
  };
}

export function serializeToken(token: Token): SerializedToken {
  return {
    user_id: token.userID,
    service: token.service,
    token_type: token.tokenType,
    access_token: token.accessToken,
    refresh_token: token.refreshToken,
    expiry: token.expiry ? token.expiry.toISOString() : null,
    created_at: token.createdAt.toISOString(),
  };
}
