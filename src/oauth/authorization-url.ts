import * as openidClient from 'openid-client';
import type { ClientConfig } from '../types.js';

export type PKCEPair = {
  codeVerifier: string;
  codeChallenge: string;
  codeChallengeMethod: 'S256';
};

/**
 * Generate a PKCE verifier and its S256 challenge
 */
export async function createPKCEPair(): Promise<PKCEPair> {
  const codeVerifier = openidClient.randomPKCECodeVerifier();
  const codeChallenge =
    await openidClient.calculatePKCECodeChallenge(codeVerifier);
  return { codeVerifier, codeChallenge, codeChallengeMethod: 'S256' };
}

/**
 * Build the provider authorization URL that starts the consent flow.
 * `state` carries the exchange id back to the callback.
 */
export function buildAuthorizationURL(
  config: ClientConfig,
  state: string,
  pkce?: Pick<PKCEPair, 'codeChallenge' | 'codeChallengeMethod'>
): string {
  const url = new URL(config.endpoint.authURL);
  const params: Record<string, string> = {
    response_type: 'code',
    client_id: config.clientId,
    redirect_uri: config.redirectURL,
    state,
  };

  if (config.scopes.length > 0) {
    params.scope = config.scopes.join(' ');
  }

  if (pkce) {
    params.code_challenge = pkce.codeChallenge;
    params.code_challenge_method = pkce.codeChallengeMethod;
  }

  for (const [key, value] of Object.entries(params)) {
    url.searchParams.set(key, value);
  }

  return url.toString();
}
