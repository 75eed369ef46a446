/**
 * Token endpoint calls: authorization-code grant and refresh grant
 */

import { BaseModel } from '../base-model.js';
import type { BrokerConfig } from '../config.js';
import type { Logger } from '../logging/types.js';
import type { CallOptions, ClientConfig, TokenGrant } from '../types.js';
import { RawTokenResponseSchema, expiryFrom } from './utils.js';

const FORM_CONTENT_TYPES = ['application/x-www-form-urlencoded', 'text/plain'];

const DEFAULT_TOKEN_TYPE = 'Bearer';

type GrantStage = 'exchangeCode' | 'refreshToken';

/**
 * Performs provider token-endpoint round trips. No retries: a failed call is
 * reported once as internal_error and the caller decides what to do.
 */
export class TokenEndpointClient extends BaseModel {
  protected readonly component = 'token-endpoint';

  public constructor(config: BrokerConfig, logger?: Logger) {
    super(config, logger);
  }

  /**
   * Exchange an authorization code for token material
   * @param codeVerifier - PKCE verifier stored with the exchange, if any
   */
  public async exchangeCode(
    client: ClientConfig,
    code: string,
    codeVerifier: string | null,
    options: CallOptions = {}
  ): Promise<TokenGrant> {
    const params = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: client.redirectURL,
    });
    if (codeVerifier) {
      params.set('code_verifier', codeVerifier);
    }
    return this.request(client, params, 'exchangeCode', options);
  }

  /**
   * Obtain new token material with a refresh token
   */
  public async refreshToken(
    client: ClientConfig,
    refreshToken: string,
    options: CallOptions = {}
  ): Promise<TokenGrant> {
    const params = new URLSearchParams({
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
    return this.request(client, params, 'refreshToken', options);
  }

  private async request(
    client: ClientConfig,
    params: URLSearchParams,
    stage: GrantStage,
    options: CallOptions
  ): Promise<TokenGrant> {
    const context = { service: client.service, stage };
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };

    if (client.quirks.clientAuthMethod === 'client_secret_basic') {
      headers.Authorization = basicAuthorization(
        client.clientId,
        client.clientSecret
      );
    } else {
      params.set('client_id', client.clientId);
      params.set('client_secret', client.clientSecret);
    }

    this.logger.info('Calling token endpoint', {
      ...context,
      endpoint: client.endpoint.tokenURL,
    });

    try {
      const response = await fetch(client.endpoint.tokenURL, {
        method: 'POST',
        headers,
        body: params.toString(),
        signal: this.signalFor(options.signal),
      });

      const body = await this.parseBody(response);

      if (!response.ok) {
        this.logger.error('Token endpoint rejected the request', {
          ...context,
          status: response.status,
          providerError: typeof body?.error === 'string' ? body.error : undefined,
        });
        throw this.createStandardError(
          'internal_error',
          stage === 'exchangeCode'
            ? 'Authorization code exchange failed'
            : 'Token refresh failed',
          context
        );
      }

      const parsed = RawTokenResponseSchema.safeParse(body ?? {});
      if (!parsed.success) {
        this.logger.error('Token endpoint returned an unusable response', {
          ...context,
          issues: parsed.error.issues.map((issue) => issue.message),
        });
        throw this.createStandardError(
          'internal_error',
          'Invalid response from token endpoint',
          context
        );
      }

      const raw = parsed.data;
      const grant: TokenGrant = {
        tokenType: raw.token_type || DEFAULT_TOKEN_TYPE,
        accessToken: raw.access_token,
        refreshToken: raw.refresh_token ?? '',
        expiry: expiryFrom(raw.expires_in),
      };

      this.logger.info('Token endpoint call succeeded', {
        ...context,
        hasRefreshToken: grant.refreshToken.length > 0,
        expiresIn: raw.expires_in,
      });

      return grant;
    } catch (error) {
      throw this.normalizeError(error, context);
    }
  }

  /**
   * Decode a JSON or form-encoded body. Returns undefined when the body
   * cannot be decoded.
   */
  private async parseBody(
    response: Response
  ): Promise<Record<string, unknown> | undefined> {
    const contentType = response.headers.get('content-type') ?? '';
    const text = await response.text();

    if (FORM_CONTENT_TYPES.some((type) => contentType.includes(type))) {
      return Object.fromEntries(new URLSearchParams(text));
    }

    try {
      const data: unknown = JSON.parse(text);
      return data !== null && typeof data === 'object' && !Array.isArray(data)
        ? Object.fromEntries(Object.entries(data))
        : undefined;
    } catch {
      return undefined;
    }
  }

  private signalFor(signal: AbortSignal | undefined): AbortSignal | undefined {
    const timeout = this.config.timeouts.response;
    if (timeout === undefined) return signal;
    const timer = AbortSignal.timeout(timeout);
    return signal ? AbortSignal.any([signal, timer]) : timer;
  }
}

/**
 * RFC 6749 §2.3.1: credentials are form-encoded before base64
 */
export function basicAuthorization(clientId: string, secret: string): string {
  const encode = (value: string) =>
    encodeURIComponent(value).replace(/%20/g, '+');
  const credentials = `${encode(clientId)}:${encode(secret)}`;
  return `Basic ${Buffer.from(credentials).toString('base64')}`;
}
