import { expect } from 'chai';
import sinon from 'sinon';
import { validate } from '../config.js';
import {
  createClientConfig,
  providerResponses,
} from '../fixtures/test-data.js';
import {
  createRecordingLogger,
  expectDelegationError,
  formResponse,
  jsonResponse,
  stubFetch,
} from '../testUtils/testHelpers.js';
import { TokenEndpointClient, basicAuthorization } from './token-endpoint.js';

const NOW = Date.UTC(2030, 0, 1);

const googleClient = () =>
  createClientConfig({
    service: 'google',
    clientId: 'google-client',
    scopes: ['https://www.googleapis.com/auth/gmail.addons.current.message.readonly'],
    redirectURL: 'https://broker.example.com/callback/google',
    endpoint: {
      authURL: 'https://accounts.google.com/o/oauth2/auth',
      tokenURL: 'https://oauth2.googleapis.com/token',
    },
    quirks: {
      requiresPKCE: true,
      supportsRefreshTokens: true,
      clientAuthMethod: 'client_secret_post',
    },
  });

describe('TokenEndpointClient', () => {
  let fetchStub: ReturnType<typeof stubFetch>;
  let endpoint: TokenEndpointClient;
  let transport: ReturnType<typeof createRecordingLogger>['transport'];

  beforeEach(() => {
    sinon.useFakeTimers({ now: NOW, toFake: ['Date'] });
    fetchStub = stubFetch();
    const recording = createRecordingLogger({ component: 'token-endpoint' });
    transport = recording.transport;
    endpoint = new TokenEndpointClient(validate({}), recording.logger);
  });

  afterEach(() => {
    sinon.restore();
  });

  const sentRequest = () => {
    const [url, init] = fetchStub.firstCall.args;
    return {
      url: String(url),
      method: init?.method,
      headers: new Headers(init?.headers),
      body: Object.fromEntries(new URLSearchParams(String(init?.body))),
      signal: init?.signal,
    };
  };

  describe('exchangeCode', () => {
    it('posts the code with HTTP Basic client credentials', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.grant));

      await endpoint.exchangeCode(createClientConfig(), 'auth-code', 'verifier-1');

      const request = sentRequest();
      expect(request.url).to.equal('https://oauth.yandex.com/token');
      expect(request.method).to.equal('POST');
      expect(request.headers.get('content-type')).to.equal(
        'application/x-www-form-urlencoded'
      );
      expect(request.headers.get('authorization')).to.equal(
        `Basic ${Buffer.from('abc:test-secret').toString('base64')}`
      );
      expect(request.body).to.deep.equal({
        grant_type: 'authorization_code',
        code: 'auth-code',
        redirect_uri: 'https://broker.example.com/callback/yandex',
        code_verifier: 'verifier-1',
      });
    });

    it('normalizes the grant', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.grant));

      const grant = await endpoint.exchangeCode(createClientConfig(), 'c', null);

      expect(grant).to.deep.equal({
        tokenType: 'bearer',
        accessToken: 'test-access-token',
        refreshToken: 'test-refresh-token',
        expiry: new Date(NOW + 3600 * 1000),
      });
    });

    it('sends client credentials in the body for client_secret_post providers', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.grant));

      await endpoint.exchangeCode(googleClient(), 'auth-code', null);

      const request = sentRequest();
      expect(request.headers.has('authorization')).to.equal(false);
      expect(request.body).to.deep.equal({
        grant_type: 'authorization_code',
        code: 'auth-code',
        redirect_uri: 'https://broker.example.com/callback/google',
        client_id: 'google-client',
        client_secret: 'test-secret',
      });
    });

    it('parses form-encoded answers and defaults the token type', async () => {
      fetchStub.resolves(
        formResponse({
          access_token: 'form-access',
          expires_in: '60',
          x_mailru_vid: '123',
        })
      );

      const grant = await endpoint.exchangeCode(createClientConfig(), 'c', null);

      expect(grant).to.deep.equal({
        tokenType: 'Bearer',
        accessToken: 'form-access',
        refreshToken: '',
        expiry: new Date(NOW + 60 * 1000),
      });
    });

    it('reports a rejected grant as internal_error and logs the provider error', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.invalidGrant, 400));

      await expectDelegationError(
        () => endpoint.exchangeCode(createClientConfig(), 'expired', null),
        'internal_error',
        'Authorization code exchange failed'
      );

      const rejected = transport.logs.find(
        (entry) => entry.message === 'Token endpoint rejected the request'
      );
      expect(rejected).to.deep.equal({
        message: 'Token endpoint rejected the request',
        level: 'Error',
        component: 'token-endpoint',
        service: 'yandex',
        stage: 'exchangeCode',
        status: 400,
        providerError: 'invalid_grant',
      });
    });

    it('rejects answers without an access token', async () => {
      fetchStub.resolves(jsonResponse({ token_type: 'bearer' }));

      await expectDelegationError(
        () => endpoint.exchangeCode(createClientConfig(), 'c', null),
        'internal_error',
        'Invalid response from token endpoint'
      );
    });

    it('rejects bodies that are not JSON', async () => {
      fetchStub.resolves(
        new Response('<html>busy</html>', {
          status: 200,
          headers: { 'Content-Type': 'text/html' },
        })
      );

      await expectDelegationError(
        () => endpoint.exchangeCode(createClientConfig(), 'c', null),
        'internal_error',
        'Invalid response from token endpoint'
      );
    });

    it('hides transport failures behind a generic error', async () => {
      fetchStub.rejects(new TypeError('fetch failed'));

      await expectDelegationError(
        () => endpoint.exchangeCode(createClientConfig(), 'c', null),
        'internal_error',
        'Internal Server Error'
      );

      const unclassified = transport.logs.find(
        (entry) => entry.message === 'Unclassified failure'
      );
      expect(unclassified?.error).to.equal('fetch failed');
    });

    it('passes the caller signal to fetch', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.grant));
      const controller = new AbortController();

      await endpoint.exchangeCode(createClientConfig(), 'c', null, {
        signal: controller.signal,
      });

      expect(sentRequest().signal).to.equal(controller.signal);
    });

    it('combines the caller signal with the configured timeout', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.grant));
      const timed = new TokenEndpointClient(
        validate({ timeouts: { response: 5000 } }),
        createRecordingLogger().logger
      );
      const controller = new AbortController();

      await timed.exchangeCode(createClientConfig(), 'c', null, {
        signal: controller.signal,
      });

      const { signal } = sentRequest();
      expect(signal).to.be.instanceOf(AbortSignal);
      expect(signal).to.not.equal(controller.signal);
      controller.abort();
      expect(signal?.aborted).to.equal(true);
    });
  });

  describe('refreshToken', () => {
    it('posts the refresh grant', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.rotated));

      const grant = await endpoint.refreshToken(
        createClientConfig(),
        'test-refresh-token'
      );

      expect(sentRequest().body).to.deep.equal({
        grant_type: 'refresh_token',
        refresh_token: 'test-refresh-token',
      });
      expect(grant.accessToken).to.equal('rotated-access-token');
      expect(grant.refreshToken).to.equal('rotated-refresh-token');
    });

    it('leaves the refresh token empty when the provider does not rotate', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.accessOnly));

      const grant = await endpoint.refreshToken(createClientConfig(), 'r');

      expect(grant.refreshToken).to.equal('');
    });

    it('reports a failed refresh as internal_error', async () => {
      fetchStub.resolves(jsonResponse(providerResponses.invalidGrant, 401));

      await expectDelegationError(
        () => endpoint.refreshToken(createClientConfig(), 'r'),
        'internal_error',
        'Token refresh failed'
      );
    });
  });
});

describe('basicAuthorization', () => {
  it('form-encodes the credentials before base64', () => {
    expect(basicAuthorization('my client', 'p:w')).to.equal(
      `Basic ${Buffer.from('my+client:p%3Aw').toString('base64')}`
    );
  });
});
