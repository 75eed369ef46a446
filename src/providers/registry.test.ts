import { expect } from 'chai';
import { SERVICE_NAMES } from '../types.js';
import { getProvider, isServiceName } from './registry.js';

describe('Provider Registry', () => {
  it('has an entry for every service name', () => {
    for (const service of SERVICE_NAMES) {
      expect(getProvider(service).service).to.equal(service);
    }
  });

  it('describes yandex with its endpoints, scope and quirks', () => {
    expect(getProvider('yandex')).to.deep.equal({
      service: 'yandex',
      endpoint: {
        authURL: 'https://oauth.yandex.com/authorize',
        tokenURL: 'https://oauth.yandex.com/token',
      },
      scopes: ['mail:imap_ro'],
      quirks: {
        requiresPKCE: true,
        supportsRefreshTokens: true,
        clientAuthMethod: 'client_secret_basic',
      },
    });
  });

  it('uses the VK access_token endpoint and sends credentials in the body', () => {
    const vk = getProvider('vk');
    expect(vk.endpoint.tokenURL).to.equal('https://oauth.vk.com/access_token');
    expect(vk.quirks.clientAuthMethod).to.equal('client_secret_post');
    expect(vk.quirks.requiresPKCE).to.equal(false);
  });

  it('recognizes only registry keys as service names', () => {
    expect(isServiceName('google')).to.equal(true);
    expect(isServiceName('github')).to.equal(false);
    expect(isServiceName('toString')).to.equal(false);
    expect(isServiceName(3)).to.equal(false);
  });

  it('throws service_unsupported for unknown services', () => {
    let thrown: unknown;
    try {
      getProvider('github');
    } catch (e) {
      thrown = e;
    }

    expect(thrown).to.deep.equal({
      statusCode: 400,
      error: 'service_unsupported',
      error_description: 'Service "github" is not supported',
      service: 'github',
      stage: 'resolveProvider',
    });
  });
});
