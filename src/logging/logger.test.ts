import { expect } from 'chai';
import {
  DefaultLogger,
  DELEGATION_REDACTION_PATHS,
  parseLogLevel,
} from './logger.js';
import { LogDestination, LogLevel } from './types.js';
import { MockTransport } from '../testUtils/logTransports.js';

describe('LogLevel', () => {
  it('orders levels from least to most verbose', () => {
    expect([
      LogLevel.Silent,
      LogLevel.Fatal,
      LogLevel.Error,
      LogLevel.Warn,
      LogLevel.Info,
      LogLevel.Debug,
      LogLevel.Trace,
    ]).to.deep.equal([0, 1, 2, 3, 4, 5, 6]);
  });
});

describe('parseLogLevel', () => {
  it('matches level names regardless of case', () => {
    expect(parseLogLevel('debug')).to.equal(LogLevel.Debug);
    expect(parseLogLevel('WARN')).to.equal(LogLevel.Warn);
    expect(parseLogLevel(' Silent ')).to.equal(LogLevel.Silent);
  });

  it('returns undefined for unknown or missing names', () => {
    expect(parseLogLevel('verbose')).to.be.undefined;
    expect(parseLogLevel('')).to.be.undefined;
    expect(parseLogLevel(undefined)).to.be.undefined;
  });
});

describe('DefaultLogger', () => {
  it('defaults to Info, StdOut and no redaction', () => {
    const logger = new DefaultLogger({});
    expect(logger.level).to.equal(LogLevel.Info);
    expect(logger.destination).to.equal(LogDestination.StdOut);
    expect(logger.redactPaths).to.deep.equal([]);
  });

  describe('with mock transport', () => {
    let transport: MockTransport;

    beforeEach(() => {
      transport = new MockTransport();
    });

    it('writes the message, level, context and meta as one object', () => {
      const logger = new DefaultLogger(
        { component: 'token-store' },
        { level: LogLevel.Info },
        transport
      );

      logger.info('Token stored', { service: 'yandex', userID: 42 });

      expect(transport.logs).to.deep.equal([
        {
          message: 'Token stored',
          level: 'Info',
          component: 'token-store',
          service: 'yandex',
          userID: 42,
        },
      ]);
    });

    it('redacts credentials with the broker paths', () => {
      const logger = new DefaultLogger(
        { component: 'app-directory' },
        { level: LogLevel.Info, redactPaths: DELEGATION_REDACTION_PATHS },
        transport
      );

      logger.info('Debugging credentials', {
        password: 'test-secret',
        code: 'auth-code',
        app: { id: 'abc', password: 'test-secret' },
      });

      expect(transport.logs[0]).to.deep.equal({
        message: 'Debugging credentials',
        level: 'Info',
        component: 'app-directory',
        password: '[redacted]',
        code: '[redacted]',
        app: { id: 'abc', password: '[redacted]' },
      });
    });

    it('redacts bound context', () => {
      const logger = new DefaultLogger(
        { component: 'token-endpoint', clientSecret: 'test-secret' },
        { level: LogLevel.Info, redactPaths: ['clientSecret'] },
        transport
      );

      logger.warn('Provider slow');

      expect(transport.logs[0]).to.deep.equal({
        message: 'Provider slow',
        level: 'Warn',
        component: 'token-endpoint',
        clientSecret: '[redacted]',
      });
    });

    it('logs nothing at Silent', () => {
      const logger = new DefaultLogger({}, { level: LogLevel.Silent }, transport);

      logger.fatal('Fatal');
      logger.error('Error');
      logger.info('Info');

      expect(transport.logs).to.have.length(0);
    });

    it('drops messages more verbose than its level', () => {
      const logger = new DefaultLogger({}, { level: LogLevel.Warn }, transport);

      logger.fatal('Fatal');
      logger.error('Error');
      logger.warn('Warn');
      logger.info('Info');
      logger.debug('Debug');
      logger.trace('Trace');

      expect(transport.logs.map((entry) => entry.level)).to.deep.equal([
        'Fatal',
        'Error',
        'Warn',
      ]);
    });

    it('writes every level at Trace', () => {
      const logger = new DefaultLogger({}, { level: LogLevel.Trace }, transport);

      logger.fatal('Fatal');
      logger.error('Error');
      logger.warn('Warn');
      logger.info('Info');
      logger.debug('Debug');
      logger.trace('Trace');

      expect(transport.logs.map((entry) => entry.level)).to.deep.equal([
        'Fatal',
        'Error',
        'Warn',
        'Info',
        'Debug',
        'Trace',
      ]);
    });

    it('carries settings and context into child loggers', () => {
      const parent = new DefaultLogger(
        { component: 'delegation-broker' },
        {
          level: LogLevel.Debug,
          redactPaths: ['refreshToken'],
          destination: LogDestination.StdErr,
        },
        transport
      );

      const child = parent.child({ stage: 'refreshToken', refreshToken: 'r' });
      child.debug('Refreshing', { userID: 7 });

      expect(transport.logs).to.have.length(0);
      expect(transport.errors).to.deep.equal([
        {
          message: 'Refreshing',
          level: 'Debug',
          component: 'delegation-broker',
          stage: 'refreshToken',
          refreshToken: '[redacted]',
          userID: 7,
        },
      ]);
      expect(child.level).to.equal(LogLevel.Debug);
      expect(child).to.be.instanceOf(DefaultLogger);
    });
  });
});
