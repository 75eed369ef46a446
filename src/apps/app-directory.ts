/**
 * App Directory
 * Registered client applications and resolution of a runnable client
 * configuration per service.
 */

import { BaseModel } from '../base-model.js';
import type { BrokerConfig } from '../config.js';
import type { Logger } from '../logging/types.js';
import { getProvider } from '../providers/registry.js';
import { UniqueViolationError, type AppStorage } from '../storage/types.js';
import type { App, ClientConfig, NewApp } from '../types.js';
import { AppStatusSchema, NewAppSchema, describeIssues } from './schema.js';

export class AppDirectory extends BaseModel {
  protected readonly component = 'app-directory';

  public constructor(
    private readonly storage: AppStorage,
    config: BrokerConfig,
    logger?: Logger
  ) {
    super(config, logger);
  }

  /**
   * Exact lookup by client id, regardless of status
   * @throws {DelegationError} not_found
   */
  public async resolveByID(id: string): Promise<App> {
    const app = await this.guard({ stage: 'resolveByID' }, () =>
      this.storage.findAppByID(id)
    );
    if (!app) {
      throw this.createStandardError('not_found', 'App not found', {
        stage: 'resolveByID',
      });
    }
    return app;
  }

  /**
   * The enabled app currently serving a service
   * @throws {DelegationError} not_found
   */
  public async resolveByService(service: string): Promise<App> {
    const app = await this.guard({ service, stage: 'resolveByService' }, () =>
      this.storage.findEnabledAppByService(service)
    );
    if (!app) {
      throw this.createStandardError('not_found', 'App not found', {
        service,
        stage: 'resolveByService',
      });
    }
    return app;
  }

  /**
   * Join the enabled app for a service with its registry entry.
   * @throws {DelegationError} not_found when no enabled app exists,
   *   service_unsupported when the app's service has no registry entry
   */
  public async resolveClientConfig(service: string): Promise<ClientConfig> {
    const app = await this.resolveByService(service);
    const provider = getProvider(app.service);

    return {
      service: provider.service,
      clientId: app.id,
      clientSecret: app.password,
      scopes: [...provider.scopes],
      redirectURL: app.callbackURL,
      endpoint: { ...provider.endpoint },
      quirks: { ...provider.quirks },
    };
  }

  /**
   * Register a new app
   * @returns The app id
   * @throws {DelegationError} invalid_request, already_exists, internal_error
   */
  public async create(input: NewApp): Promise<string> {
    const parsed = NewAppSchema.safeParse(input);
    if (!parsed.success) {
      const issues = describeIssues(parsed.error);
      this.logger.warn('Rejected app registration', { stage: 'create', issues });
      throw this.createStandardError(
        'invalid_request',
        Object.entries(issues)
          .map(([field, message]) => `${field}: ${message}`)
          .join('; '),
        { stage: 'create' }
      );
    }

    const app: App = {
      id: parsed.data.id,
      service: parsed.data.service,
      password: parsed.data.password,
      callbackURL: parsed.data.callbackURL,
      expiry: parsed.data.expiry ?? null,
      createdAt: new Date(),
      status: parsed.data.status,
    };

    try {
      await this.storage.insertApp(app);
    } catch (e) {
      if (e instanceof UniqueViolationError) {
        throw this.createStandardError('already_exists', 'App already exists', {
          service: app.service,
          stage: 'create',
        });
      }
      throw this.normalizeError(e, { service: app.service, stage: 'create' });
    }

    this.logger.info('App registered', {
      stage: 'create',
      appId: app.id,
      service: app.service,
      status: app.status,
    });

    return app.id;
  }

  /**
   * Enable or disable an app. The status is checked before storage is touched.
   * @throws {DelegationError} invalid_status, not_found, internal_error
   */
  public async setStatus(id: string, status: string): Promise<App> {
    const parsed = AppStatusSchema.safeParse(status);
    if (!parsed.success) {
      throw this.createStandardError(
        'invalid_status',
        `Status must be one of: ${AppStatusSchema.options.join(', ')}`,
        { stage: 'setStatus' }
      );
    }

    const app = await this.guard({ stage: 'setStatus' }, () =>
      this.storage.updateAppStatus(id, parsed.data)
    );
    if (!app) {
      throw this.createStandardError('not_found', 'App not found', {
        stage: 'setStatus',
      });
    }

    this.logger.info('App status changed', {
      stage: 'setStatus',
      appId: app.id,
      service: app.service,
      status: app.status,
    });

    return app;
  }
}
