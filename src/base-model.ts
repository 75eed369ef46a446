import type { DelegationError, DelegationErrorCode } from './types.js';
import type { BrokerConfig } from './config.js';
import {
  ErrorNormalizer,
  createDelegationError,
  isDelegationError,
  type ErrorContext,
} from './utils/error-normalizer.js';
import type { Logger } from './logging/types.js';
import {
  DefaultLogger,
  DELEGATION_REDACTION_PATHS,
} from './logging/logger.js';

/**
 * Shared plumbing for the model-layer components: validated configuration,
 * a lazily created logger and the error helpers every operation funnels through.
 */
export abstract class BaseModel {
  /**
   * Component name bound into every log line
   */
  protected abstract readonly component: string;

  private loggerImpl?: Logger;

  protected constructor(
    protected readonly config: BrokerConfig,
    logger?: Logger
  ) {
    this.loggerImpl = logger;
  }

  public get logger(): Logger {
    if (!this.loggerImpl) {
      this.loggerImpl = new DefaultLogger(
        { component: this.component },
        {
          level: this.config.logLevel,
          redactPaths: DELEGATION_REDACTION_PATHS,
        }
      );
    }
    return this.loggerImpl;
  }

  /**
   * Collapse an unknown failure into the broker taxonomy. Unclassified
   * failures are logged with their original message before being replaced
   * by a generic internal_error.
   */
  protected normalizeError(e: unknown, context: ErrorContext): DelegationError {
    if (!isDelegationError(e)) {
      this.logger.error('Unclassified failure', {
        ...context,
        error: ErrorNormalizer.describe(e),
      });
    }
    return ErrorNormalizer.normalizeError(e, context);
  }

  protected createStandardError(
    code: DelegationErrorCode,
    description: string,
    context: ErrorContext
  ): DelegationError {
    return createDelegationError(code, description, context);
  }

  /**
   * Run a storage or provider operation, rethrowing anything it raises as a
   * DelegationError
   */
  protected async guard<T>(
    context: ErrorContext,
    operation: () => Promise<T>
  ): Promise<T> {
    try {
      return await operation();
    } catch (e) {
      throw this.normalizeError(e, context);
    }
  }

  /**
   * Stop an operation between steps once its signal has fired
   */
  protected checkAborted(
    signal: AbortSignal | undefined,
    context: ErrorContext
  ): void {
    if (signal?.aborted) {
      this.logger.info('Operation aborted', { ...context });
      throw this.createStandardError(
        'internal_error',
        'Operation aborted',
        context
      );
    }
  }
}
