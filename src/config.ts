/**
 * Broker configuration schema and validation
 */

import { z } from 'zod';
import { LogLevel } from './logging/types.js';

export const DEFAULT_EXCHANGE_TTL_SECONDS = 600;
export const DEFAULT_TOKEN_EXPIRY_LEEWAY_SECONDS = 10;

export const BrokerConfigSchema = z.object({
  /** Lifetime of an unconsumed exchange */
  exchangeTTLSeconds: z
    .number()
    .int()
    .positive('Exchange TTL must be a positive integer')
    .default(DEFAULT_EXCHANGE_TTL_SECONDS),
  /** A token expiring within this window is treated as expired on refresh */
  tokenExpiryLeewaySeconds: z
    .number()
    .int()
    .nonnegative('Token expiry leeway must not be negative')
    .default(DEFAULT_TOKEN_EXPIRY_LEEWAY_SECONDS),
  timeouts: z
    .object({
      /** Upper bound in milliseconds for one provider token-endpoint call */
      response: z
        .number()
        .int()
        .positive('Response timeout must be a positive integer')
        .optional(),
    })
    .default({}),
  logLevel: z.nativeEnum(LogLevel).default(LogLevel.Info),
});

export type BrokerConfigInput = z.input<typeof BrokerConfigSchema>;
export type BrokerConfig = z.output<typeof BrokerConfigSchema>;

/**
 * Validate broker configuration and apply defaults
 * @throws ZodError with detailed validation messages
 */
export function validate(config: unknown = {}): BrokerConfig {
  return BrokerConfigSchema.parse(config);
}

/**
 * Validation that reports failure instead of throwing
 */
export function safeValidate(
  config: unknown = {}
):
  | { success: true; data: BrokerConfig }
  | { success: false; error: z.ZodError } {
  const result = BrokerConfigSchema.safeParse(config);
  return result.success
    ? { success: true, data: result.data }
    : { success: false, error: result.error };
}
