/**
 * Shared helpers for provider token-endpoint responses
 */

import { z } from 'zod';

/**
 * Token endpoint body after JSON or form decoding. Some providers send
 * `expires_in` as a string, so it is coerced. Fields outside the grant are
 * dropped.
 */
export const RawTokenResponseSchema = z.object({
  access_token: z.string().min(1, 'access_token is required'),
  token_type: z.string().optional(),
  refresh_token: z.string().optional(),
  expires_in: z.coerce.number().nonnegative().optional(),
});

export type RawTokenResponse = z.infer<typeof RawTokenResponseSchema>;

/**
 * Absolute expiry for a relative lifetime. Zero or missing means no expiry.
 */
export function expiryFrom(
  expiresIn: number | undefined,
  now: Date = new Date()
): Date | null {
  if (expiresIn === undefined || expiresIn <= 0) return null;
  return new Date(now.getTime() + expiresIn * 1000);
}
