import { z } from 'zod';
import { APP_STATUSES, SERVICE_NAMES } from '../types.js';

export const AppStatusSchema = z.enum(APP_STATUSES);

/**
 * Registration input. Strings are trimmed before the checks run.
 */
export const NewAppSchema = z.object({
  id: z.string().trim().min(1, 'id is required'),
  service: z.enum(SERVICE_NAMES),
  password: z.string().trim().min(1, 'password is required'),
  callbackURL: z.string().trim().url('Invalid callback URL'),
  expiry: z.coerce.date().nullable().optional(),
  status: AppStatusSchema.default('enable'),
});

export type ValidatedNewApp = z.output<typeof NewAppSchema>;

/**
 * Flatten a ZodError into `{ field: message }`, one message per field
 */
export function describeIssues(error: z.ZodError): Record<string, string> {
  const errs: Record<string, string> = {};
  for (const issue of error.issues) {
    const field = issue.path.join('.') || '_';
    if (!(field in errs)) {
      errs[field] = issue.message;
    }
  }
  return errs;
}
