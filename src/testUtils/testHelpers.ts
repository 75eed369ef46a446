/**
 * Common test utilities and helpers
 */

import { expect } from 'chai';
import sinon from 'sinon';
import { DefaultLogger } from '../logging/logger.js';
import { LogLevel } from '../logging/types.js';
import type { DelegationErrorCode } from '../types.js';
import { isDelegationError } from '../utils/error-normalizer.js';
import { MockTransport } from './logTransports.js';

/**
 * Assert that `fn` rejects with a DelegationError carrying `expectedError`
 */
export async function expectDelegationError(
  fn: () => Promise<unknown>,
  expectedError: DelegationErrorCode,
  expectedDescription?: string
): Promise<void> {
  let caught: unknown;
  try {
    await fn();
  } catch (err) {
    caught = err;
  }
  expect(isDelegationError(caught), `expected a ${expectedError} error`).to.equal(
    true
  );
  if (!isDelegationError(caught)) return;
  expect(caught.error).to.equal(expectedError);
  if (expectedDescription !== undefined) {
    expect(caught.error_description).to.equal(expectedDescription);
  }
}

/**
 * A logger that records instead of printing, at Trace level
 */
export function createRecordingLogger(context: Record<string, unknown> = {}) {
  const transport = new MockTransport();
  const logger = new DefaultLogger(context, { level: LogLevel.Trace }, transport);
  return { logger, transport };
}

/**
 * Stub global fetch; restored by `sinon.restore()`
 */
export function stubFetch() {
  return sinon.stub(globalThis, 'fetch');
}

/**
 * Provider answer with a JSON body
 */
export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Provider answer with a form-encoded body
 */
export function formResponse(
  body: Record<string, string>,
  status = 200
): Response {
  return new Response(new URLSearchParams(body).toString(), {
    status,
    headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
  });
}
