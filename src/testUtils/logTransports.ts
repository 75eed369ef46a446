import type { LogTransport } from '../logging/types.js';

/**
 * Records what a DefaultLogger writes instead of printing it
 */
export class MockTransport implements LogTransport {
  public logs: Record<string, unknown>[] = [];
  public errors: Record<string, unknown>[] = [];

  log(message?: unknown) {
    this.logs.push(toRecord(message));
  }

  error(message?: unknown) {
    this.errors.push(toRecord(message));
  }

  /** Messages written at any destination, in order of arrival per destination */
  messages(): string[] {
    return [...this.logs, ...this.errors].map((entry) => String(entry.message));
  }
}

function toRecord(message: unknown): Record<string, unknown> {
  if (message !== null && typeof message === 'object') {
    return Object.fromEntries(Object.entries(message));
  }
  return { message };
}
