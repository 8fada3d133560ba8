/**
 * Correlation Context
 *
 * Async correlation ID management across a check-in attempt
 */

import { AsyncLocalStorage } from 'node:async_hooks';
import { randomUUID } from 'node:crypto';
import type { LogContext } from './types.js';

export const correlationStorage = new AsyncLocalStorage<LogContext>();

export function getCorrelationContext(): LogContext | undefined {
  return correlationStorage.getStore();
}

/**
 * Run function with correlation context
 */
export function runWithContext<T>(context: LogContext, fn: () => T): T {
  return correlationStorage.run(context, fn);
}

export function generateCorrelationId(): string {
  return randomUUID().replace(/-/g, '').slice(0, 16);
}
