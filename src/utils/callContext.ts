/**
 * Call Context
 *
 * Uses Node.js `AsyncLocalStorage` to propagate federated-call context
 * (callId, operation) through provider adapters and normalizers without
 * passing it through every function signature.
 *
 * The federation service opens a context for each routed call. The logger
 * reads it automatically so every log line of that call is correlated.
 */

import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

export interface CallContext {
  /** Unique identifier for one federated call. */
  callId: string;
  /** Federated operation name, e.g. `getEvents`. */
  operation: string;
}

/**
 * Singleton AsyncLocalStorage instance shared across the process.
 */
export const callContext = new AsyncLocalStorage<CallContext>();

/**
 * Get the current call context, or `undefined` outside a federated call.
 */
export function getCallContext(): CallContext | undefined {
  return callContext.getStore();
}

/**
 * Run `fn` inside a fresh call context for `operation`.
 */
export function runInCallContext<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  return callContext.run({ callId: randomUUID(), operation }, fn);
}
