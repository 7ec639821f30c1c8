/**
 * Structured Logger (pino-backed)
 *
 * Every log line is a JSON object containing:
 *   - `level`    : pino numeric level
 *   - `time`     : epoch ms
 *   - `service`  : the tag passed to `createLogger`
 *   - `callId`   : auto-injected from AsyncLocalStorage (inside a federated call)
 *   - `operation`: the federated operation being served, when there is one
 *   - `msg`      : human-readable message
 *   - …any extra fields from the payload object
 *
 * Pipe through `pino-pretty` for human-readable output.
 */

import pino from 'pino';
import { getEnv } from '../config/env';
import { getCallContext } from './callContext';

// ─────────────────────────────────────────────────────────────────────────────
// Root pino instance
// ─────────────────────────────────────────────────────────────────────────────

function resolveLevel(): string {
  const env = getEnv();
  if (env.LOG_LEVEL) return env.LOG_LEVEL;
  if (env.NODE_ENV === 'production') return 'info';
  if (env.NODE_ENV === 'test') return 'silent';
  return 'debug';
}

const rootLogger = pino({
  level: resolveLevel(),
  mixin() {
    const ctx = getCallContext();
    return ctx ? { callId: ctx.callId, operation: ctx.operation } : {};
  },
  serializers: pino.stdSerializers,
});

// ─────────────────────────────────────────────────────────────────────────────
// Public interface
// ─────────────────────────────────────────────────────────────────────────────

export type LogPayload = Record<string, unknown>;

export interface Logger {
  info(payload: LogPayload | string, message?: string): void;
  debug(payload: LogPayload | string, message?: string): void;
  warn(payload: LogPayload | string, message?: string): void;
  error(payload: LogPayload | string, message?: string): void;
}

/**
 * Create a child logger scoped to a specific module.
 *
 *   const logger = createLogger('espnProvider');
 *   logger.warn({ league }, 'Unknown status');
 */
export function createLogger(prefix: string): Logger {
  const child = rootLogger.child({ service: prefix });

  function log(
    level: 'info' | 'debug' | 'warn' | 'error',
    payload: LogPayload | string,
    message?: string,
  ): void {
    if (typeof payload === 'string') {
      child[level](payload);
    } else {
      child[level](payload, message ?? '');
    }
  }

  return {
    info: (p, m) => log('info', p, m),
    debug: (p, m) => log('debug', p, m),
    warn: (p, m) => log('warn', p, m),
    error: (p, m) => log('error', p, m),
  };
}
