import { readEnv } from '../config.js';

// Console logging in the `[scope:event] {json}` shape. Debug lines need DEBUG=1|true.

export function isDebugEnabled(): boolean {
  const dbg = (readEnv('DEBUG') || '').toLowerCase();
  return dbg === '1' || dbg === 'true';
}

function format(scope: string, event: string, data?: Record<string, unknown>): string {
  return data ? `[${scope}:${event}] ${JSON.stringify(data)}` : `[${scope}:${event}]`;
}

export function logDebug(scope: string, event: string, data?: Record<string, unknown>): void {
  if (isDebugEnabled()) console.debug(format(scope, event, data));
}

export function logInfo(scope: string, event: string, data?: Record<string, unknown>): void {
  console.info(format(scope, event, data));
}

export function logWarn(scope: string, event: string, data?: Record<string, unknown>): void {
  console.warn(format(scope, event, data));
}

export function logError(scope: string, event: string, data?: Record<string, unknown>): void {
  console.error(format(scope, event, data));
}

export interface Logger {
  debug(event: string, data?: Record<string, unknown>): void;
  info(event: string, data?: Record<string, unknown>): void;
  warn(event: string, data?: Record<string, unknown>): void;
  error(event: string, data?: Record<string, unknown>): void;
}

export function createLogger(scope: string): Logger {
  return {
    debug: (event, data) => logDebug(scope, event, data),
    info: (event, data) => logInfo(scope, event, data),
    warn: (event, data) => logWarn(scope, event, data),
    error: (event, data) => logError(scope, event, data),
  };
}
