/**
 * Simple logger that prefixes every message with a timestamp.
 * Outputs to the console so cron hosts and containers capture it as-is.
 */

function timestamp(): string {
  return new Date().toISOString().replace('T', ' ').replace('Z', '');
}

function format(level: string, scope: string | null, message: string, data?: unknown): string {
  const prefix = scope ? `[${scope}] ` : '';
  const base = `[${timestamp()}] [${level}] ${prefix}${message}`;
  if (data !== undefined) {
    return `${base} ${JSON.stringify(data, null, 2)}`;
  }
  return base;
}

function debugEnabled(): boolean {
  return process.env.LOG_LEVEL === 'debug';
}

export interface Logger {
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  success(message: string, data?: unknown): void;
  debug(message: string, data?: unknown): void;
  step(stepNumber: number, message: string): void;
  /** Child logger whose lines carry `scope` (nested scopes are joined with " / ") */
  scope(scope: string): Logger;
}

export function createLogger(scope: string | null = null): Logger {
  return {
    info(message, data) {
      console.log(format('INFO', scope, message, data));
    },

    warn(message, data) {
      console.warn(format('WARN', scope, message, data));
    },

    error(message, data) {
      console.error(format('ERROR', scope, message, data));
    },

    success(message, data) {
      console.log(format('OK', scope, message, data));
    },

    debug(message, data) {
      if (debugEnabled()) console.log(format('DEBUG', scope, message, data));
    },

    step(stepNumber, message) {
      console.log(format('STEP', scope, `[${stepNumber}] ${message}`));
    },

    scope(child) {
      return createLogger(scope ? `${scope} / ${child}` : child);
    },
  };
}

export const log = createLogger();
