import { ViewLoadError, errorMessage } from './errors.js';
import { log as rootLog, type Logger } from './logger.js';
import { delay } from './timing.js';

export interface RetryOptions {
  /** Total attempts, including the first */
  attempts: number;
  /** Fixed pause after each failed attempt */
  backoffMs: number;
  log?: Logger;
}

/**
 * NAVIGATE → WAIT_FOR_TABLE, from scratch on every attempt. The final failure
 * surfaces as a ViewLoadError carrying the last cause.
 */
export async function loadWithRetry<T>(
  load: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const log = options.log ?? rootLog;
  const attempts = Math.max(1, options.attempts);
  let lastError: unknown;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      return await load(attempt);
    } catch (error) {
      lastError = error;
      log.warn(`View load attempt ${attempt}/${attempts} failed: ${errorMessage(error)}`);
      if (attempt < attempts) {
        log.info(`Waiting ${options.backoffMs}ms before retrying...`);
        await delay(options.backoffMs);
      }
    }
  }

  throw new ViewLoadError(attempts, lastError);
}
