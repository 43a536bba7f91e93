// ---------------------------------------------------------------------------
// Failure taxonomy for one account's scrape
// ---------------------------------------------------------------------------

export type FailureReason =
  | 'missing_credentials'
  | 'browser_launch'
  | 'view_load'
  | 'no_data'
  | 'cancelled'
  | 'unknown';

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** The observer view never reached a readable table within the retry budget */
export class ViewLoadError extends Error {
  readonly attempts: number;

  constructor(attempts: number, cause: unknown) {
    super(`View failed to load after ${attempts} attempt(s): ${errorMessage(cause)}`, { cause });
    this.name = 'ViewLoadError';
    this.attempts = attempts;
  }
}

/** The view had nothing to extract: no rows on the first table page, or no dashboard field */
export class EmptyTableError extends Error {
  constructor(view: string, message: string = `No rows found on the first page of the ${view} table`) {
    super(message);
    this.name = 'EmptyTableError';
  }
}

export class MissingCredentialsError extends Error {
  constructor(accountName: string) {
    super(`Missing access key or observer user id for account "${accountName}"`);
    this.name = 'MissingCredentialsError';
  }
}

export class BrowserLaunchError extends Error {
  constructor(cause: unknown) {
    super(`Browser failed to launch: ${errorMessage(cause)}`, { cause });
    this.name = 'BrowserLaunchError';
  }
}

export class CancelledError extends Error {
  constructor() {
    super('Run cancelled before this account started');
    this.name = 'CancelledError';
  }
}

export function classifyFailure(error: unknown): FailureReason {
  if (error instanceof MissingCredentialsError) return 'missing_credentials';
  if (error instanceof BrowserLaunchError) return 'browser_launch';
  if (error instanceof ViewLoadError) return 'view_load';
  if (error instanceof EmptyTableError) return 'no_data';
  if (error instanceof CancelledError) return 'cancelled';
  return 'unknown';
}
