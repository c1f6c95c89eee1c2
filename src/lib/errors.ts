/**
 * Multifeed — Errors
 *
 * Source failures never surface as exceptions; they become statuses.
 * The classes here cover caller misuse and bad configuration.
 */

/**
 * A load was requested while another fetch is still outstanding.
 */
export class LoaderBusyError extends Error {
  constructor(message = 'A fetch is already in progress; wait for it or poll updateState()') {
    super(message);
    this.name = 'LoaderBusyError';
  }
}

/**
 * A continuation or refresh token was handed to a feed that did not issue it.
 */
export class InvalidTokenError extends Error {
  constructor(feed: string, kind: 'continuation' | 'refresh') {
    super(`${feed} received a ${kind} token it did not issue`);
    this.name = 'InvalidTokenError';
  }
}

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigError';
    this.issues = issues;
  }
}

/**
 * True when `error` is a cancellation, or `signal` has fired.
 */
export function isAbortError(error: unknown, signal?: AbortSignal): boolean {
  if (signal?.aborted) return true;
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * The error to reject with once `signal` has fired.
 */
export function abortReason(signal: AbortSignal): Error {
  if (signal.reason instanceof Error) return signal.reason;
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
