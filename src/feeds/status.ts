/**
 * Multifeed — Loading Status Reduction
 *
 * Folds per-source statuses into one composite status. Pure functions, no I/O.
 *
 * Priority, highest first:
 *   ErrorOccurred  every source errored
 *   Loading        any source still fetching
 *   Ready          any source has more pages
 *   NoMoreItems    every surviving source exhausted
 *   Cancelled      nothing answered because the fetch was aborted
 *
 * A failing source only fails the composite when all of them fail; otherwise
 * the surviving sources decide.
 */

import type { LoadingStatus, SearchResult, SourceStatusMap } from '../types';

const TERMINAL: ReadonlySet<LoadingStatus> = new Set<LoadingStatus>([
  'NoMoreItems',
  'ErrorOccurred',
  'Cancelled',
]);

export function isTerminalStatus(status: LoadingStatus): boolean {
  return TERMINAL.has(status);
}

/**
 * Reduce a set of per-source statuses to a composite status.
 * An empty set reduces to `Unknown`.
 */
export function reduceLoadingStatus(statuses: Iterable<LoadingStatus>): LoadingStatus {
  const all = Array.from(statuses);
  if (all.length === 0) return 'Unknown';

  if (all.every(s => s === 'ErrorOccurred')) return 'ErrorOccurred';
  if (all.includes('Loading')) return 'Loading';
  if (all.includes('Ready')) return 'Ready';
  if (all.includes('NoMoreItems')) return 'NoMoreItems';

  // Only ErrorOccurred, Cancelled and Unknown remain
  if (all.includes('Cancelled')) return 'Cancelled';
  if (all.includes('ErrorOccurred')) return 'ErrorOccurred';
  return 'Unknown';
}

export function reduceSourceStatus(sourceStatus: SourceStatusMap): LoadingStatus {
  return reduceLoadingStatus(Object.values(sourceStatus));
}

/**
 * Composite status of a page, falling back to its tokens when the statuses
 * say nothing usable.
 *
 * `Loading` without a refresh token could never finish, and `Ready` without a
 * continuation token has nothing left to load; both are resolved from the
 * tokens instead.
 */
export function resolvePageStatus(page: Pick<SearchResult, 'sourceStatus' | 'nextToken' | 'refreshToken'>): LoadingStatus {
  const reduced = reduceSourceStatus(page.sourceStatus);
  const fromTokens: LoadingStatus = page.nextToken !== undefined ? 'Ready' : 'NoMoreItems';

  if (reduced === 'Unknown') {
    return page.refreshToken !== undefined ? 'Loading' : fromTokens;
  }
  if (reduced === 'Loading' && page.refreshToken === undefined) {
    return fromTokens;
  }
  if (reduced === 'Ready' && page.nextToken === undefined) {
    return 'NoMoreItems';
  }
  return reduced;
}
