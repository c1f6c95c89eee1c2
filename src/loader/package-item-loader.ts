/**
 * Multifeed — Incremental Package Item Loader
 *
 * The caller-facing search engine. Owns the growing result list, the
 * composite loading status and the telemetry sequence of one logical search.
 *
 * State machine:
 *   Unknown → Loading → Ready | NoMoreItems | ErrorOccurred | Cancelled
 *   Ready → Loading (next page) → ...
 *   Loading (page published with slow sources) → updateState() → ...
 *
 * At most one fetch is outstanding. `loadNext()` switches to Loading before
 * it returns and hands back a promise for the fetch; callers without a
 * completion channel poll `state` and `updateState()` instead.
 */

import { randomUUID } from 'crypto';
import type {
  ContinuationToken,
  LoaderState,
  LoadingStatus,
  PackageItem,
  PackageSourceDescriptor,
  RefreshToken,
  SearchFilter,
  SearchResult,
  TelemetrySink,
} from '../types';
import { SearchFilterSchema } from '../types';
import type { PackageFeed } from '../feeds/base';
import { identityKey } from '../feeds/merge';
import { resolvePageStatus } from '../feeds/status';
import { createSearchEvent, createSearchPageEvent, createSourceSummaryEvent } from '../telemetry/search-events';
import { emitSafely } from '../telemetry/sinks';
import { logger as rootLogger, timeOperation } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { LoaderBusyError, abortReason, describeError, isAbortError } from '../lib/errors';
import { linkedAbortController, raceAbort } from '../lib/async';

// ============================================================
// TYPES
// ============================================================

export interface SearchQuery {
  searchText: string;
  includePrerelease?: boolean;
  /** Page size requested from each source */
  pageSize?: number;
}

export interface PackageItemLoaderOptions extends SearchQuery {
  /** Sources behind the feed, reported in the source summary event */
  sources?: readonly PackageSourceDescriptor[];
  telemetry?: TelemetrySink;
  logger?: Logger;
  /** Called after every state transition */
  onStateChange?: (state: LoaderState) => void;
}

interface Cursor {
  nextToken?: ContinuationToken;
  refreshToken?: RefreshToken;
}

interface InFlightFetch {
  promise: Promise<void>;
  controller: AbortController;
}

type FeedCall = (signal: AbortSignal) => Promise<SearchResult>;

// ============================================================
// LOADER
// ============================================================

export class PackageItemLoader {
  private readonly feed: PackageFeed;
  private readonly sources: readonly PackageSourceDescriptor[];
  private readonly telemetry?: TelemetrySink;
  private readonly logger: Logger;
  // Tagged with the operation id of the current search
  private searchLogger: Logger;
  private readonly onStateChange?: (state: LoaderState) => void;

  private searchText: string;
  private filter: SearchFilter;

  private loadingStatus: LoadingStatus = 'Unknown';
  private operationId?: string;
  private items: readonly PackageItem[] = Object.freeze([]);
  private readonly seen = new Set<string>();
  private cursor: Cursor = {};
  private pageIndex = 0;
  private inFlight?: InFlightFetch;
  // Bumped on reset; completions from older generations are dropped
  private generation = 0;

  constructor(feed: PackageFeed, options: PackageItemLoaderOptions) {
    this.feed = feed;
    this.sources = options.sources ?? [];
    this.telemetry = options.telemetry;
    this.logger = (options.logger ?? rootLogger).child({ component: 'PackageItemLoader' });
    this.searchLogger = this.logger;
    this.onStateChange = options.onStateChange;

    this.searchText = options.searchText;
    this.filter = SearchFilterSchema.parse({
      includePrerelease: options.includePrerelease,
      take: options.pageSize,
    });
  }

  get state(): LoaderState {
    return Object.freeze({
      loadingStatus: this.loadingStatus,
      operationId: this.operationId,
      itemsCount: this.items.length,
    });
  }

  /**
   * Snapshot of every item published so far for the current search.
   */
  getCurrent(): readonly PackageItem[] {
    return this.items;
  }

  /**
   * Start fetching the next page: a fresh search when nothing has been
   * loaded yet (or the last search left nothing to continue from), the next
   * page otherwise.
   *
   * The status is Loading by the time this returns. The returned promise
   * settles once the page is published and never rejects; failures and
   * cancellation show up in `state`.
   *
   * @param filter - Overrides for a fresh search; ignored when continuing
   * @throws LoaderBusyError if a fetch is still outstanding
   */
  loadNext(filter?: Partial<SearchFilter>, signal?: AbortSignal): Promise<void> {
    if (this.inFlight || this.loadingStatus === 'Loading') {
      throw new LoaderBusyError();
    }

    if (this.loadingStatus === 'NoMoreItems') {
      this.searchLogger.debug('No more items to load');
      return Promise.resolve();
    }

    const nextToken = this.cursor.nextToken;
    if (nextToken === undefined) {
      if (filter) {
        this.filter = SearchFilterSchema.parse({ ...this.filter, ...filter });
      }
      this.beginSearch();
      const { searchText, filter: searchFilter } = this;
      this.setStatus('Loading');
      return this.startFetch(s => this.feed.search(searchText, searchFilter, s), signal);
    }

    this.setStatus('Loading');
    return this.startFetch(s => this.feed.continueSearch(nextToken, s), signal);
  }

  /**
   * Poll for progress. While a fetch is outstanding this has no effect.
   * When the last published page is still Loading because some sources had
   * not answered, this re-queries them through the page's refresh token.
   */
  updateState(signal?: AbortSignal): Promise<void> {
    if (this.inFlight) return Promise.resolve();

    const refreshToken = this.cursor.refreshToken;
    if (this.loadingStatus !== 'Loading' || refreshToken === undefined) {
      return Promise.resolve();
    }

    return this.startFetch(s => this.feed.refreshSearch(refreshToken, s), signal);
  }

  /**
   * Best-effort count of matches. Stops paging once the count passes
   * `maxCount`, so any result above it means "at least maxCount".
   * Does not touch the loader's own state.
   */
  async getTotalCount(maxCount: number, signal?: AbortSignal): Promise<number> {
    let result = await raceAbort(this.feed.search(this.searchText, this.filter, signal), signal);
    let total = result.items.length;

    for (;;) {
      if (signal?.aborted) throw abortReason(signal);

      if (result.refreshToken !== undefined && resolvePageStatus(result) === 'Loading') {
        // A refreshed page replaces the page it was issued for
        const counted = result.items.length;
        result = await raceAbort(this.feed.refreshSearch(result.refreshToken, signal), signal);
        total += result.items.length - counted;
        continue;
      }

      if (total > maxCount || result.nextToken === undefined) {
        this.logger.debug('Total count computed', { total, maxCount });
        return total;
      }

      result = await raceAbort(this.feed.continueSearch(result.nextToken, signal), signal);
      total += result.items.length;
    }
  }

  /**
   * Start a new logical search. Drops the outstanding fetch, if any, and
   * every published item. The next `loadNext()` issues a fresh search under
   * a new correlation id.
   */
  reset(query?: Partial<SearchQuery>): void {
    this.generation++;
    if (this.inFlight) {
      this.inFlight.controller.abort();
      this.inFlight = undefined;
    }

    if (query?.searchText !== undefined) this.searchText = query.searchText;
    if (query?.includePrerelease !== undefined || query?.pageSize !== undefined) {
      this.filter = SearchFilterSchema.parse({
        includePrerelease: query.includePrerelease ?? this.filter.includePrerelease,
        take: query.pageSize ?? this.filter.take,
      });
    }

    this.clearResults();
    this.operationId = undefined;
    this.searchLogger = this.logger;
    this.setStatus('Unknown');
  }

  // ============================================================
  // FETCHING
  // ============================================================

  private beginSearch(): void {
    this.clearResults();
    this.operationId = randomUUID();
    this.searchLogger = this.logger.child({ operationId: this.operationId });
    this.setStatus('Unknown');

    this.searchLogger.info('Search started', {
      includePrerelease: this.filter.includePrerelease,
      sources: this.sources.length,
    });

    emitSafely(
      this.telemetry,
      createSearchEvent(this.operationId, this.searchText, this.filter.includePrerelease),
      this.searchLogger
    );
    emitSafely(this.telemetry, createSourceSummaryEvent(this.operationId, this.sources), this.searchLogger);
  }

  private clearResults(): void {
    this.items = Object.freeze([]);
    this.seen.clear();
    this.cursor = {};
    this.pageIndex = 0;
  }

  private startFetch(call: FeedCall, signal?: AbortSignal): Promise<void> {
    const { controller, dispose } = linkedAbortController(signal);
    const promise = this.runFetch(call, controller.signal, this.generation).finally(dispose);
    this.inFlight = { promise, controller };
    return promise;
  }

  private async runFetch(call: FeedCall, signal: AbortSignal, generation: number): Promise<void> {
    let result: SearchResult;
    let durationMs: number;

    try {
      ({ value: result, durationMs } = await timeOperation(
        'Search fetch',
        () => raceAbort(call(signal), signal),
        this.searchLogger
      ));
    } catch (error) {
      if (generation !== this.generation) return;
      this.inFlight = undefined;

      if (isAbortError(error, signal)) {
        this.cancel();
      } else {
        this.searchLogger.error('Search fetch failed', { error: describeError(error) });
        this.setStatus('ErrorOccurred');
      }
      return;
    }

    if (generation !== this.generation) return;
    this.inFlight = undefined;

    if (signal.aborted) {
      this.cancel();
      return;
    }

    this.publish(result, durationMs);
  }

  private cancel(): void {
    this.searchLogger.info('Search fetch cancelled');
    this.setStatus('Cancelled');
  }

  // ============================================================
  // PUBLICATION
  // ============================================================

  private publish(result: SearchResult, durationMs: number): void {
    const status = resolvePageStatus(result);
    if (status === 'Cancelled') {
      this.cancel();
      return;
    }

    const multiSource = this.feed.isMultiSource;
    const fresh: PackageItem[] = [];
    for (const item of result.items) {
      const key = identityKey(item.identity);
      if (this.seen.has(key)) continue;
      this.seen.add(key);
      fresh.push(multiSource && item.prefixReserved ? { ...item, prefixReserved: false } : item);
    }

    this.items = Object.freeze([...this.items, ...fresh]);
    // A failed step keeps the last good position so loadNext() can retry it
    if (status !== 'ErrorOccurred') {
      this.cursor = { nextToken: result.nextToken, refreshToken: result.refreshToken };
    }
    this.loadingStatus = status;

    const pageIndex = this.pageIndex++;
    const operationId = this.operationId ?? '';

    emitSafely(
      this.telemetry,
      createSearchPageEvent({
        parentId: operationId,
        pageIndex,
        loadingStatus: status,
        resultCount: result.items.length,
        durationMs,
        aggregationMs: result.timings?.aggregationMs ?? 0,
        // A feed that does not time its sources counts as one source
        sourceDurationsMs: result.timings ? Object.values(result.timings.sourceDurationsMs) : [durationMs],
      }),
      this.searchLogger
    );

    this.searchLogger.debug('Page published', {
      pageIndex,
      status,
      added: fresh.length,
      total: this.items.length,
    });

    this.notify();
  }

  private setStatus(status: LoadingStatus): void {
    this.loadingStatus = status;
    this.notify();
  }

  private notify(): void {
    if (!this.onStateChange) return;

    try {
      this.onStateChange(this.state);
    } catch (error) {
      this.logger.warn('State change listener failed', { error: describeError(error) });
    }
  }
}
