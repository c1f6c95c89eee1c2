/**
 * Multifeed — Multi-Source Feed Aggregator
 *
 * Fans every query out to all configured sources at once and folds their
 * answers into one page:
 * 1. Query every source concurrently under one shared abort signal
 * 2. Wait for all of them (or, with a source timeout, until it elapses)
 * 3. Merge and deduplicate items in source priority order
 * 4. Reduce per-source statuses and compose per-source tokens
 *
 * A source that throws reports ErrorOccurred for itself and contributes no
 * items; the page only fails when every source fails.
 */

import { nanoid } from 'nanoid';
import type {
  ContinuationToken,
  LoadingStatus,
  PackageItem,
  PackageSourceDescriptor,
  RefreshToken,
  SearchFilter,
  SearchResult,
} from '../types';
import type { PackageFeed, PackageSource } from './base';
import { mergeSourceItems } from './merge';
import { isTerminalStatus, reduceLoadingStatus, resolvePageStatus } from './status';
import { logger as rootLogger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { InvalidTokenError, describeError, isAbortError } from '../lib/errors';
import { raceAbort, settlesWithin } from '../lib/async';

// ============================================================
// TYPES
// ============================================================

export interface AggregatorOptions {
  /**
   * Stop waiting for slow sources after this many milliseconds. Unfinished
   * sources report Loading and the page carries a refresh token that picks
   * them up later. Unset means wait for every source.
   */
  sourceTimeoutMs?: number;
  logger?: Logger;
}

/**
 * Where one source stands after a page.
 */
interface SourceCursor {
  status: LoadingStatus;
  nextToken?: ContinuationToken;
  refreshToken?: RefreshToken;
}

/**
 * A source that is not queried on this step, with the items it already
 * contributed to the page set (empty when moving to a new page).
 */
interface CarriedSource extends SourceCursor {
  items: readonly PackageItem[];
}

interface SourceOutcome extends CarriedSource {
  sourceId: string;
  /** Unset for sources that were not queried in this step */
  durationMs?: number;
}

type SourceQuery = (feed: PackageFeed, signal?: AbortSignal) => Promise<SearchResult>;

class AggregateContinuationToken {
  constructor(
    readonly feedId: string,
    readonly cursors: ReadonlyMap<string, SourceCursor>
  ) {}
}

class AggregateRefreshToken {
  constructor(
    readonly feedId: string,
    readonly cursors: ReadonlyMap<string, SourceCursor>,
    /** Queries still running when the page was cut off */
    readonly pending: ReadonlyMap<string, Promise<SourceOutcome>>,
    /** Items each source has contributed to the page set so far */
    readonly delivered: ReadonlyMap<string, readonly PackageItem[]>
  ) {}
}

// ============================================================
// AGGREGATOR
// ============================================================

export class MultiSourcePackageFeed implements PackageFeed {
  readonly name = 'multi-source';

  private readonly feedId = nanoid(10);
  private readonly sources: readonly PackageSource[];
  private readonly sourceTimeoutMs?: number;
  private readonly logger: Logger;

  constructor(sources: readonly PackageSource[], options: AggregatorOptions = {}) {
    const ids = new Set<string>();
    for (const source of sources) {
      if (ids.has(source.descriptor.id)) {
        throw new Error(`Duplicate package source id "${source.descriptor.id}"`);
      }
      ids.add(source.descriptor.id);
    }

    this.sources = [...sources];
    this.sourceTimeoutMs = options.sourceTimeoutMs;
    this.logger = (options.logger ?? rootLogger).child({ component: 'MultiSourcePackageFeed' });

    this.logger.debug('Aggregator created', {
      sources: this.sources.map(s => s.descriptor.id),
      sourceTimeoutMs: this.sourceTimeoutMs,
    });
  }

  get isMultiSource(): boolean {
    return this.sources.length > 1;
  }

  get descriptors(): PackageSourceDescriptor[] {
    return this.sources.map(s => s.descriptor);
  }

  async search(searchText: string, filter: SearchFilter, signal?: AbortSignal): Promise<SearchResult> {
    const running = new Map<string, Promise<SourceOutcome>>();
    for (const source of this.sources) {
      running.set(
        source.descriptor.id,
        this.querySource(source, (feed, s) => feed.search(searchText, filter, s), signal)
      );
    }

    return this.collect(running, new Map(), signal);
  }

  async continueSearch(token: ContinuationToken, signal?: AbortSignal): Promise<SearchResult> {
    if (!(token instanceof AggregateContinuationToken) || token.feedId !== this.feedId) {
      throw new InvalidTokenError(this.name, 'continuation');
    }

    const running = new Map<string, Promise<SourceOutcome>>();
    const carried = new Map<string, CarriedSource>();

    for (const source of this.sources) {
      const id = source.descriptor.id;
      const cursor = token.cursors.get(id);
      const next = cursor?.nextToken;

      if (next !== undefined) {
        running.set(id, this.querySource(source, (feed, s) => feed.continueSearch(next, s), signal));
      } else {
        carried.set(id, { status: settledStatus(cursor), items: [] });
      }
    }

    return this.collect(running, carried, signal);
  }

  async refreshSearch(token: RefreshToken, signal?: AbortSignal): Promise<SearchResult> {
    if (!(token instanceof AggregateRefreshToken) || token.feedId !== this.feedId) {
      throw new InvalidTokenError(this.name, 'refresh');
    }

    const running = new Map<string, Promise<SourceOutcome>>();
    const carried = new Map<string, CarriedSource>();

    for (const source of this.sources) {
      const id = source.descriptor.id;
      const pending = token.pending.get(id);
      const cursor = token.cursors.get(id);
      const refresh = cursor?.refreshToken;

      if (pending) {
        running.set(id, pending);
      } else if (refresh !== undefined) {
        running.set(id, this.querySource(source, (feed, s) => feed.refreshSearch(refresh, s), signal));
      } else if (cursor) {
        // Settled earlier; its items stay part of the refreshed page set
        carried.set(id, {
          status: cursor.status,
          nextToken: cursor.nextToken,
          items: token.delivered.get(id) ?? [],
        });
      }
    }

    return this.collect(running, carried, signal);
  }

  // ============================================================
  // FAN-OUT
  // ============================================================

  /**
   * Run one source query. Never rejects: failures become statuses.
   */
  private async querySource(source: PackageSource, query: SourceQuery, signal?: AbortSignal): Promise<SourceOutcome> {
    const sourceId = source.descriptor.id;
    const startTime = performance.now();

    try {
      const result = await query(source.feed, signal);
      const durationMs = performance.now() - startTime;

      this.logger.debug('Source query completed', {
        source: sourceId,
        items: result.items.length,
        durationMs: Math.round(durationMs),
      });

      return {
        sourceId,
        items: result.items,
        status: resolvePageStatus(result),
        nextToken: result.nextToken,
        refreshToken: result.refreshToken,
        durationMs,
      };
    } catch (error) {
      const durationMs = performance.now() - startTime;

      if (isAbortError(error, signal)) {
        this.logger.debug('Source query cancelled', { source: sourceId });
        return { sourceId, items: [], status: 'Cancelled', durationMs };
      }

      this.logger.warn('Source query failed', {
        source: sourceId,
        error: describeError(error),
        durationMs: Math.round(durationMs),
      });
      return { sourceId, items: [], status: 'ErrorOccurred', durationMs };
    }
  }

  /**
   * Wait for the running queries, then fold everything into one page.
   */
  private async collect(
    running: ReadonlyMap<string, Promise<SourceOutcome>>,
    carried: ReadonlyMap<string, CarriedSource>,
    signal?: AbortSignal
  ): Promise<SearchResult> {
    const settled = new Map<string, SourceOutcome>();
    const all = Promise.all(
      Array.from(running, ([id, outcome]) =>
        outcome.then(result => {
          settled.set(id, result);
        })
      )
    );

    if (this.sourceTimeoutMs === undefined) {
      await raceAbort(all, signal);
    } else {
      await raceAbort(settlesWithin(all, this.sourceTimeoutMs), signal);
    }

    const aggregationStart = performance.now();

    const outcomes: SourceOutcome[] = [];
    const pending = new Map<string, Promise<SourceOutcome>>();

    for (const source of this.sources) {
      const id = source.descriptor.id;
      const done = settled.get(id);
      const stillRunning = running.get(id);
      const cursor = carried.get(id);

      if (done) {
        outcomes.push(done);
      } else if (stillRunning) {
        pending.set(id, stillRunning);
        outcomes.push({ sourceId: id, items: [], status: 'Loading' });
      } else if (cursor) {
        outcomes.push({ sourceId: id, ...cursor });
      }
    }

    const merged = mergeSourceItems(outcomes, { multiSource: this.isMultiSource });

    const sourceStatus: Record<string, LoadingStatus> = {};
    const cursors = new Map<string, SourceCursor>();
    const delivered = new Map<string, readonly PackageItem[]>();
    const sourceDurationsMs: Record<string, number> = {};

    for (const outcome of outcomes) {
      sourceStatus[outcome.sourceId] = outcome.status;
      cursors.set(outcome.sourceId, {
        status: outcome.status,
        nextToken: outcome.nextToken,
        refreshToken: outcome.refreshToken,
      });
      delivered.set(outcome.sourceId, outcome.items);
      if (outcome.durationMs !== undefined) {
        sourceDurationsMs[outcome.sourceId] = outcome.durationMs;
      }
    }

    const hasMore = outcomes.some(o => o.nextToken !== undefined);
    const canRefresh = pending.size > 0 || outcomes.some(o => o.refreshToken !== undefined);
    const aggregationMs = performance.now() - aggregationStart;

    const composite = reduceLoadingStatus(Object.values(sourceStatus));
    if (composite === 'ErrorOccurred') {
      this.logger.error('All package sources failed', { sources: Object.keys(sourceStatus) });
    } else {
      this.logger.debug('Page aggregated', {
        items: merged.items.length,
        duplicates: merged.duplicateCount,
        pendingSources: pending.size,
        status: composite,
      });
    }

    return {
      items: merged.items,
      sourceStatus,
      nextToken: hasMore ? new AggregateContinuationToken(this.feedId, cursors) : undefined,
      refreshToken: canRefresh ? new AggregateRefreshToken(this.feedId, cursors, pending, delivered) : undefined,
      timings: { sourceDurationsMs, aggregationMs },
    };
  }
}

/**
 * Status of a source that is not queried on this step.
 */
function settledStatus(cursor: SourceCursor | undefined): LoadingStatus {
  if (!cursor) return 'NoMoreItems';
  if (isTerminalStatus(cursor.status)) return cursor.status;
  // A query still running when the caller moved on is abandoned
  return cursor.status === 'Loading' ? 'Cancelled' : 'NoMoreItems';
}
