/**
 * Multifeed — Package Feed Contract
 *
 * A feed answers three kinds of query: a fresh search, the next page of a
 * search, and a re-poll of the current page set. The multi-source aggregator
 * implements the same contract, so it can stand in wherever a single feed
 * is expected.
 */

import type {
  ContinuationToken,
  LoadingStatus,
  PackageItem,
  PackageSourceDescriptor,
  RefreshToken,
  SearchFilter,
  SearchResult,
} from '../types';
import { logger } from '../lib/logger';
import type { Logger } from '../lib/logger';
import { abortReason } from '../lib/errors';

export interface PackageFeed {
  /** Display name, used in logs */
  readonly name: string;
  /** True when results come from more than one source */
  readonly isMultiSource: boolean;

  /**
   * Start a new logical search. Never consults earlier continuation state.
   */
  search(searchText: string, filter: SearchFilter, signal?: AbortSignal): Promise<SearchResult>;

  /**
   * Next page of a search. The token must come from this same feed.
   */
  continueSearch(token: ContinuationToken, signal?: AbortSignal): Promise<SearchResult>;

  /**
   * Re-query the same page set for results that were not available yet.
   * The page holds everything the earlier page held, plus what arrived since.
   */
  refreshSearch(token: RefreshToken, signal?: AbortSignal): Promise<SearchResult>;
}

/**
 * A configured source: what it is, and the feed that queries it.
 */
export interface PackageSource {
  descriptor: PackageSourceDescriptor;
  feed: PackageFeed;
}

/**
 * Base class for feeds backed by a single source.
 */
export abstract class SourceFeed implements PackageFeed {
  readonly isMultiSource = false;

  protected readonly logger: Logger;

  constructor(readonly descriptor: PackageSourceDescriptor) {
    this.logger = logger.child({ source: descriptor.id });
  }

  get name(): string {
    return this.descriptor.name;
  }

  abstract search(searchText: string, filter: SearchFilter, signal?: AbortSignal): Promise<SearchResult>;

  abstract continueSearch(token: ContinuationToken, signal?: AbortSignal): Promise<SearchResult>;

  abstract refreshSearch(token: RefreshToken, signal?: AbortSignal): Promise<SearchResult>;

  /**
   * Build a page whose status map holds just this source.
   */
  protected page(
    items: readonly PackageItem[],
    status: LoadingStatus,
    tokens: { nextToken?: ContinuationToken; refreshToken?: RefreshToken } = {}
  ): SearchResult {
    return {
      items,
      sourceStatus: { [this.descriptor.id]: status },
      nextToken: tokens.nextToken,
      refreshToken: tokens.refreshToken,
    };
  }

  protected throwIfAborted(signal?: AbortSignal): void {
    if (signal?.aborted) throw abortReason(signal);
  }
}
