/**
 * Multifeed — Static Catalog Feed
 *
 * A feed over an in-memory package catalog: offline caches, local folders
 * already scanned by the host, fixtures. Catalog order is relevance order.
 *
 * Every id appears once per search, at its highest version allowed by the
 * prerelease filter.
 */

import { nanoid } from 'nanoid';
import semver from 'semver';
import { SourceFeed } from './base';
import { PackageItemSchema } from '../types';
import type {
  ContinuationToken,
  PackageItem,
  PackageItemInput,
  PackageSourceDescriptor,
  RefreshToken,
  SearchFilter,
  SearchResult,
} from '../types';
import { InvalidTokenError } from '../lib/errors';

export interface StaticFeedOptions {
  /**
   * Answer the first query of each search with `Loading` and no items, as a
   * feed that is still building its index would. The page arrives on refresh.
   */
  warmUp?: boolean;
}

class StaticContinuationToken {
  constructor(
    readonly feedId: string,
    readonly searchText: string,
    readonly filter: SearchFilter,
    readonly skip: number
  ) {}
}

class StaticRefreshToken {
  constructor(
    readonly feedId: string,
    readonly searchText: string,
    readonly filter: SearchFilter
  ) {}
}

// ============================================================
// MATCHING
// ============================================================

/**
 * Case-insensitive substring match on id, title, tags and description.
 */
export function matchesQuery(query: string, item: PackageItem): boolean {
  const q = query.trim().toLowerCase();
  if (q === '') return true;

  if (item.identity.id.toLowerCase().includes(q)) return true;
  if (item.title?.toLowerCase().includes(q)) return true;
  if (item.tags.some(tag => tag.toLowerCase().includes(q))) return true;
  if (item.description?.toLowerCase().includes(q)) return true;

  return false;
}

function isPrerelease(version: string): boolean {
  return (semver.prerelease(version, { loose: true }) ?? []).length > 0;
}

function compareVersions(a: string, b: string): number {
  const left = semver.parse(a, { loose: true });
  const right = semver.parse(b, { loose: true });
  if (left && right) return semver.compare(left, right);
  if (left) return 1;
  if (right) return -1;
  return a.localeCompare(b);
}

// ============================================================
// FEED
// ============================================================

export class StaticPackageFeed extends SourceFeed {
  private readonly feedId = nanoid(10);
  private readonly catalog: readonly PackageItem[];
  private readonly warmUp: boolean;

  constructor(descriptor: PackageSourceDescriptor, catalog: readonly PackageItemInput[], options: StaticFeedOptions = {}) {
    super(descriptor);
    this.catalog = catalog.map(entry => PackageItemSchema.parse(entry));
    this.warmUp = options.warmUp ?? false;
  }

  async search(searchText: string, filter: SearchFilter, signal?: AbortSignal): Promise<SearchResult> {
    this.throwIfAborted(signal);

    if (this.warmUp) {
      this.logger.debug('Index warming, deferring first page', { searchText });
      return this.page([], 'Loading', {
        refreshToken: new StaticRefreshToken(this.feedId, searchText, filter),
      });
    }

    return this.pageAt(searchText, filter, 0);
  }

  async continueSearch(token: ContinuationToken, signal?: AbortSignal): Promise<SearchResult> {
    if (!(token instanceof StaticContinuationToken) || token.feedId !== this.feedId) {
      throw new InvalidTokenError(this.name, 'continuation');
    }
    this.throwIfAborted(signal);

    return this.pageAt(token.searchText, token.filter, token.skip);
  }

  async refreshSearch(token: RefreshToken, signal?: AbortSignal): Promise<SearchResult> {
    if (!(token instanceof StaticRefreshToken) || token.feedId !== this.feedId) {
      throw new InvalidTokenError(this.name, 'refresh');
    }
    this.throwIfAborted(signal);

    return this.pageAt(token.searchText, token.filter, 0);
  }

  /**
   * All matches for a query, one entry per id, in catalog order.
   */
  findMatches(searchText: string, filter: Pick<SearchFilter, 'includePrerelease'>): PackageItem[] {
    const best = new Map<string, PackageItem>();
    const order: string[] = [];

    for (const item of this.catalog) {
      if (!filter.includePrerelease && isPrerelease(item.identity.version)) continue;
      if (!matchesQuery(searchText, item)) continue;

      const key = item.identity.id.toLowerCase();
      const current = best.get(key);
      if (!current) {
        order.push(key);
        best.set(key, item);
      } else if (compareVersions(item.identity.version, current.identity.version) > 0) {
        best.set(key, item);
      }
    }

    return order.flatMap(key => {
      const item = best.get(key);
      return item ? [item] : [];
    });
  }

  private pageAt(searchText: string, filter: SearchFilter, skip: number): SearchResult {
    const matches = this.findMatches(searchText, filter);
    const items = matches.slice(skip, skip + filter.take);
    const nextSkip = skip + items.length;
    const hasMore = nextSkip < matches.length;

    this.logger.debug('Page served', { searchText, skip, count: items.length, total: matches.length });

    return this.page(items, hasMore ? 'Ready' : 'NoMoreItems', {
      nextToken: hasMore ? new StaticContinuationToken(this.feedId, searchText, filter, nextSkip) : undefined,
    });
  }
}
