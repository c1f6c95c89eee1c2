/**
 * Multifeed — Search Telemetry Events
 *
 * Builders for the three checkpoints of a search:
 * - Search                      once per logical search
 * - SearchPackageSourceSummary  once per logical search, right after Search
 * - SearchPage                  once per published page
 *
 * Durations are reported in seconds.
 */

import type {
  LoadingStatus,
  PackageSourceDescriptor,
  SearchEventName,
  TelemetryEvent,
  TelemetryValue,
} from '../types';

export const SEARCH_EVENT_NAMES: Readonly<Record<SearchEventName, SearchEventName>> = {
  Search: 'Search',
  SearchPackageSourceSummary: 'SearchPackageSourceSummary',
  SearchPage: 'SearchPage',
} as const;

export type PublicCatalogPresence = 'YesV3' | 'YesV2' | 'YesLocal' | 'NotPresent';

export function createTelemetryEvent(
  name: string,
  properties: Record<string, TelemetryValue> = {},
  piiProperties: Record<string, TelemetryValue> = {}
): TelemetryEvent {
  return {
    name,
    properties: Object.freeze({ ...properties }),
    piiProperties: Object.freeze({ ...piiProperties }),
  };
}

// ============================================================
// SEARCH
// ============================================================

export function createSearchEvent(operationId: string, searchText: string, includePrerelease: boolean): TelemetryEvent {
  return createTelemetryEvent(
    SEARCH_EVENT_NAMES.Search,
    { OperationId: operationId, IncludePrerelease: includePrerelease },
    { Query: searchText }
  );
}

// ============================================================
// SOURCE SUMMARY
// ============================================================

export interface SourceSummary {
  numLocalFeeds: number;
  numHttpV2Feeds: number;
  numHttpV3Feeds: number;
  publicCatalog: PublicCatalogPresence;
}

/**
 * Count configured sources by kind and note how the public catalog is reached.
 */
export function summarizeSources(sources: readonly PackageSourceDescriptor[]): SourceSummary {
  const summary: SourceSummary = {
    numLocalFeeds: 0,
    numHttpV2Feeds: 0,
    numHttpV3Feeds: 0,
    publicCatalog: 'NotPresent',
  };

  for (const source of sources) {
    switch (source.kind) {
      case 'local':
        summary.numLocalFeeds++;
        break;
      case 'http_v2':
        summary.numHttpV2Feeds++;
        break;
      case 'http_v3':
        summary.numHttpV3Feeds++;
        break;
    }

    if (source.isPublicCatalog && summary.publicCatalog !== 'YesV3') {
      summary.publicCatalog = source.kind === 'http_v3' ? 'YesV3' : source.kind === 'http_v2' ? 'YesV2' : 'YesLocal';
    }
  }

  return summary;
}

export function createSourceSummaryEvent(
  parentId: string,
  sources: readonly PackageSourceDescriptor[]
): TelemetryEvent {
  const summary = summarizeSources(sources);
  return createTelemetryEvent(SEARCH_EVENT_NAMES.SearchPackageSourceSummary, {
    ParentId: parentId,
    NumLocalFeeds: summary.numLocalFeeds,
    NumHTTPv2Feeds: summary.numHttpV2Feeds,
    NumHTTPv3Feeds: summary.numHttpV3Feeds,
    PublicCatalog: summary.publicCatalog,
  });
}

// ============================================================
// SEARCH PAGE
// ============================================================

export interface SearchPageMetrics {
  parentId: string;
  pageIndex: number;
  loadingStatus: LoadingStatus;
  resultCount: number;
  durationMs: number;
  aggregationMs: number;
  /** Per queried source, in configuration order */
  sourceDurationsMs: readonly number[];
}

const toSeconds = (ms: number): number => ms / 1000;

export function createSearchPageEvent(metrics: SearchPageMetrics): TelemetryEvent {
  return createTelemetryEvent(SEARCH_EVENT_NAMES.SearchPage, {
    ParentId: metrics.parentId,
    PageIndex: metrics.pageIndex,
    LoadingStatus: metrics.loadingStatus,
    ResultCount: metrics.resultCount,
    Duration: toSeconds(metrics.durationMs),
    ResultsAggregationDuration: toSeconds(metrics.aggregationMs),
    IndividualSourceDurations: JSON.stringify(metrics.sourceDurationsMs.map(toSeconds)),
  });
}
