/**
 * Multifeed — Search Types v1.0
 *
 * Loading status, filters, source descriptors, pages and tokens shared by
 * feeds, the multi-source aggregator and the incremental loader.
 */

import { z } from 'zod';
import type { PackageItem } from './package-item';

// ============================================================
// LOADING STATUS
// ============================================================

export const LoadingStatusSchema = z.enum([
  'Unknown',       // nothing queried yet
  'Loading',       // a fetch is outstanding
  'Ready',         // at least one page produced, more may exist
  'NoMoreItems',   // terminal success
  'ErrorOccurred', // terminal failure
  'Cancelled',     // terminal failure, caller aborted
]);
export type LoadingStatus = z.infer<typeof LoadingStatusSchema>;

/**
 * Per-source status after one query step, keyed by source id.
 */
export type SourceStatusMap = Readonly<Record<string, LoadingStatus>>;

// ============================================================
// FILTER
// ============================================================

export const SearchFilterSchema = z.object({
  includePrerelease: z.boolean().default(false),
  /** Page size requested from each source */
  take: z.number().int().positive().max(1000).default(25),
});
export type SearchFilter = z.infer<typeof SearchFilterSchema>;

// ============================================================
// PACKAGE SOURCE DESCRIPTORS
// ============================================================

export const FeedKindSchema = z.enum(['local', 'http_v2', 'http_v3']);
export type FeedKind = z.infer<typeof FeedKindSchema>;

export const PackageSourceDescriptorSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  kind: FeedKindSchema,
  url: z.string().optional(),
  isPublicCatalog: z.boolean().default(false),
});
export type PackageSourceDescriptor = z.infer<typeof PackageSourceDescriptorSchema>;

// ============================================================
// TOKENS
// ============================================================

/**
 * Opaque handle for resuming pagination. Only the feed that issued a token
 * may look inside it; everyone else threads it back unchanged.
 */
export type ContinuationToken = object;

/**
 * Opaque handle for re-polling the same logical page set for results that
 * were not available yet.
 */
export type RefreshToken = object;

// ============================================================
// PAGE
// ============================================================

/**
 * Timing breakdown attached by feeds that measure their own work.
 */
export interface SearchTimings {
  /** Wall time per queried source, in milliseconds, keyed by source id */
  sourceDurationsMs: Readonly<Record<string, number>>;
  /** Time spent merging source pages, in milliseconds */
  aggregationMs: number;
}

/**
 * One query step's answer.
 */
export interface SearchResult {
  items: readonly PackageItem[];
  sourceStatus: SourceStatusMap;
  /** Present iff more pages may exist */
  nextToken?: ContinuationToken;
  /** Present iff the same page set may later yield more results */
  refreshToken?: RefreshToken;
  timings?: SearchTimings;
}

// ============================================================
// LOADER STATE
// ============================================================

export interface LoaderState {
  readonly loadingStatus: LoadingStatus;
  /** Correlation id of the current logical search; unset before the first load */
  readonly operationId?: string;
  readonly itemsCount: number;
}
