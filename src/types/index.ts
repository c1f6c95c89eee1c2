/**
 * Multifeed — Type Exports
 *
 * Re-exports all types from the types module.
 */

// Package items
export type { PackageIdentity, PackageItem, PackageItemInput } from './package-item';
export { PackageIdentitySchema, PackageItemSchema } from './package-item';

// Search
export type {
  LoadingStatus,
  SourceStatusMap,
  SearchFilter,
  FeedKind,
  PackageSourceDescriptor,
  ContinuationToken,
  RefreshToken,
  SearchTimings,
  SearchResult,
  LoaderState,
} from './search';
export {
  LoadingStatusSchema,
  SearchFilterSchema,
  FeedKindSchema,
  PackageSourceDescriptorSchema,
} from './search';

// Telemetry
export type { TelemetryValue, TelemetryEvent, TelemetrySink, SearchEventName } from './telemetry';
