/**
 * Multifeed — Telemetry Module
 */

export {
  SEARCH_EVENT_NAMES,
  createTelemetryEvent,
  createSearchEvent,
  createSourceSummaryEvent,
  createSearchPageEvent,
  summarizeSources,
  type PublicCatalogPresence,
  type SourceSummary,
  type SearchPageMetrics,
} from './search-events';

export { createLoggingTelemetrySink, emitSafely, hashPiiValue } from './sinks';
