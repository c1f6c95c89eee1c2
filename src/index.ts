/**
 * Multifeed — Public API
 *
 * Incremental multi-source package search:
 * - Feeds: a three-operation query contract and a static catalog feed
 * - Aggregator: concurrent fan-out, merge, status reduction
 * - Loader: paged, cancellable, pollable result list with search telemetry
 */

export * from './types';
export * from './feeds';
export * from './loader';
export * from './telemetry';

export { createPackageSearch, type PackageSearch, type PackageSearchOptions } from './package-search';

export {
  loadConfig,
  parseSourceDescriptors,
  LogLevelSchema,
  TelemetryModeSchema,
  type MultifeedConfig,
  type LogLevel,
  type TelemetryMode,
} from './lib/config';
export { logger, setLogLevel, getLogLevel, timeOperation, type Logger, type LogContext, type Timed } from './lib/logger';
export { LoaderBusyError, InvalidTokenError, ConfigError, isAbortError } from './lib/errors';
