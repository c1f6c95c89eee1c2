/**
 * Multifeed — Package Search Setup
 *
 * Wires configuration, sources, telemetry and logging into a ready
 * multi-source feed plus a loader factory.
 */

import type { LoaderState, PackageSourceDescriptor, TelemetrySink } from './types';
import type { PackageFeed, PackageSource } from './feeds/base';
import { MultiSourcePackageFeed } from './feeds/aggregator';
import { PackageItemLoader } from './loader/package-item-loader';
import type { SearchQuery } from './loader/package-item-loader';
import { createLoggingTelemetrySink } from './telemetry/sinks';
import { loadConfig } from './lib/config';
import type { MultifeedConfig } from './lib/config';
import { logger as rootLogger, setLogLevel } from './lib/logger';
import type { Logger } from './lib/logger';

export interface PackageSearchOptions {
  /** Builds the transport-backed feed for one configured source */
  resolveFeed: (descriptor: PackageSourceDescriptor) => PackageFeed;
  /** Defaults to the sources in the configuration */
  sources?: readonly PackageSourceDescriptor[];
  /** Defaults to `loadConfig()` */
  config?: MultifeedConfig;
  /** Overrides the sink chosen by MULTIFEED_TELEMETRY */
  telemetry?: TelemetrySink;
  logger?: Logger;
}

export interface PackageSearch {
  readonly feed: MultiSourcePackageFeed;
  readonly config: MultifeedConfig;
  createLoader(query: SearchQuery, onStateChange?: (state: LoaderState) => void): PackageItemLoader;
}

export function createPackageSearch(options: PackageSearchOptions): PackageSearch {
  const config = options.config ?? loadConfig();
  const log = options.logger ?? rootLogger;
  setLogLevel(config.logLevel);

  const descriptors = options.sources ?? config.sources;
  const sources: PackageSource[] = descriptors.map(descriptor => ({
    descriptor,
    feed: options.resolveFeed(descriptor),
  }));

  const telemetry =
    options.telemetry ?? (config.telemetry === 'log' ? createLoggingTelemetrySink(log) : undefined);

  const feed = new MultiSourcePackageFeed(sources, {
    sourceTimeoutMs: config.sourceTimeoutMs,
    logger: log,
  });

  log.info('Package search ready', {
    sources: descriptors.map(d => d.id),
    telemetry: telemetry ? 'on' : 'off',
  });

  return {
    feed,
    config,
    createLoader: (query, onStateChange) =>
      new PackageItemLoader(feed, {
        ...query,
        sources: descriptors,
        telemetry,
        logger: log,
        onStateChange,
      }),
  };
}
