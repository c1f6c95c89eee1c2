/**
 * Multifeed — Feeds Module
 *
 * The feed contract, the static catalog feed and the multi-source aggregator.
 */

export { SourceFeed, type PackageFeed, type PackageSource } from './base';

export { StaticPackageFeed, matchesQuery, type StaticFeedOptions } from './static-feed';

export { MultiSourcePackageFeed, type AggregatorOptions } from './aggregator';

export { mergeSourceItems, identityKey, type SourceItems, type MergeOptions, type MergeResult } from './merge';

export { reduceLoadingStatus, reduceSourceStatus, resolvePageStatus, isTerminalStatus } from './status';
