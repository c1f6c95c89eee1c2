/**
 * Multifeed — Loader Module
 */

export { PackageItemLoader, type PackageItemLoaderOptions, type SearchQuery } from './package-item-loader';
