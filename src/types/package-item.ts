/**
 * Multifeed — Package Item Types v1.0
 *
 * A package search result as produced by a feed.
 * Items are immutable once a feed hands them out.
 */

import { z } from 'zod';

// ============================================================
// IDENTITY
// ============================================================

export const PackageIdentitySchema = z.object({
  id: z.string().min(1),
  version: z.string().min(1),
});
export type PackageIdentity = z.infer<typeof PackageIdentitySchema>;

// ============================================================
// PACKAGE ITEM
// ============================================================

export const PackageItemSchema = z.object({
  identity: PackageIdentitySchema,

  // Display metadata
  title: z.string().optional(),
  description: z.string().optional(),
  authors: z.array(z.string()).default([]),
  tags: z.array(z.string()).default([]),
  iconUrl: z.string().url().optional(),
  downloadCount: z.number().int().min(0).optional(),

  // Only trustworthy when a single source answered the query
  prefixReserved: z.boolean().default(false),
});
export type PackageItem = z.infer<typeof PackageItemSchema>;

/**
 * Input shape accepted by `PackageItemSchema` (defaults not yet applied).
 */
export type PackageItemInput = z.input<typeof PackageItemSchema>;
