/**
 * Tests for the static catalog feed
 */

import { describe, it, expect } from 'vitest';
import { StaticPackageFeed, matchesQuery } from '../../src/feeds/static-feed';
import { InvalidTokenError } from '../../src/lib/errors';
import { item, descriptor, catalog, DEFAULT_FILTER } from '../helpers/feeds';

const ids = (items: readonly { identity: { id: string } }[]) => items.map(i => i.identity.id);

describe('StaticPackageFeed', () => {
  describe('matchesQuery', () => {
    const pkg = item('Contoso.Logging', '1.0.0', {
      title: 'Contoso Logging',
      description: 'Structured sinks for everything',
      tags: ['diagnostics'],
    });

    it('should match on id, title, tags and description, ignoring case', () => {
      expect(matchesQuery('contoso', pkg)).toBe(true);
      expect(matchesQuery('LOGGING', pkg)).toBe(true);
      expect(matchesQuery('diag', pkg)).toBe(true);
      expect(matchesQuery('sinks', pkg)).toBe(true);
    });

    it('should match everything for an empty query', () => {
      expect(matchesQuery('  ', pkg)).toBe(true);
    });

    it('should reject unrelated queries', () => {
      expect(matchesQuery('serializer', pkg)).toBe(false);
    });
  });

  describe('search', () => {
    it('should page through matches with continuation tokens', async () => {
      const feed = new StaticPackageFeed(descriptor('local', 'local'), catalog('Tools', 5));
      const filter = { ...DEFAULT_FILTER, take: 2 };

      const first = await feed.search('tools', filter);
      expect(ids(first.items)).toEqual(['Tools.Package0', 'Tools.Package1']);
      expect(first.sourceStatus).toEqual({ local: 'Ready' });
      expect(first.nextToken).toBeDefined();

      const second = await feed.continueSearch(first.nextToken ?? {});
      expect(ids(second.items)).toEqual(['Tools.Package2', 'Tools.Package3']);

      const third = await feed.continueSearch(second.nextToken ?? {});
      expect(ids(third.items)).toEqual(['Tools.Package4']);
      expect(third.sourceStatus).toEqual({ local: 'NoMoreItems' });
      expect(third.nextToken).toBeUndefined();
    });

    it('should return one entry per id at its highest version', async () => {
      const feed = new StaticPackageFeed(descriptor('local', 'local'), [
        item('Lib', '1.2.0'),
        item('Other', '1.0.0'),
        item('lib', '1.10.0'),
        item('Lib', '2.0.0-beta.1'),
      ]);

      const stable = await feed.search('', DEFAULT_FILTER);
      expect(stable.items.map(i => `${i.identity.id}@${i.identity.version}`)).toEqual(['lib@1.10.0', 'Other@1.0.0']);

      const withPrerelease = await feed.search('', { ...DEFAULT_FILTER, includePrerelease: true });
      expect(withPrerelease.items[0]?.identity.version).toBe('2.0.0-beta.1');
    });

    it('should apply schema defaults to catalog entries', async () => {
      const feed = new StaticPackageFeed(descriptor('local', 'local'), [{ identity: { id: 'Bare', version: '1.0.0' } }]);

      const result = await feed.search('bare', DEFAULT_FILTER);
      expect(result.items[0]).toEqual({
        identity: { id: 'Bare', version: '1.0.0' },
        authors: [],
        tags: [],
        prefixReserved: false,
      });
    });

    it('should defer the first page while warming up', async () => {
      const feed = new StaticPackageFeed(descriptor('local', 'local'), catalog('Tools', 3), { warmUp: true });

      const first = await feed.search('tools', DEFAULT_FILTER);
      expect(first.items).toEqual([]);
      expect(first.sourceStatus).toEqual({ local: 'Loading' });
      expect(first.refreshToken).toBeDefined();

      const refreshed = await feed.refreshSearch(first.refreshToken ?? {});
      expect(refreshed.items).toHaveLength(3);
      expect(refreshed.sourceStatus).toEqual({ local: 'NoMoreItems' });
    });

    it('should reject tokens issued by another feed', async () => {
      const one = new StaticPackageFeed(descriptor('one', 'local'), catalog('Tools', 5));
      const two = new StaticPackageFeed(descriptor('two', 'local'), catalog('Tools', 5));

      const page = await one.search('tools', { ...DEFAULT_FILTER, take: 2 });

      await expect(two.continueSearch(page.nextToken ?? {})).rejects.toBeInstanceOf(InvalidTokenError);
      await expect(two.refreshSearch({})).rejects.toBeInstanceOf(InvalidTokenError);
    });

    it('should reject when the signal has already fired', async () => {
      const feed = new StaticPackageFeed(descriptor('local', 'local'), catalog('Tools', 1));
      const controller = new AbortController();
      const reason = new Error('stopped');
      reason.name = 'AbortError';
      controller.abort(reason);

      await expect(feed.search('tools', DEFAULT_FILTER, controller.signal)).rejects.toBe(reason);
    });
  });
});
