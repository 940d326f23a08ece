/**
 * Memory Entity Store Tests
 */

import { countsFromRows } from '../../src/analytics/sentimentMath';
import { resolveWindow } from '../../src/analytics/timeWindow';
import { PostRecord, TokenMentionRecord } from '../../src/store/entityStore';
import { MemoryEntityStore } from '../../src/store/memoryEntityStore';
import { DatasetBuilder, NOW, daysAgo, hoursAgo } from '../helpers/datasetBuilder';

describe('MemoryEntityStore', () => {
  const builder = new DatasetBuilder().network('ethereum', 'Ethereum').network('solana');
  const SOL = builder.token('SOL', 'solana', 'Solana');
  const USDC_ETH = builder.token('USDC', 'ethereum');
  const USDC_SOL = builder.token('USDC', 'solana');
  const BTC = builder.token('BTC', null);

  builder.post({ at: hoursAgo(2), tokens: [SOL, USDC_ETH], sentiment: 'positive', confidence: 0.9, author: 'alice', likes: 10, reshares: 2 });
  builder.post({ at: hoursAgo(5), tokens: [SOL], sentiment: 'negative', confidence: 0.7, author: 'bob', likes: 1 });
  builder.post({ at: daysAgo(2), tokens: [SOL, USDC_SOL], sentiment: 'neutral', confidence: 0.5, author: 'alice', likes: 4, reshares: 1 });
  builder.post({ at: daysAgo(10), tokens: [SOL], sentiment: 'positive', author: 'carol' });
  builder.post({ at: hoursAgo(1), tokens: [BTC], sentiment: null, author: 'bob' });
  builder.post({ at: hoursAgo(3), tokens: [USDC_ETH], sentiment: 'positive', confidence: 0.6, author: 'alice' });

  const store = builder.store();
  const window = resolveWindow(7, NOW);

  describe('Lookups', () => {
    it('should find tokens by symbol across networks, ordered by id', async () => {
      const tokens = await store.findTokens({ symbols: ['USDC'] });
      expect(tokens.map(t => t.id)).toEqual([USDC_ETH, USDC_SOL]);
    });

    it('should combine token criteria', async () => {
      expect((await store.findTokens({ symbols: ['USDC'], networks: ['solana'] })).map(t => t.id)).toEqual([USDC_SOL]);
      expect((await store.findTokens({ symbols: ['USDC'], excludeIds: [USDC_ETH] })).map(t => t.id)).toEqual([USDC_SOL]);
      expect((await store.findTokens({ networks: ['solana'] })).map(t => t.id)).toEqual([SOL, USDC_SOL]);
    });

    it('should match symbols case-sensitively', async () => {
      expect(await store.findTokens({ symbols: ['sol'] })).toEqual([]);
    });

    it('should find networks by name', async () => {
      const networks = await store.findNetworks(['solana', 'unknown']);
      expect(networks).toEqual([{ id: 2, name: 'solana', displayName: null }]);
      expect(await store.findNetworks()).toHaveLength(2);
    });
  });

  describe('Mention counts', () => {
    it('should count mention rows inside the window', async () => {
      expect(await store.countMentions({ window })).toBe(7);
    });

    it('should treat an empty id list as matching nothing', async () => {
      expect(await store.countMentions({ window, tokenIds: [] })).toBe(0);
    });

    it('should filter by network and skip tokens without one', async () => {
      expect(await store.countMentions({ window, networks: ['solana'] })).toBe(4);
      expect(await store.countMentions({ window, requireNetwork: true })).toBe(6);
    });

    it('should bucket mentions by day', async () => {
      const rows = await store.countMentionsByBucket({ window, tokenIds: [SOL] }, 'day');
      expect(rows.map(r => [r.bucket.toISOString(), r.mentionCount])).toEqual([
        ['2024-03-13T00:00:00.000Z', 1],
        ['2024-03-15T00:00:00.000Z', 2],
      ]);
    });
  });

  describe('Sentiment counts', () => {
    it('should count labelled mentions by sentiment', async () => {
      const rows = await store.countSentiments({ window, tokenIds: [SOL] });
      expect(countsFromRows(rows)).toEqual({ positive: 1, negative: 1, neutral: 1 });
      expect(rows.find(r => r.sentiment === 'positive')?.avgConfidence).toBeCloseTo(0.9);
    });

    it('should ignore unlabelled posts', async () => {
      expect(await store.countSentiments({ window, tokenIds: [BTC] })).toEqual([]);
    });

    it('should filter by author', async () => {
      const rows = await store.countSentiments({ window, tokenIds: [SOL], authorId: 'alice' });
      expect(countsFromRows(rows)).toEqual({ positive: 1, negative: 0, neutral: 1 });
    });

    it('should group by network', async () => {
      const rows = await store.countSentimentsByNetwork({ window });
      expect(countsFromRows(rows.filter(r => r.network === 'ethereum'))).toEqual({ positive: 2, negative: 0, neutral: 0 });
      expect(countsFromRows(rows.filter(r => r.network === 'solana'))).toEqual({ positive: 1, negative: 1, neutral: 2 });
    });

    it('should group by bucket in chronological order', async () => {
      const rows = await store.countSentimentsByBucket({ window, tokenIds: [SOL] }, 'day');
      expect(rows.map(r => `${r.bucket.toISOString().slice(0, 10)} ${r.sentiment} ${r.count}`)).toEqual([
        '2024-03-13 neutral 1',
        '2024-03-15 positive 1',
        '2024-03-15 negative 1',
      ]);
    });
  });

  describe('Rankings', () => {
    it('should rank tokens by mentions, then likes, then id', async () => {
      const ranked = await store.rankTokens({ window });
      expect(ranked.map(r => [r.token.id, r.mentionCount])).toEqual([
        [SOL, 3],
        [USDC_ETH, 2],
        [USDC_SOL, 1],
        [BTC, 1],
      ]);
    });

    it('should apply the minimum and the limit', async () => {
      expect((await store.rankTokens({ window }, { minMentions: 2 })).map(r => r.token.id)).toEqual([SOL, USDC_ETH]);
      expect((await store.rankTokens({ window }, { limit: 1 })).map(r => r.token.id)).toEqual([SOL]);
    });

    it('should rank symbols across networks', async () => {
      const ranked = await store.rankSymbols({ window });
      expect(ranked).toEqual([
        { symbol: 'SOL', mentionCount: 3 },
        { symbol: 'USDC', mentionCount: 3 },
        { symbol: 'BTC', mentionCount: 1 },
      ]);
    });

    it('should rank (symbol, network) pairs', async () => {
      const ranked = await store.rankSymbolNetworks({ window });
      expect(ranked).toEqual([
        { symbol: 'SOL', network: 'solana', mentionCount: 3 },
        { symbol: 'USDC', network: 'ethereum', mentionCount: 2 },
        { symbol: 'BTC', network: null, mentionCount: 1 },
        { symbol: 'USDC', network: 'solana', mentionCount: 1 },
      ]);
    });

    it('should rank networks, skipping tokens without one', async () => {
      expect(await store.rankNetworks({ window })).toEqual([
        { network: 'solana', mentionCount: 4 },
        { network: 'ethereum', mentionCount: 2 },
      ]);
    });

    it('should rank authors by distinct posts', async () => {
      const authors = await store.rankAuthors({ window, tokenIds: [SOL, USDC_ETH, USDC_SOL] }, 10);
      expect(authors).toEqual([
        { authorId: 'alice', authorHandle: '@alice', postCount: 3, totalLikes: 14, totalReshares: 3 },
        { authorId: 'bob', authorHandle: '@bob', postCount: 1, totalLikes: 1, totalReshares: 0 },
      ]);
    });
  });

  describe('Co-mentions', () => {
    it('should count other tokens sharing a post with the primary', async () => {
      const rows = await store.countCoMentions([SOL], window);
      expect(rows.map(r => [r.token.id, r.coMentionCount])).toEqual([
        [USDC_ETH, 1],
        [USDC_SOL, 1],
      ]);
      expect(await store.countCoMentions([SOL], window, { minMentions: 2 })).toEqual([]);
    });

    it('should count sentiment of shared posts', async () => {
      const rows = await store.countCoMentionSentiments([SOL], USDC_ETH, window);
      expect(rows).toEqual([{ sentiment: 'positive', count: 1, avgConfidence: 0.9 }]);
    });
  });

  describe('Summaries', () => {
    it('should summarize all-time mentions', async () => {
      expect(await store.summarizeMentions(SOL)).toEqual({
        mentionCount: 4,
        firstSeen: daysAgo(10),
        lastSeen: hoursAgo(2),
      });
    });

    it('should summarize a long mention history', async () => {
      const count = 200_000;
      const posts: PostRecord[] = [];
      const mentions: TokenMentionRecord[] = [];
      for (let i = 1; i <= count; i++) {
        const createdAt = new Date(NOW.getTime() - i * 1000);
        posts.push({
          id: i,
          externalId: `post-${i}`,
          text: '$SOL',
          createdAt,
          authorId: 'alice',
          authorHandle: '@alice',
          likeCount: 0,
          reshareCount: 0,
        });
        mentions.push({ id: i, postId: i, tokenId: 1, mentionedAt: createdAt });
      }
      const large = new MemoryEntityStore({
        tokens: [{ id: 1, address: '0xtoken1', symbol: 'SOL', name: null, network: null }],
        posts,
        mentions,
      });

      expect(await large.summarizeMentions(1)).toEqual({
        mentionCount: count,
        firstSeen: new Date(NOW.getTime() - count * 1000),
        lastSeen: new Date(NOW.getTime() - 1000),
      });
    });

    it('should return an empty summary for an unmentioned token', async () => {
      expect(await new MemoryEntityStore().summarizeMentions(1)).toEqual({
        mentionCount: 0,
        firstSeen: null,
        lastSeen: null,
      });
    });

    it('should report its size', () => {
      expect(store.size).toEqual({ posts: 6, labels: 5, mentions: 8, tokens: 4, networks: 2 });
    });
  });
});
