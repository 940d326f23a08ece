/**
 * Comparator Tests
 */

import {
  compareNetworksSentiment,
  compareTokenAcrossNetworks,
  compareTokenSentiments,
} from '../../src/analytics/comparator';
import { NotFoundError } from '../../src/analytics/errors';
import {
  compareNetworksSchema,
  compareTokensSchema,
  parseParams,
  tokenAcrossNetworksSchema,
} from '../../src/analytics/validation';
import { DatasetBuilder, NOW, daysAgo, hoursAgo } from '../helpers/datasetBuilder';

describe('Comparator', () => {
  const builder = new DatasetBuilder().network('ethereum').network('solana').network('polygon');
  const USDC_ETH = builder.token('USDC', 'ethereum');
  const USDC_SOL = builder.token('USDC', 'solana');
  const USDC_POLY = builder.token('USDC', 'polygon');
  const SOL = builder.token('SOL', 'solana');
  const ETH = builder.token('ETH', 'ethereum');
  const LINK = builder.token('LINK', 'ethereum');

  builder
    .repeat(2, { at: hoursAgo(2), tokens: [USDC_ETH], sentiment: 'positive', author: 'alice' })
    .repeat(1, { at: hoursAgo(3), tokens: [USDC_SOL], sentiment: 'negative', author: 'bob' })
    .repeat(3, { at: hoursAgo(4), tokens: [SOL], sentiment: 'positive' })
    .repeat(1, { at: hoursAgo(4), tokens: [SOL], sentiment: 'negative' })
    .repeat(1, { at: hoursAgo(5), tokens: [ETH], sentiment: 'neutral' })
    .repeat(1, { at: daysAgo(1), tokens: [LINK], sentiment: 'positive' })
    .repeat(1, { at: daysAgo(40), tokens: [USDC_POLY], sentiment: 'positive' });

  const store = builder.store();

  describe('compareTokenSentiments', () => {
    const compare = (input: unknown) => compareTokenSentiments(store, parseParams(compareTokensSchema, input), NOW);

    it('should expand a bare symbol into one entry per network', async () => {
      const result = await compare({ tokens: [{ symbol: 'SOL' }, { symbol: 'USDC' }] });

      expect(result.tokens.map(t => [t.displayName, t.totalMentions, t.sentimentScore])).toEqual([
        ['SOL (solana)', 4, 0.5],
        ['USDC (ethereum)', 2, 1],
        ['USDC (solana)', 1, -1],
        ['USDC (polygon)', 0, 0],
      ]);
      expect(result.tokens[1].key).toEqual({ symbol: 'USDC', network: 'ethereum' });
      expect(result.tokens[1].tokenIds).toEqual([USDC_ETH]);
    });

    it('should merge selectors that resolve to the same token', async () => {
      const result = await compare({ tokens: [{ symbol: 'SOL' }, { tokenId: SOL }] });
      expect(result.tokens).toHaveLength(1);
      expect(result.tokens[0].tokenIds).toEqual([SOL]);
    });

    it('should narrow bare symbols to the given networks', async () => {
      const result = await compare({ tokens: [{ symbol: 'USDC' }], networks: ['solana'] });
      expect(result.tokens.map(t => t.displayName)).toEqual(['USDC (solana)']);
    });

    it('should let a selector network override the network list', async () => {
      const result = await compare({ tokens: [{ symbol: 'USDC', network: 'ethereum' }], networks: ['solana'] });
      expect(result.tokens.map(t => t.displayName)).toEqual(['USDC (ethereum)']);
    });

    it('should report every unresolved selector together', async () => {
      const error = await compare({ tokens: [{ symbol: 'SOL' }, { symbol: 'DOGE' }, { tokenId: 99 }] })
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(NotFoundError);
      if (error instanceof NotFoundError) {
        expect(error.missing).toEqual(["'DOGE'", "ID '99'"]);
        expect(error.message).toBe("Tokens not found: 'DOGE', ID '99'");
      }
    });

    it('should name the network list for symbols missing from it', async () => {
      await expect(compare({ tokens: [{ symbol: 'SOL' }], networks: ['polygon'] }))
        .rejects.toThrow("Tokens not found: 'SOL' in networks [polygon]");
    });
  });

  describe('compareNetworksSentiment', () => {
    const compare = (input: unknown) =>
      compareNetworksSentiment(store, parseParams(compareNetworksSchema, input), NOW);

    it('should rank networks by total mentions', async () => {
      const result = await compare({
        networks: ['ethereum', 'solana'],
        daysBack: 7,
        minTokensPerNetwork: 1,
        minMentionsPerToken: 1,
      });

      expect(result.networks.map(n => [n.network, n.totalMentions, n.sentimentScore, n.totalTokens])).toEqual([
        ['solana', 5, 0.2, 2],
        ['ethereum', 4, 0.75, 3],
      ]);
      expect(result.networks[1].topTokens).toEqual([
        { tokenId: USDC_ETH, symbol: 'USDC', mentions: 2 },
        { tokenId: ETH, symbol: 'ETH', mentions: 1 },
        { tokenId: LINK, symbol: 'LINK', mentions: 1 },
      ]);
    });

    it('should skip networks with too few qualifying tokens', async () => {
      const result = await compare({
        networks: ['ethereum', 'solana'],
        daysBack: 7,
        minTokensPerNetwork: 3,
        minMentionsPerToken: 1,
      });
      expect(result.networks.map(n => n.network)).toEqual(['ethereum']);
    });

    it('should only count tokens meeting the mention threshold', async () => {
      const result = await compare({
        networks: ['ethereum', 'solana', 'ethereum'],
        daysBack: 7,
        minTokensPerNetwork: 1,
        minMentionsPerToken: 2,
      });
      expect(result.networks.map(n => [n.network, n.totalTokens])).toEqual([
        ['solana', 1],
        ['ethereum', 1],
      ]);
    });

    it('should return no networks under the default thresholds', async () => {
      const result = await compare({ networks: ['ethereum'] });
      expect(result.networks).toEqual([]);
    });

    it('should reject unknown networks', async () => {
      await expect(compare({ networks: ['ethereum', 'cosmos', 'atom'] }))
        .rejects.toThrow('Blockchain networks with names [cosmos, atom] not found');
    });
  });

  describe('compareTokenAcrossNetworks', () => {
    const compare = (input: unknown) =>
      compareTokenAcrossNetworks(store, parseParams(tokenAcrossNetworksSchema, input), NOW);

    it('should compare a symbol on every network that mentions it', async () => {
      const result = await compare({ symbol: 'USDC', daysBack: 7 });

      expect(result.symbol).toBe('USDC');
      expect(result.totalMentionsAllNetworks).toBe(3);
      expect(result.networks.map(n => [n.network, n.totalMentions, n.popularityPercentage])).toEqual([
        ['ethereum', 2, 66.7],
        ['solana', 1, 33.3],
      ]);
      expect(result.networks[0].timeline).toEqual([{ date: '2024-03-15', mentions: 2 }]);
      expect(result.networks[0].topUsers).toEqual([{ authorHandle: '@alice', postCount: 2 }]);
    });

    it('should restrict to the given networks', async () => {
      const result = await compare({ symbol: 'USDC', networks: ['solana'], daysBack: 7 });
      expect(result.networks.map(n => [n.network, n.popularityPercentage])).toEqual([['solana', 100]]);
    });

    it('should return no networks when nothing was said in the window', async () => {
      const result = await compare({ symbol: 'USDC', networks: ['polygon'], daysBack: 7 });
      expect(result.networks).toEqual([]);
      expect(result.totalMentionsAllNetworks).toBe(0);
    });

    it('should reject an unknown symbol', async () => {
      await expect(compare({ symbol: 'DOGE' })).rejects.toThrow("Token with symbol 'DOGE' not found");
      await expect(compare({ symbol: 'SOL', networks: ['polygon'] }))
        .rejects.toThrow("Token with symbol 'SOL' not found in specified networks [polygon]");
    });
  });
});
