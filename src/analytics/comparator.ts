/**
 * Comparator
 * Side-by-side statistics for tokens, networks, and one symbol across networks
 */

import { z } from 'zod';

import { EntityStore, TokenRecord } from '../store/entityStore';
import { NotFoundError } from './errors';
import { percentageOf } from './sentimentMath';
import { statsFromRows } from './sentimentStats';
import { formatDate, formatPeriod, resolveWindow } from './timeWindow';
import {
  TokenKey,
  displayNameOf,
  groupByTokenKey,
  idsOf,
  resolveAllSelectors,
  sameTokenKey,
} from './tokenResolver';
import {
  CrossNetworkComparison,
  CrossNetworkEntry,
  NetworkComparison,
  NetworkComparisonEntry,
  TokenComparison,
} from './types';
import { compareNetworksSchema, compareTokensSchema, tokenAcrossNetworksSchema } from './validation';

// =============================================================================
// TOKENS
// =============================================================================

export async function compareTokenSentiments(
  store: EntityStore,
  params: z.output<typeof compareTokensSchema>,
  now: Date
): Promise<TokenComparison> {
  // All-or-nothing: every selector must resolve before any statistics run
  const resolved = await resolveAllSelectors(store, params.tokens, params.networks);
  const window = resolveWindow(params.daysBack, now);

  const entries: Array<{ key: TokenKey; tokens: TokenRecord[] }> = [];
  for (const { tokens } of resolved) {
    for (const group of groupByTokenKey(tokens)) {
      const existing = entries.find(e => sameTokenKey(e.key, group.key));
      if (!existing) {
        entries.push(group);
        continue;
      }
      for (const token of group.tokens) {
        if (!existing.tokens.some(t => t.id === token.id)) existing.tokens.push(token);
      }
    }
  }

  const allIds = [...new Set(entries.flatMap(e => idsOf(e.tokens)))];
  const rows = await store.countSentimentsByToken({ window, tokenIds: allIds });

  return {
    period: formatPeriod(window),
    window,
    tokens: entries.map(({ key, tokens }) => {
      const ids = new Set(idsOf(tokens));
      return {
        key,
        displayName: displayNameOf(key),
        tokenIds: [...ids],
        ...statsFromRows(rows.filter(r => ids.has(r.tokenId))),
      };
    }),
  };
}

// =============================================================================
// NETWORKS
// =============================================================================

export async function compareNetworksSentiment(
  store: EntityStore,
  params: z.output<typeof compareNetworksSchema>,
  now: Date
): Promise<NetworkComparison> {
  const requested = [...new Set(params.networks)];
  const existing = new Set((await store.findNetworks(requested)).map(n => n.name));
  const missing = requested.filter(name => !existing.has(name));
  if (missing.length > 0) {
    throw new NotFoundError(
      'network',
      missing,
      `Blockchain networks with names [${missing.join(', ')}] not found`
    );
  }

  const window = resolveWindow(params.daysBack, now);
  const networks: NetworkComparisonEntry[] = [];

  for (const network of requested) {
    const qualifying = await store.rankTokens(
      { window, networks: [network] },
      { minMentions: params.minMentionsPerToken }
    );
    if (qualifying.length < params.minTokensPerNetwork) continue;

    const rows = await store.countSentiments({ window, networks: [network] });
    networks.push({
      network,
      totalTokens: qualifying.length,
      topTokens: qualifying.slice(0, 10).map(({ token, mentionCount }) => ({
        tokenId: token.id,
        symbol: token.symbol,
        mentions: mentionCount,
      })),
      ...statsFromRows(rows),
    });
  }

  networks.sort((a, b) => b.totalMentions - a.totalMentions);

  return { period: formatPeriod(window), window, networks };
}

// =============================================================================
// ONE SYMBOL ACROSS NETWORKS
// =============================================================================

export async function compareTokenAcrossNetworks(
  store: EntityStore,
  params: z.output<typeof tokenAcrossNetworksSchema>,
  now: Date
): Promise<CrossNetworkComparison> {
  const filterNetworks = params.networks && params.networks.length > 0 ? params.networks : undefined;
  const tokens = await store.findTokens({ symbols: [params.symbol], networks: filterNetworks });

  if (tokens.length === 0) {
    const scope = filterNetworks ? ` in specified networks [${filterNetworks.join(', ')}]` : '';
    throw new NotFoundError('token', [params.symbol], `Token with symbol '${params.symbol}' not found${scope}`);
  }

  const window = resolveWindow(params.daysBack, now);
  const hosted = [...new Set(tokens.flatMap(t => (t.network ? [t.network] : [])))];
  const entries: Array<Omit<CrossNetworkEntry, 'popularityPercentage'>> = [];

  for (const network of hosted) {
    const tokenIds = idsOf(tokens.filter(t => t.network === network));
    const filter = { window, tokenIds };
    const stats = statsFromRows(await store.countSentiments(filter));
    if (stats.totalMentions === 0) continue;

    const daily = await store.countMentionsByBucket(filter, 'day');
    const authors = await store.rankAuthors(filter, 5);

    entries.push({
      network,
      ...stats,
      timeline: daily.map(d => ({ date: formatDate(d.bucket), mentions: d.mentionCount })),
      topUsers: authors.map(a => ({ authorHandle: a.authorHandle, postCount: a.postCount })),
    });
  }

  const totalAll = entries.reduce((sum, e) => sum + e.totalMentions, 0);
  const networks = entries
    .map(e => ({ ...e, popularityPercentage: percentageOf(e.totalMentions, totalAll, 1) }))
    .sort((a, b) => b.totalMentions - a.totalMentions);

  return {
    symbol: params.symbol,
    period: formatPeriod(window),
    window,
    networks,
    totalMentionsAllNetworks: totalAll,
  };
}
