/**
 * Momentum Calculator
 * Sentiment score change and mention growth between two adjacent windows
 */

import { z } from 'zod';

import { EntityStore, TimeWindow } from '../store/entityStore';
import { NotFoundError } from './errors';
import {
  SentimentCounts,
  buildDistribution,
  countsFromRows,
  roundTo,
  sentimentScore,
  totalOf,
} from './sentimentMath';
import { formatPeriod, splitWindow } from './timeWindow';
import { TokenKey, displayNameOf, sameTokenKey } from './tokenResolver';
import { MentionGrowth, MomentumPeriod, SentimentMomentum, TokenMomentum, UNBOUNDED_GROWTH } from './types';
import { momentumSchema } from './validation';

type MomentumInput = z.output<typeof momentumSchema>;

/** (total2 - total1) / total1 × 100, 1 dp; unbounded when only the second period has mentions */
export function mentionGrowth(total1: number, total2: number): MentionGrowth {
  if (total1 === 0) {
    return total2 > 0 ? UNBOUNDED_GROWTH : 0;
  }
  return roundTo(((total2 - total1) / total1) * 100, 1);
}

/**
 * Explicit symbols become (symbol, network) candidates: paired 1:1 with
 * networks when both lists have the same length, otherwise every existing
 * combination (restricted to networks when given).
 */
async function explicitCandidates(
  store: EntityStore,
  symbols: string[],
  networks: string[] | undefined
): Promise<TokenKey[]> {
  const scopeFor = (index: number): string[] | undefined => {
    if (networks === undefined || networks.length === 0) return undefined;
    return networks.length === symbols.length ? [networks[index]] : networks;
  };
  const candidates: TokenKey[] = [];
  const missing: string[] = [];

  for (const [index, symbol] of symbols.entries()) {
    const scope = scopeFor(index);
    const tokens = await store.findTokens({ symbols: [symbol], networks: scope });

    if (tokens.length === 0) {
      missing.push(scope ? `'${symbol}' in networks [${scope.join(', ')}]` : `'${symbol}'`);
      continue;
    }
    for (const token of tokens) {
      const key: TokenKey = { symbol: token.symbol, network: token.network };
      if (!candidates.some(c => sameTokenKey(c, key))) candidates.push(key);
    }
  }

  if (missing.length > 0) {
    throw new NotFoundError('token', missing, `Tokens not found: ${missing.join(', ')}`);
  }
  return candidates;
}

async function topCandidates(store: EntityStore, params: MomentumInput, window: TimeWindow): Promise<TokenKey[]> {
  const filter = params.networks && params.networks.length > 0
    ? { window, networks: params.networks }
    : { window };
  const ranked = await store.rankSymbolNetworks(filter, {
    minMentions: params.minMentions,
    limit: params.topN,
  });
  return ranked.map(({ symbol, network }) => ({ symbol, network }));
}

function periodOf(counts: SentimentCounts, window: TimeWindow): MomentumPeriod {
  return {
    period: formatPeriod(window),
    window,
    totalMentions: totalOf(counts),
    sentimentScore: roundTo(sentimentScore(counts), 3),
    sentimentBreakdown: buildDistribution(counts, 1),
  };
}

export async function getSentimentMomentum(
  store: EntityStore,
  params: MomentumInput,
  now: Date
): Promise<SentimentMomentum> {
  const { full, first, second } = splitWindow(params.daysBack, now);
  const candidates = params.symbols
    ? await explicitCandidates(store, params.symbols, params.networks)
    : await topCandidates(store, params, full);

  // Applied to each half, after candidate selection
  const perHalfMinimum = Math.floor(params.minMentions / 2);
  const tokens: TokenMomentum[] = [];

  for (const key of candidates) {
    const matching = await store.findTokens({ symbols: [key.symbol] });
    const tokenIds = matching.filter(t => t.network === key.network).map(t => t.id);
    if (tokenIds.length === 0) continue;

    const counts1 = countsFromRows(await store.countSentiments({ window: first, tokenIds }));
    const counts2 = countsFromRows(await store.countSentiments({ window: second, tokenIds }));
    const total1 = totalOf(counts1);
    const total2 = totalOf(counts2);

    if (total1 < perHalfMinimum || total2 < perHalfMinimum) continue;

    tokens.push({
      key,
      displayName: displayNameOf(key),
      period1: periodOf(counts1, first),
      period2: periodOf(counts2, second),
      momentum: roundTo(sentimentScore(counts2) - sentimentScore(counts1), 3),
      mentionGrowthPercentage: mentionGrowth(total1, total2),
    });
  }

  tokens.sort((a, b) => b.momentum - a.momentum);

  return {
    period1: formatPeriod(first),
    period2: formatPeriod(second),
    tokens,
  };
}
