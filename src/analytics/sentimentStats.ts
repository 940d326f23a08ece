/**
 * Sentiment Statistics Aggregator
 * Per-token counts, percentages, confidence averages and score
 */

import { z } from 'zod';

import { EntityStore, SentimentCountRow, TokenRecord } from '../store/entityStore';
import { NotFoundError } from './errors';
import {
  buildDetailedDistribution,
  buildDistribution,
  countsFromRows,
  roundTo,
  sentimentScore,
  totalOf,
} from './sentimentMath';
import { formatPeriod, resolveWindow } from './timeWindow';
import {
  TokenSelector,
  displayNameOf,
  groupByTokenKey,
  idsOf,
  resolveTokenSelector,
} from './tokenResolver';
import { SentimentStats, TokenMentionStats, TokenSentimentStats } from './types';
import { mentionStatsSchema, tokenStatsSchema } from './validation';

export function statsFromRows(rows: SentimentCountRow[]): SentimentStats {
  const { counts, breakdown } = buildDetailedDistribution(rows);
  return {
    totalMentions: totalOf(counts),
    sentimentScore: roundTo(sentimentScore(counts), 2),
    breakdown,
  };
}

/**
 * Display label for whatever a selector resolved to. A single composite key
 * gets its full name; a symbol spread over several networks keeps the bare
 * symbol.
 */
export function describeResolution(
  selector: TokenSelector,
  tokens: TokenRecord[]
): { token: string; network: string | null } {
  const groups = groupByTokenKey(tokens);
  if (groups.length === 1) {
    return { token: displayNameOf(groups[0].key), network: groups[0].key.network };
  }
  return {
    token: selector.symbol ?? `ID '${selector.tokenId}'`,
    network: selector.network ?? null,
  };
}

export async function getTokenSentimentStats(
  store: EntityStore,
  params: z.output<typeof tokenStatsSchema>,
  now: Date
): Promise<TokenSentimentStats> {
  const tokens = await resolveTokenSelector(store, params);
  const window = resolveWindow(params.daysBack, now);
  const rows = await store.countSentiments({ window, tokenIds: idsOf(tokens) });

  return {
    ...describeResolution(params, tokens),
    tokenIds: idsOf(tokens),
    period: formatPeriod(window),
    window,
    ...statsFromRows(rows),
  };
}

export async function getTokenMentionStats(
  store: EntityStore,
  params: z.output<typeof mentionStatsSchema>
): Promise<TokenMentionStats> {
  const [token] = await store.findTokens({ ids: [params.tokenId] });
  if (!token) {
    throw new NotFoundError('token', [String(params.tokenId)], `Token with ID ${params.tokenId} not found`);
  }

  const summary = await store.summarizeMentions(token.id);
  const counts = countsFromRows(await store.countSentiments({ tokenIds: [token.id] }));

  return {
    tokenId: token.id,
    symbol: token.symbol,
    name: token.name,
    network: token.network,
    mentionCount: summary.mentionCount,
    firstSeen: summary.firstSeen,
    lastSeen: summary.lastSeen,
    sentimentScore: roundTo(sentimentScore(counts), 2),
    sentimentDistribution: buildDistribution(counts),
  };
}
