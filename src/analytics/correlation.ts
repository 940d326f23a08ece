/**
 * Correlation Analyzer
 * Tokens that share posts with a primary token
 */

import { z } from 'zod';

import { EntityStore } from '../store/entityStore';
import { buildDistribution, countsFromRows, percentageOf } from './sentimentMath';
import { describeResolution } from './sentimentStats';
import { formatPeriod, resolveWindow } from './timeWindow';
import { displayNameOf, idsOf, resolveTokenSelector, tokenKeyOf } from './tokenResolver';
import { CorrelatedToken, TokenCorrelation } from './types';
import { correlationSchema } from './validation';

export async function analyzeTokenCorrelation(
  store: EntityStore,
  params: z.output<typeof correlationSchema>,
  now: Date
): Promise<TokenCorrelation> {
  const selector = { symbol: params.symbol, network: params.network };
  const primaryTokens = await resolveTokenSelector(store, selector);
  const primaryIds = idsOf(primaryTokens);
  const window = resolveWindow(params.daysBack, now);

  // Three reads; they are not atomic and may see slightly different snapshots
  const totalMentions = await store.countMentions({ window, tokenIds: primaryIds });
  const coMentioned = await store.countCoMentions(primaryIds, window, {
    minMentions: params.minCoMentions,
    limit: params.limit,
  });

  const correlatedTokens: CorrelatedToken[] = [];
  for (const { token, coMentionCount } of coMentioned) {
    const combined = countsFromRows(await store.countCoMentionSentiments(primaryIds, token.id, window));
    correlatedTokens.push({
      tokenId: token.id,
      symbol: token.symbol,
      name: token.name,
      network: token.network,
      displayName: displayNameOf(tokenKeyOf(token)),
      coMentionCount,
      correlationPercentage: Math.min(100, percentageOf(coMentionCount, totalMentions)),
      combinedSentiment: buildDistribution(combined),
    });
  }

  const { token: displayName, network } = describeResolution(selector, primaryTokens);

  return {
    primaryToken: {
      tokenIds: primaryIds,
      symbol: params.symbol,
      network,
      displayName,
      totalMentions,
    },
    period: formatPeriod(window),
    window,
    correlatedTokens,
  };
}
