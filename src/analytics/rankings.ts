/**
 * Rankings
 * Most-discussed tokens and most active authors per token
 */

import { z } from 'zod';

import { EntityStore } from '../store/entityStore';
import { buildDistribution, countsFromRows, roundTo, sentimentScore } from './sentimentMath';
import { describeResolution } from './sentimentStats';
import { formatPeriod, resolveWindow } from './timeWindow';
import { displayNameOf, idsOf, resolveTokenSelector, tokenKeyOf } from './tokenResolver';
import { DiscussedToken, MostDiscussedTokens, TopUser, TopUsersByToken } from './types';
import { mostDiscussedSchema, topUsersSchema } from './validation';

export async function getMostDiscussedTokens(
  store: EntityStore,
  params: z.output<typeof mostDiscussedSchema>,
  now: Date
): Promise<MostDiscussedTokens> {
  const window = resolveWindow(params.daysBack, now);
  const ranked = await store.rankTokens(
    params.network ? { window, networks: [params.network] } : { window },
    { minMentions: params.minMentions, limit: params.limit }
  );

  const tokens: DiscussedToken[] = [];
  for (const { token, mentionCount } of ranked) {
    const counts = countsFromRows(await store.countSentiments({ window, tokenIds: [token.id] }));
    tokens.push({
      tokenId: token.id,
      symbol: token.symbol,
      name: token.name,
      network: token.network,
      displayName: displayNameOf(tokenKeyOf(token)),
      mentionCount,
      sentimentScore: roundTo(sentimentScore(counts), 2),
      sentimentBreakdown: buildDistribution(counts),
    });
  }

  return {
    period: formatPeriod(window),
    window,
    network: params.network ?? null,
    tokens,
  };
}

/** (likes + 2 × reshares) per post */
export function engagementRate(totalLikes: number, totalReshares: number, postCount: number): number {
  return postCount > 0 ? (totalLikes + totalReshares * 2) / postCount : 0;
}

/** Engagement scaled by activity; a ranking aid only */
export function influenceScore(rate: number, postCount: number): number {
  return (rate * postCount) / 1000;
}

export async function getTopUsersByToken(
  store: EntityStore,
  params: z.output<typeof topUsersSchema>,
  now: Date
): Promise<TopUsersByToken> {
  const tokens = await resolveTokenSelector(store, params);
  const window = resolveWindow(params.daysBack, now);
  const tokenIds = idsOf(tokens);
  const authors = await store.rankAuthors({ window, tokenIds }, params.limit);

  const topUsers: TopUser[] = [];
  for (const author of authors) {
    const counts = countsFromRows(
      await store.countSentiments({ window, tokenIds, authorId: author.authorId })
    );
    const rate = engagementRate(author.totalLikes, author.totalReshares, author.postCount);

    topUsers.push({
      authorId: author.authorId,
      authorHandle: author.authorHandle,
      postCount: author.postCount,
      totalLikes: author.totalLikes,
      totalReshares: author.totalReshares,
      engagementRate: roundTo(rate, 2),
      influenceScore: roundTo(influenceScore(rate, author.postCount), 2),
      sentimentDistribution: buildDistribution(counts),
    });
  }

  return {
    ...describeResolution(params, tokens),
    period: formatPeriod(window),
    window,
    topUsers,
  };
}
