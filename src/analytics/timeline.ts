/**
 * Timeline Builder
 * Buckets sentiment by hour, day, week or month
 */

import { z } from 'zod';

import { BucketSentimentCountRow, EntityStore, Interval, MentionFilter } from '../store/entityStore';
import { NotFoundError } from './errors';
import {
  SentimentCounts,
  emptyCounts,
  percentageOf,
  roundTo,
  sentimentScore,
  totalOf,
} from './sentimentMath';
import { formatBucketLabel, formatPeriod, resolveWindow } from './timeWindow';
import { idsOf, resolveTokenSelector } from './tokenResolver';
import { describeResolution } from './sentimentStats';
import {
  GlobalSentimentTrends,
  NetworkSentimentTotals,
  NetworkTimeline,
  SentimentTotals,
  TimelinePoint,
  TokenTimeline,
} from './types';
import { globalTrendsSchema, networkTimelineSchema, tokenTimelineSchema } from './validation';

export function summarizeCounts(counts: SentimentCounts): SentimentTotals {
  const total = totalOf(counts);
  return {
    ...counts,
    total,
    positivePct: percentageOf(counts.positive, total),
    negativePct: percentageOf(counts.negative, total),
    neutralPct: percentageOf(counts.neutral, total),
    sentimentScore: roundTo(sentimentScore(counts), 2),
  };
}

/**
 * Groups rows by bucket start, then emits one point per bucket in
 * chronological order. Empty buckets produce no point.
 */
export function buildTimeline(rows: BucketSentimentCountRow[], interval: Interval): TimelinePoint[] {
  const buckets = new Map<number, SentimentCounts>();

  for (const row of rows) {
    const key = row.bucket.getTime();
    const counts = buckets.get(key) ?? emptyCounts();
    counts[row.sentiment] += row.count;
    buckets.set(key, counts);
  }

  return [...buckets.entries()]
    .filter(([, counts]) => totalOf(counts) > 0)
    .sort(([a], [b]) => a - b)
    .map(([time, counts]) => {
      const bucketStart = new Date(time);
      const { total, positivePct, negativePct, neutralPct, sentimentScore: score } = summarizeCounts(counts);
      return {
        bucketStart,
        label: formatBucketLabel(bucketStart, interval),
        total,
        positive: counts.positive,
        negative: counts.negative,
        neutral: counts.neutral,
        positivePct,
        negativePct,
        neutralPct,
        sentimentScore: score,
      };
    });
}

function totalsOfTimeline(timeline: TimelinePoint[]): SentimentTotals {
  const counts = emptyCounts();
  for (const point of timeline) {
    counts.positive += point.positive;
    counts.negative += point.negative;
    counts.neutral += point.neutral;
  }
  return summarizeCounts(counts);
}

export async function getTokenSentimentTimeline(
  store: EntityStore,
  params: z.output<typeof tokenTimelineSchema>,
  now: Date
): Promise<TokenTimeline> {
  const tokens = await resolveTokenSelector(store, params);
  const window = resolveWindow(params.daysBack, now);
  const rows = await store.countSentimentsByBucket({ window, tokenIds: idsOf(tokens) }, params.interval);

  return {
    ...describeResolution(params, tokens),
    period: formatPeriod(window),
    window,
    interval: params.interval,
    timeline: buildTimeline(rows, params.interval),
  };
}

export async function getNetworkSentimentTimeline(
  store: EntityStore,
  params: z.output<typeof networkTimelineSchema>,
  now: Date
): Promise<NetworkTimeline> {
  const [network] = await store.findNetworks([params.network]);
  if (!network) {
    throw new NotFoundError('network', [params.network], `Blockchain network '${params.network}' not found`);
  }

  const window = resolveWindow(params.daysBack, now);
  const filter: MentionFilter = { window, networks: [network.name] };
  const rows = await store.countSentimentsByBucket(filter, params.interval);
  const timeline = buildTimeline(rows, params.interval);
  const overallSentiment = totalsOfTimeline(timeline);
  const topTokens = await store.rankSymbols(filter, { limit: 5 });

  return {
    network: { name: network.name, displayName: network.displayName ?? network.name },
    period: formatPeriod(window),
    window,
    interval: params.interval,
    totalMentions: overallSentiment.total,
    overallSentiment,
    topTokens: topTokens.map(t => ({ symbol: t.symbol, mentions: t.mentionCount })),
    timeline,
  };
}

export async function getGlobalSentimentTrends(
  store: EntityStore,
  params: z.output<typeof globalTrendsSchema>,
  now: Date
): Promise<GlobalSentimentTrends> {
  const window = resolveWindow(params.daysBack, now);

  let networksIncluded: string[] | null = null;
  if (params.topNetworks !== undefined) {
    const ranked = await store.rankNetworks({ window }, { limit: params.topNetworks });
    networksIncluded = ranked.map(r => r.network);
  }

  const filter: MentionFilter = networksIncluded ? { window, networks: networksIncluded } : { window };
  const timeline = buildTimeline(await store.countSentimentsByBucket(filter, params.interval), params.interval);

  const perNetwork = new Map<string, SentimentCounts>();
  for (const row of await store.countSentimentsByNetwork(filter)) {
    const counts = perNetwork.get(row.network) ?? emptyCounts();
    counts[row.sentiment] += row.count;
    perNetwork.set(row.network, counts);
  }

  const networkSentiment: NetworkSentimentTotals[] = [...perNetwork.entries()]
    .map(([network, counts]) => ({ network, ...summarizeCounts(counts) }))
    .sort((a, b) => b.total - a.total);

  // Overall figures come from networked tokens only, like the per-network table
  const overall = emptyCounts();
  for (const entry of networkSentiment) {
    overall.positive += entry.positive;
    overall.negative += entry.negative;
    overall.neutral += entry.neutral;
  }
  const overallSentiment = summarizeCounts(overall);

  return {
    period: formatPeriod(window),
    window,
    interval: params.interval,
    totalMentions: overallSentiment.total,
    overallSentiment,
    timeline,
    networkSentiment,
    networksIncluded,
  };
}
