/**
 * Sentiment Math
 * Breakdowns, percentages and the normalized sentiment score
 */

import { Sentiment, SentimentCountRow } from '../store/entityStore';

export interface SentimentCounts {
  positive: number;
  negative: number;
  neutral: number;
}

export interface SentimentShare {
  count: number;
  percentage: number;
}

export interface SentimentBreakdown extends SentimentShare {
  avgConfidence: number;
}

export type SentimentDistribution = Record<Sentiment, SentimentShare>;

export type DetailedSentimentDistribution = Record<Sentiment, SentimentBreakdown>;

export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

export function emptyCounts(): SentimentCounts {
  return { positive: 0, negative: 0, neutral: 0 };
}

export function totalOf(counts: SentimentCounts): number {
  return counts.positive + counts.negative + counts.neutral;
}

/** Percentage of total, 0 when total is 0 */
export function percentageOf(count: number, total: number, digits = 2): number {
  return total > 0 ? roundTo((count / total) * 100, digits) : 0;
}

/** (positive - negative) / total, in [-1, 1]; 0 when there is nothing to score */
export function sentimentScore(counts: SentimentCounts): number {
  const total = totalOf(counts);
  if (total === 0) return 0;
  const score = (counts.positive - counts.negative) / total;
  return Math.max(-1, Math.min(1, score));
}

/** Sums rows per sentiment; several rows for one sentiment are merged */
export function countsFromRows(rows: Iterable<Pick<SentimentCountRow, 'sentiment' | 'count'>>): SentimentCounts {
  const counts = emptyCounts();
  for (const row of rows) {
    counts[row.sentiment] += row.count;
  }
  return counts;
}

export function buildDistribution(counts: SentimentCounts, digits = 2): SentimentDistribution {
  const total = totalOf(counts);
  const shareOf = (sentiment: Sentiment): SentimentShare => ({
    count: counts[sentiment],
    percentage: percentageOf(counts[sentiment], total, digits),
  });
  return {
    positive: shareOf('positive'),
    negative: shareOf('negative'),
    neutral: shareOf('neutral'),
  };
}

/**
 * Full breakdown with confidence averages. Confidence is weighted by row
 * count so that merged rows keep the same mean as a single grouped row.
 */
export function buildDetailedDistribution(rows: SentimentCountRow[]): {
  counts: SentimentCounts;
  breakdown: DetailedSentimentDistribution;
} {
  const counts = countsFromRows(rows);
  const total = totalOf(counts);
  const confidenceSums: Record<Sentiment, number> = { positive: 0, negative: 0, neutral: 0 };

  for (const row of rows) {
    confidenceSums[row.sentiment] += row.avgConfidence * row.count;
  }

  const entry = (sentiment: Sentiment): SentimentBreakdown => {
    const count = counts[sentiment];
    return {
      count,
      percentage: percentageOf(count, total),
      avgConfidence: count > 0 ? roundTo(confidenceSums[sentiment] / count, 2) : 0,
    };
  };

  return {
    counts,
    breakdown: {
      positive: entry('positive'),
      negative: entry('negative'),
      neutral: entry('neutral'),
    },
  };
}
