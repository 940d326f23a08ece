/**
 * Analytics Result Types
 * One explicit record per operation
 */

import { Interval, TimeWindow } from '../store/entityStore';
import {
  DetailedSentimentDistribution,
  SentimentCounts,
  SentimentDistribution,
} from './sentimentMath';
import { TokenKey } from './tokenResolver';

export interface PeriodInfo {
  /** "YYYY-MM-DD to YYYY-MM-DD" */
  period: string;
  window: TimeWindow;
}

// =============================================================================
// STATISTICS
// =============================================================================

export interface SentimentStats {
  totalMentions: number;
  /** (positive - negative) / total, 2 dp */
  sentimentScore: number;
  breakdown: DetailedSentimentDistribution;
}

export interface TokenSentimentStats extends SentimentStats, PeriodInfo {
  /** "SOL", "SOL (solana)" or "ID '7'" */
  token: string;
  network: string | null;
  tokenIds: number[];
}

// =============================================================================
// TIMELINES
// =============================================================================

export interface TimelinePoint extends SentimentCounts {
  bucketStart: Date;
  label: string;
  total: number;
  positivePct: number;
  negativePct: number;
  neutralPct: number;
  sentimentScore: number;
}

export interface TokenTimeline extends PeriodInfo {
  token: string;
  network: string | null;
  interval: Interval;
  timeline: TimelinePoint[];
}

export interface SentimentTotals extends SentimentCounts {
  total: number;
  positivePct: number;
  negativePct: number;
  neutralPct: number;
  sentimentScore: number;
}

export interface SymbolMentions {
  symbol: string;
  mentions: number;
}

export interface NetworkTimeline extends PeriodInfo {
  network: { name: string; displayName: string };
  interval: Interval;
  totalMentions: number;
  overallSentiment: SentimentTotals;
  topTokens: SymbolMentions[];
  timeline: TimelinePoint[];
}

export interface NetworkSentimentTotals extends SentimentTotals {
  network: string;
}

export interface GlobalSentimentTrends extends PeriodInfo {
  interval: Interval;
  totalMentions: number;
  overallSentiment: SentimentTotals;
  timeline: TimelinePoint[];
  /** Sorted by descending total */
  networkSentiment: NetworkSentimentTotals[];
  /** Networks the trend was restricted to, null when unrestricted */
  networksIncluded: string[] | null;
}

// =============================================================================
// COMPARISONS
// =============================================================================

export interface TokenComparisonEntry extends SentimentStats {
  key: TokenKey;
  displayName: string;
  tokenIds: number[];
}

export interface TokenComparison extends PeriodInfo {
  /** Input order, one entry per distinct (symbol, network) */
  tokens: TokenComparisonEntry[];
}

export interface NetworkTokenMentions {
  tokenId: number;
  symbol: string;
  mentions: number;
}

export interface NetworkComparisonEntry extends SentimentStats {
  network: string;
  /** Tokens meeting the per-token mention threshold */
  totalTokens: number;
  topTokens: NetworkTokenMentions[];
}

export interface NetworkComparison extends PeriodInfo {
  /** Sorted by descending total mentions */
  networks: NetworkComparisonEntry[];
}

export interface DailyMentions {
  date: string;
  mentions: number;
}

export interface AuthorPostCount {
  authorHandle: string | null;
  postCount: number;
}

export interface CrossNetworkEntry extends SentimentStats {
  network: string;
  timeline: DailyMentions[];
  topUsers: AuthorPostCount[];
  /** Share of mentions across all listed networks, 1 dp */
  popularityPercentage: number;
}

export interface CrossNetworkComparison extends PeriodInfo {
  symbol: string;
  /** Sorted by descending total mentions */
  networks: CrossNetworkEntry[];
  totalMentionsAllNetworks: number;
}

// =============================================================================
// RANKINGS
// =============================================================================

export interface DiscussedToken {
  tokenId: number;
  symbol: string;
  name: string | null;
  network: string | null;
  displayName: string;
  mentionCount: number;
  sentimentScore: number;
  sentimentBreakdown: SentimentDistribution;
}

export interface MostDiscussedTokens extends PeriodInfo {
  network: string | null;
  tokens: DiscussedToken[];
}

/**
 * engagementRate and influenceScore are presentation heuristics, not
 * calibrated measures of reach.
 */
export interface TopUser {
  authorId: string;
  authorHandle: string | null;
  postCount: number;
  totalLikes: number;
  totalReshares: number;
  engagementRate: number;
  influenceScore: number;
  sentimentDistribution: SentimentDistribution;
}

export interface TopUsersByToken extends PeriodInfo {
  token: string;
  network: string | null;
  topUsers: TopUser[];
}

// =============================================================================
// CORRELATION
// =============================================================================

export interface CorrelatedToken {
  tokenId: number;
  symbol: string;
  name: string | null;
  network: string | null;
  displayName: string;
  coMentionCount: number;
  /** coMentionCount / primary total mentions × 100, in [0, 100] */
  correlationPercentage: number;
  combinedSentiment: SentimentDistribution;
}

export interface TokenCorrelation extends PeriodInfo {
  primaryToken: {
    tokenIds: number[];
    symbol: string;
    network: string | null;
    displayName: string;
    totalMentions: number;
  };
  correlatedTokens: CorrelatedToken[];
}

// =============================================================================
// MOMENTUM
// =============================================================================

export const UNBOUNDED_GROWTH = 'unbounded' as const;

/** Percentage, or UNBOUNDED_GROWTH when the first period had no mentions */
export type MentionGrowth = number | typeof UNBOUNDED_GROWTH;

export interface MomentumPeriod extends PeriodInfo {
  totalMentions: number;
  /** 3 dp */
  sentimentScore: number;
  sentimentBreakdown: SentimentDistribution;
}

export interface TokenMomentum {
  key: TokenKey;
  displayName: string;
  period1: MomentumPeriod;
  period2: MomentumPeriod;
  momentum: number;
  mentionGrowthPercentage: MentionGrowth;
}

export interface SentimentMomentum {
  period1: string;
  period2: string;
  /** Sorted by descending momentum */
  tokens: TokenMomentum[];
}

// =============================================================================
// MATRIX
// =============================================================================

export interface MatrixCell {
  mentions: number;
  sentimentScore: number;
  counts: SentimentCounts;
}

export interface MatrixRow {
  symbol: string;
  /** Aligned with SentimentMatrix.networks; null marks an absent pair */
  cells: Array<MatrixCell | null>;
  totalMentions: number;
}

export interface SentimentMatrix extends PeriodInfo {
  networks: string[];
  tokens: string[];
  rows: MatrixRow[];
}

// =============================================================================
// SIMILARITY & MENTION SUMMARY
// =============================================================================

export interface SimilarToken {
  tokenId: number;
  symbol: string;
  name: string | null;
  network: string | null;
  similarity: number;
}

export interface TokenMentionStats {
  tokenId: number;
  symbol: string;
  name: string | null;
  network: string | null;
  mentionCount: number;
  firstSeen: Date | null;
  lastSeen: Date | null;
  sentimentScore: number;
  sentimentDistribution: SentimentDistribution;
}
