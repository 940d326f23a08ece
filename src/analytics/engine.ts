/**
 * Sentiment Analytics Engine
 * Single entry point for every analytics operation
 *
 * Each call validates its parameters, resolves "now" from the injected
 * clock, runs against the EntityStore and records metrics. The engine keeps
 * no state between calls.
 */

import { LogLevel } from '../config/default';
import { QueryStatus, analyticsQueriesTotal, analyticsQueryDuration } from '../metrics';
import { EntityStore } from '../store/entityStore';
import { compareNetworksSentiment, compareTokenAcrossNetworks, compareTokenSentiments } from './comparator';
import { analyzeTokenCorrelation } from './correlation';
import { InvalidParameterError, NotFoundError } from './errors';
import { getNetworkTokenSentimentMatrix } from './matrix';
import { getSentimentMomentum } from './momentum';
import { getMostDiscussedTokens, getTopUsersByToken } from './rankings';
import { getTokenMentionStats, getTokenSentimentStats } from './sentimentStats';
import { findSimilarTokens } from './similarity';
import { getGlobalSentimentTrends, getNetworkSentimentTimeline, getTokenSentimentTimeline } from './timeline';
import {
  CrossNetworkComparison,
  GlobalSentimentTrends,
  MostDiscussedTokens,
  NetworkComparison,
  NetworkTimeline,
  SentimentMatrix,
  SentimentMomentum,
  SimilarToken,
  TokenComparison,
  TokenCorrelation,
  TokenMentionStats,
  TokenSentimentStats,
  TokenTimeline,
  TopUsersByToken,
} from './types';
import {
  CompareNetworksParams,
  CompareTokensParams,
  CorrelationParams,
  GlobalTrendsParams,
  MatrixParams,
  MentionStatsParams,
  MomentumParams,
  MostDiscussedParams,
  NetworkTimelineParams,
  SimilarityParams,
  TokenAcrossNetworksParams,
  TokenStatsParams,
  TokenTimelineParams,
  TopUsersParams,
  compareNetworksSchema,
  compareTokensSchema,
  correlationSchema,
  globalTrendsSchema,
  matrixSchema,
  mentionStatsSchema,
  momentumSchema,
  mostDiscussedSchema,
  networkTimelineSchema,
  parseParams,
  similaritySchema,
  tokenAcrossNetworksSchema,
  tokenStatsSchema,
  tokenTimelineSchema,
  topUsersSchema,
} from './validation';

// =============================================================================
// TYPES
// =============================================================================

export interface EngineOptions {
  /** Source of "now" for every window; defaults to the system clock */
  clock?: () => Date;
  logLevel?: LogLevel;
  /** Operations slower than this are logged at warn level */
  slowQueryThresholdMs?: number;
  metricsEnabled?: boolean;
}

const LOG_PRIORITY: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function statusOf(error: unknown): QueryStatus {
  if (error instanceof InvalidParameterError) return 'invalid_parameter';
  if (error instanceof NotFoundError) return 'not_found';
  return 'error';
}

// =============================================================================
// ENGINE
// =============================================================================

export class SentimentAnalyticsEngine {
  private readonly clock: () => Date;
  private readonly logLevel: LogLevel;
  private readonly slowQueryThresholdMs: number;
  private readonly metricsEnabled: boolean;

  constructor(private readonly store: EntityStore, options: EngineOptions = {}) {
    this.clock = options.clock ?? (() => new Date());
    this.logLevel = options.logLevel ?? 'info';
    this.slowQueryThresholdMs = options.slowQueryThresholdMs ?? 1000;
    this.metricsEnabled = options.metricsEnabled ?? true;
  }

  // ===========================================================================
  // Statistics & timelines
  // ===========================================================================

  getTokenSentimentStats(params: TokenStatsParams): Promise<TokenSentimentStats> {
    return this.execute('token_sentiment_stats', () =>
      getTokenSentimentStats(this.store, parseParams(tokenStatsSchema, params), this.clock())
    );
  }

  getTokenSentimentTimeline(params: TokenTimelineParams): Promise<TokenTimeline> {
    return this.execute('token_sentiment_timeline', () =>
      getTokenSentimentTimeline(this.store, parseParams(tokenTimelineSchema, params), this.clock())
    );
  }

  getNetworkSentimentTimeline(params: NetworkTimelineParams): Promise<NetworkTimeline> {
    return this.execute('network_sentiment_timeline', () =>
      getNetworkSentimentTimeline(this.store, parseParams(networkTimelineSchema, params), this.clock())
    );
  }

  getGlobalSentimentTrends(params: GlobalTrendsParams = {}): Promise<GlobalSentimentTrends> {
    return this.execute('global_sentiment_trends', () =>
      getGlobalSentimentTrends(this.store, parseParams(globalTrendsSchema, params), this.clock())
    );
  }

  // ===========================================================================
  // Comparisons
  // ===========================================================================

  compareTokenSentiments(params: CompareTokensParams): Promise<TokenComparison> {
    return this.execute('compare_token_sentiments', () =>
      compareTokenSentiments(this.store, parseParams(compareTokensSchema, params), this.clock())
    );
  }

  compareNetworksSentiment(params: CompareNetworksParams): Promise<NetworkComparison> {
    return this.execute('compare_networks_sentiment', () =>
      compareNetworksSentiment(this.store, parseParams(compareNetworksSchema, params), this.clock())
    );
  }

  compareTokenAcrossNetworks(params: TokenAcrossNetworksParams): Promise<CrossNetworkComparison> {
    return this.execute('compare_token_across_networks', () =>
      compareTokenAcrossNetworks(this.store, parseParams(tokenAcrossNetworksSchema, params), this.clock())
    );
  }

  // ===========================================================================
  // Rankings, correlation, momentum, matrix, similarity
  // ===========================================================================

  getMostDiscussedTokens(params: MostDiscussedParams = {}): Promise<MostDiscussedTokens> {
    return this.execute('most_discussed_tokens', () =>
      getMostDiscussedTokens(this.store, parseParams(mostDiscussedSchema, params), this.clock())
    );
  }

  getTopUsersByToken(params: TopUsersParams): Promise<TopUsersByToken> {
    return this.execute('top_users_by_token', () =>
      getTopUsersByToken(this.store, parseParams(topUsersSchema, params), this.clock())
    );
  }

  analyzeTokenCorrelation(params: CorrelationParams): Promise<TokenCorrelation> {
    return this.execute('token_correlation', () =>
      analyzeTokenCorrelation(this.store, parseParams(correlationSchema, params), this.clock())
    );
  }

  getSentimentMomentum(params: MomentumParams = {}): Promise<SentimentMomentum> {
    return this.execute('sentiment_momentum', () =>
      getSentimentMomentum(this.store, parseParams(momentumSchema, params), this.clock())
    );
  }

  getNetworkTokenSentimentMatrix(params: MatrixParams = {}): Promise<SentimentMatrix> {
    return this.execute('network_token_matrix', () =>
      getNetworkTokenSentimentMatrix(this.store, parseParams(matrixSchema, params), this.clock())
    );
  }

  findSimilarTokens(params: SimilarityParams): Promise<SimilarToken[]> {
    return this.execute('similar_tokens', () =>
      findSimilarTokens(this.store, parseParams(similaritySchema, params))
    );
  }

  getTokenMentionStats(params: MentionStatsParams): Promise<TokenMentionStats> {
    return this.execute('token_mention_stats', () =>
      getTokenMentionStats(this.store, parseParams(mentionStatsSchema, params))
    );
  }

  // ===========================================================================
  // Instrumentation
  // ===========================================================================

  private async execute<T>(operation: string, run: () => Promise<T>): Promise<T> {
    const endTimer = this.metricsEnabled ? analyticsQueryDuration.startTimer({ operation }) : null;
    const started = Date.now();

    try {
      const result = await run();
      this.record(operation, 'success');
      return result;
    } catch (error) {
      const status = statusOf(error);
      this.record(operation, status);

      const message = error instanceof Error ? error.message : String(error);
      if (status === 'error') {
        this.log('error', `${operation} failed: ${message}`);
      } else {
        this.log('debug', `${operation} rejected (${status}): ${message}`);
      }
      throw error;
    } finally {
      if (endTimer) endTimer();

      const elapsed = Date.now() - started;
      if (elapsed > this.slowQueryThresholdMs) {
        this.log('warn', `Slow operation ${operation}: ${elapsed}ms (threshold ${this.slowQueryThresholdMs}ms)`);
      } else {
        this.log('debug', `${operation} completed in ${elapsed}ms`);
      }
    }
  }

  private record(operation: string, status: QueryStatus): void {
    if (this.metricsEnabled) {
      analyticsQueriesTotal.inc({ operation, status });
    }
  }

  private log(level: LogLevel, message: string): void {
    if (LOG_PRIORITY[level] < LOG_PRIORITY[this.logLevel]) return;
    console[level](`[AnalyticsEngine] ${message}`);
  }
}
