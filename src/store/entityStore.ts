/**
 * Entity Store
 * Read-only access to posts, sentiment labels, token mentions, tokens and networks
 *
 * The analytics engine only ever issues the filtered, grouped and joined reads
 * declared here. Implementations: PostgresEntityStore (pg) and
 * MemoryEntityStore (in-process arrays).
 */

// =============================================================================
// ENTITIES
// =============================================================================

export const SENTIMENTS = ['positive', 'negative', 'neutral'] as const;

export type Sentiment = (typeof SENTIMENTS)[number];

export const INTERVALS = ['hour', 'day', 'week', 'month'] as const;

export type Interval = (typeof INTERVALS)[number];

export interface PostRecord {
  id: number;
  externalId: string;
  text: string;
  createdAt: Date;
  authorId: string;
  authorHandle: string | null;
  likeCount: number;
  reshareCount: number;
}

export interface SentimentLabelRecord {
  id: number;
  postId: number;
  sentiment: Sentiment;
  /** Classifier confidence in [0, 1] */
  confidence: number;
  analyzedAt: Date;
}

export interface TokenMentionRecord {
  id: number;
  postId: number;
  tokenId: number;
  mentionedAt: Date;
}

export interface TokenRecord {
  id: number;
  address: string;
  symbol: string;
  name: string | null;
  network: string | null;
}

export interface NetworkRecord {
  id: number;
  name: string;
  displayName: string | null;
}

/** Half-open range: start <= createdAt < end */
export interface TimeWindow {
  start: Date;
  end: Date;
}

// =============================================================================
// QUERY CRITERIA
// =============================================================================

export interface TokenCriteria {
  ids?: number[];
  symbols?: string[];
  networks?: string[];
  excludeIds?: number[];
}

/**
 * Restricts the Post ⋈ TokenMention ⋈ Token join. Omitted fields do not
 * filter; an empty array matches nothing.
 */
export interface MentionFilter {
  window?: TimeWindow;
  tokenIds?: number[];
  networks?: string[];
  /** Only tokens that belong to some network */
  requireNetwork?: boolean;
  authorId?: string;
}

export interface RankOptions {
  minMentions?: number;
  limit?: number;
}

// =============================================================================
// RESULT ROWS
// =============================================================================

export interface SentimentCountRow {
  sentiment: Sentiment;
  count: number;
  avgConfidence: number;
}

export interface TokenSentimentCountRow extends SentimentCountRow {
  tokenId: number;
}

export interface NetworkSentimentCountRow extends SentimentCountRow {
  network: string;
}

export interface BucketSentimentCountRow extends SentimentCountRow {
  bucket: Date;
}

export interface BucketMentionCountRow {
  bucket: Date;
  mentionCount: number;
}

export interface TokenMentionCount {
  token: TokenRecord;
  mentionCount: number;
}

export interface SymbolMentionCount {
  symbol: string;
  mentionCount: number;
}

export interface SymbolNetworkMentionCount {
  symbol: string;
  network: string | null;
  mentionCount: number;
}

export interface NetworkMentionCount {
  network: string;
  mentionCount: number;
}

export interface AuthorActivityRow {
  authorId: string;
  authorHandle: string | null;
  postCount: number;
  totalLikes: number;
  totalReshares: number;
}

export interface CoMentionCount {
  token: TokenRecord;
  coMentionCount: number;
}

export interface MentionSummary {
  mentionCount: number;
  firstSeen: Date | null;
  lastSeen: Date | null;
}

// =============================================================================
// STORE INTERFACE
// =============================================================================

export interface EntityStore {
  /** Tokens matching every given criterion, ordered by id */
  findTokens(criteria: TokenCriteria): Promise<TokenRecord[]>;

  /** Networks by name (all networks when names is omitted), ordered by id */
  findNetworks(names?: string[]): Promise<NetworkRecord[]>;

  /** Labelled mentions grouped by sentiment */
  countSentiments(filter: MentionFilter): Promise<SentimentCountRow[]>;

  countSentimentsByToken(filter: MentionFilter): Promise<TokenSentimentCountRow[]>;

  /** Grouped by token network; tokens without a network are skipped */
  countSentimentsByNetwork(filter: MentionFilter): Promise<NetworkSentimentCountRow[]>;

  /** Grouped by post creation time truncated (UTC) to the interval */
  countSentimentsByBucket(filter: MentionFilter, interval: Interval): Promise<BucketSentimentCountRow[]>;

  /** Mention rows, labelled or not */
  countMentions(filter: MentionFilter): Promise<number>;

  countMentionsByBucket(filter: MentionFilter, interval: Interval): Promise<BucketMentionCountRow[]>;

  /** Ordered by mention count desc, then token id asc */
  rankTokens(filter: MentionFilter, options?: RankOptions): Promise<TokenMentionCount[]>;

  /** Grouped by symbol only; ordered by mention count desc, then symbol asc */
  rankSymbols(filter: MentionFilter, options?: RankOptions): Promise<SymbolMentionCount[]>;

  /** Grouped by (symbol, network); ordered by mention count desc, then symbol, network */
  rankSymbolNetworks(filter: MentionFilter, options?: RankOptions): Promise<SymbolNetworkMentionCount[]>;

  /** Tokens without a network are skipped; ordered by mention count desc, then name */
  rankNetworks(filter: MentionFilter, options?: RankOptions): Promise<NetworkMentionCount[]>;

  /** Distinct posts per author; ordered by post count desc, likes desc, author id asc */
  rankAuthors(filter: MentionFilter, limit: number): Promise<AuthorActivityRow[]>;

  /**
   * Tokens outside primaryTokenIds that share a post with any primary token,
   * counted as distinct posts; ordered by count desc, then token id asc
   */
  countCoMentions(
    primaryTokenIds: number[],
    window: TimeWindow,
    options?: RankOptions
  ): Promise<CoMentionCount[]>;

  /** Sentiment of distinct posts mentioning a primary token and the other token */
  countCoMentionSentiments(
    primaryTokenIds: number[],
    otherTokenId: number,
    window: TimeWindow
  ): Promise<SentimentCountRow[]>;

  /** All-time mention count and first/last mention timestamps */
  summarizeMentions(tokenId: number): Promise<MentionSummary>;
}
