/**
 * PostgreSQL Entity Store
 * EntityStore reads as parameterised SQL over a pg Pool
 *
 * Tables: networks, tokens, posts, sentiment_labels, token_mentions
 * (see src/database/migrations). Every query is read-only.
 */

import { QueryResultRow } from 'pg';

import { storeQueriesTotal } from '../metrics';
import {
  AuthorActivityRow,
  BucketMentionCountRow,
  BucketSentimentCountRow,
  CoMentionCount,
  EntityStore,
  Interval,
  MentionFilter,
  MentionSummary,
  NetworkMentionCount,
  NetworkRecord,
  NetworkSentimentCountRow,
  RankOptions,
  SENTIMENTS,
  Sentiment,
  SentimentCountRow,
  SymbolMentionCount,
  SymbolNetworkMentionCount,
  TimeWindow,
  TokenCriteria,
  TokenMentionCount,
  TokenRecord,
  TokenSentimentCountRow,
} from './entityStore';

/** The part of pg's Pool (or PoolClient) the store needs */
export interface SqlClient {
  query(text: string, values: unknown[]): Promise<{ rows: QueryResultRow[] }>;
}

// =============================================================================
// SQL FRAGMENTS
// =============================================================================

const MENTION_JOIN = `
  FROM token_mentions tm
  JOIN posts p ON p.id = tm.post_id
  JOIN tokens t ON t.id = tm.token_id
  LEFT JOIN networks n ON n.id = t.network_id`;

const LABEL_JOIN = `
  JOIN sentiment_labels sl ON sl.post_id = p.id`;

const TOKEN_COLUMNS = 't.id, t.address, t.symbol, t.name, n.name AS network';

const SENTIMENT_AGGREGATES = 'COUNT(*)::int AS count, AVG(sl.confidence)::float8 AS avg_confidence';

/** Collects positional parameters while a statement is assembled */
class Params {
  readonly values: unknown[] = [];

  bind(value: unknown): string {
    this.values.push(value);
    return `$${this.values.length}`;
  }
}

function whereClause(filter: MentionFilter, params: Params): string {
  const clauses: string[] = [];

  if (filter.window) {
    clauses.push(`p.created_at >= ${params.bind(filter.window.start)}`);
    clauses.push(`p.created_at < ${params.bind(filter.window.end)}`);
  }
  if (filter.tokenIds) {
    clauses.push(`t.id = ANY(${params.bind(filter.tokenIds)}::int[])`);
  }
  if (filter.networks) {
    clauses.push(`n.name = ANY(${params.bind(filter.networks)}::text[])`);
  }
  if (filter.requireNetwork) {
    clauses.push('n.name IS NOT NULL');
  }
  if (filter.authorId !== undefined) {
    clauses.push(`p.author_id = ${params.bind(filter.authorId)}`);
  }

  return clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
}

/** HAVING / LIMIT tail shared by the ranking queries */
function rankTail(options: RankOptions, params: Params, countExpression: string): { having: string; limit: string } {
  return {
    having: `HAVING ${countExpression} >= ${params.bind(options.minMentions ?? 1)}`,
    limit: `LIMIT ${params.bind(options.limit ?? null)}`,
  };
}

// =============================================================================
// ROW MAPPING
// =============================================================================

export function parseSentiment(value: unknown): Sentiment {
  const sentiment = SENTIMENTS.find(s => s === value);
  if (!sentiment) {
    throw new Error(`Unexpected sentiment value in sentiment_labels: ${String(value)}`);
  }
  return sentiment;
}

const nullableText = (value: unknown): string | null =>
  value === null || value === undefined ? null : String(value);

const nullableDate = (value: unknown): Date | null => {
  if (value === null || value === undefined) return null;
  return value instanceof Date ? value : new Date(String(value));
};

function mapToken(row: QueryResultRow): TokenRecord {
  return {
    id: Number(row.id),
    address: String(row.address),
    symbol: String(row.symbol),
    name: nullableText(row.name),
    network: nullableText(row.network),
  };
}

function mapSentimentCount(row: QueryResultRow): SentimentCountRow {
  return {
    sentiment: parseSentiment(row.sentiment),
    count: Number(row.count),
    avgConfidence: Number(row.avg_confidence ?? 0),
  };
}

// =============================================================================
// STORE
// =============================================================================

export class PostgresEntityStore implements EntityStore {
  constructor(private readonly client: SqlClient) {}

  private async run(query: string, text: string, values: unknown[]): Promise<QueryResultRow[]> {
    storeQueriesTotal.inc({ query });
    const result = await this.client.query(text, values);
    return result.rows;
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  async findTokens(criteria: TokenCriteria): Promise<TokenRecord[]> {
    const params = new Params();
    const clauses: string[] = [];

    if (criteria.ids) clauses.push(`t.id = ANY(${params.bind(criteria.ids)}::int[])`);
    if (criteria.symbols) clauses.push(`t.symbol = ANY(${params.bind(criteria.symbols)}::text[])`);
    if (criteria.networks) clauses.push(`n.name = ANY(${params.bind(criteria.networks)}::text[])`);
    if (criteria.excludeIds) clauses.push(`NOT (t.id = ANY(${params.bind(criteria.excludeIds)}::int[]))`);

    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const rows = await this.run(
      'find_tokens',
      `SELECT ${TOKEN_COLUMNS}
       FROM tokens t
       LEFT JOIN networks n ON n.id = t.network_id
       ${where}
       ORDER BY t.id ASC`,
      params.values
    );
    return rows.map(mapToken);
  }

  async findNetworks(names?: string[]): Promise<NetworkRecord[]> {
    const params = new Params();
    const where = names ? `WHERE name = ANY(${params.bind(names)}::text[])` : '';
    const rows = await this.run(
      'find_networks',
      `SELECT id, name, display_name FROM networks ${where} ORDER BY id ASC`,
      params.values
    );
    return rows.map(row => ({
      id: Number(row.id),
      name: String(row.name),
      displayName: nullableText(row.display_name),
    }));
  }

  // ===========================================================================
  // Sentiment counts
  // ===========================================================================

  async countSentiments(filter: MentionFilter): Promise<SentimentCountRow[]> {
    const params = new Params();
    const rows = await this.run(
      'count_sentiments',
      `SELECT sl.sentiment, ${SENTIMENT_AGGREGATES}
       ${MENTION_JOIN}
       ${LABEL_JOIN}
       ${whereClause(filter, params)}
       GROUP BY sl.sentiment`,
      params.values
    );
    return rows.map(mapSentimentCount);
  }

  async countSentimentsByToken(filter: MentionFilter): Promise<TokenSentimentCountRow[]> {
    const params = new Params();
    const rows = await this.run(
      'count_sentiments_by_token',
      `SELECT t.id AS token_id, sl.sentiment, ${SENTIMENT_AGGREGATES}
       ${MENTION_JOIN}
       ${LABEL_JOIN}
       ${whereClause(filter, params)}
       GROUP BY t.id, sl.sentiment
       ORDER BY t.id ASC`,
      params.values
    );
    return rows.map(row => ({ tokenId: Number(row.token_id), ...mapSentimentCount(row) }));
  }

  async countSentimentsByNetwork(filter: MentionFilter): Promise<NetworkSentimentCountRow[]> {
    const params = new Params();
    const rows = await this.run(
      'count_sentiments_by_network',
      `SELECT n.name AS network, sl.sentiment, ${SENTIMENT_AGGREGATES}
       ${MENTION_JOIN}
       ${LABEL_JOIN}
       ${whereClause({ ...filter, requireNetwork: true }, params)}
       GROUP BY n.name, sl.sentiment
       ORDER BY n.name ASC`,
      params.values
    );
    return rows.map(row => ({ network: String(row.network), ...mapSentimentCount(row) }));
  }

  async countSentimentsByBucket(filter: MentionFilter, interval: Interval): Promise<BucketSentimentCountRow[]> {
    const params = new Params();
    const bucket = `date_trunc(${params.bind(interval)}, p.created_at, 'UTC')`;
    const rows = await this.run(
      'count_sentiments_by_bucket',
      `SELECT ${bucket} AS bucket, sl.sentiment, ${SENTIMENT_AGGREGATES}
       ${MENTION_JOIN}
       ${LABEL_JOIN}
       ${whereClause(filter, params)}
       GROUP BY 1, 2
       ORDER BY 1 ASC`,
      params.values
    );
    return rows.map(row => ({ bucket: new Date(row.bucket), ...mapSentimentCount(row) }));
  }

  // ===========================================================================
  // Mention counts & rankings
  // ===========================================================================

  async countMentions(filter: MentionFilter): Promise<number> {
    const params = new Params();
    const rows = await this.run(
      'count_mentions',
      `SELECT COUNT(*)::int AS mention_count
       ${MENTION_JOIN}
       ${whereClause(filter, params)}`,
      params.values
    );
    return rows.length > 0 ? Number(rows[0].mention_count) : 0;
  }

  async countMentionsByBucket(filter: MentionFilter, interval: Interval): Promise<BucketMentionCountRow[]> {
    const params = new Params();
    const bucket = `date_trunc(${params.bind(interval)}, p.created_at, 'UTC')`;
    const rows = await this.run(
      'count_mentions_by_bucket',
      `SELECT ${bucket} AS bucket, COUNT(*)::int AS mention_count
       ${MENTION_JOIN}
       ${whereClause(filter, params)}
       GROUP BY 1
       ORDER BY 1 ASC`,
      params.values
    );
    return rows.map(row => ({ bucket: new Date(row.bucket), mentionCount: Number(row.mention_count) }));
  }

  async rankTokens(filter: MentionFilter, options: RankOptions = {}): Promise<TokenMentionCount[]> {
    const params = new Params();
    const where = whereClause(filter, params);
    const { having, limit } = rankTail(options, params, 'COUNT(*)');
    const rows = await this.run(
      'rank_tokens',
      `SELECT ${TOKEN_COLUMNS}, COUNT(*)::int AS mention_count
       ${MENTION_JOIN}
       ${where}
       GROUP BY t.id, n.name
       ${having}
       ORDER BY mention_count DESC, SUM(p.like_count) DESC, t.id ASC
       ${limit}`,
      params.values
    );
    return rows.map(row => ({ token: mapToken(row), mentionCount: Number(row.mention_count) }));
  }

  async rankSymbols(filter: MentionFilter, options: RankOptions = {}): Promise<SymbolMentionCount[]> {
    const params = new Params();
    const where = whereClause(filter, params);
    const { having, limit } = rankTail(options, params, 'COUNT(*)');
    const rows = await this.run(
      'rank_symbols',
      `SELECT t.symbol, COUNT(*)::int AS mention_count
       ${MENTION_JOIN}
       ${where}
       GROUP BY t.symbol
       ${having}
       ORDER BY mention_count DESC, t.symbol ASC
       ${limit}`,
      params.values
    );
    return rows.map(row => ({ symbol: String(row.symbol), mentionCount: Number(row.mention_count) }));
  }

  async rankSymbolNetworks(filter: MentionFilter, options: RankOptions = {}): Promise<SymbolNetworkMentionCount[]> {
    const params = new Params();
    const where = whereClause(filter, params);
    const { having, limit } = rankTail(options, params, 'COUNT(*)');
    const rows = await this.run(
      'rank_symbol_networks',
      `SELECT t.symbol, n.name AS network, COUNT(*)::int AS mention_count
       ${MENTION_JOIN}
       ${where}
       GROUP BY t.symbol, n.name
       ${having}
       ORDER BY mention_count DESC, t.symbol ASC, n.name ASC
       ${limit}`,
      params.values
    );
    return rows.map(row => ({
      symbol: String(row.symbol),
      network: nullableText(row.network),
      mentionCount: Number(row.mention_count),
    }));
  }

  async rankNetworks(filter: MentionFilter, options: RankOptions = {}): Promise<NetworkMentionCount[]> {
    const params = new Params();
    const where = whereClause({ ...filter, requireNetwork: true }, params);
    const { having, limit } = rankTail(options, params, 'COUNT(*)');
    const rows = await this.run(
      'rank_networks',
      `SELECT n.name AS network, COUNT(*)::int AS mention_count
       ${MENTION_JOIN}
       ${where}
       GROUP BY n.name
       ${having}
       ORDER BY mention_count DESC, n.name ASC
       ${limit}`,
      params.values
    );
    return rows.map(row => ({ network: String(row.network), mentionCount: Number(row.mention_count) }));
  }

  async rankAuthors(filter: MentionFilter, limit: number): Promise<AuthorActivityRow[]> {
    const params = new Params();
    const where = whereClause(filter, params);
    const rows = await this.run(
      'rank_authors',
      `WITH author_posts AS (
         SELECT DISTINCT p.id, p.author_id, p.author_handle, p.like_count, p.reshare_count
         ${MENTION_JOIN}
         ${where}
       )
       SELECT author_id,
              MAX(author_handle) AS author_handle,
              COUNT(*)::int AS post_count,
              COALESCE(SUM(like_count), 0)::float8 AS total_likes,
              COALESCE(SUM(reshare_count), 0)::float8 AS total_reshares
       FROM author_posts
       GROUP BY author_id
       ORDER BY post_count DESC, total_likes DESC, author_id ASC
       LIMIT ${params.bind(limit)}`,
      params.values
    );
    return rows.map(row => ({
      authorId: String(row.author_id),
      authorHandle: nullableText(row.author_handle),
      postCount: Number(row.post_count),
      totalLikes: Number(row.total_likes),
      totalReshares: Number(row.total_reshares),
    }));
  }

  // ===========================================================================
  // Co-mentions
  // ===========================================================================

  async countCoMentions(
    primaryTokenIds: number[],
    window: TimeWindow,
    options: RankOptions = {}
  ): Promise<CoMentionCount[]> {
    const params = new Params();
    const primary = params.bind(primaryTokenIds);
    const start = params.bind(window.start);
    const end = params.bind(window.end);
    const { having, limit } = rankTail(options, params, 'COUNT(DISTINCT tm.post_id)');

    const rows = await this.run(
      'count_co_mentions',
      `WITH primary_posts AS (
         SELECT DISTINCT pm.post_id
         FROM token_mentions pm
         JOIN posts p ON p.id = pm.post_id
         WHERE pm.token_id = ANY(${primary}::int[])
           AND p.created_at >= ${start} AND p.created_at < ${end}
       )
       SELECT ${TOKEN_COLUMNS}, COUNT(DISTINCT tm.post_id)::int AS co_mention_count
       FROM token_mentions tm
       JOIN primary_posts pp ON pp.post_id = tm.post_id
       JOIN tokens t ON t.id = tm.token_id
       LEFT JOIN networks n ON n.id = t.network_id
       WHERE NOT (tm.token_id = ANY(${primary}::int[]))
       GROUP BY t.id, n.name
       ${having}
       ORDER BY co_mention_count DESC, t.id ASC
       ${limit}`,
      params.values
    );
    return rows.map(row => ({ token: mapToken(row), coMentionCount: Number(row.co_mention_count) }));
  }

  async countCoMentionSentiments(
    primaryTokenIds: number[],
    otherTokenId: number,
    window: TimeWindow
  ): Promise<SentimentCountRow[]> {
    const params = new Params();
    const rows = await this.run(
      'count_co_mention_sentiments',
      `SELECT sl.sentiment, ${SENTIMENT_AGGREGATES}
       FROM posts p
       ${LABEL_JOIN}
       WHERE p.created_at >= ${params.bind(window.start)} AND p.created_at < ${params.bind(window.end)}
         AND EXISTS (
           SELECT 1 FROM token_mentions a
           WHERE a.post_id = p.id AND a.token_id = ANY(${params.bind(primaryTokenIds)}::int[])
         )
         AND EXISTS (
           SELECT 1 FROM token_mentions b
           WHERE b.post_id = p.id AND b.token_id = ${params.bind(otherTokenId)}
         )
       GROUP BY sl.sentiment`,
      params.values
    );
    return rows.map(mapSentimentCount);
  }

  // ===========================================================================
  // Summaries
  // ===========================================================================

  async summarizeMentions(tokenId: number): Promise<MentionSummary> {
    const rows = await this.run(
      'summarize_mentions',
      `SELECT COUNT(*)::int AS mention_count,
              MIN(mentioned_at) AS first_seen,
              MAX(mentioned_at) AS last_seen
       FROM token_mentions
       WHERE token_id = $1`,
      [tokenId]
    );
    if (rows.length === 0) {
      return { mentionCount: 0, firstSeen: null, lastSeen: null };
    }
    return {
      mentionCount: Number(rows[0].mention_count),
      firstSeen: nullableDate(rows[0].first_seen),
      lastSeen: nullableDate(rows[0].last_seen),
    };
  }
}
