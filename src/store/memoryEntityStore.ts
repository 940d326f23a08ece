/**
 * Memory Entity Store
 * EntityStore over in-process arrays, for the sandbox dataset and tests
 *
 * Mirrors the joins issued by PostgresEntityStore: a mention row is
 * Post ⋈ TokenMention ⋈ Token, and sentiment reads additionally join the
 * post's labels.
 */

import { isWithin, truncateToInterval } from '../analytics/timeWindow';
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
  PostRecord,
  RankOptions,
  Sentiment,
  SentimentCountRow,
  SentimentLabelRecord,
  SymbolMentionCount,
  SymbolNetworkMentionCount,
  TimeWindow,
  TokenCriteria,
  TokenMentionCount,
  TokenMentionRecord,
  TokenRecord,
  TokenSentimentCountRow,
} from './entityStore';

export interface EntityDataset {
  networks: NetworkRecord[];
  tokens: TokenRecord[];
  posts: PostRecord[];
  labels: SentimentLabelRecord[];
  mentions: TokenMentionRecord[];
}

interface MentionRow {
  mention: TokenMentionRecord;
  post: PostRecord;
  token: TokenRecord;
}

interface LabelledRow extends MentionRow {
  label: SentimentLabelRecord;
}

type GroupKey = string | number;

// =============================================================================
// HELPERS
// =============================================================================

const compareText = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

/** Ascending with nulls last, matching PostgreSQL's default ordering */
const compareNullableText = (a: string | null, b: string | null): number => {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return compareText(a, b);
};

function rankWindow<T extends { mentionCount: number }>(rows: T[], options: RankOptions = {}): T[] {
  const qualifying = rows.filter(r => r.mentionCount >= (options.minMentions ?? 1));
  return options.limit !== undefined ? qualifying.slice(0, options.limit) : qualifying;
}

/**
 * Groups labelled rows by (key, sentiment) with count and mean confidence.
 * Rows whose key is null are dropped.
 */
function groupSentiments<K extends GroupKey>(
  rows: LabelledRow[],
  keyOf: (row: LabelledRow) => K | null
): Array<{ key: K; sentiment: Sentiment; count: number; avgConfidence: number }> {
  const groups = new Map<string, { key: K; sentiment: Sentiment; count: number; confidence: number }>();

  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;

    const id = `${key}|${row.label.sentiment}`;
    const group = groups.get(id) ?? { key, sentiment: row.label.sentiment, count: 0, confidence: 0 };
    group.count += 1;
    group.confidence += row.label.confidence;
    groups.set(id, group);
  }

  return [...groups.values()].map(({ key, sentiment, count, confidence }) => ({
    key,
    sentiment,
    count,
    avgConfidence: count > 0 ? confidence / count : 0,
  }));
}

function countBy<K extends GroupKey>(rows: MentionRow[], keyOf: (row: MentionRow) => K | null): Map<K, number> {
  const counts = new Map<K, number>();
  for (const row of rows) {
    const key = keyOf(row);
    if (key === null) continue;
    counts.set(key, (counts.get(key) ?? 0) + 1);
  }
  return counts;
}

// =============================================================================
// STORE
// =============================================================================

export class MemoryEntityStore implements EntityStore {
  private readonly networks: NetworkRecord[];
  private readonly tokens: Map<number, TokenRecord>;
  private readonly posts: Map<number, PostRecord>;
  private readonly labelsByPost: Map<number, SentimentLabelRecord[]>;
  private readonly mentions: TokenMentionRecord[];

  constructor(dataset: Partial<EntityDataset> = {}) {
    this.networks = [...(dataset.networks ?? [])].sort((a, b) => a.id - b.id);
    this.tokens = new Map((dataset.tokens ?? []).map(t => [t.id, t]));
    this.posts = new Map((dataset.posts ?? []).map(p => [p.id, p]));
    this.mentions = [...(dataset.mentions ?? [])];

    this.labelsByPost = new Map();
    for (const label of dataset.labels ?? []) {
      const labels = this.labelsByPost.get(label.postId) ?? [];
      labels.push(label);
      this.labelsByPost.set(label.postId, labels);
    }
  }

  get size(): { posts: number; labels: number; mentions: number; tokens: number; networks: number } {
    let labels = 0;
    for (const list of this.labelsByPost.values()) labels += list.length;
    return {
      posts: this.posts.size,
      labels,
      mentions: this.mentions.length,
      tokens: this.tokens.size,
      networks: this.networks.length,
    };
  }

  // ===========================================================================
  // Joins
  // ===========================================================================

  private matches(row: MentionRow, filter: MentionFilter): boolean {
    const { post, token } = row;
    if (filter.window && !isWithin(post.createdAt, filter.window)) return false;
    if (filter.tokenIds && !filter.tokenIds.includes(token.id)) return false;
    if (filter.networks && (token.network === null || !filter.networks.includes(token.network))) return false;
    if (filter.requireNetwork && token.network === null) return false;
    if (filter.authorId !== undefined && post.authorId !== filter.authorId) return false;
    return true;
  }

  private mentionRows(filter: MentionFilter): MentionRow[] {
    const rows: MentionRow[] = [];
    for (const mention of this.mentions) {
      const post = this.posts.get(mention.postId);
      const token = this.tokens.get(mention.tokenId);
      if (!post || !token) continue;

      const row = { mention, post, token };
      if (this.matches(row, filter)) rows.push(row);
    }
    return rows;
  }

  private labelledRows(filter: MentionFilter): LabelledRow[] {
    return this.mentionRows(filter).flatMap(row =>
      (this.labelsByPost.get(row.post.id) ?? []).map(label => ({ ...row, label }))
    );
  }

  /** Distinct posts in the window that mention any of the given tokens */
  private postsMentioning(tokenIds: number[], window: TimeWindow): Set<number> {
    return new Set(this.mentionRows({ window, tokenIds }).map(r => r.post.id));
  }

  // ===========================================================================
  // Lookups
  // ===========================================================================

  async findTokens(criteria: TokenCriteria): Promise<TokenRecord[]> {
    return [...this.tokens.values()]
      .filter(t => !criteria.ids || criteria.ids.includes(t.id))
      .filter(t => !criteria.symbols || criteria.symbols.includes(t.symbol))
      .filter(t => !criteria.networks || (t.network !== null && criteria.networks.includes(t.network)))
      .filter(t => !criteria.excludeIds || !criteria.excludeIds.includes(t.id))
      .sort((a, b) => a.id - b.id);
  }

  async findNetworks(names?: string[]): Promise<NetworkRecord[]> {
    return this.networks.filter(n => !names || names.includes(n.name));
  }

  // ===========================================================================
  // Sentiment counts
  // ===========================================================================

  async countSentiments(filter: MentionFilter): Promise<SentimentCountRow[]> {
    return groupSentiments(this.labelledRows(filter), () => 0)
      .map(({ sentiment, count, avgConfidence }) => ({ sentiment, count, avgConfidence }));
  }

  async countSentimentsByToken(filter: MentionFilter): Promise<TokenSentimentCountRow[]> {
    return groupSentiments(this.labelledRows(filter), r => r.token.id)
      .map(({ key, ...row }) => ({ tokenId: key, ...row }))
      .sort((a, b) => a.tokenId - b.tokenId);
  }

  async countSentimentsByNetwork(filter: MentionFilter): Promise<NetworkSentimentCountRow[]> {
    return groupSentiments(this.labelledRows(filter), r => r.token.network)
      .map(({ key, ...row }) => ({ network: key, ...row }))
      .sort((a, b) => compareText(a.network, b.network));
  }

  async countSentimentsByBucket(filter: MentionFilter, interval: Interval): Promise<BucketSentimentCountRow[]> {
    return groupSentiments(this.labelledRows(filter), r => truncateToInterval(r.post.createdAt, interval).getTime())
      .map(({ key, ...row }) => ({ bucket: new Date(key), ...row }))
      .sort((a, b) => a.bucket.getTime() - b.bucket.getTime());
  }

  // ===========================================================================
  // Mention counts & rankings
  // ===========================================================================

  async countMentions(filter: MentionFilter): Promise<number> {
    return this.mentionRows(filter).length;
  }

  async countMentionsByBucket(filter: MentionFilter, interval: Interval): Promise<BucketMentionCountRow[]> {
    const counts = countBy(this.mentionRows(filter), r => truncateToInterval(r.post.createdAt, interval).getTime());
    return [...counts.entries()]
      .sort(([a], [b]) => a - b)
      .map(([time, mentionCount]) => ({ bucket: new Date(time), mentionCount }));
  }

  async rankTokens(filter: MentionFilter, options?: RankOptions): Promise<TokenMentionCount[]> {
    const groups = new Map<number, { token: TokenRecord; mentionCount: number; totalLikes: number }>();
    for (const { post, token } of this.mentionRows(filter)) {
      const group = groups.get(token.id) ?? { token, mentionCount: 0, totalLikes: 0 };
      group.mentionCount += 1;
      group.totalLikes += post.likeCount;
      groups.set(token.id, group);
    }

    // Ties on mentions go to the token whose posts drew more likes
    const rows = [...groups.values()].sort((a, b) =>
      b.mentionCount - a.mentionCount ||
      b.totalLikes - a.totalLikes ||
      a.token.id - b.token.id
    );
    return rankWindow(rows, options).map(({ token, mentionCount }): TokenMentionCount => ({ token, mentionCount }));
  }

  async rankSymbols(filter: MentionFilter, options?: RankOptions): Promise<SymbolMentionCount[]> {
    const counts = countBy(this.mentionRows(filter), r => r.token.symbol);
    const rows = [...counts.entries()]
      .map(([symbol, mentionCount]) => ({ symbol, mentionCount }))
      .sort((a, b) => b.mentionCount - a.mentionCount || compareText(a.symbol, b.symbol));
    return rankWindow(rows, options);
  }

  async rankSymbolNetworks(filter: MentionFilter, options?: RankOptions): Promise<SymbolNetworkMentionCount[]> {
    const groups = new Map<string, SymbolNetworkMentionCount>();
    for (const { token } of this.mentionRows(filter)) {
      const id = JSON.stringify([token.symbol, token.network]);
      const group = groups.get(id) ?? { symbol: token.symbol, network: token.network, mentionCount: 0 };
      group.mentionCount += 1;
      groups.set(id, group);
    }

    const rows = [...groups.values()].sort((a, b) =>
      b.mentionCount - a.mentionCount ||
      compareText(a.symbol, b.symbol) ||
      compareNullableText(a.network, b.network)
    );
    return rankWindow(rows, options);
  }

  async rankNetworks(filter: MentionFilter, options?: RankOptions): Promise<NetworkMentionCount[]> {
    const counts = countBy(this.mentionRows(filter), r => r.token.network);
    const rows = [...counts.entries()]
      .map(([network, mentionCount]) => ({ network, mentionCount }))
      .sort((a, b) => b.mentionCount - a.mentionCount || compareText(a.network, b.network));
    return rankWindow(rows, options);
  }

  async rankAuthors(filter: MentionFilter, limit: number): Promise<AuthorActivityRow[]> {
    const authors = new Map<string, { handle: string | null; posts: Map<number, PostRecord> }>();
    for (const { post } of this.mentionRows(filter)) {
      const author = authors.get(post.authorId) ?? { handle: post.authorHandle, posts: new Map() };
      author.posts.set(post.id, post);
      authors.set(post.authorId, author);
    }

    return [...authors.entries()]
      .map(([authorId, { handle, posts }]) => {
        let totalLikes = 0;
        let totalReshares = 0;
        for (const post of posts.values()) {
          totalLikes += post.likeCount;
          totalReshares += post.reshareCount;
        }
        return { authorId, authorHandle: handle, postCount: posts.size, totalLikes, totalReshares };
      })
      .sort((a, b) =>
        b.postCount - a.postCount ||
        b.totalLikes - a.totalLikes ||
        compareText(a.authorId, b.authorId)
      )
      .slice(0, limit);
  }

  // ===========================================================================
  // Co-mentions
  // ===========================================================================

  async countCoMentions(
    primaryTokenIds: number[],
    window: TimeWindow,
    options?: RankOptions
  ): Promise<CoMentionCount[]> {
    const primaryPosts = this.postsMentioning(primaryTokenIds, window);
    const postsByToken = new Map<number, Set<number>>();

    for (const { post, token } of this.mentionRows({ window })) {
      if (!primaryPosts.has(post.id) || primaryTokenIds.includes(token.id)) continue;
      const posts = postsByToken.get(token.id) ?? new Set<number>();
      posts.add(post.id);
      postsByToken.set(token.id, posts);
    }

    const rows: Array<{ token: TokenRecord; mentionCount: number }> = [];
    for (const [id, posts] of postsByToken) {
      const token = this.tokens.get(id);
      if (token) rows.push({ token, mentionCount: posts.size });
    }
    rows.sort((a, b) => b.mentionCount - a.mentionCount || a.token.id - b.token.id);

    return rankWindow(rows, options).map(({ token, mentionCount }) => ({ token, coMentionCount: mentionCount }));
  }

  async countCoMentionSentiments(
    primaryTokenIds: number[],
    otherTokenId: number,
    window: TimeWindow
  ): Promise<SentimentCountRow[]> {
    const primaryPosts = this.postsMentioning(primaryTokenIds, window);
    const sharedPosts = [...this.postsMentioning([otherTokenId], window)].filter(id => primaryPosts.has(id));

    const counts = new Map<Sentiment, { count: number; confidence: number }>();
    for (const postId of sharedPosts) {
      for (const label of this.labelsByPost.get(postId) ?? []) {
        const group = counts.get(label.sentiment) ?? { count: 0, confidence: 0 };
        group.count += 1;
        group.confidence += label.confidence;
        counts.set(label.sentiment, group);
      }
    }

    return [...counts.entries()].map(([sentiment, { count, confidence }]) => ({
      sentiment,
      count,
      avgConfidence: confidence / count,
    }));
  }

  // ===========================================================================
  // Summaries
  // ===========================================================================

  async summarizeMentions(tokenId: number): Promise<MentionSummary> {
    const mentions = this.mentions.filter(m => m.tokenId === tokenId);
    if (mentions.length === 0) {
      return { mentionCount: 0, firstSeen: null, lastSeen: null };
    }

    let first = mentions[0].mentionedAt.getTime();
    let last = first;
    for (const mention of mentions) {
      const time = mention.mentionedAt.getTime();
      if (time < first) first = time;
      if (time > last) last = time;
    }
    return { mentionCount: mentions.length, firstSeen: new Date(first), lastSeen: new Date(last) };
  }
}
