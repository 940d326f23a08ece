/**
 * Dataset Builder
 * Small hand-made datasets for MemoryEntityStore-backed tests
 */

import { DAY_MS, HOUR_MS } from '../../src/analytics/timeWindow';
import {
  NetworkRecord,
  PostRecord,
  Sentiment,
  SentimentLabelRecord,
  TokenMentionRecord,
  TokenRecord,
} from '../../src/store/entityStore';
import { EntityDataset, MemoryEntityStore } from '../../src/store/memoryEntityStore';

/** Fixed reference time used as "now" across the suite */
export const NOW = new Date('2024-03-15T12:00:00.000Z');

export const hoursAgo = (hours: number): Date => new Date(NOW.getTime() - hours * HOUR_MS);
export const daysAgo = (days: number): Date => new Date(NOW.getTime() - days * DAY_MS);
export const clock = (): Date => new Date(NOW.getTime());

export interface PostSpec {
  at: Date;
  tokens: number[];
  /** null leaves the post unlabelled */
  sentiment?: Sentiment | null;
  confidence?: number;
  author?: string;
  handle?: string | null;
  likes?: number;
  reshares?: number;
}

export class DatasetBuilder {
  private readonly networks: NetworkRecord[] = [];
  private readonly tokens: TokenRecord[] = [];
  private readonly posts: PostRecord[] = [];
  private readonly labels: SentimentLabelRecord[] = [];
  private readonly mentions: TokenMentionRecord[] = [];

  network(name: string, displayName: string | null = null): this {
    this.networks.push({ id: this.networks.length + 1, name, displayName });
    return this;
  }

  /** Adds a token and returns its id */
  token(symbol: string, network: string | null, name: string | null = null): number {
    const id = this.tokens.length + 1;
    this.tokens.push({ id, address: `0xtoken${id}`, symbol, name, network });
    return id;
  }

  /** Adds a post mentioning the given tokens and returns its id */
  post(spec: PostSpec): number {
    const id = this.posts.length + 1;
    const author = spec.author ?? 'author-1';

    this.posts.push({
      id,
      externalId: `post-${id}`,
      text: `post ${id}`,
      createdAt: spec.at,
      authorId: author,
      authorHandle: spec.handle === undefined ? `@${author}` : spec.handle,
      likeCount: spec.likes ?? 0,
      reshareCount: spec.reshares ?? 0,
    });

    for (const tokenId of spec.tokens) {
      this.mentions.push({ id: this.mentions.length + 1, postId: id, tokenId, mentionedAt: spec.at });
    }

    const sentiment = spec.sentiment === undefined ? 'neutral' : spec.sentiment;
    if (sentiment !== null) {
      this.labels.push({
        id: this.labels.length + 1,
        postId: id,
        sentiment,
        confidence: spec.confidence ?? 0.8,
        analyzedAt: spec.at,
      });
    }
    return id;
  }

  /** Adds `count` identical posts */
  repeat(count: number, spec: PostSpec): this {
    for (let i = 0; i < count; i++) this.post(spec);
    return this;
  }

  build(): EntityDataset {
    return {
      networks: [...this.networks],
      tokens: [...this.tokens],
      posts: [...this.posts],
      labels: [...this.labels],
      mentions: [...this.mentions],
    };
  }

  store(): MemoryEntityStore {
    return new MemoryEntityStore(this.build());
  }
}
