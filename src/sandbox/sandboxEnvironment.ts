/**
 * Sandbox Environment
 * Deterministic synthetic posts, labels and mentions for demos and tests
 *
 * The same seed always yields the same dataset, and the sandbox engine's
 * clock is pinned to the dataset's reference time, so every analytics
 * result over the sandbox is reproducible.
 */

import crypto from 'crypto';
import { z } from 'zod';

import { EngineOptions, SentimentAnalyticsEngine } from '../analytics/engine';
import { DAY_MS } from '../analytics/timeWindow';
import {
  NetworkRecord,
  PostRecord,
  Sentiment,
  SentimentLabelRecord,
  TokenMentionRecord,
  TokenRecord,
} from '../store/entityStore';
import { EntityDataset, MemoryEntityStore } from '../store/memoryEntityStore';
import catalogJson from './catalog.json';

// =============================================================================
// TYPES & INTERFACES
// =============================================================================

export interface SandboxOptions {
  /** Seed for deterministic generation */
  seed: number;
  /** Days of history ending at `now` */
  days: number;
  postsPerDay: number;
  authorCount: number;
  /** Share of posts left without a sentiment label (0-1) */
  unlabelledRate: number;
  /** Reference time; the newest post is strictly before it */
  now: Date;
}

export const DEFAULT_SANDBOX_OPTIONS: SandboxOptions = {
  seed: 42,
  days: 30,
  postsPerDay: 40,
  authorCount: 24,
  unlabelledRate: 0.1,
  now: new Date('2024-06-01T00:00:00.000Z'),
};

const catalogSchema = z.object({
  networks: z.array(z.object({
    name: z.string().min(1),
    displayName: z.string().nullable(),
  })),
  tokens: z.array(z.object({
    symbol: z.string().min(1),
    name: z.string().nullable(),
    network: z.string().nullable(),
    /** Relative mention weight */
    popularity: z.number().positive(),
    /** Shifts the positive/negative balance, in [-1, 1] */
    bias: z.number().min(-1).max(1),
  })),
});

export type SandboxCatalog = z.infer<typeof catalogSchema>;

export function loadCatalog(): SandboxCatalog {
  return catalogSchema.parse(catalogJson);
}

// =============================================================================
// SEEDED RANDOM NUMBER GENERATOR
// =============================================================================

export class SeededRandom {
  private seed: number;

  constructor(seed: number) {
    this.seed = seed & 0x7fffffff;
  }

  /** Next value in [0, 1) */
  next(): number {
    this.seed = (Math.imul(this.seed, 1103515245) + 12345) & 0x7fffffff;
    return this.seed / 0x80000000;
  }

  range(min: number, max: number): number {
    return min + this.next() * (max - min);
  }

  /** Integer in [min, max] */
  int(min: number, max: number): number {
    return Math.floor(this.range(min, max + 1));
  }

  pick<T>(items: readonly T[]): T {
    return items[this.int(0, items.length - 1)];
  }

  /** Index drawn proportionally to the given weights */
  weighted(weights: readonly number[]): number {
    const total = weights.reduce((sum, w) => sum + w, 0);
    let target = this.next() * total;
    for (const [index, weight] of weights.entries()) {
      target -= weight;
      if (target < 0) return index;
    }
    return weights.length - 1;
  }
}

// =============================================================================
// SYNTHETIC DATA GENERATOR
// =============================================================================

const clamp = (value: number, min: number, max: number): number => Math.max(min, Math.min(max, value));

const POST_TEMPLATES = [
  'Watching $SYM closely today',
  '$SYM looks strong on the daily chart',
  'Not convinced about $SYM after that unlock',
  'Anyone else accumulating $SYM?',
  '$SYM volume is picking up',
  'Rotating out of $SYM for now',
];

function addressOf(symbol: string, network: string | null): string {
  return `0x${crypto.createHash('sha256').update(`${network ?? 'native'}:${symbol}`).digest('hex').slice(0, 40)}`;
}

function drawSentiment(rng: SeededRandom, bias: number): Sentiment {
  const positive = clamp(0.35 + bias * 0.5, 0.05, 0.9);
  const negative = clamp(0.25 - bias * 0.5, 0.05, 0.9);
  const roll = rng.next();
  if (roll < positive) return 'positive';
  if (roll < positive + negative) return 'negative';
  return 'neutral';
}

export function generateSandboxDataset(
  options: Partial<SandboxOptions> = {},
  catalog: SandboxCatalog = loadCatalog()
): EntityDataset {
  const opts: SandboxOptions = { ...DEFAULT_SANDBOX_OPTIONS, ...options };
  const rng = new SeededRandom(opts.seed);

  const networks: NetworkRecord[] = catalog.networks.map((n, i) => ({
    id: i + 1,
    name: n.name,
    displayName: n.displayName,
  }));

  const tokens: TokenRecord[] = catalog.tokens.map((t, i) => ({
    id: i + 1,
    address: addressOf(t.symbol, t.network),
    symbol: t.symbol,
    name: t.name,
    network: t.network,
  }));
  const weights = catalog.tokens.map(t => t.popularity);

  const authors = Array.from({ length: opts.authorCount }, (_, i) => ({
    id: `sandbox-author-${i + 1}`,
    handle: i % 7 === 6 ? null : `sandbox_trader_${i + 1}`,
  }));

  const posts: PostRecord[] = [];
  const labels: SentimentLabelRecord[] = [];
  const mentions: TokenMentionRecord[] = [];
  const windowStart = opts.now.getTime() - opts.days * DAY_MS;

  for (let day = 0; day < opts.days; day++) {
    for (let n = 0; n < opts.postsPerDay; n++) {
      const createdAt = new Date(windowStart + day * DAY_MS + Math.floor(rng.next() * DAY_MS));
      // Author index skewed towards the start of the list
      const author = authors[Math.floor(rng.next() ** 2 * authors.length)];

      const mentioned = new Set<number>([rng.weighted(weights)]);
      const extra = rng.int(0, 2);
      for (let k = 0; k < extra; k++) mentioned.add(rng.weighted(weights));

      const [primary] = [...mentioned];
      const postId = posts.length + 1;

      posts.push({
        id: postId,
        externalId: `sandbox-${opts.seed}-${postId}`,
        text: rng.pick(POST_TEMPLATES).replace('SYM', tokens[primary].symbol),
        createdAt,
        authorId: author.id,
        authorHandle: author.handle,
        likeCount: rng.int(0, 400),
        reshareCount: rng.int(0, 80),
      });

      for (const index of mentioned) {
        mentions.push({ id: mentions.length + 1, postId, tokenId: tokens[index].id, mentionedAt: createdAt });
      }

      if (rng.next() >= opts.unlabelledRate) {
        labels.push({
          id: labels.length + 1,
          postId,
          sentiment: drawSentiment(rng, catalog.tokens[primary].bias),
          confidence: Math.round(rng.range(0.5, 0.99) * 100) / 100,
          analyzedAt: new Date(createdAt.getTime() + 60_000),
        });
      }
    }
  }

  console.log(
    `[Sandbox] Generated ${posts.length} posts, ${labels.length} labels, ` +
    `${mentions.length} mentions (seed ${opts.seed})`
  );

  return { networks, tokens, posts, labels, mentions };
}

export function createSandboxStore(options: Partial<SandboxOptions> = {}): MemoryEntityStore {
  return new MemoryEntityStore(generateSandboxDataset(options));
}

/** Engine over a fresh sandbox store with its clock pinned to the dataset's reference time */
export function createSandboxEngine(
  options: Partial<SandboxOptions> = {},
  engineOptions: Omit<EngineOptions, 'clock'> = {}
): SentimentAnalyticsEngine {
  const now = options.now ?? DEFAULT_SANDBOX_OPTIONS.now;
  return new SentimentAnalyticsEngine(createSandboxStore(options), {
    ...engineOptions,
    clock: () => new Date(now.getTime()),
  });
}
