/**
 * Parameter Schemas
 * Zod schemas for every analytics operation
 */

import { z } from 'zod';

import { INTERVALS } from '../store/entityStore';
import { InvalidParameterError } from './errors';

// =============================================================================
// BUILDING BLOCKS
// =============================================================================

const positiveInt = (name: string) =>
  z.number({ invalid_type_error: `${name} must be a number` })
    .int(`${name} must be an integer`)
    .positive(`${name} must be a positive integer`);

const nonEmptyString = (name: string) =>
  z.string({ invalid_type_error: `${name} must be a string` })
    .trim()
    .min(1, `${name} must not be empty`);

export const intervalSchema = z.enum(INTERVALS, {
  errorMap: () => ({ message: `interval must be one of: ${INTERVALS.join(', ')}` }),
});

const selectorShape = {
  symbol: nonEmptyString('symbol').optional(),
  tokenId: positiveInt('tokenId').optional(),
  network: nonEmptyString('network').optional(),
};

const SELECTOR_REQUIRED = 'Must provide either symbol or tokenId';

const hasSelector = (params: { symbol?: string; tokenId?: number }): boolean =>
  params.symbol !== undefined || params.tokenId !== undefined;

export const tokenSelectorSchema = z.object(selectorShape).refine(hasSelector, SELECTOR_REQUIRED);

// =============================================================================
// OPERATION SCHEMAS
// =============================================================================

export const tokenStatsSchema = z.object({
  ...selectorShape,
  daysBack: positiveInt('daysBack').default(7),
}).refine(hasSelector, SELECTOR_REQUIRED);

export const tokenTimelineSchema = z.object({
  ...selectorShape,
  daysBack: positiveInt('daysBack').default(30),
  interval: intervalSchema.default('day'),
}).refine(hasSelector, SELECTOR_REQUIRED);

export const networkTimelineSchema = z.object({
  network: nonEmptyString('network'),
  daysBack: positiveInt('daysBack').default(30),
  interval: intervalSchema.default('day'),
});

export const globalTrendsSchema = z.object({
  daysBack: positiveInt('daysBack').default(30),
  interval: intervalSchema.default('day'),
  topNetworks: positiveInt('topNetworks').optional(),
});

export const compareTokensSchema = z.object({
  tokens: z.array(tokenSelectorSchema).min(1, 'tokens must contain at least one selector'),
  networks: z.array(nonEmptyString('network')).optional(),
  daysBack: positiveInt('daysBack').default(7),
});

export const compareNetworksSchema = z.object({
  networks: z.array(nonEmptyString('network')).min(1, 'Must provide at least one network name'),
  daysBack: positiveInt('daysBack').default(30),
  minTokensPerNetwork: positiveInt('minTokensPerNetwork').default(5),
  minMentionsPerToken: positiveInt('minMentionsPerToken').default(3),
});

export const tokenAcrossNetworksSchema = z.object({
  symbol: nonEmptyString('symbol'),
  networks: z.array(nonEmptyString('network')).optional(),
  daysBack: positiveInt('daysBack').default(30),
});

export const mostDiscussedSchema = z.object({
  daysBack: positiveInt('daysBack').default(7),
  limit: positiveInt('limit').default(10),
  minMentions: positiveInt('minMentions').default(5),
  network: nonEmptyString('network').optional(),
});

export const topUsersSchema = z.object({
  ...selectorShape,
  daysBack: positiveInt('daysBack').default(30),
  limit: positiveInt('limit').default(10),
}).refine(hasSelector, SELECTOR_REQUIRED);

export const correlationSchema = z.object({
  symbol: nonEmptyString('symbol'),
  network: nonEmptyString('network').optional(),
  daysBack: positiveInt('daysBack').default(30),
  minCoMentions: positiveInt('minCoMentions').default(3),
  limit: positiveInt('limit').default(10),
});

export const momentumSchema = z.object({
  symbols: z.array(nonEmptyString('symbol')).min(1, 'symbols must not be empty').optional(),
  networks: z.array(nonEmptyString('network')).optional(),
  topN: positiveInt('topN').default(5),
  daysBack: positiveInt('daysBack').default(14),
  minMentions: positiveInt('minMentions').default(10),
});

export const matrixSchema = z.object({
  topNTokens: positiveInt('topNTokens').default(10),
  topNNetworks: positiveInt('topNNetworks').default(5),
  daysBack: positiveInt('daysBack').default(30),
  minMentions: positiveInt('minMentions').default(5),
});

export const similaritySchema = z.object({
  symbol: nonEmptyString('symbol'),
  minSimilarity: z.number({ invalid_type_error: 'minSimilarity must be a number' })
    .min(0, 'minSimilarity must be between 0 and 1')
    .max(1, 'minSimilarity must be between 0 and 1')
    .default(0.7),
  excludeTokenId: positiveInt('excludeTokenId').optional(),
});

export const mentionStatsSchema = z.object({
  tokenId: positiveInt('tokenId'),
});

// =============================================================================
// PARSING
// =============================================================================

export function parseParams<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw InvalidParameterError.fromZodError(result.error);
  }
  return result.data;
}

export type TokenSelectorInput = z.input<typeof tokenSelectorSchema>;
export type TokenSelector = z.output<typeof tokenSelectorSchema>;
export type TokenStatsParams = z.input<typeof tokenStatsSchema>;
export type TokenTimelineParams = z.input<typeof tokenTimelineSchema>;
export type NetworkTimelineParams = z.input<typeof networkTimelineSchema>;
export type GlobalTrendsParams = z.input<typeof globalTrendsSchema>;
export type CompareTokensParams = z.input<typeof compareTokensSchema>;
export type CompareNetworksParams = z.input<typeof compareNetworksSchema>;
export type TokenAcrossNetworksParams = z.input<typeof tokenAcrossNetworksSchema>;
export type MostDiscussedParams = z.input<typeof mostDiscussedSchema>;
export type TopUsersParams = z.input<typeof topUsersSchema>;
export type CorrelationParams = z.input<typeof correlationSchema>;
export type MomentumParams = z.input<typeof momentumSchema>;
export type MatrixParams = z.input<typeof matrixSchema>;
export type SimilarityParams = z.input<typeof similaritySchema>;
export type MentionStatsParams = z.input<typeof mentionStatsSchema>;
