/**
 * Similarity Matcher
 *
 * Naive symbol matching: identical symbols score 1, a symbol contained in
 * the other scores len(shorter) / len(longer), anything else is not a
 * candidate at all. Not an edit distance.
 */

import { z } from 'zod';

import { EntityStore, TokenRecord } from '../store/entityStore';
import { SimilarToken } from './types';
import { similaritySchema } from './validation';

export function normalizeSymbol(symbol: string): string {
  return symbol.trim().toLowerCase();
}

/** Similarity in [0, 1], or null when neither symbol contains the other */
export function symbolSimilarity(a: string, b: string): number | null {
  const left = normalizeSymbol(a);
  const right = normalizeSymbol(b);

  if (left === right) return 1.0;
  if (!left.includes(right) && !right.includes(left)) return null;

  const [shorter, longer] = left.length <= right.length ? [left, right] : [right, left];
  return shorter.length / longer.length;
}

export function rankBySimilarity(symbol: string, tokens: TokenRecord[], minSimilarity: number): SimilarToken[] {
  const matches: SimilarToken[] = [];

  for (const token of tokens) {
    const similarity = symbolSimilarity(symbol, token.symbol);
    if (similarity === null || similarity < minSimilarity) continue;

    matches.push({
      tokenId: token.id,
      symbol: token.symbol,
      name: token.name,
      network: token.network,
      similarity,
    });
  }

  return matches.sort((a, b) => b.similarity - a.similarity);
}

export async function findSimilarTokens(
  store: EntityStore,
  params: z.output<typeof similaritySchema>
): Promise<SimilarToken[]> {
  const tokens = await store.findTokens(
    params.excludeTokenId !== undefined ? { excludeIds: [params.excludeTokenId] } : {}
  );
  return rankBySimilarity(params.symbol, tokens, params.minSimilarity);
}
