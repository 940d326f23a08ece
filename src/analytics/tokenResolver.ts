/**
 * Token Resolution
 * Selector → token resolution and (symbol, network) composite keys
 *
 * A symbol is not unique across networks. A symbol with a network must match
 * at least one token on that network; a bare symbol resolves to every token
 * carrying it (union across networks).
 */

import { EntityStore, TokenRecord } from '../store/entityStore';
import { NotFoundError } from './errors';

export interface TokenSelector {
  symbol?: string;
  tokenId?: number;
  network?: string;
}

/** Composite identity used wherever symbols must stay apart per network */
export interface TokenKey {
  readonly symbol: string;
  readonly network: string | null;
}

export interface ResolvedSelector {
  selector: TokenSelector;
  tokens: TokenRecord[];
}

export function tokenKeyOf(token: Pick<TokenRecord, 'symbol' | 'network'>): TokenKey {
  return { symbol: token.symbol, network: token.network };
}

export function sameTokenKey(a: TokenKey, b: TokenKey): boolean {
  return a.symbol === b.symbol && a.network === b.network;
}

export function displayNameOf(key: TokenKey): string {
  return key.network ? `${key.symbol} (${key.network})` : key.symbol;
}

/** Groups tokens by composite key, keeping first-seen order */
export function groupByTokenKey(tokens: TokenRecord[]): Array<{ key: TokenKey; tokens: TokenRecord[] }> {
  const groups: Array<{ key: TokenKey; tokens: TokenRecord[] }> = [];
  for (const token of tokens) {
    const key = tokenKeyOf(token);
    const group = groups.find(g => sameTokenKey(g.key, key));
    if (group) {
      group.tokens.push(token);
    } else {
      groups.push({ key, tokens: [token] });
    }
  }
  return groups;
}

export function describeSelector(selector: TokenSelector, networks?: string[]): string {
  if (selector.symbol === undefined) {
    return `ID '${selector.tokenId}'`;
  }
  if (selector.network) {
    return `'${selector.symbol}' on network '${selector.network}'`;
  }
  if (networks && networks.length > 0) {
    return `'${selector.symbol}' in networks [${networks.join(', ')}]`;
  }
  return `'${selector.symbol}'`;
}

/**
 * Looks up the tokens a selector refers to. The selector's own network wins;
 * otherwise fallbackNetworks (when given) restricts the match.
 */
export async function lookupTokens(
  store: EntityStore,
  selector: TokenSelector,
  fallbackNetworks?: string[]
): Promise<TokenRecord[]> {
  const networks = selector.network
    ? [selector.network]
    : fallbackNetworks && fallbackNetworks.length > 0 ? fallbackNetworks : undefined;

  if (selector.symbol !== undefined) {
    return store.findTokens({ symbols: [selector.symbol], networks });
  }
  if (selector.tokenId !== undefined) {
    return store.findTokens({ ids: [selector.tokenId], networks });
  }
  return [];
}

export async function resolveTokenSelector(
  store: EntityStore,
  selector: TokenSelector
): Promise<TokenRecord[]> {
  const tokens = await lookupTokens(store, selector);
  if (tokens.length === 0) {
    const label = describeSelector(selector);
    throw new NotFoundError('token', [label], `Token with ${selector.symbol === undefined ? '' : 'symbol '}${label} not found`);
  }
  return tokens;
}

/**
 * Resolves every selector before anything is computed; all failures are
 * reported together.
 */
export async function resolveAllSelectors(
  store: EntityStore,
  selectors: TokenSelector[],
  fallbackNetworks?: string[]
): Promise<ResolvedSelector[]> {
  const resolved: ResolvedSelector[] = [];
  const missing: string[] = [];

  for (const selector of selectors) {
    const tokens = await lookupTokens(store, selector, fallbackNetworks);
    if (tokens.length === 0) {
      missing.push(describeSelector(selector, fallbackNetworks));
    } else {
      resolved.push({ selector, tokens });
    }
  }

  if (missing.length > 0) {
    throw new NotFoundError('token', missing, `Tokens not found: ${missing.join(', ')}`);
  }
  return resolved;
}

export function idsOf(tokens: TokenRecord[]): number[] {
  return tokens.map(t => t.id);
}
