/**
 * Matrix Builder
 * Token × network sentiment grid over the busiest networks and symbols
 */

import { z } from 'zod';

import { EntityStore } from '../store/entityStore';
import { countsFromRows, roundTo, sentimentScore, totalOf } from './sentimentMath';
import { formatPeriod, resolveWindow } from './timeWindow';
import { MatrixCell, SentimentMatrix } from './types';
import { matrixSchema } from './validation';

export async function getNetworkTokenSentimentMatrix(
  store: EntityStore,
  params: z.output<typeof matrixSchema>,
  now: Date
): Promise<SentimentMatrix> {
  const window = resolveWindow(params.daysBack, now);
  const empty: SentimentMatrix = { period: formatPeriod(window), window, networks: [], tokens: [], rows: [] };

  const topNetworks = (await store.rankNetworks(
    { window, requireNetwork: true },
    { minMentions: params.minMentions, limit: params.topNNetworks }
  )).map(n => n.network);
  if (topNetworks.length === 0) return empty;

  const topSymbols = (await store.rankSymbols(
    { window, networks: topNetworks },
    { minMentions: params.minMentions, limit: params.topNTokens }
  )).map(s => s.symbol);
  if (topSymbols.length === 0) return empty;

  const tokens = await store.findTokens({ symbols: topSymbols, networks: topNetworks });
  const rows = await store.countSentimentsByToken({ window, tokenIds: tokens.map(t => t.id) });

  const cellOf = (symbol: string, network: string): MatrixCell | null => {
    const ids = new Set(tokens.filter(t => t.symbol === symbol && t.network === network).map(t => t.id));
    if (ids.size === 0) return null;

    const counts = countsFromRows(rows.filter(r => ids.has(r.tokenId)));
    const mentions = totalOf(counts);
    if (mentions < params.minMentions) return null;

    return { mentions, sentimentScore: roundTo(sentimentScore(counts), 2), counts };
  };

  const grid = topSymbols.map(symbol => ({
    symbol,
    cells: new Map(topNetworks.map(network => [network, cellOf(symbol, network)])),
  }));

  const networkTotals = new Map<string, number>(topNetworks.map(n => [n, 0]));
  for (const { cells } of grid) {
    for (const [network, cell] of cells) {
      if (cell) networkTotals.set(network, (networkTotals.get(network) ?? 0) + cell.mentions);
    }
  }

  const networks = [...topNetworks].sort((a, b) => (networkTotals.get(b) ?? 0) - (networkTotals.get(a) ?? 0));

  const matrixRows = grid
    .map(({ symbol, cells }) => {
      const aligned = networks.map(network => cells.get(network) ?? null);
      const totalMentions = aligned.reduce((sum, cell) => sum + (cell ? cell.mentions : 0), 0);
      return { symbol, cells: aligned, totalMentions };
    })
    .sort((a, b) => b.totalMentions - a.totalMentions);

  return {
    period: formatPeriod(window),
    window,
    networks,
    tokens: matrixRows.map(r => r.symbol),
    rows: matrixRows,
  };
}
