import type { BacktestRow } from '../types/pairs';
import type { RoundTrip, TradeMarker } from '../types/analysis';

/**
 * Points where the decided position changes, for plotting over the z-score.
 * Trajectories from `generatePositions` always pass through flat, so `flip`
 * only appears for position series built elsewhere.
 */
export function tradeMarkers(
  z: readonly (number | null)[],
  yPos: readonly number[]
): TradeMarker[] {
  const markers: TradeMarker[] = [];
  for (let i = 1; i < yPos.length; i++) {
    const prev = yPos[i - 1];
    const next = yPos[i];
    if (prev === next) continue;
    markers.push({
      index: i,
      z: z[i] ?? null,
      kind: prev === 0 ? 'entry' : next === 0 ? 'exit' : 'flip',
    });
  }
  return markers;
}

/**
 * Split a backtest into round trips. A position decided on day `entryIndex`
 * is held from the next day through the day it is closed, so its return
 * compounds `ret` over entryIndex+1..exitIndex.
 */
export function summarizeTrades(rows: readonly BacktestRow[]): RoundTrip[] {
  const trips: RoundTrip[] = [];
  let i = 0;

  while (i < rows.length) {
    const side = rows[i].yPos;
    if (side === 0) {
      i++;
      continue;
    }

    const entryIndex = i;
    while (i < rows.length && rows[i].yPos === side) i++;
    const open = i >= rows.length;
    const exitIndex = open ? rows.length - 1 : i;

    let growth = 1;
    for (let d = entryIndex + 1; d <= exitIndex; d++) growth *= 1 + rows[d].ret;

    trips.push({
      side: side > 0 ? 'long' : 'short',
      entryIndex,
      exitIndex,
      entryDate: rows[entryIndex].date,
      exitDate: rows[exitIndex].date,
      holdingDays: exitIndex - entryIndex,
      return: growth - 1,
      open,
    });
  }

  return trips;
}
