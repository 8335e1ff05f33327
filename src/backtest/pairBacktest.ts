import type {
  AlignedPair,
  BacktestParams,
  BacktestResult,
  BacktestRow,
  PriceSeries,
} from '../types/pairs';
import { resolveParams } from '../config/params';
import { DataError } from '../errors';
import { spreadOf, zscore } from '../signals/zscore';
import { generatePositions } from '../signals/positions';

export interface PnlColumns {
  grossReturn: number[];
  cost: number[];
  ret: number[];
  equity: number[];
  turnover: number[];
}

/**
 * Restrict both series to the dates where each has a finite price, sorted
 * ascending. Fewer than two shared dates is a data error.
 */
export function alignSeries(pricesA: PriceSeries, pricesB: PriceSeries): AlignedPair {
  const byDateA = new Map<string, number>();
  for (const p of pricesA) {
    if (Number.isFinite(p.price)) byDateA.set(p.date, p.price);
  }

  const byDateB = new Map<string, number>();
  for (const p of pricesB) {
    if (Number.isFinite(p.price) && byDateA.has(p.date)) byDateB.set(p.date, p.price);
  }

  const dates = Array.from(byDateB.keys()).sort();
  if (dates.length < 2) {
    throw new DataError('price series need at least 2 overlapping dates', {
      overlap: dates.length,
    });
  }

  const a: number[] = [];
  const b: number[] = [];
  for (const date of dates) {
    a.push(byDateA.get(date) ?? Number.NaN);
    b.push(byDateB.get(date) ?? Number.NaN);
  }

  return { dates, a, b };
}

// Zero gross exposure means nothing was held: the ratio is undefined and
// reported as 0.
function perExposure(amount: number, exposure: number): number {
  return exposure === 0 ? 0 : amount / exposure;
}

/**
 * Dollar PnL and costs for a position trajectory.
 *
 * Holdings lag decisions by one bar: the position decided at the close of
 * t-1 is held through t. Returns are normalized by the prior day's gross
 * two-leg exposure; cost is `costBps` on the combined traded notional of
 * both legs, over the same exposure.
 */
export function computePnl(
  pair: AlignedPair,
  yPos: readonly number[],
  xPos: readonly number[],
  costBps: number
): PnlColumns {
  const { a, b } = pair;
  const n = b.length;
  const columns: PnlColumns = {
    grossReturn: [],
    cost: [],
    ret: [],
    equity: [],
    turnover: [],
  };

  let equity = 1;
  let lastA = Number.NaN;
  let lastB = Number.NaN;

  for (let t = 0; t < n; t++) {
    const qB = t > 0 ? yPos[t - 1] : 0;
    const qA = t > 0 ? -xPos[t - 1] : 0;

    const dB = t > 0 ? b[t] - b[t - 1] : 0;
    const dA = t > 0 ? a[t] - a[t - 1] : 0;
    const pnl = qB * dB + qA * dA;

    // prior close, carried forward if missing
    if (t > 0) {
      if (Number.isFinite(b[t - 1])) lastB = b[t - 1];
      if (Number.isFinite(a[t - 1])) lastA = a[t - 1];
    }
    const exposure = t > 0 ? Math.abs(qB) * lastB + Math.abs(qA) * lastA : 0;
    const usable = Number.isFinite(exposure) ? exposure : 0;

    const dyPos = t > 0 ? Math.abs(yPos[t] - yPos[t - 1]) : 0;
    const dxPos = t > 0 ? Math.abs(xPos[t] - xPos[t - 1]) : 0;
    const traded = dyPos * b[t] + dxPos * a[t];

    const grossReturn = perExposure(pnl, usable);
    const turnover = perExposure(traded, usable);
    const cost = (costBps / 1e4) * turnover;
    const ret = grossReturn - cost;
    equity *= 1 + ret;

    columns.grossReturn.push(grossReturn);
    columns.cost.push(cost);
    columns.ret.push(ret);
    columns.equity.push(equity);
    columns.turnover.push(turnover);
  }

  return columns;
}

/**
 * Backtest one pair: spread `B - beta * A`, its rolling z-score, the
 * threshold state machine, then PnL net of costs.
 *
 * @param pricesA independent leg (the one scaled by beta)
 * @param pricesB dependent leg
 */
export function backtestPair(
  pricesA: PriceSeries,
  pricesB: PriceSeries,
  beta: number,
  overrides: Partial<BacktestParams> = {}
): BacktestResult {
  const params = resolveParams(overrides, beta);
  const pair = alignSeries(pricesA, pricesB);

  const z = zscore(spreadOf(pair.a, pair.b, beta), params.lookback);
  const { yPos, xPos } = generatePositions(z, beta, params);
  const pnl = computePnl(pair, yPos, xPos, params.costBps);

  const rows: BacktestRow[] = pair.dates.map((date, t) => ({
    date,
    ret: pnl.ret[t],
    grossReturn: pnl.grossReturn[t],
    cost: pnl.cost[t],
    equity: pnl.equity[t],
    z: z[t],
    yPos: yPos[t],
    xPos: xPos[t],
    turnover: pnl.turnover[t],
  }));

  return { beta, params, rows };
}
