import type { PerformanceMetrics } from '../types/analysis';

export const TRADING_DAYS = 252;

function sampleStd(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const mean = values.reduce((sum, v) => sum + v, 0) / values.length;
  const ss = values.reduce((sum, v) => sum + (v - mean) ** 2, 0);
  return Math.sqrt(ss / (values.length - 1));
}

/** Compounded growth of 1 under the given returns; non-finite returns count as 0. */
export function equityCurve(ret: readonly number[]): number[] {
  let equity = 1;
  return ret.map((r) => {
    equity *= 1 + (Number.isFinite(r) ? r : 0);
    return equity;
  });
}

export function drawdownSeries(ret: readonly number[]): number[] {
  let peak = -Infinity;
  return equityCurve(ret).map((e) => {
    peak = Math.max(peak, e);
    return e / peak - 1;
  });
}

/**
 * Annualized return, volatility, Sharpe (return over volatility, no risk-free
 * rate) and maximum drawdown of a daily return series.
 */
export function computeMetrics(
  ret: readonly number[],
  freq: number = TRADING_DAYS
): PerformanceMetrics {
  const r = ret.filter((v) => Number.isFinite(v));
  if (r.length === 0) {
    return { annReturn: 0, annVol: 0, sharpe: 0, maxDrawdown: 0 };
  }

  const growth = r.reduce((acc, v) => acc * (1 + v), 1);
  const annReturn = Math.pow(growth, freq / r.length) - 1;
  const annVol = sampleStd(r) * Math.sqrt(freq);
  const sharpe = annVol === 0 ? 0 : annReturn / annVol;
  const maxDrawdown = drawdownSeries(r).reduce((worst, d) => Math.min(worst, d), 0);

  return { annReturn, annVol, sharpe, maxDrawdown };
}

/** Annualized rolling Sharpe (mean / std); null during warm-up or when std is 0. */
export function rollingSharpe(
  ret: readonly number[],
  window: number = 126,
  freq: number = TRADING_DAYS
): (number | null)[] {
  const r = ret.map((v) => (Number.isFinite(v) ? v : 0));
  return r.map((_, end) => {
    if (end < window - 1) return null;
    const slice = r.slice(end - window + 1, end + 1);
    const std = sampleStd(slice);
    if (std === 0) return null;
    const mean = slice.reduce((sum, v) => sum + v, 0) / window;
    return (mean / std) * Math.sqrt(freq);
  });
}
