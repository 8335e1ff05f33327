import { validateLookback } from '../config/params';

/**
 * Rolling z-score of a spread over a trailing window that includes the
 * current point, using the sample standard deviation (n - 1).
 *
 * Points without a full window of finite values, and windows whose standard
 * deviation is zero, yield `null`.
 */
export function zscore(spread: readonly (number | null)[], lookback: number): (number | null)[] {
  validateLookback(lookback);

  const z: (number | null)[] = new Array(spread.length).fill(null);
  if (lookback < 2) {
    // a single-point window has no sample deviation
    return z;
  }

  for (let end = lookback - 1; end < spread.length; end++) {
    const current = spread[end];
    if (current === null || !Number.isFinite(current)) continue;

    let sum = 0;
    let min = Infinity;
    let max = -Infinity;
    let complete = true;
    for (let i = end - lookback + 1; i <= end; i++) {
      const v = spread[i];
      if (v === null || !Number.isFinite(v)) {
        complete = false;
        break;
      }
      sum += v;
      min = Math.min(min, v);
      max = Math.max(max, v);
    }
    if (!complete || min === max) continue;

    const mean = sum / lookback;
    let ss = 0;
    for (let i = end - lookback + 1; i <= end; i++) {
      const d = (spread[i] ?? mean) - mean;
      ss += d * d;
    }
    const std = Math.sqrt(ss / (lookback - 1));
    if (std === 0) continue;

    z[end] = (current - mean) / std;
  }

  return z;
}

export function spreadOf(a: readonly number[], b: readonly number[], beta: number): number[] {
  return b.map((pb, i) => pb - beta * a[i]);
}
