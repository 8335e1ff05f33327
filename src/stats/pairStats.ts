import type { AdfResult } from '../types/analysis';
import { DataError } from '../errors';
import { ols } from '../utils/ols';

// MacKinnon (2010) response surface, constant-only regression, one series:
// cv(T) = b0 + b1/T + b2/T^2 + b3/T^3
const ADF_CONSTANT_SURFACE = {
  '1%': [-3.43035, -6.5393, -16.786, -79.433],
  '5%': [-2.86154, -2.8903, -4.234, -40.04],
  '10%': [-2.56677, -1.5384, -2.809, 0],
} as const;

// MacKinnon (1994) approximate p-values, constant-only regression, one series.
// Below TAU_STAR the small-p polynomial applies, above it the large-p one.
const TAU_MAX = 2.74;
const TAU_MIN = -18.83;
const TAU_STAR = -1.61;
const TAU_SMALL_P: readonly number[] = [2.1659, 1.4412, 0.038269];
const TAU_LARGE_P: readonly number[] = [1.7339, 0.93202, -0.12745, -0.010368];

function finite(values: readonly number[]): number[] {
  return values.filter((v) => Number.isFinite(v));
}

/**
 * Static hedge ratio of y on x, OLS without intercept: y = beta * x + e.
 * Pairs where either value is not finite are skipped.
 */
export function hedgeRatio(y: readonly number[], x: readonly number[]): number {
  let sxy = 0;
  let sxx = 0;
  let count = 0;
  const n = Math.min(y.length, x.length);
  for (let i = 0; i < n; i++) {
    if (!Number.isFinite(y[i]) || !Number.isFinite(x[i])) continue;
    sxy += x[i] * y[i];
    sxx += x[i] * x[i];
    count++;
  }

  if (count < 2) {
    throw new DataError('not enough overlapping observations to estimate hedge ratio', { count });
  }
  if (sxx === 0) {
    throw new DataError('independent series is identically zero');
  }
  return sxy / sxx;
}

/**
 * Half-life of mean reversion in bars, from dS_t = a + phi * S_{t-1} + e.
 * kappa = -ln(1 + phi); Infinity when the spread does not revert.
 */
export function halfLife(spread: readonly number[]): number {
  const s = finite(spread);
  if (s.length < 20) {
    throw new DataError('spread too short to estimate half-life (need >= 20 observations)', {
      count: s.length,
    });
  }

  const x: number[][] = [];
  const y: number[] = [];
  for (let j = 0; j < s.length - 1; j++) {
    x.push([1, s[j]]);
    y.push(s[j + 1] - s[j]);
  }

  const phi = ols(x, y).coef[1];
  if (phi <= -1) return 0;
  const kappa = -Math.log1p(phi);
  if (!(kappa > 0)) return Infinity;
  return Math.log(2) / kappa;
}

function adfDesign(s: number[], ds: number[], lag: number, first: number) {
  const x: number[][] = [];
  const y: number[] = [];
  for (let j = first; j < ds.length; j++) {
    const row = [1, s[j]];
    for (let i = 1; i <= lag; i++) row.push(ds[j - i]);
    x.push(row);
    y.push(ds[j]);
  }
  return { x, y };
}

export function adfCriticalValues(nobs: number): AdfResult['criticalValues'] {
  const at = (b: readonly number[]) => b[0] + b[1] / nobs + b[2] / nobs ** 2 + b[3] / nobs ** 3;
  return {
    '1%': at(ADF_CONSTANT_SURFACE['1%']),
    '5%': at(ADF_CONSTANT_SURFACE['5%']),
    '10%': at(ADF_CONSTANT_SURFACE['10%']),
  };
}

// Abramowitz and Stegun 7.1.26, absolute error below 1.5e-7.
function normalCdf(x: number): number {
  const z = Math.abs(x) / Math.SQRT2;
  const t = 1 / (1 + 0.3275911 * z);
  const poly =
    t * (0.254829592 + t * (-0.284496736 + t * (1.421413741 + t * (-1.453152027 + t * 1.061405429))));
  const erf = 1 - poly * Math.exp(-z * z);
  return x >= 0 ? 0.5 * (1 + erf) : 0.5 * (1 - erf);
}

/** Approximate p-value of an ADF statistic from a regression with a constant. */
export function adfPValue(statistic: number): number {
  if (Number.isNaN(statistic)) return NaN;
  if (statistic > TAU_MAX) return 1;
  if (statistic < TAU_MIN) return 0;
  const coef = statistic <= TAU_STAR ? TAU_SMALL_P : TAU_LARGE_P;
  const score = coef.reduce((sum, c, i) => sum + c * statistic ** i, 0);
  return normalCdf(score);
}

/**
 * Augmented Dickey-Fuller test with a constant. The lag order is picked by
 * AIC over 0..maxLag on a common sample, then refit on every usable point.
 */
export function adfTest(series: readonly number[], maxLag?: number): AdfResult {
  const s = finite(series);
  const n = s.length;
  if (n < 10) {
    throw new DataError('series too short for ADF test (need >= 10 observations)', { count: n });
  }

  const ds: number[] = [];
  for (let j = 0; j < n - 1; j++) ds.push(s[j + 1] - s[j]);

  const defaultLag = Math.floor(12 * Math.pow(n / 100, 0.25));
  const lagCap = Math.max(0, Math.min(maxLag ?? defaultLag, Math.floor(n / 2) - 2));

  let usedLag = 0;
  let bestAic = Infinity;
  for (let lag = 0; lag <= lagCap; lag++) {
    const { x, y } = adfDesign(s, ds, lag, lagCap);
    const fit = ols(x, y);
    const aic = fit.nobs * Math.log(fit.ssr / fit.nobs) + 2 * (lag + 2);
    if (aic < bestAic) {
      bestAic = aic;
      usedLag = lag;
    }
  }

  const { x, y } = adfDesign(s, ds, usedLag, usedLag);
  const fit = ols(x, y);
  const k = usedLag + 2;
  const sigma2 = fit.ssr / (fit.nobs - k);
  const statistic = fit.coef[1] / Math.sqrt(sigma2 * fit.xtxInv[1][1]);
  const criticalValues = adfCriticalValues(fit.nobs);

  return {
    statistic,
    pValue: adfPValue(statistic),
    usedLag,
    nobs: fit.nobs,
    criticalValues,
    stationaryAt5: statistic < criticalValues['5%'],
  };
}
