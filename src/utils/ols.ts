import { DataError } from '../errors';

export interface OlsFit {
  coef: number[];
  ssr: number;
  nobs: number;
  // (X'X)^-1; times the residual variance it gives the coefficient covariance
  xtxInv: number[][];
}

function invert(matrix: number[][]): number[][] {
  const n = matrix.length;
  const a = matrix.map((row, i) => [
    ...row,
    ...Array.from({ length: n }, (_, j) => (i === j ? 1 : 0)),
  ]);

  for (let col = 0; col < n; col++) {
    let pivot = col;
    for (let r = col + 1; r < n; r++) {
      if (Math.abs(a[r][col]) > Math.abs(a[pivot][col])) pivot = r;
    }
    if (Math.abs(a[pivot][col]) < 1e-12) {
      throw new DataError('regression design matrix is singular');
    }
    [a[col], a[pivot]] = [a[pivot], a[col]];

    const p = a[col][col];
    for (let c = 0; c < 2 * n; c++) a[col][c] /= p;

    for (let r = 0; r < n; r++) {
      if (r === col) continue;
      const f = a[r][col];
      if (f === 0) continue;
      for (let c = 0; c < 2 * n; c++) a[r][c] -= f * a[col][c];
    }
  }

  return a.map((row) => row.slice(n));
}

/** Ordinary least squares via the normal equations. Rows of `x` are observations. */
export function ols(x: number[][], y: number[]): OlsFit {
  const nobs = y.length;
  const k = x[0]?.length ?? 0;
  if (nobs === 0 || k === 0) {
    throw new DataError('regression needs at least one observation and one regressor');
  }

  const xtx = Array.from({ length: k }, () => new Array<number>(k).fill(0));
  const xty = new Array<number>(k).fill(0);
  for (let i = 0; i < nobs; i++) {
    const row = x[i];
    for (let p = 0; p < k; p++) {
      xty[p] += row[p] * y[i];
      for (let q = 0; q < k; q++) xtx[p][q] += row[p] * row[q];
    }
  }

  const xtxInv = invert(xtx);
  const coef = xtxInv.map((row) => row.reduce((sum, v, q) => sum + v * xty[q], 0));

  let ssr = 0;
  for (let i = 0; i < nobs; i++) {
    const fitted = x[i].reduce((sum, v, p) => sum + v * coef[p], 0);
    const e = y[i] - fitted;
    ssr += e * e;
  }

  return { coef, ssr, nobs, xtxInv };
}
