import type { BacktestParams, PairThresholds } from '../types/pairs';
import { ConfigError } from '../errors';

export const DEFAULT_PARAMS: Readonly<BacktestParams> = Object.freeze({
  lookback: 60,
  zIn: 2.0,
  zOut: 0.5,
  stop: 3.5,
  costBps: 1.0,
  confirmDelta: 0,
});

const ENV_KEYS: ReadonlyArray<[keyof BacktestParams, string]> = [
  ['lookback', 'PAIRS_LOOKBACK'],
  ['zIn', 'PAIRS_Z_IN'],
  ['zOut', 'PAIRS_Z_OUT'],
  ['stop', 'PAIRS_STOP'],
  ['costBps', 'PAIRS_COST_BPS'],
  ['tpThreshold', 'PAIRS_TP_THRESHOLD'],
  ['confirmDelta', 'PAIRS_CONFIRM_DELTA'],
];

function requireFinite(name: string, value: number): void {
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${name} must be a finite number`, { [name]: value });
  }
}

export function validateLookback(lookback: number): void {
  if (!Number.isInteger(lookback) || lookback <= 0) {
    throw new ConfigError('lookback must be a positive integer', { lookback });
  }
}

export function validateThresholds(thresholds: PairThresholds): void {
  const { zIn, zOut, stop, tpThreshold, confirmDelta } = thresholds;

  requireFinite('zIn', zIn);
  requireFinite('zOut', zOut);
  requireFinite('stop', stop);
  requireFinite('confirmDelta', confirmDelta);

  if (zIn <= 0) {
    throw new ConfigError('zIn must be positive', { zIn });
  }
  if (zOut < 0 || zOut >= zIn) {
    throw new ConfigError('zOut must lie in [0, zIn)', { zIn, zOut });
  }
  if (stop <= zIn) {
    throw new ConfigError('stop must be greater than zIn', { zIn, stop });
  }
  if (tpThreshold !== undefined) {
    requireFinite('tpThreshold', tpThreshold);
    if (tpThreshold < 0 || tpThreshold > zOut) {
      throw new ConfigError('tpThreshold must lie in [0, zOut]', { tpThreshold, zOut });
    }
  }
  if (confirmDelta < 0) {
    throw new ConfigError('confirmDelta must be non-negative', { confirmDelta });
  }
}

/**
 * Merge overrides onto the defaults and check every rule. The returned
 * object is frozen so a run cannot alter its own configuration.
 */
export function resolveParams(
  overrides: Partial<BacktestParams> = {},
  beta?: number
): Readonly<BacktestParams> {
  const params: BacktestParams = { ...DEFAULT_PARAMS, ...overrides };

  validateLookback(params.lookback);
  validateThresholds(params);

  requireFinite('costBps', params.costBps);
  if (params.costBps < 0) {
    throw new ConfigError('costBps must be non-negative', { costBps: params.costBps });
  }
  if (beta !== undefined && !Number.isFinite(beta)) {
    throw new ConfigError('beta must be a finite number', { beta });
  }

  return Object.freeze(params);
}

function parseNumber(key: string, raw: string): number {
  const value = raw.trim() === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigError(`${key} is not a number: "${raw}"`, { [key]: raw });
  }
  return value;
}

/** Read backtest parameters from PAIRS_* variables; unset keys keep defaults. */
export function loadParamsFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Readonly<BacktestParams> {
  const read = (key: string): number | undefined => {
    const raw = env[key];
    return raw === undefined ? undefined : parseNumber(key, raw);
  };

  const overrides: Partial<BacktestParams> = {};
  for (const [field, key] of ENV_KEYS) {
    const value = read(key);
    if (value !== undefined) overrides[field] = value;
  }

  return resolveParams(overrides);
}
