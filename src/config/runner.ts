import { ConfigError } from '../errors';

export interface RunnerConfig {
  tickers: [string, string];
  start: string;
  end: string;
  cachePath: string;
  outputPath?: string;
}

// The first ticker is the independent leg (A), the second the dependent one (B).
export function loadRunnerConfig(env: NodeJS.ProcessEnv = process.env): RunnerConfig {
  const tickers = (env.PAIRS_TICKERS || 'KO,PEP')
    .split(',')
    .map((t) => t.trim().toUpperCase())
    .filter((t) => t.length > 0);

  if (tickers.length !== 2) {
    throw new ConfigError('PAIRS_TICKERS must name exactly two tickers', { tickers });
  }

  return {
    tickers: [tickers[0], tickers[1]],
    start: env.PAIRS_START || '2018-01-01',
    end: env.PAIRS_END || '2025-01-01',
    cachePath: env.PAIRS_CACHE_PATH || 'data/prices.json',
    outputPath: env.PAIRS_OUTPUT || undefined,
  };
}
