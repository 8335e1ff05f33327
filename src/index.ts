import 'dotenv/config';
import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';
import { PriceCache } from './db/priceCache';
import { PriceLoader, alignPair } from './data/priceLoader';
import { loadParamsFromEnv } from './config/params';
import { loadRunnerConfig } from './config/runner';
import { hedgeRatio, adfTest, halfLife } from './stats/pairStats';
import { backtestPair } from './backtest/pairBacktest';
import { spreadOf } from './signals/zscore';
import { computeMetrics } from './analysis/metrics';
import { summarizeTrades } from './analysis/trades';
import { formatResultCsv } from './reports/csv';
import type { PairDiagnostics } from './types/analysis';

const pct = (v: number) => `${v >= 0 ? '+' : ''}${(v * 100).toFixed(2)}%`;

async function main() {
  console.log('📊 Pairs Trading Backtester');
  console.log('='.repeat(50));

  const config = loadRunnerConfig();
  const params = loadParamsFromEnv();
  const [tickerA, tickerB] = config.tickers;

  const cache = new PriceCache(config.cachePath);
  const loader = new PriceLoader(cache);

  console.log(`\n📥 Loading prices for ${tickerA}/${tickerB}...`);
  const frame = await loader.loadPrices([tickerA, tickerB], config.start, config.end);
  const { a, b } = alignPair(frame, tickerA, tickerB);
  console.log(`  ✓ ${a.length} aligned observations`);

  const pxA = a.map((p) => p.price);
  const pxB = b.map((p) => p.price);
  const beta = hedgeRatio(pxB, pxA);
  const spread = spreadOf(pxA, pxB, beta);
  const diagnostics: PairDiagnostics = { beta, adf: adfTest(spread), halfLife: halfLife(spread) };
  const { adf } = diagnostics;

  console.log('\n🔍 Pair diagnostics:');
  console.log(`  Beta (${tickerB} on ${tickerA}): ${beta.toFixed(4)}`);
  console.log(
    `  ADF statistic: ${adf.statistic.toFixed(3)}, p-value ${adf.pValue.toFixed(4)} (5% critical ${adf.criticalValues['5%'].toFixed(3)}, lag ${adf.usedLag})` +
      ` ${adf.stationaryAt5 ? '✓ stationary' : '✗ not stationary'}`
  );
  console.log(`  Half-life: ${diagnostics.halfLife.toFixed(1)} days`);

  console.log('\n🔬 Running backtest...');
  console.log(
    `  lookback=${params.lookback} zIn=${params.zIn} zOut=${params.zOut} stop=${params.stop}` +
      ` costBps=${params.costBps} tp=${params.tpThreshold ?? 'off'} confirm=${params.confirmDelta}`
  );
  const result = backtestPair(a, b, beta, params);
  const metrics = computeMetrics(result.rows.map((r) => r.ret));
  const trades = summarizeTrades(result.rows);

  console.log('\n📈 PERFORMANCE:');
  console.log(`  Annual Return:  ${pct(metrics.annReturn)}`);
  console.log(`  Annual Vol:     ${(metrics.annVol * 100).toFixed(2)}%`);
  console.log(`  Sharpe:         ${metrics.sharpe.toFixed(2)}`);
  console.log(`  Max Drawdown:   ${pct(metrics.maxDrawdown)}`);
  console.log(`  Final Equity:   ${result.rows[result.rows.length - 1].equity.toFixed(4)}`);
  console.log(`  Total Turnover: ${result.rows.reduce((sum, r) => sum + r.turnover, 0).toFixed(2)}`);

  if (trades.length > 0) {
    const wins = trades.filter((t) => t.return > 0).length;
    console.log(`\n🎯 Round trips: ${trades.length} (${((wins / trades.length) * 100).toFixed(1)}% winners)`);
    console.log('| Side  | Entry      | Exit       | Days | Return   |');
    console.log('|-------|------------|------------|------|----------|');
    for (const t of trades.slice(-10)) {
      console.log(
        `| ${t.side.padEnd(5)} | ${t.entryDate} | ${t.exitDate} | ${String(t.holdingDays).padEnd(4)} | ${pct(t.return).padEnd(8)} |` +
          (t.open ? ' (open)' : '')
      );
    }
  } else {
    console.log('\nNo trades triggered.');
  }

  if (config.outputPath) {
    await mkdir(dirname(config.outputPath), { recursive: true });
    await writeFile(config.outputPath, formatResultCsv(result), 'utf8');
    console.log(`\n✓ Results written to ${config.outputPath}`);
  }

  await cache.close();
  console.log('\n✓ Backtest complete');
}

main().catch((error) => {
  console.error(`✗ ${error instanceof Error ? error.message : String(error)}`);
  process.exitCode = 1;
});
