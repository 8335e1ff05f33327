import axios from 'axios';
import type { PriceFrame, PriceRange, YahooChartResponse } from '../types/data';
import type { PricePoint, PriceSeries } from '../types/pairs';
import { DataError, FetchError } from '../errors';
import { PriceCache, priceCacheKey } from '../db/priceCache';

const YAHOO_FINANCE_URL = 'https://query1.finance.yahoo.com/v8/finance/chart';
const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

// Gap filling: forward at most FFILL_LIMIT bars, then backward at most BFILL_LIMIT.
const FFILL_LIMIT = 5;
const BFILL_LIMIT = 2;

export function parseRange(start: string, end: string): { start: Date; end: Date } {
  const startDate = new Date(`${start}T00:00:00Z`);
  const endDate = new Date(`${end}T00:00:00Z`);
  if (!ISO_DATE.test(start) || Number.isNaN(startDate.getTime())) {
    throw new DataError(`invalid start date: ${start}`);
  }
  if (!ISO_DATE.test(end) || Number.isNaN(endDate.getTime())) {
    throw new DataError(`invalid end date: ${end}`);
  }
  if (endDate < startDate) {
    throw new DataError('end date must be on/after start date', { start, end });
  }
  return { start: startDate, end: endDate };
}

function fillForward(col: (number | null)[], limit: number): void {
  let last: number | null = null;
  let run = 0;
  for (let i = 0; i < col.length; i++) {
    const v = col[i];
    if (v !== null) {
      last = v;
      run = 0;
    } else if (last !== null && run < limit) {
      col[i] = last;
      run++;
    } else {
      run++;
    }
  }
}

function fillBackward(col: (number | null)[], limit: number): void {
  let next: number | null = null;
  let run = 0;
  for (let i = col.length - 1; i >= 0; i--) {
    const v = col[i];
    if (v !== null) {
      next = v;
      run = 0;
    } else if (next !== null && run < limit) {
      col[i] = next;
      run++;
    } else {
      run++;
    }
  }
}

/**
 * Sort by date, drop repeated dates (first wins), fill short gaps and drop
 * columns that have no data at all. Returns a new frame.
 */
export function cleanPriceFrame(frame: PriceFrame): PriceFrame {
  const order = frame.dates
    .map((date, i) => ({ date, i }))
    .sort((x, y) => (x.date < y.date ? -1 : x.date > y.date ? 1 : x.i - y.i));

  const seen = new Set<string>();
  const keep = order.filter(({ date }) => {
    if (seen.has(date)) return false;
    seen.add(date);
    return true;
  });

  const columns: Record<string, (number | null)[]> = {};
  for (const [ticker, values] of Object.entries(frame.columns)) {
    const col = keep.map(({ i }) => {
      const v = values[i];
      return v !== null && v !== undefined && Number.isFinite(v) ? v : null;
    });
    fillForward(col, FFILL_LIMIT);
    fillBackward(col, BFILL_LIMIT);
    if (col.some((v) => v !== null)) columns[ticker] = col;
  }

  return { dates: keep.map(({ date }) => date), columns };
}

/** Merge per-ticker series into one frame over the union of their dates. */
export function buildPriceFrame(series: Record<string, PriceSeries>): PriceFrame {
  const dates = Array.from(
    new Set(Object.values(series).flatMap((points) => points.map((p) => p.date)))
  ).sort();
  const position = new Map(dates.map((d, i) => [d, i]));

  const columns: Record<string, (number | null)[]> = {};
  for (const [ticker, points] of Object.entries(series)) {
    const col: (number | null)[] = new Array(dates.length).fill(null);
    for (const p of points) {
      const i = position.get(p.date);
      if (i !== undefined && col[i] === null) col[i] = p.price;
    }
    columns[ticker] = col;
  }

  return { dates, columns };
}

/** The two columns as series over the dates where both have a price. */
export function alignPair(
  frame: PriceFrame,
  tickerA: string,
  tickerB: string
): { a: PriceSeries; b: PriceSeries } {
  const colA = frame.columns[tickerA];
  const colB = frame.columns[tickerB];
  if (!colA || !colB) {
    const missing = [tickerA, tickerB].filter((t) => !frame.columns[t]);
    throw new DataError(`no price data for ${missing.join(', ')}`, { missing });
  }

  const a: PriceSeries = [];
  const b: PriceSeries = [];
  frame.dates.forEach((date, i) => {
    const pa = colA[i];
    const pb = colB[i];
    if (pa === null || pb === null) return;
    a.push({ date, price: pa });
    b.push({ date, price: pb });
  });

  return { a, b };
}

export class PriceLoader {
  private cache: PriceCache | null;
  private cacheReady = false;

  constructor(cache?: PriceCache) {
    this.cache = cache || null;
  }

  /** Daily adjusted closes for one ticker from the Yahoo chart API. */
  async fetchTicker(ticker: string, range: PriceRange): Promise<PricePoint[]> {
    const { start, end } = parseRange(range.start, range.end);
    const period1 = Math.floor(start.getTime() / 1000);
    const period2 = Math.floor(end.getTime() / 1000);

    let data: YahooChartResponse;
    try {
      const response = await axios.get<YahooChartResponse>(`${YAHOO_FINANCE_URL}/${ticker}`, {
        params: {
          period1,
          period2,
          interval: '1d',
          includePrePost: false,
        },
        headers: {
          'User-Agent': 'Mozilla/5.0',
        },
        timeout: 30000,
      });
      data = response.data;
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FetchError(ticker, `failed to fetch prices for ${ticker}: ${message}`, error);
    }

    const result = data.chart.result?.[0];
    if (!result) {
      return [];
    }

    const timestamps = result.timestamp || [];
    const adjClose = result.indicators.adjclose?.[0]?.adjclose;
    const close = result.indicators.quote?.[0]?.close;
    const values = adjClose || close || [];

    const prices: PricePoint[] = [];
    for (let i = 0; i < timestamps.length; i++) {
      const price = values[i];
      if (price == null || !Number.isFinite(price)) continue;
      prices.push({
        date: new Date(timestamps[i] * 1000).toISOString().slice(0, 10),
        price,
      });
    }

    return prices;
  }

  private async readyCache(): Promise<PriceCache | null> {
    if (!this.cache) return null;
    if (this.cacheReady) return this.cache;
    try {
      await this.cache.initialize();
      this.cacheReady = true;
      return this.cache;
    } catch (error) {
      console.warn(`  ✗ Price cache unreadable, downloading instead: ${error}`);
      this.cache = null;
      return null;
    }
  }

  /**
   * Adjusted closes for the tickers over [start, end], cleaned, one column
   * per ticker that returned data. Served from the cache when the same
   * request was stored before.
   */
  async loadPrices(tickers: string[], start: string, end: string): Promise<PriceFrame> {
    if (tickers.length === 0) {
      throw new DataError('tickers must be a non-empty list');
    }
    parseRange(start, end);

    const key = priceCacheKey(tickers, start, end);
    const cache = await this.readyCache();

    if (cache) {
      const cached = await cache.get(key);
      if (cached) {
        console.log(`  ✓ Cache hit: ${key}`);
        return cleanPriceFrame(cached);
      }
      if ((await cache.keys()).includes(key)) {
        console.warn(`  ✗ Dropping malformed cache entry: ${key}`);
        await cache.delete(key);
      }
    }

    console.log(`  • Downloading ${tickers.join(', ')} (${start} → ${end})`);
    const series: Record<string, PriceSeries> = {};
    for (const ticker of tickers) {
      series[ticker] = await this.fetchTicker(ticker, { start, end });
    }

    const frame = cleanPriceFrame(buildPriceFrame(series));
    const missing = tickers.filter((t) => !frame.columns[t]).sort();
    if (missing.length === tickers.length) {
      throw new DataError(`no price data returned for ${tickers.join(', ')}`);
    }
    if (missing.length > 0) {
      console.warn(`  ✗ Missing tickers with no data: ${missing.join(', ')}`);
    }

    const present = tickers.filter((t) => frame.columns[t]);
    const ordered: PriceFrame = {
      dates: frame.dates,
      columns: Object.fromEntries(present.map((t) => [t, frame.columns[t]])),
    };

    if (cache) {
      try {
        await cache.put(key, { tickers: present, start, end, frame: ordered });
      } catch (error) {
        console.warn(`  ✗ Could not write price cache: ${error}`);
      }
    }

    return ordered;
  }
}
