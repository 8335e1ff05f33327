/**
 * Wide table of prices: one shared date index, one column per ticker.
 * `null` marks a missing observation.
 */
export interface PriceFrame {
  dates: string[];
  columns: Record<string, (number | null)[]>;
}

export interface PriceRange {
  start: string;
  end: string;
}

// Subset of the Yahoo Finance v8 chart payload that the loader reads.
export interface YahooChartResponse {
  chart: {
    result?: Array<{
      timestamp?: number[];
      indicators: {
        quote?: Array<{ close?: (number | null)[] }>;
        adjclose?: Array<{ adjclose?: (number | null)[] }>;
      };
    }> | null;
    error?: { code: string; description: string } | null;
  };
}
