/**
 * Market Data Types for price series, derived metrics and quotes
 */

export type AssetClass = 'STOCK' | 'CRYPTO';

export type SeriesSource = 'LIVE' | 'MOCK';

export type SymbolCategory = 'EQUITY' | 'INDEX_FUND' | 'COIN' | 'MARKET_INDEX';

export type Direction = 'UP' | 'DOWN' | 'FLAT';

/**
 * One trading period. `date` is an ISO calendar day (YYYY-MM-DD).
 */
export interface PricePoint {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Ordered price history for one symbol.
 *
 * `isApproximated` marks values that were derived or estimated instead of
 * read from an authoritative feed (e.g. the TOTAL market-cap index).
 */
export interface Series {
  symbol: string;
  assetClass: AssetClass;
  points: PricePoint[];
  isApproximated: boolean;
  source: SeriesSource;
  sourceId: string;
}

export interface Metrics {
  previousClose: number;
  movingAverage50: number;
  percentChange: number;
  direction: Direction;
}

export interface PriceSummary {
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
  previousClose: number;
  movingAverage50: number;
  movingAverage200: number;
  yearHigh: number;
  yearLow: number;
}

export interface CandlestickPoint {
  x: string;
  open: number;
  high: number;
  low: number;
  close: number;
}

export interface Quote {
  symbol: string;
  name?: string;
  price: number;
  open: number;
  high: number;
  low: number;
  previousClose: number;
  volume: number;
  change: number;
  changePercent: number;
  marketCap?: number;
  isApproximated: boolean;
  source: SeriesSource;
  timestamp: string;
}

export interface SymbolInfo {
  symbol: string;
  name: string;
  assetClass: AssetClass;
  category: SymbolCategory;
}

export type QuotaBasis = 'UNLIMITED' | 'HEADER' | 'ESTIMATE' | 'UNKNOWN';

export interface QuotaStatus {
  sourceId: string;
  requestsRemaining: number | null;
  basis: QuotaBasis;
  checkedAt: string;
}

export interface HealthCheckResult {
  healthy: boolean;
  latencyMs: number;
  message?: string;
  checkedAt: string;
}

// Comparison results are rounded to two decimals; percentages are in percent
export interface AssetComparison {
  correlation: number;
  relativePerformance: number;
  volatilityRatio: number;
}

export interface IndexComparison {
  correlation: number;
  alpha: number;
  beta: number;
}
