/**
 * Base Market Data Adapter - common logic shared by every data provider
 *
 * This abstract class implements:
 * - Symbol and range validation
 * - Conversion of raw OHLCV values to PricePoint, rejecting malformed values
 * - Series assembly
 */

import { DataProvider } from '../../types/data-provider';
import {
  AssetClass,
  HealthCheckResult,
  PricePoint,
  Quote,
  QuotaStatus,
  Series,
  SeriesSource,
  SymbolCategory,
  SymbolInfo
} from '../../types/market-data';
import { ProviderError } from '../../types/market-data-error';
import { toIsoDate } from '../../utils/dates';
import { Logger } from '../../utils/logger';

/**
 * Raw OHLCV data from a provider (before normalization)
 */
export interface RawOHLCV {
  date: string;
  open: number | string;
  high: number | string;
  low: number | string;
  close: number | string;
  volume: number | string;
}

/**
 * Configuration shared by all market data adapters
 */
export interface MarketDataAdapterConfig {
  sourceId: string;
  logger: Logger;
}

const SYMBOL_PATTERN = /^[A-Z0-9._^-]{1,20}$/;

/**
 * Upper-case and validate a symbol
 *
 * @throws ProviderError(INVALID_ARGUMENT) for blank or malformed symbols
 */
export function normalizeSymbol(symbol: string, sourceId?: string): string {
  const normalized = symbol.trim().toUpperCase();
  if (normalized.length === 0) {
    throw new ProviderError('INVALID_ARGUMENT', 'Symbol must not be empty', sourceId);
  }
  if (!SYMBOL_PATTERN.test(normalized)) {
    throw new ProviderError('INVALID_ARGUMENT', `Invalid symbol: ${symbol}`, sourceId);
  }
  return normalized;
}

/** Longest series a single request may ask for (about ten years of days) */
export const MAX_RANGE_DAYS = 3650;

/**
 * @throws ProviderError(INVALID_ARGUMENT) unless rangeDays is an integer
 * between 1 and MAX_RANGE_DAYS
 */
export function validateRangeDays(rangeDays: number, sourceId?: string): void {
  if (!Number.isInteger(rangeDays) || rangeDays <= 0) {
    throw new ProviderError(
      'INVALID_ARGUMENT',
      `rangeDays must be a positive integer, got ${rangeDays}`,
      sourceId
    );
  }
  if (rangeDays > MAX_RANGE_DAYS) {
    throw new ProviderError(
      'INVALID_ARGUMENT',
      `rangeDays must not exceed ${MAX_RANGE_DAYS}, got ${rangeDays}`,
      sourceId
    );
  }
}

/**
 * Abstract base class for market data adapters
 */
export abstract class BaseMarketDataAdapter implements DataProvider {
  abstract readonly assetClass: AssetClass;
  abstract readonly source: SeriesSource;

  protected readonly config: MarketDataAdapterConfig;
  protected readonly logger: Logger;

  constructor(config: MarketDataAdapterConfig) {
    this.config = config;
    this.logger = config.logger;
  }

  /**
   * Validate arguments, then delegate to the implementation
   */
  async fetchSeries(symbol: string, rangeDays: number): Promise<Series> {
    const normalized = normalizeSymbol(symbol, this.config.sourceId);
    validateRangeDays(rangeDays, this.config.sourceId);
    return this.loadSeries(normalized, rangeDays);
  }

  async fetchQuote(symbol: string): Promise<Quote> {
    return this.loadQuote(normalizeSymbol(symbol, this.config.sourceId));
  }

  /**
   * Convert raw OHLCV values to a PricePoint
   *
   * @throws ProviderError(MALFORMED_PAYLOAD) when a field is missing, not
   * numeric or negative, or the date cannot be parsed
   */
  protected normalizePricePoint(raw: RawOHLCV, symbol: string): PricePoint {
    const date = toIsoDate(raw.date);
    if (!date) {
      throw this.malformed(`Invalid date "${raw.date}" for ${symbol}`);
    }

    return {
      date,
      open: this.toNumber(raw.open, 'open', symbol),
      high: this.toNumber(raw.high, 'high', symbol),
      low: this.toNumber(raw.low, 'low', symbol),
      close: this.toNumber(raw.close, 'close', symbol),
      volume: this.toNumber(raw.volume, 'volume', symbol)
    };
  }

  /**
   * Convert a value to a non-negative finite number
   */
  protected toNumber(value: number | string, field: string, symbol: string): number {
    if (typeof value === 'string' && value.trim() === '') {
      throw this.malformed(`Empty ${field} for ${symbol}`);
    }
    const parsed = typeof value === 'string' ? Number(value) : value;
    if (!Number.isFinite(parsed) || parsed < 0) {
      throw this.malformed(`Invalid ${field} "${value}" for ${symbol}`);
    }
    return parsed;
  }

  protected createSeries(symbol: string, points: PricePoint[], isApproximated = false): Series {
    return {
      symbol,
      assetClass: this.assetClass,
      points,
      isApproximated,
      source: this.source,
      sourceId: this.config.sourceId
    };
  }

  /**
   * Build a quote from the last two points of a series
   */
  protected quoteFromSeries(series: Series, name?: string): Quote {
    const points = series.points;
    const latest = points[points.length - 1];
    if (!latest) {
      throw this.notFound(series.symbol);
    }
    const previousClose = points.length > 1 ? points[points.length - 2].close : latest.close;
    const change = latest.close - previousClose;

    return {
      symbol: series.symbol,
      name,
      price: latest.close,
      open: latest.open,
      high: latest.high,
      low: latest.low,
      previousClose,
      volume: latest.volume,
      change,
      changePercent: previousClose === 0 ? 0 : (change / previousClose) * 100,
      isApproximated: series.isApproximated,
      source: this.source,
      timestamp: `${latest.date}T00:00:00.000Z`
    };
  }

  protected malformed(message: string): ProviderError {
    return new ProviderError('MALFORMED_PAYLOAD', message, this.config.sourceId);
  }

  protected notFound(symbol: string): ProviderError {
    return new ProviderError('NOT_FOUND', `No data found for symbol: ${symbol}`, this.config.sourceId, 404);
  }

  getSourceId(): string {
    return this.config.sourceId;
  }

  // Abstract methods to be implemented by specific adapters
  protected abstract loadSeries(symbol: string, rangeDays: number): Promise<Series>;
  protected abstract loadQuote(symbol: string): Promise<Quote>;
  abstract listSymbols(category?: SymbolCategory): Promise<SymbolInfo[]>;
  abstract getRemainingQuota(): Promise<QuotaStatus>;
  abstract healthCheck(): Promise<HealthCheckResult>;
}
