/**
 * Data Provider capability interface.
 *
 * Mock and live implementations share this contract; the adapter factory
 * picks one implementation per asset class when the process starts.
 */

import {
  AssetClass,
  HealthCheckResult,
  Quote,
  QuotaStatus,
  Series,
  SeriesSource,
  SymbolCategory,
  SymbolInfo,
} from './market-data';

export interface DataProvider {
  readonly assetClass: AssetClass;
  readonly source: SeriesSource;

  fetchSeries(symbol: string, rangeDays: number): Promise<Series>;
  fetchQuote(symbol: string): Promise<Quote>;
  listSymbols(category?: SymbolCategory): Promise<SymbolInfo[]>;

  getRemainingQuota(): Promise<QuotaStatus>;
  healthCheck(): Promise<HealthCheckResult>;
  getSourceId(): string;
}

export interface DataProviders {
  stock: DataProvider;
  crypto: DataProvider;
}
