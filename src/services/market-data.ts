/**
 * Market Data Service - runs provider, then processor, for dashboard panels
 *
 * Each panel is independent: a dashboard fetches all of them concurrently
 * and reports a failing panel as an error entry without affecting the rest.
 */

import { MarketDataAdapterFactory } from '../adapters/market-data/adapter-factory';
import { MarketDataConfig } from '../types/config';
import { DataProvider, DataProviders } from '../types/data-provider';
import {
  AssetClass,
  AssetComparison,
  CandlestickPoint,
  HealthCheckResult,
  IndexComparison,
  Metrics,
  PriceSummary,
  Quote,
  QuotaStatus,
  Series,
  SymbolCategory,
  SymbolInfo
} from '../types/market-data';
import { isMarketDataError } from '../types/market-data-error';
import { createLogger, Logger } from '../utils/logger';
import { AssetComparisonService } from './asset-comparison';
import { DataProcessorService } from './data-processor';

export interface AssetRef {
  assetClass: AssetClass;
  symbol: string;
}

export interface PanelRequest extends AssetRef {
  /** Defaults to the configured range when omitted */
  rangeDays?: number;
}

export interface Panel {
  series: Series;
  metrics: Metrics;
  summary: PriceSummary;
  candles: CandlestickPoint[];
}

export interface PanelError {
  code: string;
  message: string;
}

export type PanelResult =
  | { status: 'OK'; panel: Panel }
  | { status: 'ERROR'; request: PanelRequest; error: PanelError };

export type ComparisonMode = 'ASSETS' | 'INDEX';

export interface ComparisonRequest {
  left: AssetRef;
  right: AssetRef;
  mode: ComparisonMode;
  rangeDays?: number;
}

export type ComparisonResult =
  | { mode: 'ASSETS'; left: string; right: string; rangeDays: number; comparison: AssetComparison }
  | { mode: 'INDEX'; left: string; right: string; rangeDays: number; comparison: IndexComparison };

export interface HealthReport {
  stock: HealthCheckResult;
  crypto: HealthCheckResult;
}

export interface MarketDataServiceOptions {
  defaultRangeDays: number;
  logger?: Logger;
}

export class MarketDataService {
  private readonly providers: DataProviders;
  private readonly defaultRangeDays: number;
  private readonly logger: Logger;

  constructor(providers: DataProviders, options: MarketDataServiceOptions) {
    this.providers = providers;
    this.defaultRangeDays = options.defaultRangeDays;
    this.logger = options.logger ?? createLogger('market-data-service');
  }

  /**
   * Fetch, normalize and measure one series
   */
  async getPanel(request: PanelRequest): Promise<Panel> {
    const rangeDays = request.rangeDays ?? this.defaultRangeDays;
    const raw = await this.provider(request.assetClass).fetchSeries(request.symbol, rangeDays);
    const series = DataProcessorService.normalize(raw);

    return {
      series,
      metrics: DataProcessorService.computeMetrics(series),
      summary: DataProcessorService.calculateSummary(series),
      candles: DataProcessorService.prepareCandlestickData(series)
    };
  }

  /**
   * Fetch every panel concurrently; results keep the request order
   */
  async getDashboard(requests: PanelRequest[]): Promise<PanelResult[]> {
    const settled = await Promise.allSettled(requests.map(request => this.getPanel(request)));

    return settled.map((result, index): PanelResult => {
      if (result.status === 'fulfilled') {
        return { status: 'OK', panel: result.value };
      }
      const request = { ...requests[index], rangeDays: requests[index].rangeDays ?? this.defaultRangeDays };
      return { status: 'ERROR', request, error: this.toPanelError(result.reason, request) };
    });
  }

  async compare(request: ComparisonRequest): Promise<ComparisonResult> {
    const rangeDays = request.rangeDays ?? this.defaultRangeDays;
    const [leftRaw, rightRaw] = await Promise.all([
      this.provider(request.left.assetClass).fetchSeries(request.left.symbol, rangeDays),
      this.provider(request.right.assetClass).fetchSeries(request.right.symbol, rangeDays)
    ]);
    const left = DataProcessorService.normalize(leftRaw);
    const right = DataProcessorService.normalize(rightRaw);

    if (request.mode === 'INDEX') {
      return {
        mode: 'INDEX',
        left: left.symbol,
        right: right.symbol,
        rangeDays,
        comparison: AssetComparisonService.compareToIndex(left, right)
      };
    }
    return {
      mode: 'ASSETS',
      left: left.symbol,
      right: right.symbol,
      rangeDays,
      comparison: AssetComparisonService.compareAssets(left, right)
    };
  }

  async getQuote(request: AssetRef): Promise<Quote> {
    return this.provider(request.assetClass).fetchQuote(request.symbol);
  }

  async listSymbols(assetClass: AssetClass, category?: SymbolCategory): Promise<SymbolInfo[]> {
    return this.provider(assetClass).listSymbols(category);
  }

  async getQuotaStatus(): Promise<QuotaStatus[]> {
    return Promise.all([
      this.providers.stock.getRemainingQuota(),
      this.providers.crypto.getRemainingQuota()
    ]);
  }

  async checkHealth(): Promise<HealthReport> {
    const [stock, crypto] = await Promise.all([
      this.providers.stock.healthCheck(),
      this.providers.crypto.healthCheck()
    ]);
    return { stock, crypto };
  }

  private provider(assetClass: AssetClass): DataProvider {
    return assetClass === 'STOCK' ? this.providers.stock : this.providers.crypto;
  }

  private toPanelError(error: unknown, request: PanelRequest): PanelError {
    if (isMarketDataError(error)) {
      this.logger.warn(`Panel ${request.assetClass}:${request.symbol} failed: ${error.code} ${error.message}`);
      return { code: error.code, message: error.message };
    }
    this.logger.error(`Panel ${request.assetClass}:${request.symbol} failed:`, error);
    return { code: 'INTERNAL_ERROR', message: 'Internal error' };
  }
}

/**
 * Build the service and its providers from configuration
 */
export function createMarketDataService(config: MarketDataConfig): MarketDataService {
  const logger = createLogger('market-data', { debug: config.debug });
  return new MarketDataService(MarketDataAdapterFactory.createProviders(config, logger), {
    defaultRangeDays: config.defaultRangeDays,
    logger
  });
}
