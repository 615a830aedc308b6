/**
 * Mock Adapters - DataProvider implementations backed by the mock generator
 *
 * Used when USE_MOCK_DATA is on. Generation never fails except on invalid
 * arguments: symbols outside the catalog start from the default base price.
 */

import { MarketDataConfig } from '../../types/config';
import {
  AssetClass,
  HealthCheckResult,
  Quote,
  QuotaStatus,
  Series,
  SymbolCategory,
  SymbolInfo
} from '../../types/market-data';
import { MockDataGenerator, MockProfileName } from '../../services/mock-data-generator';
import {
  GLOBAL_MCAP_INDEX_SYMBOL,
  MarketIndexService,
  TOTAL_INDEX_SYMBOL,
  TOTAL_REFERENCE_SYMBOL
} from '../../services/market-index';
import { SymbolCatalog } from '../../services/symbol-catalog';
import { Logger } from '../../utils/logger';
import { BaseMarketDataAdapter } from './base-market-data-adapter';

/** Length of the series a mock quote is read from */
const QUOTE_RANGE_DAYS = 30;

export interface MockAdapterConfig {
  sourceId?: string;
  logger: Logger;
  settings: Pick<MarketDataConfig, 'mockSeed' | 'mockEndDate' | 'totalMarketCapMultiplier'>;
}

abstract class BaseMockAdapter extends BaseMarketDataAdapter {
  readonly source = 'MOCK' as const;
  protected readonly settings: MockAdapterConfig['settings'];

  constructor(config: MockAdapterConfig, defaultSourceId: string) {
    super({ sourceId: config.sourceId ?? defaultSourceId, logger: config.logger });
    this.settings = config.settings;
  }

  protected generate(
    symbol: string,
    rangeDays: number,
    profile: MockProfileName,
    basePrice: number,
    isApproximated = false
  ): Series {
    this.logger.debug(`Generating ${rangeDays} mock points for ${symbol}`);
    const points = MockDataGenerator.generatePoints({
      symbol,
      rangeDays,
      basePrice,
      profile,
      endDate: this.settings.mockEndDate,
      marketSeed: this.settings.mockSeed
    });
    return this.createSeries(symbol, points, isApproximated);
  }

  protected async loadQuote(symbol: string): Promise<Quote> {
    const series = await this.loadSeries(symbol, QUOTE_RANGE_DAYS);
    return this.quoteFromSeries(series, SymbolCatalog.find(this.assetClass, symbol)?.name);
  }

  async listSymbols(category?: SymbolCategory): Promise<SymbolInfo[]> {
    return SymbolCatalog.list(this.assetClass, category);
  }

  async getRemainingQuota(): Promise<QuotaStatus> {
    return {
      sourceId: this.getSourceId(),
      requestsRemaining: null,
      basis: 'UNLIMITED',
      checkedAt: new Date().toISOString()
    };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    return {
      healthy: true,
      latencyMs: 0,
      message: 'Mock data is always available',
      checkedAt: new Date().toISOString()
    };
  }
}

/**
 * Mock stock provider: weekday-only series
 */
export class MockStockAdapter extends BaseMockAdapter {
  readonly assetClass: AssetClass = 'STOCK';

  constructor(config: MockAdapterConfig) {
    super(config, 'mock-stocks');
  }

  protected async loadSeries(symbol: string, rangeDays: number): Promise<Series> {
    return this.generate(symbol, rangeDays, 'STOCK', SymbolCatalog.basePrice('STOCK', symbol));
  }
}

/**
 * Mock crypto provider: daily series, plus the TOTAL and GLOBAL_MCAP indexes
 */
export class MockCryptoAdapter extends BaseMockAdapter {
  readonly assetClass: AssetClass = 'CRYPTO';

  constructor(config: MockAdapterConfig) {
    super(config, 'mock-crypto');
  }

  protected async loadSeries(symbol: string, rangeDays: number): Promise<Series> {
    if (symbol === TOTAL_INDEX_SYMBOL) {
      const reference = await this.loadSeries(TOTAL_REFERENCE_SYMBOL, rangeDays);
      return MarketIndexService.deriveTotalMarketCap(reference, this.settings.totalMarketCapMultiplier);
    }
    const basePrice = SymbolCatalog.basePrice('CRYPTO', symbol);
    if (symbol === GLOBAL_MCAP_INDEX_SYMBOL) {
      // Synthetic in both modes: high and low are a band around one daily reading
      return this.generate(symbol, rangeDays, 'INDEX', basePrice, true);
    }
    return this.generate(symbol, rangeDays, 'CRYPTO', basePrice);
  }
}
