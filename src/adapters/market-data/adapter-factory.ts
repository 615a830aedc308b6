/**
 * Market Data Adapter Factory - picks the provider implementations
 *
 * Mock and live providers share the DataProvider contract. The choice is
 * made once, from MarketDataConfig.useMockData, and callers never see which
 * one they hold except through Series.source.
 */

import { MarketDataConfig } from '../../types/config';
import { DataProviders } from '../../types/data-provider';
import { ConfigError } from '../../types/market-data-error';
import { createLogger, Logger } from '../../utils/logger';
import { CoinMarketCapCryptoAdapter } from './coinmarketcap-crypto-adapter';
import { FmpStockAdapter } from './fmp-stock-adapter';
import { MockCryptoAdapter, MockStockAdapter } from './mock-adapters';

export class MarketDataAdapterFactory {
  /**
   * Create the stock and crypto providers for a configuration
   *
   * @throws ConfigError if live mode is selected without API keys
   */
  static createProviders(config: MarketDataConfig, logger?: Logger): DataProviders {
    const log = logger ?? createLogger('market-data', { debug: config.debug });

    if (config.useMockData) {
      log.info('Using mock market data');
      const settings = {
        mockSeed: config.mockSeed,
        mockEndDate: config.mockEndDate,
        totalMarketCapMultiplier: config.totalMarketCapMultiplier
      };
      return {
        stock: new MockStockAdapter({ logger: log, settings }),
        crypto: new MockCryptoAdapter({ logger: log, settings })
      };
    }

    const problems: string[] = [];
    if (!config.fmpApiKey) problems.push('FMP_API_KEY is required for live stock data');
    if (!config.cmcApiKey) problems.push('CMC_API_KEY is required for live crypto data');
    if (!config.fmpApiKey || !config.cmcApiKey) {
      throw new ConfigError(problems);
    }

    log.info('Using live market data');
    return {
      stock: new FmpStockAdapter({
        apiKey: config.fmpApiKey,
        baseUrl: config.fmpBaseUrl,
        timeoutMs: config.requestTimeoutMs,
        logger: log
      }),
      crypto: new CoinMarketCapCryptoAdapter({
        apiKey: config.cmcApiKey,
        baseUrl: config.cmcBaseUrl,
        timeoutMs: config.requestTimeoutMs,
        logger: log,
        totalMarketCapMultiplier: config.totalMarketCapMultiplier
      })
    };
  }
}
