import { DEFAULT_CONFIG } from '../../services/config';
import { ConfigError } from '../../types/market-data-error';
import { silentLogger } from '../../test/generators';
import { MarketDataAdapterFactory } from './adapter-factory';
import { CoinMarketCapCryptoAdapter } from './coinmarketcap-crypto-adapter';
import { FmpStockAdapter } from './fmp-stock-adapter';
import { MockCryptoAdapter, MockStockAdapter } from './mock-adapters';

describe('MarketDataAdapterFactory', () => {
  it('should create mock providers in mock mode', () => {
    const providers = MarketDataAdapterFactory.createProviders(DEFAULT_CONFIG, silentLogger);

    expect(providers.stock).toBeInstanceOf(MockStockAdapter);
    expect(providers.crypto).toBeInstanceOf(MockCryptoAdapter);
    expect(providers.stock.source).toBe('MOCK');
  });

  it('should create live providers when mock data is off', () => {
    const providers = MarketDataAdapterFactory.createProviders(
      { ...DEFAULT_CONFIG, useMockData: false, fmpApiKey: 'test-secret', cmcApiKey: 'test-secret' },
      silentLogger
    );

    expect(providers.stock).toBeInstanceOf(FmpStockAdapter);
    expect(providers.crypto).toBeInstanceOf(CoinMarketCapCryptoAdapter);
    expect(providers.stock.getSourceId()).toBe('fmp');
    expect(providers.crypto.getSourceId()).toBe('coinmarketcap');
  });

  it('should refuse live mode without API keys', () => {
    expect(() =>
      MarketDataAdapterFactory.createProviders({ ...DEFAULT_CONFIG, useMockData: false, fmpApiKey: 'test-secret' }, silentLogger)
    ).toThrow(ConfigError);
  });
});
