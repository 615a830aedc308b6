import { DEFAULT_BASE_PRICE, SymbolCatalog } from './symbol-catalog';

describe('SymbolCatalog', () => {
  it('should list stocks by category', () => {
    expect(SymbolCatalog.list('STOCK')).toHaveLength(15);
    expect(SymbolCatalog.list('STOCK', 'INDEX_FUND').map(info => info.symbol)).toEqual([
      'SPY', 'QQQ', 'DIA', 'IWM', 'VTI'
    ]);
    expect(SymbolCatalog.list('STOCK', 'COIN')).toEqual([]);
  });

  it('should list crypto market indexes', () => {
    expect(SymbolCatalog.list('CRYPTO', 'MARKET_INDEX')).toEqual([
      { symbol: 'TOTAL', name: 'Total Crypto Market Cap', assetClass: 'CRYPTO', category: 'MARKET_INDEX' },
      { symbol: 'GLOBAL_MCAP', name: 'Global Market Cap', assetClass: 'CRYPTO', category: 'MARKET_INDEX' }
    ]);
  });

  it('should not expose base prices in listings', () => {
    expect(SymbolCatalog.list('CRYPTO', 'COIN')[0]).toEqual({
      symbol: 'BTC',
      name: 'Bitcoin',
      assetClass: 'CRYPTO',
      category: 'COIN'
    });
  });

  it('should look up base prices with a default for unknown symbols', () => {
    expect(SymbolCatalog.basePrice('STOCK', 'AAPL')).toBe(180);
    expect(SymbolCatalog.basePrice('CRYPTO', 'BTC')).toBe(68000);
    expect(SymbolCatalog.basePrice('STOCK', 'ZZZZ')).toBe(DEFAULT_BASE_PRICE);
    expect(SymbolCatalog.basePrice('STOCK', 'BTC')).toBe(DEFAULT_BASE_PRICE);
  });

  it('should recognize crypto market indexes', () => {
    expect(SymbolCatalog.isMarketIndex('TOTAL')).toBe(true);
    expect(SymbolCatalog.isMarketIndex('GLOBAL_MCAP')).toBe(true);
    expect(SymbolCatalog.isMarketIndex('BTC')).toBe(false);
  });
});
