/**
 * Symbol Catalog - well-known stocks, index funds, coins and crypto market
 * indexes, with the base prices the mock generator starts from
 */

import catalogData from '../data/symbols.json';
import { AssetClass, SymbolCategory, SymbolInfo } from '../types/market-data';

export interface CatalogEntry extends SymbolInfo {
  basePrice: number;
}

interface RawCatalogEntry {
  symbol: string;
  name: string;
  category: string;
  basePrice: number;
}

const SYMBOL_CATEGORIES: readonly SymbolCategory[] = ['EQUITY', 'INDEX_FUND', 'COIN', 'MARKET_INDEX'];

/** Base price for symbols the catalog does not list */
export const DEFAULT_BASE_PRICE = 100;

function isSymbolCategory(value: string): value is SymbolCategory {
  return SYMBOL_CATEGORIES.some(category => category === value);
}

function toEntries(raw: RawCatalogEntry[], assetClass: AssetClass): CatalogEntry[] {
  return raw.map(entry => {
    if (!isSymbolCategory(entry.category)) {
      throw new Error(`Unknown symbol category "${entry.category}" for ${entry.symbol}`);
    }
    return {
      symbol: entry.symbol,
      name: entry.name,
      assetClass,
      category: entry.category,
      basePrice: entry.basePrice
    };
  });
}

const ENTRIES: Record<AssetClass, CatalogEntry[]> = {
  STOCK: toEntries(catalogData.stocks, 'STOCK'),
  CRYPTO: toEntries(catalogData.crypto, 'CRYPTO')
};

export const SymbolCatalog = {
  list(assetClass: AssetClass, category?: SymbolCategory): SymbolInfo[] {
    return ENTRIES[assetClass]
      .filter(entry => category === undefined || entry.category === category)
      .map(({ symbol, name, category: entryCategory }) => ({
        symbol,
        name,
        assetClass,
        category: entryCategory
      }));
  },

  find(assetClass: AssetClass, symbol: string): CatalogEntry | undefined {
    return ENTRIES[assetClass].find(entry => entry.symbol === symbol);
  },

  basePrice(assetClass: AssetClass, symbol: string): number {
    return this.find(assetClass, symbol)?.basePrice ?? DEFAULT_BASE_PRICE;
  },

  isMarketIndex(symbol: string): boolean {
    return this.find('CRYPTO', symbol)?.category === 'MARKET_INDEX';
  }
};
