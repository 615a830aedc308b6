/**
 * Market Index Service - synthetic crypto market indexes
 *
 * TOTAL has no dedicated feed: it is approximated by scaling the reference
 * asset's price history, and is always flagged `isApproximated` so callers
 * can tell it apart from authoritative data.
 */

import { Series } from '../types/market-data';

export const TOTAL_INDEX_SYMBOL = 'TOTAL';
export const GLOBAL_MCAP_INDEX_SYMBOL = 'GLOBAL_MCAP';
export const TOTAL_REFERENCE_SYMBOL = 'BTC';

/** Half-width of the high/low band put around daily market-cap readings */
export const MARKET_CAP_BAND = 0.01;

export const MarketIndexService = {
  /**
   * Derive the TOTAL market-cap series from the reference asset.
   * Prices are multiplied by `multiplier`; volume is kept as reported.
   */
  deriveTotalMarketCap(reference: Series, multiplier: number): Series {
    return {
      symbol: TOTAL_INDEX_SYMBOL,
      assetClass: reference.assetClass,
      points: reference.points.map(point => ({
        date: point.date,
        open: point.open * multiplier,
        high: point.high * multiplier,
        low: point.low * multiplier,
        close: point.close * multiplier,
        volume: point.volume
      })),
      isApproximated: true,
      source: reference.source,
      sourceId: reference.sourceId
    };
  }
};
