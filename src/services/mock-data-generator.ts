/**
 * Mock Data Generator - synthesizes reproducible OHLCV series
 *
 * Each close is the previous close moved by a bounded drift that mixes a
 * market-wide return (shared by every symbol for a given seed, so mock
 * assets move together) with a symbol-specific return seeded from the
 * symbol itself. High and low are drawn around the close and then widened
 * so that low <= open, close <= high always holds.
 */

import { PricePoint } from '../types/market-data';
import { trailingDates } from '../utils/dates';
import { hashString, mulberry32, normal, uniform } from '../utils/random';

export type MockProfileName = 'STOCK' | 'CRYPTO' | 'INDEX';

export interface MockProfile {
  /** Daily standard deviation of the symbol-specific return */
  volatility: number;
  /** Share of the daily drift taken from the market return (0-1) */
  marketWeight: number;
  /** Scale of the per-symbol trend */
  momentumScale: number;
  /** Widens the high/low band relative to volatility */
  rangeMultiplier: number;
  /** Absolute bound on the daily drift */
  maxDailyDrift: number;
  volumeRange: [number, number];
  weekdaysOnly: boolean;
}

export const MOCK_PROFILES: Record<MockProfileName, MockProfile> = {
  STOCK: {
    volatility: 0.02,
    marketWeight: 0.7,
    momentumScale: 0.001,
    rangeMultiplier: 1,
    maxDailyDrift: 0.05,
    volumeRange: [1_000_000, 10_000_000],
    weekdaysOnly: true
  },
  CRYPTO: {
    volatility: 0.04,
    marketWeight: 0.6,
    momentumScale: 0.002,
    rangeMultiplier: 1.5,
    maxDailyDrift: 0.1,
    volumeRange: [5_000_000, 50_000_000],
    weekdaysOnly: false
  },
  INDEX: {
    volatility: 0.02,
    marketWeight: 1,
    momentumScale: 0,
    rangeMultiplier: 1,
    maxDailyDrift: 0.03,
    volumeRange: [10_000_000, 100_000_000],
    weekdaysOnly: false
  }
};

const MARKET_DRIFT_MEAN = 0.001;
const MARKET_DRIFT_STD_DEV = 0.01;
const MAX_BAND_SIGMAS = 3;

export interface MockSeriesRequest {
  symbol: string;
  rangeDays: number;
  basePrice: number;
  profile: MockProfileName;
  /** Last day of the series (YYYY-MM-DD) */
  endDate: string;
  marketSeed: number;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export const MockDataGenerator = {
  /**
   * Generate exactly `rangeDays` chronologically ordered points
   */
  generatePoints(request: MockSeriesRequest): PricePoint[] {
    const profile = MOCK_PROFILES[request.profile];
    const dates = trailingDates(request.endDate, request.rangeDays, profile.weekdaysOnly);

    const marketRand = mulberry32(request.marketSeed);
    const symbolRand = mulberry32(((hashString(request.symbol) ^ request.marketSeed) >>> 0) || 1);

    const momentum = profile.momentumScale * normal(symbolRand);
    const band = () => Math.min(Math.abs(normal(symbolRand)), MAX_BAND_SIGMAS);

    let close = request.basePrice;
    return dates.map(date => {
      const marketReturn = normal(marketRand, MARKET_DRIFT_MEAN, MARKET_DRIFT_STD_DEV);
      const symbolReturn = normal(symbolRand, momentum, profile.volatility);
      const drift = clamp(
        profile.marketWeight * marketReturn + (1 - profile.marketWeight) * symbolReturn,
        -profile.maxDailyDrift,
        profile.maxDailyDrift
      );
      close = close * (1 + drift);

      const spread = profile.volatility * profile.rangeMultiplier * close;
      let high = close + band() * spread;
      let low = Math.max(0, close - band() * spread);
      const open = uniform(symbolRand, low, high);
      high = Math.max(high, open, close);
      low = Math.min(low, open, close);

      const [minVolume, maxVolume] = profile.volumeRange;
      const volume = Math.floor(uniform(symbolRand, minVolume, maxVolume));

      return { date, open, high, low, close, volume };
    });
  }
};
