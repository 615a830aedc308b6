/**
 * Data Processor Service - normalizes price series and derives metrics
 *
 * This service handles:
 * - Ordering and de-duplicating series points
 * - Headline metrics (previous close, 50-day average, percent change, direction)
 * - Long-horizon summary (200-day average, 52-week high/low)
 * - Candlestick chart shaping
 *
 * Every function is pure: inputs are never mutated.
 */

import {
  CandlestickPoint,
  Direction,
  Metrics,
  PricePoint,
  PriceSummary,
  Series
} from '../types/market-data';
import { ProcessorError } from '../types/market-data-error';

export const MOVING_AVERAGE_SHORT_WINDOW = 50;
export const MOVING_AVERAGE_LONG_WINDOW = 200;
/** Approximate number of trading days in a year */
export const YEAR_WINDOW = 252;

function assertNotEmpty(series: Series): void {
  if (series.points.length === 0) {
    throw new ProcessorError('EMPTY_SERIES', `Series for ${series.symbol} has no points`);
  }
}

function mean(values: number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export const DataProcessorService = {
  /**
   * Sort points by date and drop duplicate dates, keeping the occurrence
   * that appears last in the input. Idempotent.
   *
   * @throws ProcessorError(EMPTY_SERIES) when the series has no points
   */
  normalize(series: Series): Series {
    assertNotEmpty(series);

    const byDate = new Map<string, PricePoint>();
    for (const point of series.points) {
      byDate.set(point.date, { ...point });
    }

    const points = Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
    return { ...series, points };
  },

  /**
   * Headline metrics from the tail of a normalized series
   *
   * Formula: percentChange = ((last - previous) / previous) * 100, or 0 when
   * previous is 0
   *
   * @throws ProcessorError(EMPTY_SERIES) when the series has no points
   */
  computeMetrics(series: Series): Metrics {
    assertNotEmpty(series);

    const closes = series.points.map(point => point.close);
    const last = closes[closes.length - 1];
    const previousClose = this.previousClose(closes);
    const percentChange = previousClose === 0 ? 0 : ((last - previousClose) / previousClose) * 100;

    return {
      previousClose,
      movingAverage50: this.movingAverage(closes, MOVING_AVERAGE_SHORT_WINDOW),
      percentChange,
      direction: this.direction(percentChange)
    };
  },

  /**
   * Latest OHLCV plus long-horizon statistics
   *
   * @throws ProcessorError(EMPTY_SERIES) when the series has no points
   */
  calculateSummary(series: Series): PriceSummary {
    assertNotEmpty(series);

    const points = series.points;
    const latest = points[points.length - 1];
    const closes = points.map(point => point.close);
    const yearPoints = points.slice(-YEAR_WINDOW);

    return {
      open: latest.open,
      high: latest.high,
      low: latest.low,
      close: latest.close,
      volume: latest.volume,
      previousClose: this.previousClose(closes),
      movingAverage50: this.movingAverage(closes, MOVING_AVERAGE_SHORT_WINDOW),
      movingAverage200: this.movingAverage(closes, MOVING_AVERAGE_LONG_WINDOW),
      yearHigh: Math.max(...yearPoints.map(point => point.high)),
      yearLow: Math.min(...yearPoints.map(point => point.low))
    };
  },

  /**
   * Shape a series for a candlestick chart, one entry per point
   */
  prepareCandlestickData(series: Series): CandlestickPoint[] {
    return series.points.map(point => ({
      x: point.date,
      open: point.open,
      high: point.high,
      low: point.low,
      close: point.close
    }));
  },

  /**
   * Mean of the last min(window, n) values
   */
  movingAverage(values: number[], window: number): number {
    return mean(values.slice(-window));
  },

  previousClose(closes: number[]): number {
    return closes.length > 1 ? closes[closes.length - 2] : closes[closes.length - 1];
  },

  direction(percentChange: number): Direction {
    if (percentChange > 0) return 'UP';
    if (percentChange < 0) return 'DOWN';
    return 'FLAT';
  }
};
