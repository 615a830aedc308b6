/**
 * Property-Based Tests for the Data Processor
 *
 * For any series:
 * - normalize yields strictly increasing dates and is idempotent
 * - normalize keeps the last occurrence of a duplicated date
 * - computeMetrics reads the tail of the series and never mutates it
 */

import * as fc from 'fast-check';
import { ProcessorError } from '../types/market-data-error';
import { Series } from '../types/market-data';
import { orderedSeriesArb, seriesFromCloses, unorderedSeriesArb } from '../test/generators';
import { DataProcessorService } from './data-processor';

const emptySeries: Series = {
  symbol: 'EMPTY',
  assetClass: 'STOCK',
  points: [],
  isApproximated: false,
  source: 'MOCK',
  sourceId: 'test'
};

describe('DataProcessorService', () => {
  describe('normalize', () => {
    it('should produce strictly increasing dates', () => {
      fc.assert(
        fc.property(unorderedSeriesArb(), series => {
          const { points } = DataProcessorService.normalize(series);
          for (let i = 1; i < points.length; i++) {
            expect(points[i].date > points[i - 1].date).toBe(true);
          }
        }),
        { numRuns: 100 }
      );
    });

    it('should be idempotent', () => {
      fc.assert(
        fc.property(unorderedSeriesArb(), series => {
          const once = DataProcessorService.normalize(series);
          expect(DataProcessorService.normalize(once)).toEqual(once);
        }),
        { numRuns: 100 }
      );
    });

    it('should keep the last occurrence of each date', () => {
      fc.assert(
        fc.property(unorderedSeriesArb(), series => {
          const { points } = DataProcessorService.normalize(series);
          for (const point of points) {
            const occurrences = series.points.filter(candidate => candidate.date === point.date);
            expect(point).toEqual(occurrences[occurrences.length - 1]);
          }
          expect(points).toHaveLength(new Set(series.points.map(point => point.date)).size);
        }),
        { numRuns: 100 }
      );
    });

    it('should not mutate its input', () => {
      const series = seriesFromCloses([3, 1, 2]);
      series.points.reverse();
      const before = JSON.stringify(series);

      DataProcessorService.normalize(series);

      expect(JSON.stringify(series)).toBe(before);
    });

    it('should keep the series metadata', () => {
      const series = { ...seriesFromCloses([1, 2]), isApproximated: true, sourceId: 'coinmarketcap' };
      const normalized = DataProcessorService.normalize(series);

      expect(normalized.isApproximated).toBe(true);
      expect(normalized.sourceId).toBe('coinmarketcap');
      expect(normalized.symbol).toBe('TEST');
    });

    it('should reject an empty series', () => {
      expect(() => DataProcessorService.normalize(emptySeries)).toThrow(ProcessorError);
      expect(() => DataProcessorService.normalize(emptySeries)).toThrow('Series for EMPTY has no points');
    });
  });

  describe('computeMetrics', () => {
    it('should report a rise from 100 to 110 as 10% UP', () => {
      const metrics = DataProcessorService.computeMetrics(seriesFromCloses([100, 110]));

      expect(metrics.previousClose).toBe(100);
      expect(metrics.percentChange).toBeCloseTo(10, 10);
      expect(metrics.direction).toBe('UP');
      expect(metrics.movingAverage50).toBe(105);
    });

    it('should report a fall as DOWN', () => {
      const metrics = DataProcessorService.computeMetrics(seriesFromCloses([200, 150]));

      expect(metrics.percentChange).toBe(-25);
      expect(metrics.direction).toBe('DOWN');
    });

    it('should treat a single point as flat', () => {
      const metrics = DataProcessorService.computeMetrics(seriesFromCloses([42]));

      expect(metrics).toEqual({ previousClose: 42, movingAverage50: 42, percentChange: 0, direction: 'FLAT' });
    });

    it('should report 0% when the previous close is 0', () => {
      const metrics = DataProcessorService.computeMetrics(seriesFromCloses([0, 5]));

      expect(metrics.percentChange).toBe(0);
      expect(metrics.direction).toBe('FLAT');
    });

    it('should average only the last 50 closes', () => {
      const closes = Array.from({ length: 60 }, (_, index) => index + 1);
      const metrics = DataProcessorService.computeMetrics(seriesFromCloses(closes));

      // mean of 11..60
      expect(metrics.movingAverage50).toBe(35.5);
    });

    it('should average all closes of a short series', () => {
      fc.assert(
        fc.property(orderedSeriesArb('STOCK', { maxLength: 50 }), series => {
          const closes = series.points.map(point => point.close);
          const expected = closes.reduce((sum, close) => sum + close, 0) / closes.length;
          expect(DataProcessorService.computeMetrics(series).movingAverage50).toBeCloseTo(expected, 6);
        }),
        { numRuns: 100 }
      );
    });

    it('should derive direction from the sign of percentChange', () => {
      fc.assert(
        fc.property(orderedSeriesArb(), series => {
          const before = JSON.stringify(series);
          const { percentChange, direction } = DataProcessorService.computeMetrics(series);

          const expected = percentChange > 0 ? 'UP' : percentChange < 0 ? 'DOWN' : 'FLAT';
          expect(direction).toBe(expected);
          expect(JSON.stringify(series)).toBe(before);
        }),
        { numRuns: 100 }
      );
    });

    it('should reject an empty series', () => {
      expect(() => DataProcessorService.computeMetrics(emptySeries)).toThrow(ProcessorError);
    });
  });

  describe('calculateSummary', () => {
    it('should summarise the latest point and long windows', () => {
      const closes = Array.from({ length: 300 }, (_, index) => index + 1);
      const series = seriesFromCloses(closes);
      series.points[10] = { ...series.points[10], high: 10000 };
      series.points[299] = { ...series.points[299], low: 0.5 };

      const summary = DataProcessorService.calculateSummary(series);

      expect(summary.close).toBe(300);
      expect(summary.open).toBe(300);
      expect(summary.high).toBe(300);
      expect(summary.low).toBe(0.5);
      expect(summary.volume).toBe(1000);
      expect(summary.previousClose).toBe(299);
      expect(summary.movingAverage50).toBe(275.5);
      expect(summary.movingAverage200).toBe(200.5);
      // the 10000 spike is older than 252 points
      expect(summary.yearHigh).toBe(300);
      expect(summary.yearLow).toBe(0.5);
    });

    it('should reject an empty series', () => {
      expect(() => DataProcessorService.calculateSummary(emptySeries)).toThrow(ProcessorError);
    });
  });

  describe('prepareCandlestickData', () => {
    it('should map every point to a candle', () => {
      const series = seriesFromCloses([1, 2]);
      series.points[1] = { date: series.points[1].date, open: 1.5, high: 2.5, low: 1.25, close: 2, volume: 7 };

      expect(DataProcessorService.prepareCandlestickData(series)).toEqual([
        { x: '2025-01-01', open: 1, high: 1, low: 1, close: 1 },
        { x: '2025-01-02', open: 1.5, high: 2.5, low: 1.25, close: 2 }
      ]);
    });
  });
});
