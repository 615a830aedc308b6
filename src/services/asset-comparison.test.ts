import * as fc from 'fast-check';
import { orderedSeriesArb, seriesFromCloses } from '../test/generators';
import { AssetComparisonService } from './asset-comparison';

describe('AssetComparisonService', () => {
  describe('joinOnDate', () => {
    it('should keep only shared dates in date order', () => {
      const left = seriesFromCloses([1, 2, 3], '2025-01-01');
      const right = seriesFromCloses([10, 20, 30], '2025-01-02');

      expect(AssetComparisonService.joinOnDate(left, right)).toEqual({ left: [2, 3], right: [10, 20] });
    });
  });

  describe('dailyReturns', () => {
    it('should compute simple returns and treat a zero base as 0', () => {
      expect(AssetComparisonService.dailyReturns([100, 150, 0, 10])).toEqual([0.5, -1, 0]);
    });
  });

  describe('compareAssets', () => {
    it('should return zeros with fewer than two common dates', () => {
      const left = seriesFromCloses([1, 2], '2025-01-01');
      const right = seriesFromCloses([1, 2], '2025-01-02');

      expect(AssetComparisonService.compareAssets(left, right)).toEqual({
        correlation: 0,
        relativePerformance: 0,
        volatilityRatio: 0
      });
    });

    it('should compare returns of two assets', () => {
      const left = seriesFromCloses([100, 110, 99]);
      const right = seriesFromCloses([100, 105, 94.5]);

      expect(AssetComparisonService.compareAssets(left, right)).toEqual({
        correlation: 1,
        relativePerformance: 4.76,
        volatilityRatio: 1.33
      });
    });

    it('should report zero correlation and ratio for a flat benchmark', () => {
      const left = seriesFromCloses([100, 110, 99]);
      const right = seriesFromCloses([50, 50, 50]);

      expect(AssetComparisonService.compareAssets(left, right)).toEqual({
        correlation: 0,
        relativePerformance: -1,
        volatilityRatio: 0
      });
    });

    it('should find no relative performance between a series and itself', () => {
      fc.assert(
        fc.property(orderedSeriesArb('STOCK', { minLength: 2 }), series => {
          const result = AssetComparisonService.compareAssets(series, series);
          expect(result.relativePerformance).toBe(0);
          expect(Math.abs(result.correlation)).toBeLessThanOrEqual(1);
        }),
        { numRuns: 100 }
      );
    });
  });

  describe('compareToIndex', () => {
    it('should return zeros with fewer than two common dates', () => {
      expect(AssetComparisonService.compareToIndex(seriesFromCloses([1]), seriesFromCloses([1]))).toEqual({
        correlation: 0,
        alpha: 0,
        beta: 0
      });
    });

    it('should measure a leveraged asset against its index', () => {
      const index = seriesFromCloses([100, 110, 99]);
      const asset = seriesFromCloses([100, 120, 96]);

      expect(AssetComparisonService.compareToIndex(asset, index)).toEqual({
        correlation: 1,
        alpha: -2,
        beta: 2
      });
    });

    it('should report beta 0 against a flat index', () => {
      const index = seriesFromCloses([100, 100, 100]);
      const asset = seriesFromCloses([100, 110, 121]);

      expect(AssetComparisonService.compareToIndex(asset, index)).toEqual({
        correlation: 0,
        alpha: 21,
        beta: 0
      });
    });
  });
});
