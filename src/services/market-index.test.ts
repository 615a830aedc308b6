import * as fc from 'fast-check';
import { orderedSeriesArb } from '../test/generators';
import { MarketIndexService, TOTAL_INDEX_SYMBOL } from './market-index';

describe('MarketIndexService', () => {
  describe('deriveTotalMarketCap', () => {
    it('should scale prices, keep volume and flag the result as approximated', () => {
      fc.assert(
        fc.property(
          orderedSeriesArb('CRYPTO'),
          fc.double({ min: 1, max: 1e8, noNaN: true }),
          (reference, multiplier) => {
            const total = MarketIndexService.deriveTotalMarketCap(reference, multiplier);

            expect(total.symbol).toBe(TOTAL_INDEX_SYMBOL);
            expect(total.isApproximated).toBe(true);
            expect(total.source).toBe(reference.source);
            expect(total.points).toHaveLength(reference.points.length);
            total.points.forEach((point, index) => {
              const source = reference.points[index];
              expect(point.date).toBe(source.date);
              expect(point.open).toBe(source.open * multiplier);
              expect(point.high).toBe(source.high * multiplier);
              expect(point.low).toBe(source.low * multiplier);
              expect(point.close).toBe(source.close * multiplier);
              expect(point.volume).toBe(source.volume);
            });
          }
        ),
        { numRuns: 100 }
      );
    });

    it('should not mutate the reference series', () => {
      fc.assert(
        fc.property(orderedSeriesArb('CRYPTO'), reference => {
          const before = JSON.stringify(reference);
          MarketIndexService.deriveTotalMarketCap(reference, 35_800_000);
          expect(JSON.stringify(reference)).toBe(before);
        }),
        { numRuns: 50 }
      );
    });
  });
});
