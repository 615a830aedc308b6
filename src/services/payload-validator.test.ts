/**
 * Property-based tests for the upstream payload validator
 */

import * as fc from 'fast-check';
import { FmpHistoricalEntry, FmpHistoricalResponse, FmpHistoricalResponseSchema } from '../schemas/fmp';
import { PayloadValidator } from './payload-validator';

const historicalEntryArb = (): fc.Arbitrary<FmpHistoricalEntry> =>
  fc.record({
    date: fc.constantFrom('2025-03-27', '2025-03-28', '2025-03-31'),
    open: fc.double({ min: 0, max: 1e6, noNaN: true }),
    high: fc.double({ min: 0, max: 1e6, noNaN: true }),
    low: fc.double({ min: 0, max: 1e6, noNaN: true }),
    close: fc.double({ min: 0, max: 1e6, noNaN: true }),
    volume: fc.integer({ min: 0, max: 1e9 })
  });

describe('PayloadValidator', () => {
  const validator = new PayloadValidator();
  const validate = validator.compile<FmpHistoricalResponse>(FmpHistoricalResponseSchema);

  it('should accept every well-formed payload unchanged', () => {
    fc.assert(
      fc.property(fc.array(historicalEntryArb(), { maxLength: 10 }), historical => {
        const payload = { symbol: 'AAPL', historical };

        expect(validator.assert(validate, payload, 'fmp', 'historical')).toBe(payload);
      }),
      { numRuns: 100 }
    );
  });

  it('should reject a payload with a non-numeric field', () => {
    fc.assert(
      fc.property(
        historicalEntryArb(),
        fc.constantFrom<keyof FmpHistoricalEntry>('open', 'high', 'low', 'close', 'volume'),
        (entry, field) => {
          const payload = { historical: [{ ...entry, [field]: 'n/a' }] };

          expect(() => validator.assert(validate, payload, 'fmp', 'historical')).toThrow(
            `Malformed historical payload from fmp: /historical/0/${field} must be number`
          );
        }
      ),
      { numRuns: 100 }
    );
  });

  it('should name every missing field', () => {
    const payload = { historical: [{ date: '2025-03-31', open: 1, high: 1, low: 1 }] };

    expect(() => validator.assert(validate, payload, 'fmp', 'historical')).toThrow(
      "Malformed historical payload from fmp: /historical/0 must have required property 'close', " +
        "/historical/0 must have required property 'volume'"
    );
  });

  it('should report a wrong root type at the root path', () => {
    expect(() => validator.assert(validate, [], 'fmp', 'historical')).toThrow(
      'Malformed historical payload from fmp: / must be object'
    );
  });
});
