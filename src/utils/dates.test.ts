import { addDays, isIsoDate, isWeekday, toIsoDate, trailingDates } from './dates';

describe('dates', () => {
  it('should validate calendar days', () => {
    expect(isIsoDate('2025-04-01')).toBe(true);
    expect(isIsoDate('2024-02-29')).toBe(true);
    expect(isIsoDate('2025-02-29')).toBe(false);
    expect(isIsoDate('2025-4-1')).toBe(false);
    expect(isIsoDate('not-a-date')).toBe(false);
  });

  it('should add days across month and year boundaries', () => {
    expect(addDays('2025-03-31', 1)).toBe('2025-04-01');
    expect(addDays('2025-01-01', -1)).toBe('2024-12-31');
  });

  it('should recognise weekdays in UTC', () => {
    expect(isWeekday('2025-04-01')).toBe(true); // Tuesday
    expect(isWeekday('2025-03-29')).toBe(false); // Saturday
    expect(isWeekday('2025-03-30')).toBe(false); // Sunday
  });

  it('should reduce timestamps to their day', () => {
    expect(toIsoDate('2025-03-31')).toBe('2025-03-31');
    expect(toIsoDate('2025-03-31 16:00:00')).toBe('2025-03-31');
    expect(toIsoDate('2025-03-31T00:00:00.000Z')).toBe('2025-03-31');
    expect(toIsoDate('31/03/2025')).toBeUndefined();
  });

  it('should list trailing days oldest first', () => {
    expect(trailingDates('2025-04-01', 3, false)).toEqual(['2025-03-30', '2025-03-31', '2025-04-01']);
    expect(trailingDates('2025-04-01', 3, true)).toEqual(['2025-03-28', '2025-03-31', '2025-04-01']);
  });
});
