import { fromEpochMicros, intervalSeconds, isPreciseTimestamp } from '../../../src/domain/timers/Timestamp';

describe('Timestamp', () => {
  test('fromEpochMicros splits seconds and microseconds', () => {
    expect(fromEpochMicros(1_700_000_000_250_000)).toEqual({ seconds: 1_700_000_000, microseconds: 250_000 });
    expect(fromEpochMicros(999_999)).toEqual({ seconds: 0, microseconds: 999_999 });
  });

  test('isPreciseTimestamp tells the two shapes apart', () => {
    expect(isPreciseTimestamp(12)).toBe(false);
    expect(isPreciseTimestamp({ seconds: 12, microseconds: 0 })).toBe(true);
  });

  test('coarse interval is a plain subtraction', () => {
    expect(intervalSeconds(100, 103)).toBe(3);
  });

  test('precise interval borrows across the second boundary', () => {
    const from = { seconds: 1_700_000_000, microseconds: 900_000 };
    const to = { seconds: 1_700_000_001, microseconds: 100_000 };
    expect(intervalSeconds(from, to)).toBe(0.2);
  });

  test('precise interval without a borrow', () => {
    const from = { seconds: 10, microseconds: 250_000 };
    const to = { seconds: 12, microseconds: 750_000 };
    expect(intervalSeconds(from, to)).toBe(2.5);
  });

  test('mixed shapes treat whole seconds as zero microseconds', () => {
    expect(intervalSeconds(10, { seconds: 11, microseconds: 500_000 })).toBe(1.5);
  });
});
