import { NodeTime } from '../../../src/adapters/sys/NodeTime';
import { isPreciseTimestamp } from '../../../src/domain/timers/Timestamp';
import { hasFineGrainedClock } from '../../../src/runtime/hires';

describe('NodeTime', () => {
  const time = new NodeTime();

  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('coarse now is whole epoch seconds from Date.now', () => {
    jest.spyOn(Date, 'now').mockReturnValue(1_700_000_123_987);
    expect(time.now(false)).toBe(1_700_000_123);
  });

  test('fine now returns seconds and microseconds near the wall clock', () => {
    const value = time.now(true);
    if (!isPreciseTimestamp(value)) {
      throw new Error('expected a precise timestamp');
    }
    expect(Number.isInteger(value.microseconds)).toBe(true);
    expect(value.microseconds).toBeGreaterThanOrEqual(0);
    expect(value.microseconds).toBeLessThan(1_000_000);
    expect(Math.abs(value.seconds - Date.now() / 1000)).toBeLessThan(2);
  });

  test('capability follows the process-wide check', () => {
    expect(time.supportsFineGrainedClock()).toBe(hasFineGrainedClock());
  });
});
