import { ConsoleLogger, formatLogLine } from '../../../src/adapters/sys/ConsoleLogger';
import { Timer } from '../../../src/app/Timer';
import { FakeTime } from '../../support/fakes';

describe('formatLogLine', () => {
  test('tags the message with its scope and appends meta as JSON', () => {
    expect(formatLogLine('timer', 'clock probe', { fine: false })).toBe('[timer] clock probe {"fine":false}');
  });

  test('empty or missing meta leaves the bare line', () => {
    expect(formatLogLine('timer', 'clock probe', {})).toBe('[timer] clock probe');
    expect(formatLogLine('bench', 'clock probe')).toBe('[bench] clock probe');
  });
});

describe('ConsoleLogger', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  test('warn and debug go to their console methods', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    const debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    const logger = new ConsoleLogger('bench');
    logger.warn('careful', { option: 'format' });
    logger.debug('fallback');
    expect(warnSpy).toHaveBeenCalledWith('[bench] careful {"option":"format"}');
    expect(debugSpy).toHaveBeenCalledWith('[bench] fallback');
  });

  test('is the default logger for the deprecated format warning', () => {
    const warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => {});
    new Timer({ time: new FakeTime(), env: {}, format: '%d:%d:%d' });
    expect(warnSpy).toHaveBeenCalledWith(
      '[timer] Timer option \'format\' is deprecated. Use \'hms\' (or \'string\') {"option":"format"}'
    );
  });

  test('is the default logger for the precision fallback note', () => {
    const debugSpy = jest.spyOn(console, 'debug').mockImplementation(() => {});
    new Timer({ time: new FakeTime(false), env: {}, hires: true });
    expect(debugSpy).toHaveBeenCalledWith('[timer] Fine-grained clock unavailable; timing in whole seconds');
  });
});
