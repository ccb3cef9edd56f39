import { debugLog, flagEnabled, isJestRuntime, isTestEnvironment, readEnv } from '../../../src/shared/utils/envFlags';

describe('envFlags helpers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('readEnv reads from process.env when present', () => {
    delete process.env.SHOGI_TEST_FLAG;
    expect(readEnv('SHOGI_TEST_FLAG')).toBeUndefined();

    process.env.SHOGI_TEST_FLAG = 'abc';
    expect(readEnv('SHOGI_TEST_FLAG')).toBe('abc');
  });

  it('flagEnabled returns true only for "1", "true", or "TRUE"', () => {
    for (const [value, expected] of [
      ['1', true],
      ['true', true],
      ['TRUE', true],
      ['0', false],
      ['false', false],
      ['', false],
    ] as const) {
      process.env.SHOGI_FLAG = value;
      expect(flagEnabled('SHOGI_FLAG')).toBe(expected);
    }

    delete process.env.SHOGI_FLAG;
    expect(flagEnabled('SHOGI_FLAG')).toBe(false);
  });

  it('detects the test runtime', () => {
    expect(isJestRuntime()).toBe(true);
    expect(isTestEnvironment()).toBe(true);
  });

  it('debugLog writes only when the condition holds', () => {
    const spy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    debugLog(false, 'hidden');
    debugLog(true, 'shown', 1);
    expect(spy).toHaveBeenCalledTimes(1);
    expect(spy).toHaveBeenCalledWith('shown', 1);
  });
});
