import { ConfigError } from '../types/market-data-error';
import { DEFAULT_CONFIG, loadConfig } from './config';

describe('loadConfig', () => {
  it('should fall back to defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config).toEqual({ ...DEFAULT_CONFIG, fmpApiKey: undefined, cmcApiKey: undefined });
    expect(config.useMockData).toBe(true);
    expect(config.requestTimeoutMs).toBe(10000);
    expect(config.mockEndDate).toBe('2025-04-01');
    expect(config.totalMarketCapMultiplier).toBe(35_800_000);
  });

  it('should return a frozen object', () => {
    expect(Object.isFrozen(loadConfig({}))).toBe(true);
  });

  it.each([
    ['true', true],
    ['1', true],
    ['YES', true],
    ['on', true],
    ['false', false],
    ['0', false],
    ['No', false],
    ['off', false]
  ])('should parse USE_MOCK_DATA=%s as %s', (raw, expected) => {
    const config = loadConfig({ USE_MOCK_DATA: raw, FMP_API_KEY: 'test-secret', CMC_API_KEY: 'test-secret' });
    expect(config.useMockData).toBe(expected);
  });

  it('should read every numeric and string setting', () => {
    const config = loadConfig({
      DEBUG: 'true',
      REQUEST_TIMEOUT_MS: '2500',
      MOCK_SEED: '7',
      MOCK_END_DATE: '2024-12-31',
      TOTAL_MARKET_CAP_MULTIPLIER: '1.5',
      DEFAULT_RANGE_DAYS: '90',
      FMP_BASE_URL: 'http://localhost:9001',
      CMC_BASE_URL: 'http://localhost:9002'
    });

    expect(config.debug).toBe(true);
    expect(config.requestTimeoutMs).toBe(2500);
    expect(config.mockSeed).toBe(7);
    expect(config.mockEndDate).toBe('2024-12-31');
    expect(config.totalMarketCapMultiplier).toBe(1.5);
    expect(config.defaultRangeDays).toBe(90);
    expect(config.fmpBaseUrl).toBe('http://localhost:9001');
    expect(config.cmcBaseUrl).toBe('http://localhost:9002');
  });

  it('should not require API keys in mock mode', () => {
    expect(() => loadConfig({ USE_MOCK_DATA: 'true' })).not.toThrow();
  });

  it('should require both API keys in live mode', () => {
    try {
      loadConfig({ USE_MOCK_DATA: 'false' });
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual([
          'FMP_API_KEY is required when USE_MOCK_DATA is false',
          'CMC_API_KEY is required when USE_MOCK_DATA is false'
        ]);
      }
    }
  });

  it('should treat blank keys as missing', () => {
    expect(() => loadConfig({ USE_MOCK_DATA: 'false', FMP_API_KEY: '  ', CMC_API_KEY: 'test-secret' }))
      .toThrow('FMP_API_KEY is required when USE_MOCK_DATA is false');
  });

  it('should collect every problem into one error', () => {
    try {
      loadConfig({
        USE_MOCK_DATA: 'maybe',
        REQUEST_TIMEOUT_MS: '-5',
        DEFAULT_RANGE_DAYS: '2.5',
        MOCK_END_DATE: '2025-02-30'
      });
      throw new Error('expected loadConfig to throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.problems).toEqual([
          'USE_MOCK_DATA must be a boolean, got "maybe"',
          'MOCK_END_DATE must be a YYYY-MM-DD date, got "2025-02-30"',
          'REQUEST_TIMEOUT_MS must be a positive integer, got "-5"',
          'DEFAULT_RANGE_DAYS must be a positive integer, got "2.5"'
        ]);
        expect(error.message).toBe(`Invalid configuration: ${error.problems.join('; ')}`);
      }
    }
  });
});
