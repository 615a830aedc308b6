/**
 * Config Service - reads the process environment into an immutable MarketDataConfig
 *
 * API keys are only mandatory when live data is requested. Every problem
 * found is collected and reported together in a single ConfigError.
 */

import { MarketDataConfig } from '../types/config';
import { ConfigError } from '../types/market-data-error';
import { isIsoDate } from '../utils/dates';

export type Environment = Record<string, string | undefined>;

export const DEFAULT_CONFIG: MarketDataConfig = {
  useMockData: true,
  debug: false,
  fmpBaseUrl: 'https://financialmodelingprep.com',
  cmcBaseUrl: 'https://pro-api.coinmarketcap.com',
  requestTimeoutMs: 10000,
  mockSeed: 42,
  mockEndDate: '2025-04-01',
  totalMarketCapMultiplier: 35_800_000,
  defaultRangeDays: 30
};

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function readString(env: Environment, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function readBoolean(
  env: Environment,
  name: string,
  fallback: boolean,
  problems: string[]
): boolean {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = raw.toLowerCase();
  if (TRUE_VALUES.includes(value)) return true;
  if (FALSE_VALUES.includes(value)) return false;

  problems.push(`${name} must be a boolean, got "${raw}"`);
  return fallback;
}

function readPositiveNumber(
  env: Environment,
  name: string,
  fallback: number,
  problems: string[],
  integer = false
): number {
  const raw = readString(env, name);
  if (raw === undefined) return fallback;

  const value = Number(raw);
  if (!Number.isFinite(value) || value <= 0 || (integer && !Number.isInteger(value))) {
    problems.push(`${name} must be a positive ${integer ? 'integer' : 'number'}, got "${raw}"`);
    return fallback;
  }
  return value;
}

/**
 * Load configuration from environment variables
 *
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigError listing every invalid or missing setting
 */
export function loadConfig(env: Environment = process.env): MarketDataConfig {
  const problems: string[] = [];

  const useMockData = readBoolean(env, 'USE_MOCK_DATA', DEFAULT_CONFIG.useMockData, problems);
  const debug = readBoolean(env, 'DEBUG', DEFAULT_CONFIG.debug, problems);
  const fmpApiKey = readString(env, 'FMP_API_KEY');
  const cmcApiKey = readString(env, 'CMC_API_KEY');

  if (!useMockData) {
    if (!fmpApiKey) problems.push('FMP_API_KEY is required when USE_MOCK_DATA is false');
    if (!cmcApiKey) problems.push('CMC_API_KEY is required when USE_MOCK_DATA is false');
  }

  const mockEndDate = readString(env, 'MOCK_END_DATE') ?? DEFAULT_CONFIG.mockEndDate;
  if (!isIsoDate(mockEndDate)) {
    problems.push(`MOCK_END_DATE must be a YYYY-MM-DD date, got "${mockEndDate}"`);
  }

  const config: MarketDataConfig = {
    useMockData,
    debug,
    fmpApiKey,
    cmcApiKey,
    fmpBaseUrl: readString(env, 'FMP_BASE_URL') ?? DEFAULT_CONFIG.fmpBaseUrl,
    cmcBaseUrl: readString(env, 'CMC_BASE_URL') ?? DEFAULT_CONFIG.cmcBaseUrl,
    requestTimeoutMs: readPositiveNumber(env, 'REQUEST_TIMEOUT_MS', DEFAULT_CONFIG.requestTimeoutMs, problems, true),
    mockSeed: readPositiveNumber(env, 'MOCK_SEED', DEFAULT_CONFIG.mockSeed, problems, true),
    mockEndDate,
    totalMarketCapMultiplier: readPositiveNumber(
      env,
      'TOTAL_MARKET_CAP_MULTIPLIER',
      DEFAULT_CONFIG.totalMarketCapMultiplier,
      problems
    ),
    defaultRangeDays: readPositiveNumber(env, 'DEFAULT_RANGE_DAYS', DEFAULT_CONFIG.defaultRangeDays, problems, true)
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }

  return Object.freeze(config);
}
