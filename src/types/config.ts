/**
 * Process-wide configuration, loaded once at start-up and never mutated
 */
export interface MarketDataConfig {
  readonly useMockData: boolean;
  readonly debug: boolean;
  /** Financial Modeling Prep key; required only for live data */
  readonly fmpApiKey?: string;
  /** CoinMarketCap key; required only for live data */
  readonly cmcApiKey?: string;
  readonly fmpBaseUrl: string;
  readonly cmcBaseUrl: string;
  readonly requestTimeoutMs: number;
  readonly mockSeed: number;
  /** Last calendar day of every mock series (YYYY-MM-DD) */
  readonly mockEndDate: string;
  /** Factor applied to the BTC series to approximate total crypto market cap */
  readonly totalMarketCapMultiplier: number;
  readonly defaultRangeDays: number;
}
