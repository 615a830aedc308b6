/**
 * CoinMarketCap Crypto Adapter
 *
 * Live crypto data from the CoinMarketCap Pro API:
 * - Symbol to id resolution via /v1/cryptocurrency/map
 * - Daily OHLCV from /v2/cryptocurrency/ohlcv/historical
 * - Quotes from /v1/cryptocurrency/quotes/latest (open/high/low estimated)
 * - Listings from /v1/cryptocurrency/listings/latest
 * - The GLOBAL_MCAP index from /v1/global-metrics/quotes/historical
 *
 * TOTAL is not served by the API; it is derived from the reference asset.
 * Every response body carries a `status` block whose non-zero error_code is
 * treated as an upstream failure even on HTTP 200.
 */

import { ValidateFunction } from 'ajv';
import {
  AssetClass,
  HealthCheckResult,
  PricePoint,
  Quote,
  QuotaBasis,
  QuotaStatus,
  Series,
  SymbolCategory,
  SymbolInfo
} from '../../types/market-data';
import { ProviderError } from '../../types/market-data-error';
import {
  CmcGlobalMetricsResponse,
  CmcGlobalMetricsResponseSchema,
  CmcLatestQuoteResponse,
  CmcLatestQuoteResponseSchema,
  CmcListingsResponse,
  CmcListingsResponseSchema,
  CmcMapResponse,
  CmcMapResponseSchema,
  CmcOhlcvResponse,
  CmcOhlcvResponseSchema,
  CmcStatus,
  CmcStatusEnvelopeSchema
} from '../../schemas/coinmarketcap';
import {
  GLOBAL_MCAP_INDEX_SYMBOL,
  MARKET_CAP_BAND,
  MarketIndexService,
  TOTAL_INDEX_SYMBOL,
  TOTAL_REFERENCE_SYMBOL
} from '../../services/market-index';
import { payloadValidator } from '../../services/payload-validator';
import { SymbolCatalog } from '../../services/symbol-catalog';
import { Logger } from '../../utils/logger';
import { BaseMarketDataAdapter } from './base-market-data-adapter';
import { isRecord, RestClient } from './rest-client';

export const CMC_API_KEY_HEADER = 'X-CMC_PRO_API_KEY';
export const CMC_CALLS_REMAINING_HEADER = 'x-cmc_pro_api_calls_remaining';

/** Monthly credit allowance assumed when only credit_count is known */
export const CMC_MONTHLY_CREDITS = 10000;

/** Error code for endpoints outside the current plan tier */
const PLAN_TIER_ERROR_CODE = 1006;

const LISTINGS_LIMIT = 100;

/** Quote estimates for fields the latest-quote endpoint does not return */
const QUOTE_HIGH_FACTOR = 1.05;
const QUOTE_LOW_FACTOR = 0.95;

const validateStatus = payloadValidator.compile<{ status: CmcStatus }>(CmcStatusEnvelopeSchema);
const validateMap = payloadValidator.compile<CmcMapResponse>(CmcMapResponseSchema);
const validateOhlcv = payloadValidator.compile<CmcOhlcvResponse>(CmcOhlcvResponseSchema);
const validateLatestQuote = payloadValidator.compile<CmcLatestQuoteResponse>(CmcLatestQuoteResponseSchema);
const validateListings = payloadValidator.compile<CmcListingsResponse>(CmcListingsResponseSchema);
const validateGlobalMetrics = payloadValidator.compile<CmcGlobalMetricsResponse>(CmcGlobalMetricsResponseSchema);

export interface CoinMarketCapAdapterConfig {
  sourceId?: string;
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
  /** Scale applied to the reference asset to approximate TOTAL */
  totalMarketCapMultiplier: number;
}

export function formatCmcStatusError(code: number, message: string | null | undefined): string {
  const base = `CoinMarketCap error ${code}: ${message || 'Unknown error'}`;
  return code === PLAN_TIER_ERROR_CODE
    ? `${base} (the current CoinMarketCap plan does not include this endpoint)`
    : base;
}

export function describeCmcError(body: unknown): string | undefined {
  if (!isRecord(body) || !isRecord(body.status)) return undefined;
  const { error_code: code, error_message: message } = body.status;
  if (typeof code !== 'number') return undefined;
  return formatCmcStatusError(code, typeof message === 'string' ? message : undefined);
}

export class CoinMarketCapCryptoAdapter extends BaseMarketDataAdapter {
  readonly assetClass: AssetClass = 'CRYPTO';
  readonly source = 'LIVE' as const;

  private readonly client: RestClient;
  private readonly totalMarketCapMultiplier: number;
  private lastQuota: { remaining: number; basis: QuotaBasis } | null = null;

  constructor(config: CoinMarketCapAdapterConfig) {
    const sourceId = config.sourceId ?? 'coinmarketcap';
    super({ sourceId, logger: config.logger });
    this.totalMarketCapMultiplier = config.totalMarketCapMultiplier;
    this.client = new RestClient({
      sourceId,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      logger: config.logger,
      headers: { [CMC_API_KEY_HEADER]: config.apiKey },
      describeError: describeCmcError
    });
  }

  protected async loadSeries(symbol: string, rangeDays: number): Promise<Series> {
    if (symbol === TOTAL_INDEX_SYMBOL) {
      const reference = await this.loadSeries(TOTAL_REFERENCE_SYMBOL, rangeDays);
      return MarketIndexService.deriveTotalMarketCap(reference, this.totalMarketCapMultiplier);
    }
    if (symbol === GLOBAL_MCAP_INDEX_SYMBOL) {
      return this.loadGlobalMarketCap(rangeDays);
    }

    const id = await this.resolveId(symbol);
    const payload = await this.request('/v2/cryptocurrency/ohlcv/historical', {
      id: String(id),
      count: String(rangeDays),
      interval: 'daily',
      convert: 'USD'
    }, validateOhlcv, 'OHLCV');

    if (payload.data.quotes.length === 0) {
      throw this.notFound(symbol);
    }

    const points = payload.data.quotes.map(quote => {
      const usd = quote.quote.USD;
      return this.normalizePricePoint({
        date: quote.time_open,
        open: usd.open,
        high: usd.high,
        low: usd.low,
        close: usd.close,
        volume: usd.volume
      }, symbol);
    });

    return this.createSeries(symbol, this.latest(points, rangeDays));
  }

  protected async loadQuote(symbol: string): Promise<Quote> {
    // Indexes have no quote endpoint; read them off a short series
    if (SymbolCatalog.isMarketIndex(symbol)) {
      const series = await this.loadSeries(symbol, 2);
      return this.quoteFromSeries(series, SymbolCatalog.find('CRYPTO', symbol)?.name);
    }

    const payload = await this.request('/v1/cryptocurrency/quotes/latest', {
      symbol,
      convert: 'USD'
    }, validateLatestQuote, 'latest quote');

    const entry = payload.data[symbol];
    if (!entry) {
      throw this.notFound(symbol);
    }

    const usd = entry.quote.USD;
    const price = this.toNumber(usd.price, 'price', symbol);
    const factor = 1 + usd.percent_change_24h / 100;
    const previousClose = factor > 0 ? price / factor : price;
    const change = price - previousClose;

    return {
      symbol,
      name: entry.name,
      price,
      open: previousClose,
      high: price * QUOTE_HIGH_FACTOR,
      low: price * QUOTE_LOW_FACTOR,
      previousClose,
      volume: this.toNumber(usd.volume_24h, 'volume_24h', symbol),
      change,
      changePercent: previousClose === 0 ? 0 : (change / previousClose) * 100,
      marketCap: usd.market_cap ?? undefined,
      isApproximated: true,
      source: this.source,
      timestamp: usd.last_updated ?? new Date().toISOString()
    };
  }

  async listSymbols(category?: SymbolCategory): Promise<SymbolInfo[]> {
    if (category === 'EQUITY' || category === 'INDEX_FUND') {
      return [];
    }
    const indexes = SymbolCatalog.list('CRYPTO', 'MARKET_INDEX');
    if (category === 'MARKET_INDEX') {
      return indexes;
    }

    const payload = await this.request('/v1/cryptocurrency/listings/latest', {
      limit: String(LISTINGS_LIMIT),
      convert: 'USD'
    }, validateListings, 'listings');

    const coins = payload.data.map((entry): SymbolInfo => ({
      symbol: entry.symbol,
      name: entry.name,
      assetClass: this.assetClass,
      category: 'COIN'
    }));

    return category === 'COIN' ? coins : [...coins, ...indexes];
  }

  async getRemainingQuota(): Promise<QuotaStatus> {
    return {
      sourceId: this.getSourceId(),
      requestsRemaining: this.lastQuota?.remaining ?? null,
      basis: this.lastQuota?.basis ?? 'UNKNOWN',
      checkedAt: new Date().toISOString()
    };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const startTime = Date.now();

    try {
      await this.request('/v1/key/info', {}, validateStatus, 'key info');
      return {
        healthy: true,
        latencyMs: Date.now() - startTime,
        message: 'CoinMarketCap API is healthy',
        checkedAt: new Date().toISOString()
      };
    } catch (error) {
      return {
        healthy: false,
        latencyMs: Date.now() - startTime,
        message: `Health check failed: ${error instanceof Error ? error.message : 'Unknown error'}`,
        checkedAt: new Date().toISOString()
      };
    }
  }

  /**
   * Resolve a ticker to the CoinMarketCap id
   */
  private async resolveId(symbol: string): Promise<number> {
    let payload: CmcMapResponse;
    try {
      payload = await this.request('/v1/cryptocurrency/map', { symbol }, validateMap, 'symbol map');
    } catch (error) {
      // CMC rejects unknown symbols with HTTP 400 "Invalid value for symbol"
      if (error instanceof ProviderError && error.statusCode === 400) {
        throw this.notFound(symbol);
      }
      throw error;
    }

    const match = payload.data[0];
    if (!match) {
      throw this.notFound(symbol);
    }
    return match.id;
  }

  /**
   * Daily total market cap. Each reading becomes open and close, with a
   * fixed band for high and low, so the series is flagged approximated.
   */
  private async loadGlobalMarketCap(rangeDays: number): Promise<Series> {
    const payload = await this.request('/v1/global-metrics/quotes/historical', {
      count: String(rangeDays),
      interval: 'daily',
      convert: 'USD'
    }, validateGlobalMetrics, 'global metrics');

    if (payload.data.quotes.length === 0) {
      throw this.notFound(GLOBAL_MCAP_INDEX_SYMBOL);
    }

    const points = payload.data.quotes.map(quote => {
      const usd = quote.quote.USD;
      return this.normalizePricePoint({
        date: quote.timestamp,
        open: usd.total_market_cap,
        high: usd.total_market_cap * (1 + MARKET_CAP_BAND),
        low: usd.total_market_cap * (1 - MARKET_CAP_BAND),
        close: usd.total_market_cap,
        volume: usd.total_volume_24h
      }, GLOBAL_MCAP_INDEX_SYMBOL);
    });

    return this.createSeries(GLOBAL_MCAP_INDEX_SYMBOL, this.latest(points, rangeDays), true);
  }

  private latest(points: PricePoint[], rangeDays: number): PricePoint[] {
    return [...points].sort((a, b) => a.date.localeCompare(b.date)).slice(-rangeDays);
  }

  /**
   * GET, check the status block, then validate the full payload
   */
  private async request<T>(
    path: string,
    params: Record<string, string>,
    validate: ValidateFunction<T>,
    context: string
  ): Promise<T> {
    const response = await this.client.get(path, params);
    const envelope = payloadValidator.assert(validateStatus, response.data, this.getSourceId(), context);

    if (envelope.status.error_code !== 0) {
      throw new ProviderError(
        'UPSTREAM_FAILURE',
        formatCmcStatusError(envelope.status.error_code, envelope.status.error_message),
        this.getSourceId(),
        response.status
      );
    }

    this.recordQuota(response.headers, envelope.status);
    return payloadValidator.assert(validate, response.data, this.getSourceId(), context);
  }

  private recordQuota(headers: Record<string, string>, status: CmcStatus): void {
    const header = headers[CMC_CALLS_REMAINING_HEADER];
    const fromHeader = header === undefined ? NaN : Number(header);

    let quota: { remaining: number; basis: QuotaBasis };
    if (Number.isFinite(fromHeader)) {
      quota = { remaining: fromHeader, basis: 'HEADER' };
    } else if (status.credit_count !== undefined) {
      quota = { remaining: CMC_MONTHLY_CREDITS - status.credit_count, basis: 'ESTIMATE' };
    } else {
      return;
    }
    this.lastQuota = quota;
    this.logger.debug(`CoinMarketCap calls remaining: ${quota.remaining} (${quota.basis})`);
  }
}
