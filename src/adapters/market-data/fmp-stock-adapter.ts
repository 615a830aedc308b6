/**
 * Financial Modeling Prep Stock Adapter
 *
 * Live stock data from the FMP v3 REST API:
 * - Daily history from /historical-price-full
 * - Quotes from /quote
 * - Symbol list from /stock/list
 *
 * The API key travels as the `apikey` query parameter and is redacted from
 * logged URLs. Remaining quota is read from the X-Rate-Limit-Remaining header
 * of the last response.
 */

import {
  AssetClass,
  HealthCheckResult,
  Quote,
  QuotaStatus,
  Series,
  SymbolCategory,
  SymbolInfo
} from '../../types/market-data';
import {
  FmpHistoricalResponse,
  FmpHistoricalResponseSchema,
  FmpQuoteEntry,
  FmpQuoteResponseSchema,
  FmpStockListEntry,
  FmpStockListResponseSchema
} from '../../schemas/fmp';
import { payloadValidator } from '../../services/payload-validator';
import { Logger } from '../../utils/logger';
import { BaseMarketDataAdapter } from './base-market-data-adapter';
import { isRecord, RestClient, RestResponse } from './rest-client';

export const FMP_RATE_LIMIT_HEADER = 'x-rate-limit-remaining';

/** Symbol queried by the health check */
const HEALTH_CHECK_SYMBOL = 'AAPL';

const FUND_TYPES = new Set(['etf', 'fund', 'trust']);

const validateHistorical = payloadValidator.compile<FmpHistoricalResponse>(FmpHistoricalResponseSchema);
const validateQuote = payloadValidator.compile<FmpQuoteEntry[]>(FmpQuoteResponseSchema);
const validateStockList = payloadValidator.compile<FmpStockListEntry[]>(FmpStockListResponseSchema);

export interface FmpAdapterConfig {
  sourceId?: string;
  apiKey: string;
  baseUrl: string;
  timeoutMs: number;
  logger: Logger;
}

/**
 * FMP reports failures as `{ "Error Message": "..." }`
 */
export function describeFmpError(body: unknown): string | undefined {
  if (!isRecord(body)) return undefined;
  const message = body['Error Message'] ?? body.message;
  return typeof message === 'string' ? message : undefined;
}

export class FmpStockAdapter extends BaseMarketDataAdapter {
  readonly assetClass: AssetClass = 'STOCK';
  readonly source = 'LIVE' as const;

  private readonly client: RestClient;
  private readonly apiKey: string;
  private lastRemaining: number | null = null;

  constructor(config: FmpAdapterConfig) {
    const sourceId = config.sourceId ?? 'fmp';
    super({ sourceId, logger: config.logger });
    this.apiKey = config.apiKey;
    this.client = new RestClient({
      sourceId,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      logger: config.logger,
      describeError: describeFmpError
    });
  }

  protected async loadSeries(symbol: string, rangeDays: number): Promise<Series> {
    const response = await this.request(`/api/v3/historical-price-full/${encodeURIComponent(symbol)}`, {
      timeseries: String(rangeDays)
    });
    const payload = payloadValidator.assert(validateHistorical, response.data, this.getSourceId(), 'historical price');

    if (!payload.historical || payload.historical.length === 0) {
      throw this.notFound(symbol);
    }

    // FMP lists the newest day first
    const points = payload.historical
      .map(entry => this.normalizePricePoint(entry, symbol))
      .sort((a, b) => a.date.localeCompare(b.date))
      .slice(-rangeDays);

    return this.createSeries(symbol, points);
  }

  protected async loadQuote(symbol: string): Promise<Quote> {
    const response = await this.request(`/api/v3/quote/${encodeURIComponent(symbol)}`);
    const entries = payloadValidator.assert(validateQuote, response.data, this.getSourceId(), 'quote');

    const entry = entries[0];
    if (!entry) {
      throw this.notFound(symbol);
    }

    const price = this.toNumber(entry.price, 'price', symbol);
    const previousClose = this.toNumber(entry.previousClose, 'previousClose', symbol);
    const change = price - previousClose;

    return {
      symbol,
      name: entry.name ?? undefined,
      price,
      open: this.toNumber(entry.open, 'open', symbol),
      high: this.toNumber(entry.dayHigh, 'dayHigh', symbol),
      low: this.toNumber(entry.dayLow, 'dayLow', symbol),
      previousClose,
      volume: this.toNumber(entry.volume, 'volume', symbol),
      change,
      changePercent: previousClose === 0 ? 0 : (change / previousClose) * 100,
      marketCap: entry.marketCap ?? undefined,
      isApproximated: false,
      source: this.source,
      timestamp: entry.timestamp !== undefined
        ? new Date(entry.timestamp * 1000).toISOString()
        : new Date().toISOString()
    };
  }

  async listSymbols(category?: SymbolCategory): Promise<SymbolInfo[]> {
    const response = await this.request('/api/v3/stock/list');
    const entries = payloadValidator.assert(validateStockList, response.data, this.getSourceId(), 'stock list');

    const symbols: SymbolInfo[] = [];
    for (const entry of entries) {
      if (typeof entry.name !== 'string') continue;
      const entryCategory: SymbolCategory = FUND_TYPES.has((entry.type ?? '').toLowerCase())
        ? 'INDEX_FUND'
        : 'EQUITY';
      if (category !== undefined && entryCategory !== category) continue;
      symbols.push({ symbol: entry.symbol, name: entry.name, assetClass: this.assetClass, category: entryCategory });
    }
    return symbols;
  }

  async getRemainingQuota(): Promise<QuotaStatus> {
    return {
      sourceId: this.getSourceId(),
      requestsRemaining: this.lastRemaining,
      basis: this.lastRemaining === null ? 'UNKNOWN' : 'HEADER',
      checkedAt: new Date().toISOString()
    };
  }

  async healthCheck(): Promise<HealthCheckResult> {
    const startTime = Date.now();

    try {
      await this.request(`/api/v3/quote/${HEALTH_CHECK_SYMBOL}`);
      return {
        healthy: true,
        latencyMs: Date.now() - startTime,
        message: 'FMP API is healthy',
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

  private async request(path: string, params: Record<string, string> = {}): Promise<RestResponse> {
    const response = await this.client.get(path, { ...params, apikey: this.apiKey });
    this.recordQuota(response);
    return response;
  }

  private recordQuota(response: RestResponse): void {
    const header = response.headers[FMP_RATE_LIMIT_HEADER];
    if (header === undefined) return;

    const remaining = Number(header);
    if (Number.isFinite(remaining)) {
      this.lastRemaining = remaining;
      this.logger.debug(`FMP requests remaining: ${remaining}`);
    }
  }
}
