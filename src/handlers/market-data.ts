import { APIGatewayProxyEvent, APIGatewayProxyResult } from 'aws-lambda';
import { loadConfig } from '../services/config';
import {
  AssetRef,
  ComparisonMode,
  createMarketDataService,
  MarketDataService,
  PanelRequest
} from '../services/market-data';
import { AssetClass, SymbolCategory } from '../types/market-data';
import { ConfigError, isMarketDataError } from '../types/market-data-error';

/**
 * Error response body structure
 */
interface ErrorResponseBody {
  error: string;
  code: string;
}

export type MarketDataHandler = (event: APIGatewayProxyEvent) => Promise<APIGatewayProxyResult>;

/**
 * Common CORS headers for all responses
 */
export const CORS_HEADERS = {
  'Content-Type': 'application/json',
  'Access-Control-Allow-Origin': '*',
  'Access-Control-Allow-Headers': 'Content-Type',
  'Access-Control-Allow-Methods': 'GET,OPTIONS'
};

/** Panels shown when a dashboard request names none */
export const DEFAULT_DASHBOARD = {
  stock: 'AAPL',
  crypto: 'BTC',
  index: 'SPY',
  cryptoIndex: 'TOTAL'
};

const ASSET_PATHS: Record<string, AssetClass> = {
  stocks: 'STOCK',
  crypto: 'CRYPTO'
};

const CATEGORIES: readonly SymbolCategory[] = ['EQUITY', 'INDEX_FUND', 'COIN', 'MARKET_INDEX'];

const COMPARISON_MODES: Record<string, ComparisonMode> = {
  assets: 'ASSETS',
  index: 'INDEX'
};

const ERROR_STATUS: Record<string, number> = {
  INVALID_ARGUMENT: 400,
  NOT_FOUND: 404,
  EMPTY_SERIES: 404,
  TIMEOUT: 504,
  UPSTREAM_FAILURE: 502,
  MALFORMED_PAYLOAD: 502
};

/**
 * Raised for malformed query parameters
 */
class InvalidParameterError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidParameterError';
  }
}

/**
 * Create a success response
 */
function successResponse<T>(data: T, statusCode = 200): APIGatewayProxyResult {
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(data)
  };
}

/**
 * Create an error response
 */
function errorResponse(statusCode: number, message: string, code: string): APIGatewayProxyResult {
  const body: ErrorResponseBody = { error: message, code };
  return {
    statusCode,
    headers: CORS_HEADERS,
    body: JSON.stringify(body)
  };
}

/**
 * Map an error thrown while serving a route to a response
 */
function toErrorResponse(error: unknown, action: string): APIGatewayProxyResult {
  if (error instanceof InvalidParameterError) {
    return errorResponse(400, error.message, 'INVALID_PARAMETER');
  }
  if (isMarketDataError(error)) {
    const statusCode = ERROR_STATUS[error.code] ?? 500;
    if (statusCode >= 500) {
      console.error(`Error ${action}:`, error.message);
    }
    return errorResponse(statusCode, error.message, error.code);
  }
  console.error(`Error ${action}:`, error);
  return errorResponse(500, 'Internal server error', 'INTERNAL_ERROR');
}

function getQueryParam(event: APIGatewayProxyEvent, name: string): string | undefined {
  const value = event.queryStringParameters?.[name]?.trim();
  return value ? value : undefined;
}

/**
 * Parse the `days` query parameter; absent means the configured default
 */
function parseDays(event: APIGatewayProxyEvent): number | undefined {
  const raw = getQueryParam(event, 'days');
  if (raw === undefined) return undefined;

  const days = Number(raw);
  if (!/^\d+$/.test(raw) || days <= 0) {
    throw new InvalidParameterError(`days must be a positive integer, got "${raw}"`);
  }
  return days;
}

function parseCategory(event: APIGatewayProxyEvent): SymbolCategory | undefined {
  const raw = getQueryParam(event, 'category');
  if (raw === undefined) return undefined;

  const category = CATEGORIES.find(candidate => candidate === raw.toUpperCase());
  if (!category) {
    throw new InvalidParameterError(`Unknown category "${raw}"`);
  }
  return category;
}

/**
 * Parse an asset reference of the form `stocks:AAPL` or `crypto:BTC`
 */
function parseAssetRef(event: APIGatewayProxyEvent, name: string): AssetRef {
  const raw = getQueryParam(event, name);
  if (raw === undefined) {
    throw new InvalidParameterError(`Missing ${name}`);
  }

  const separator = raw.indexOf(':');
  const assetClass = separator > 0 ? ASSET_PATHS[raw.slice(0, separator).toLowerCase()] : undefined;
  if (!assetClass) {
    throw new InvalidParameterError(`${name} must look like stocks:SYMBOL or crypto:SYMBOL, got "${raw}"`);
  }
  return { assetClass, symbol: raw.slice(separator + 1) };
}

function parseMode(event: APIGatewayProxyEvent): ComparisonMode {
  const raw = getQueryParam(event, 'mode') ?? 'assets';
  const mode = COMPARISON_MODES[raw.toLowerCase()];
  if (!mode) {
    throw new InvalidParameterError(`mode must be "assets" or "index", got "${raw}"`);
  }
  return mode;
}

/**
 * Create the API handler around a MarketDataService
 *
 * Routes:
 * - GET /markets/{stocks|crypto}/symbols?category=
 * - GET /markets/{stocks|crypto}/{symbol}/series?days=
 * - GET /markets/{stocks|crypto}/{symbol}/quote
 * - GET /dashboard?stock=&crypto=&index=&cryptoIndex=&days=
 * - GET /compare?left=&right=&mode=&days=
 * - GET /quota
 * - GET /health
 */
export function createMarketDataHandler(service: MarketDataService): MarketDataHandler {
  return async (event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> => {
    // Handle CORS preflight
    if (event.httpMethod === 'OPTIONS') {
      return {
        statusCode: 200,
        headers: CORS_HEADERS,
        body: ''
      };
    }

    if (event.httpMethod !== 'GET') {
      return errorResponse(404, 'Route not found', 'NOT_FOUND');
    }

    const path = event.path.replace(/\/+$/, '');

    // Route: GET /markets/{assets}/symbols
    const symbolsMatch = path.match(/^\/markets\/([^/]+)\/symbols$/);
    if (symbolsMatch && ASSET_PATHS[symbolsMatch[1]]) {
      const assetClass = ASSET_PATHS[symbolsMatch[1]];
      try {
        const symbols = await service.listSymbols(assetClass, parseCategory(event));
        return successResponse({ symbols });
      } catch (error) {
        return toErrorResponse(error, 'listing symbols');
      }
    }

    // Route: GET /markets/{assets}/{symbol}/series
    const seriesMatch = path.match(/^\/markets\/([^/]+)\/([^/]+)\/series$/);
    if (seriesMatch && ASSET_PATHS[seriesMatch[1]]) {
      try {
        const panel = await service.getPanel({
          assetClass: ASSET_PATHS[seriesMatch[1]],
          symbol: decodeURIComponent(seriesMatch[2]),
          rangeDays: parseDays(event)
        });
        return successResponse(panel);
      } catch (error) {
        return toErrorResponse(error, 'getting series');
      }
    }

    // Route: GET /markets/{assets}/{symbol}/quote
    const quoteMatch = path.match(/^\/markets\/([^/]+)\/([^/]+)\/quote$/);
    if (quoteMatch && ASSET_PATHS[quoteMatch[1]]) {
      try {
        const quote = await service.getQuote({
          assetClass: ASSET_PATHS[quoteMatch[1]],
          symbol: decodeURIComponent(quoteMatch[2])
        });
        return successResponse(quote);
      } catch (error) {
        return toErrorResponse(error, 'getting quote');
      }
    }

    // Route: GET /dashboard
    if (path === '/dashboard') {
      try {
        const rangeDays = parseDays(event);
        const requests: PanelRequest[] = [
          { assetClass: 'STOCK', symbol: getQueryParam(event, 'stock') ?? DEFAULT_DASHBOARD.stock, rangeDays },
          { assetClass: 'CRYPTO', symbol: getQueryParam(event, 'crypto') ?? DEFAULT_DASHBOARD.crypto, rangeDays },
          { assetClass: 'STOCK', symbol: getQueryParam(event, 'index') ?? DEFAULT_DASHBOARD.index, rangeDays },
          {
            assetClass: 'CRYPTO',
            symbol: getQueryParam(event, 'cryptoIndex') ?? DEFAULT_DASHBOARD.cryptoIndex,
            rangeDays
          }
        ];
        const panels = await service.getDashboard(requests);
        return successResponse({ panels });
      } catch (error) {
        return toErrorResponse(error, 'building dashboard');
      }
    }

    // Route: GET /compare
    if (path === '/compare') {
      try {
        const comparison = await service.compare({
          left: parseAssetRef(event, 'left'),
          right: parseAssetRef(event, 'right'),
          mode: parseMode(event),
          rangeDays: parseDays(event)
        });
        return successResponse(comparison);
      } catch (error) {
        return toErrorResponse(error, 'comparing assets');
      }
    }

    // Route: GET /quota
    if (path === '/quota') {
      try {
        const quotas = await service.getQuotaStatus();
        return successResponse({ quotas });
      } catch (error) {
        return toErrorResponse(error, 'reading quota');
      }
    }

    // Route: GET /health
    if (path === '/health') {
      try {
        const health = await service.checkHealth();
        const healthy = health.stock.healthy && health.crypto.healthy;
        return successResponse({ healthy, ...health }, healthy ? 200 : 503);
      } catch (error) {
        return toErrorResponse(error, 'checking health');
      }
    }

    return errorResponse(404, 'Route not found', 'NOT_FOUND');
  };
}

let defaultHandler: MarketDataHandler | undefined;

/**
 * Lambda entry point. Configuration is read from the environment on the
 * first invocation and reused afterwards.
 */
export async function handler(event: APIGatewayProxyEvent): Promise<APIGatewayProxyResult> {
  if (!defaultHandler) {
    try {
      defaultHandler = createMarketDataHandler(createMarketDataService(loadConfig()));
    } catch (error) {
      if (error instanceof ConfigError) {
        console.error('Error loading configuration:', error.message);
        return errorResponse(500, error.message, 'CONFIGURATION_ERROR');
      }
      throw error;
    }
  }
  return defaultHandler(event);
}
