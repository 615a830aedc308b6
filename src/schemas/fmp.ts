/**
 * JSON Schemas for Financial Modeling Prep responses.
 * Only the fields mapped into the domain model are required.
 */

export interface FmpHistoricalEntry {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

export interface FmpHistoricalResponse {
  symbol?: string;
  historical?: FmpHistoricalEntry[];
}

export interface FmpQuoteEntry {
  symbol: string;
  name?: string | null;
  price: number;
  open: number;
  dayHigh: number;
  dayLow: number;
  previousClose: number;
  volume: number;
  marketCap?: number | null;
  timestamp?: number;
}

export interface FmpStockListEntry {
  symbol: string;
  name?: string | null;
  type?: string | null;
}

export const FmpHistoricalEntrySchema = {
  type: 'object',
  required: ['date', 'open', 'high', 'low', 'close', 'volume'],
  properties: {
    date: { type: 'string' },
    open: { type: 'number' },
    high: { type: 'number' },
    low: { type: 'number' },
    close: { type: 'number' },
    volume: { type: 'number' }
  }
} as const;

export const FmpHistoricalResponseSchema = {
  type: 'object',
  properties: {
    symbol: { type: 'string' },
    historical: {
      type: 'array',
      items: FmpHistoricalEntrySchema
    }
  }
} as const;

export const FmpQuoteResponseSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['symbol', 'price', 'open', 'dayHigh', 'dayLow', 'previousClose', 'volume'],
    properties: {
      symbol: { type: 'string' },
      name: { type: ['string', 'null'] },
      price: { type: 'number' },
      open: { type: 'number' },
      dayHigh: { type: 'number' },
      dayLow: { type: 'number' },
      previousClose: { type: 'number' },
      volume: { type: 'number' },
      marketCap: { type: ['number', 'null'] },
      timestamp: { type: 'number' }
    }
  }
} as const;

export const FmpStockListResponseSchema = {
  type: 'array',
  items: {
    type: 'object',
    required: ['symbol'],
    properties: {
      symbol: { type: 'string' },
      name: { type: ['string', 'null'] },
      type: { type: ['string', 'null'] }
    }
  }
} as const;
