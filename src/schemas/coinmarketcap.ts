/**
 * JSON Schemas for CoinMarketCap Pro API responses.
 */

export interface CmcStatus {
  error_code: number;
  error_message?: string | null;
  credit_count?: number;
}

export interface CmcMapResponse {
  status: CmcStatus;
  data: Array<{ id: number; symbol: string; name?: string }>;
}

export interface CmcOhlcvQuote {
  time_open: string;
  quote: {
    USD: {
      open: number;
      high: number;
      low: number;
      close: number;
      volume: number;
    };
  };
}

export interface CmcOhlcvResponse {
  status: CmcStatus;
  data: {
    id?: number;
    symbol?: string;
    quotes: CmcOhlcvQuote[];
  };
}

export interface CmcLatestQuoteEntry {
  symbol: string;
  name?: string;
  quote: {
    USD: {
      price: number;
      volume_24h: number;
      percent_change_24h: number;
      market_cap?: number | null;
      last_updated?: string;
    };
  };
}

export interface CmcLatestQuoteResponse {
  status: CmcStatus;
  data: Record<string, CmcLatestQuoteEntry>;
}

export interface CmcListingsResponse {
  status: CmcStatus;
  data: Array<{ symbol: string; name: string }>;
}

export interface CmcGlobalMetricsQuote {
  timestamp: string;
  quote: {
    USD: {
      total_market_cap: number;
      total_volume_24h: number;
    };
  };
}

export interface CmcGlobalMetricsResponse {
  status: CmcStatus;
  data: {
    quotes: CmcGlobalMetricsQuote[];
  };
}

export const CmcStatusSchema = {
  type: 'object',
  required: ['error_code'],
  properties: {
    error_code: { type: 'number' },
    error_message: { type: ['string', 'null'] },
    credit_count: { type: 'number' }
  }
} as const;

export const CmcStatusEnvelopeSchema = {
  type: 'object',
  required: ['status'],
  properties: {
    status: CmcStatusSchema
  }
} as const;

export const CmcMapResponseSchema = {
  type: 'object',
  required: ['status', 'data'],
  properties: {
    status: CmcStatusSchema,
    data: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id', 'symbol'],
        properties: {
          id: { type: 'number' },
          symbol: { type: 'string' },
          name: { type: 'string' }
        }
      }
    }
  }
} as const;

export const CmcOhlcvResponseSchema = {
  type: 'object',
  required: ['status', 'data'],
  properties: {
    status: CmcStatusSchema,
    data: {
      type: 'object',
      required: ['quotes'],
      properties: {
        id: { type: 'number' },
        symbol: { type: 'string' },
        quotes: {
          type: 'array',
          items: {
            type: 'object',
            required: ['time_open', 'quote'],
            properties: {
              time_open: { type: 'string' },
              quote: {
                type: 'object',
                required: ['USD'],
                properties: {
                  USD: {
                    type: 'object',
                    required: ['open', 'high', 'low', 'close', 'volume'],
                    properties: {
                      open: { type: 'number' },
                      high: { type: 'number' },
                      low: { type: 'number' },
                      close: { type: 'number' },
                      volume: { type: 'number' }
                    }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
} as const;

export const CmcLatestQuoteResponseSchema = {
  type: 'object',
  required: ['status', 'data'],
  properties: {
    status: CmcStatusSchema,
    data: {
      type: 'object',
      additionalProperties: {
        type: 'object',
        required: ['symbol', 'quote'],
        properties: {
          symbol: { type: 'string' },
          name: { type: 'string' },
          quote: {
            type: 'object',
            required: ['USD'],
            properties: {
              USD: {
                type: 'object',
                required: ['price', 'volume_24h', 'percent_change_24h'],
                properties: {
                  price: { type: 'number' },
                  volume_24h: { type: 'number' },
                  percent_change_24h: { type: 'number' },
                  market_cap: { type: ['number', 'null'] },
                  last_updated: { type: 'string' }
                }
              }
            }
          }
        }
      }
    }
  }
} as const;

export const CmcListingsResponseSchema = {
  type: 'object',
  required: ['status', 'data'],
  properties: {
    status: CmcStatusSchema,
    data: {
      type: 'array',
      items: {
        type: 'object',
        required: ['symbol', 'name'],
        properties: {
          symbol: { type: 'string' },
          name: { type: 'string' }
        }
      }
    }
  }
} as const;

export const CmcGlobalMetricsResponseSchema = {
  type: 'object',
  required: ['status', 'data'],
  properties: {
    status: CmcStatusSchema,
    data: {
      type: 'object',
      required: ['quotes'],
      properties: {
        quotes: {
          type: 'array',
          items: {
            type: 'object',
            required: ['timestamp', 'quote'],
            properties: {
              timestamp: { type: 'string' },
              quote: {
                type: 'object',
                required: ['USD'],
                properties: {
                  USD: {
                    type: 'object',
                    required: ['total_market_cap', 'total_volume_24h'],
                    properties: {
                      total_market_cap: { type: 'number' },
                      total_volume_24h: { type: 'number' }
                    }
                  }
                }
              }
            }
          }
        }
      }
    }
  }
} as const;
