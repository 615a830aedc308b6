/**
 * Market Data Adapters - exports for stock and crypto providers
 */

export * from './base-market-data-adapter';
export * from './rest-client';
export * from './mock-adapters';
export * from './fmp-stock-adapter';
export * from './coinmarketcap-crypto-adapter';
export * from './adapter-factory';
