export * from './types/market-data';
export * from './types/market-data-error';
export * from './types/config';
export * from './types/data-provider';
export * from './adapters/market-data';
export * from './services/config';
export * from './services/data-processor';
export * from './services/asset-comparison';
export * from './services/market-index';
export * from './services/market-data';
export * from './services/mock-data-generator';
export * from './services/symbol-catalog';
export { createMarketDataHandler, handler } from './handlers/market-data';
export { createLogger } from './utils/logger';
export type { Logger } from './utils/logger';
