export * from './polymarket/index.js';
export * from './coingecko/index.js';
export { TtlCache } from './cache.js';
export { PolymarketDataSource, CACHE_TTL_MS } from './data-source.js';
export type { PolymarketDataSourceOptions } from './data-source.js';
