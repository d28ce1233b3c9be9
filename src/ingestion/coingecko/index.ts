export { CoinGeckoClient, estimateDriftAndVolatility } from './client.js';
export type { CoinGeckoClientOptions } from './client.js';
