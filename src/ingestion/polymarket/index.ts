export { PolymarketDataClient } from './client.js';
export type { PolymarketDataClientOptions, FetchMarketsParams } from './client.js';
export { parseMarket, parseTrade, parsePriceHistory, tradeOutcome } from './types.js';
export type { Market, ParsedMarket, MarketHolder, MarketTrade, DataPosition, DataTrade } from './types.js';
