/**
 * Market Edge Analytics
 *
 * Scores prediction markets, estimates fair probabilities and sizes positions.
 */

import 'dotenv/config';

import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { Orchestrator } from './analysis/index.js';
import { CoinGeckoClient, PolymarketDataClient, PolymarketDataSource } from './ingestion/index.js';
import { AnalysisScanner } from './scanner/index.js';
import { APIServer } from './api/index.js';

async function main() {
  console.log('Market Edge Analytics');
  console.log('=====================\n');

  const config = loadConfig();

  // Data layer
  const polymarket = new PolymarketDataClient({ timeoutMs: config.REQUEST_TIMEOUT_MS });
  const coingecko = new CoinGeckoClient({ timeoutMs: config.REQUEST_TIMEOUT_MS });
  const dataSource = new PolymarketDataSource(polymarket, coingecko, {
    whaleMinTradeUsd: config.WHALE_MIN_TRADE_USD,
  });

  const orchestrator = new Orchestrator(dataSource, {
    simulations: config.MC_SIMULATIONS,
    driftMode: config.MC_CRYPTO_DRIFT,
  });

  const scanner = new AnalysisScanner(dataSource, orchestrator, {
    intervalMs: config.SCAN_INTERVAL_MS,
    marketLimit: config.SCAN_MARKET_LIMIT,
    minConfidence: config.SCAN_MIN_CONFIDENCE,
    bankroll: config.DEFAULT_BANKROLL,
    kellyFraction: config.KELLY_FRACTION,
    whaleMinTradeUsd: config.WHALE_MIN_TRADE_USD,
    significantVolumeUsd: config.WHALE_SIGNIFICANT_VOLUME_USD,
  });

  scanner.on('signal', (result) => {
    console.log(
      `[Signal] ${result.recommendedSide} "${result.question}" | ` +
      `market ${(result.marketPrice * 100).toFixed(1)}c, model ${(result.modelProbability * 100).toFixed(1)}c, ` +
      `confidence ${result.confidence}, kelly ${(result.kellyPct * 100).toFixed(2)}%`
    );
  });

  scanner.on('error', (error) => {
    console.error('[System] Scanner error:', error.message);
  });

  const apiServer = new APIServer(
    {
      port: config.API_PORT,
      host: config.API_HOST,
      defaultBankroll: config.DEFAULT_BANKROLL,
      kellyFraction: config.KELLY_FRACTION,
      whaleMinTradeUsd: config.WHALE_MIN_TRADE_USD,
      significantVolumeUsd: config.WHALE_SIGNIFICANT_VOLUME_USD,
    },
    { markets: dataSource, orchestrator, scanner }
  );

  await apiServer.start();

  if (config.SCAN_ENABLED) {
    scanner.start();
  } else {
    console.log('[System] Scanner disabled (SCAN_ENABLED=false)');
  }

  // Graceful shutdown
  process.on('SIGINT', () => {
    console.log('\n[System] Shutting down...');
    scanner.stop();
    apiServer
      .stop()
      .then(() => process.exit(0))
      .catch((error: unknown) => {
        console.error('[System] Shutdown error:', errorMessage(error));
        process.exit(1);
      });
  });
}

main().catch((error: unknown) => {
  console.error('[System] Fatal:', errorMessage(error));
  process.exit(1);
});
