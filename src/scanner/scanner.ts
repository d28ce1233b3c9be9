/**
 * Analysis Scanner
 *
 * Periodically pulls the most active markets, builds snapshots and runs the
 * deep analysis on each one. Positive setups above the confidence floor are
 * emitted as signals.
 */

import { EventEmitter } from 'events';
import { errorMessage } from '../errors.js';
import type { Orchestrator } from '../analysis/orchestrator.js';
import type { DeepAnalysisResult } from '../analysis/types.js';
import type { PolymarketDataSource } from '../ingestion/data-source.js';
import { buildSnapshot } from '../signals/snapshot.js';

const DEFAULT_INTERVAL_MS = 5 * 60 * 1000; // 5 minutes

export type ScannerFeed = Pick<PolymarketDataSource, 'listActiveMarkets' | 'fetchMarketTrades'>;
export type ScannerAnalyzer = Pick<Orchestrator, 'analyze'>;

export interface ScannerConfig {
  intervalMs?: number;
  marketLimit?: number;
  minConfidence?: number;
  bankroll?: number;
  kellyFraction?: number;
  whaleMinTradeUsd?: number;
  significantVolumeUsd?: number;
}

export interface ScanSummary {
  marketsListed: number;
  analyzed: number;
  signals: number;
  failed: number;
  durationMs: number;
  completedAt: number;
}

export interface ScannerEvents {
  analysis: [result: DeepAnalysisResult];
  signal: [result: DeepAnalysisResult];
  scanComplete: [summary: ScanSummary];
  error: [error: Error];
}

export class AnalysisScanner extends EventEmitter<ScannerEvents> {
  private feed: ScannerFeed;
  private analyzer: ScannerAnalyzer;
  private config: Required<ScannerConfig>;
  private scanTimer: NodeJS.Timeout | null = null;
  private scanning = false;
  private results: Map<string, DeepAnalysisResult> = new Map();
  private lastScan: ScanSummary | null = null;
  private lastError: { message: string; time: number } | null = null;

  constructor(feed: ScannerFeed, analyzer: ScannerAnalyzer, config: ScannerConfig = {}) {
    super();
    this.feed = feed;
    this.analyzer = analyzer;
    this.config = {
      intervalMs: config.intervalMs ?? DEFAULT_INTERVAL_MS,
      marketLimit: config.marketLimit ?? 20,
      minConfidence: config.minConfidence ?? 50,
      bankroll: config.bankroll ?? 10_000,
      kellyFraction: config.kellyFraction ?? 0.25,
      whaleMinTradeUsd: config.whaleMinTradeUsd ?? 500,
      significantVolumeUsd: config.significantVolumeUsd ?? 10_000,
    };
  }

  /**
   * Scan now, then on every interval
   */
  start(): void {
    if (this.scanTimer) return;

    console.log(`[Scanner] Starting (every ${Math.round(this.config.intervalMs / 1000)}s, top ${this.config.marketLimit} markets)`);
    this.runScan();
    this.scanTimer = setInterval(() => this.runScan(), this.config.intervalMs);
  }

  stop(): void {
    if (this.scanTimer) {
      clearInterval(this.scanTimer);
      this.scanTimer = null;
    }
  }

  isRunning(): boolean {
    return this.scanTimer !== null;
  }

  /**
   * Run one scan. Returns null when a scan is already in progress.
   */
  async scan(): Promise<ScanSummary | null> {
    if (this.scanning) return null;
    this.scanning = true;

    const startedAt = Date.now();
    let analyzed = 0;
    let signals = 0;
    let failed = 0;
    const current = new Map<string, DeepAnalysisResult>();

    try {
      const markets = (await this.feed.listActiveMarkets(this.config.marketLimit)).filter((m) => !m.closed);

      // Sequential: keeps request volume against the public APIs bounded
      for (const market of markets) {
        try {
          const trades = await this.feed.fetchMarketTrades(market.conditionId).catch((error: unknown) => {
            console.warn(`[Scanner] No trades for ${market.conditionId}: ${errorMessage(error)}`);
            return [];
          });

          const snapshot = buildSnapshot(market, trades, {
            whaleMinTradeUsd: this.config.whaleMinTradeUsd,
            significantVolumeUsd: this.config.significantVolumeUsd,
          });

          const result = await this.analyzer.analyze(snapshot, this.config.bankroll, this.config.kellyFraction);
          analyzed++;

          current.set(result.conditionId, result);
          this.emit('analysis', result);

          if (this.isSignal(result)) {
            signals++;
            this.emit('signal', result);
          }
        } catch (error) {
          failed++;
          console.warn(`[Scanner] Skipped ${market.conditionId}: ${errorMessage(error)}`);
        }
      }

      const summary: ScanSummary = {
        marketsListed: markets.length,
        analyzed,
        signals,
        failed,
        durationMs: Date.now() - startedAt,
        completedAt: Date.now(),
      };

      // Markets that closed or dropped out of the listing leave with this scan
      this.results = current;
      this.lastScan = summary;
      this.lastError = null;
      console.log(`[Scanner] Scan complete: ${analyzed} analyzed, ${signals} signals, ${failed} failed`);
      this.emit('scanComplete', summary);
      return summary;
    } catch (error) {
      this.reportError(error);
      return null;
    } finally {
      this.scanning = false;
    }
  }

  /**
   * Latest positive setups, highest confidence first
   */
  getTopSignals(limit = 10): DeepAnalysisResult[] {
    return [...this.results.values()]
      .filter((r) => this.isSignal(r))
      .sort((a, b) => b.confidence - a.confidence || Math.abs(b.edge) - Math.abs(a.edge))
      .slice(0, limit);
  }

  getResult(conditionId: string): DeepAnalysisResult | undefined {
    return this.results.get(conditionId);
  }

  getLastScan(): ScanSummary | null {
    return this.lastScan;
  }

  getLastError(): { message: string; time: number } | null {
    return this.lastError;
  }

  private isSignal(result: DeepAnalysisResult): boolean {
    return result.isPositiveSetup && result.confidence >= this.config.minConfidence;
  }

  private runScan(): void {
    this.scan().catch((error: unknown) => this.reportError(error));
  }

  private reportError(error: unknown): void {
    const err = error instanceof Error ? error : new Error(String(error));
    this.lastError = { message: err.message, time: Date.now() };

    if (this.listenerCount('error') > 0) {
      this.emit('error', err);
    } else {
      console.error('[Scanner] Scan failed:', err.message);
    }
  }
}
