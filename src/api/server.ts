/**
 * API Server
 *
 * REST API for on-demand deep analysis and the scanner's latest signals,
 * plus a WebSocket feed at /ws that pushes each new signal.
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { URL } from 'url';
import WebSocket, { WebSocketServer } from 'ws';
import { z } from 'zod';
import { errorMessage, isInvalidInput } from '../errors.js';
import type { Orchestrator } from '../analysis/orchestrator.js';
import type { DeepAnalysisResult } from '../analysis/types.js';
import type { PolymarketDataSource } from '../ingestion/data-source.js';
import type { AnalysisScanner } from '../scanner/scanner.js';
import { buildSnapshot } from '../signals/snapshot.js';
import type {
  AnalyzeResponse,
  APIInfoResponse,
  ErrorResponse,
  HealthResponse,
  SignalSummary,
  SignalsResponse,
  WSMessage,
} from './types.js';

const ANALYZE_PREFIX = '/api/analyze/';
const MAX_SIGNALS = 100;

export interface APIServerConfig {
  port: number;
  host?: string;
  defaultBankroll?: number;
  kellyFraction?: number;
  whaleMinTradeUsd?: number;
  significantVolumeUsd?: number;
}

export interface APIServerDependencies {
  markets: Pick<PolymarketDataSource, 'fetchMarket' | 'fetchMarketTrades'>;
  orchestrator: Pick<Orchestrator, 'analyze'>;
  scanner: AnalysisScanner;
}

const analyzeQuerySchema = z.object({
  bankroll: z.coerce.number().finite().positive().optional(),
  fraction: z.coerce.number().positive().max(1).optional(),
});

export function toSignalSummary(result: DeepAnalysisResult): SignalSummary {
  return {
    conditionId: result.conditionId,
    question: result.question,
    side: result.recommendedSide,
    marketPrice: result.marketPrice,
    modelProbability: result.modelProbability,
    edge: result.edge,
    confidence: result.confidence,
    kellyPct: result.kellyPct,
    analyzedAt: result.analyzedAt,
  };
}

export class APIServer {
  private config: Required<Omit<APIServerConfig, 'host'>> & { host: string };
  private deps: APIServerDependencies;
  private server: ReturnType<typeof createServer> | null = null;
  private wss: WebSocketServer | null = null;
  private startTime: number = Date.now();

  constructor(config: APIServerConfig, deps: APIServerDependencies) {
    this.config = {
      port: config.port,
      host: config.host || '0.0.0.0',
      defaultBankroll: config.defaultBankroll ?? 10_000,
      kellyFraction: config.kellyFraction ?? 0.25,
      whaleMinTradeUsd: config.whaleMinTradeUsd ?? 500,
      significantVolumeUsd: config.significantVolumeUsd ?? 10_000,
    };
    this.deps = deps;

    this.setupListeners();
  }

  /**
   * Start the API server
   */
  start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server = createServer((req, res) => {
        this.handleRequest(req, res).catch((error: unknown) => {
          console.error('[API] Unhandled error:', errorMessage(error));
        });
      });
      this.wss = new WebSocketServer({ server: this.server, path: '/ws' });

      this.wss.on('connection', (socket) => {
        this.send(socket, { type: 'connected', timestamp: Date.now() });
      });

      this.server.on('error', reject);

      this.server.listen(this.config.port, this.config.host, () => {
        console.log(`[API] Server listening on port ${this.getPort()}`);
        resolve();
      });
    });
  }

  /**
   * Stop the API server
   */
  stop(): Promise<void> {
    return new Promise((resolve) => {
      if (this.wss) {
        for (const client of this.wss.clients) client.terminate();
        this.wss.close();
        this.wss = null;
      }
      if (this.server) {
        this.server.close(() => resolve());
        this.server = null;
      } else {
        resolve();
      }
    });
  }

  /**
   * Bound port (differs from the configured one when that was 0)
   */
  getPort(): number {
    const address = this.server?.address();
    return address && typeof address === 'object' ? address.port : this.config.port;
  }

  /**
   * Push a message to every open WebSocket client
   */
  broadcast(message: WSMessage): void {
    if (!this.wss) return;
    for (const client of this.wss.clients) {
      this.send(client, message);
    }
  }

  private setupListeners(): void {
    this.deps.scanner.on('signal', (result) => {
      this.broadcast({ type: 'analysis', data: result });
    });

    this.deps.scanner.on('scanComplete', (summary) => {
      this.broadcast({ type: 'scanComplete', data: summary });
    });
  }

  private send(socket: WebSocket, message: WSMessage): void {
    if (socket.readyState === WebSocket.OPEN) {
      socket.send(JSON.stringify(message));
    }
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (req.method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    const url = new URL(req.url || '/', `http://${req.headers.host}`);
    const path = url.pathname;
    const method = req.method || 'GET';

    if (method !== 'GET') {
      this.sendError(res, 405, 'Method not allowed', 'METHOD_NOT_ALLOWED');
      return;
    }

    try {
      switch (path) {
        case '/':
        case '/api':
          this.sendJSON(res, this.getAPIInfo());
          break;

        case '/api/health':
          this.sendJSON(res, this.getHealth());
          break;

        case '/api/signals': {
          const limit = parseInt(url.searchParams.get('limit') || '20', 10);
          this.sendJSON(res, this.getSignals(Number.isNaN(limit) ? 20 : limit));
          break;
        }

        default:
          if (path.startsWith(ANALYZE_PREFIX)) {
            const conditionId = decodeURIComponent(path.slice(ANALYZE_PREFIX.length));
            if (!conditionId) {
              this.sendError(res, 400, 'Condition ID required', 'MISSING_CONDITION_ID');
              break;
            }

            const query = analyzeQuerySchema.safeParse({
              bankroll: url.searchParams.get('bankroll') ?? undefined,
              fraction: url.searchParams.get('fraction') ?? undefined,
            });
            if (!query.success) {
              const issue = query.error.issues[0];
              const message = issue ? `${issue.path.join('.')}: ${issue.message}` : 'Invalid query';
              this.sendError(res, 400, message, 'INVALID_INPUT');
              break;
            }

            const analysis = await this.analyzeMarket(conditionId, query.data.bankroll, query.data.fraction);
            if (analysis) {
              this.sendJSON(res, analysis);
            } else {
              this.sendError(res, 404, 'Market not found', 'NOT_FOUND');
            }
            break;
          }
          this.sendError(res, 404, 'Endpoint not found', 'NOT_FOUND');
      }
    } catch (error) {
      if (isInvalidInput(error)) {
        this.sendError(res, 400, error.message, error.code);
        return;
      }
      console.error('[API] Error:', error);
      this.sendError(res, 500, 'Internal server error', 'INTERNAL_ERROR');
    }
  }

  private async analyzeMarket(
    conditionId: string,
    bankroll = this.config.defaultBankroll,
    fraction = this.config.kellyFraction
  ): Promise<AnalyzeResponse | null> {
    const market = await this.deps.markets.fetchMarket(conditionId);
    if (!market) return null;

    const trades = await this.deps.markets.fetchMarketTrades(market.conditionId).catch((error: unknown) => {
      console.warn(`[API] No trades for ${market.conditionId}: ${errorMessage(error)}`);
      return [];
    });

    const snapshot = buildSnapshot(market, trades, {
      whaleMinTradeUsd: this.config.whaleMinTradeUsd,
      significantVolumeUsd: this.config.significantVolumeUsd,
    });

    const analysis = await this.deps.orchestrator.analyze(snapshot, bankroll, fraction);
    return { bankroll, fraction, analysis };
  }

  private sendJSON(res: ServerResponse, data: unknown): void {
    res.setHeader('Content-Type', 'application/json');
    res.writeHead(200);
    res.end(JSON.stringify(data, null, 2));
  }

  private sendError(res: ServerResponse, status: number, message: string, code: string): void {
    const error: ErrorResponse = {
      error: message,
      code,
      timestamp: Date.now(),
    };
    res.setHeader('Content-Type', 'application/json');
    res.writeHead(status);
    res.end(JSON.stringify(error));
  }

  private getAPIInfo(): APIInfoResponse {
    return {
      name: 'Market Edge Analytics API',
      version: '0.1.0',
      endpoints: [
        { path: '/api/health', description: 'Health check' },
        { path: '/api/analyze/:conditionId', description: 'Deep analysis for one market (use ?bankroll=N&fraction=F)' },
        { path: '/api/signals', description: 'Latest scanner signals by confidence (use ?limit=N)' },
        { path: '/ws', description: 'WebSocket feed of new signals' },
      ],
    };
  }

  private getHealth(): HealthResponse {
    const lastScan = this.deps.scanner.getLastScan();
    const checks = {
      scanner: this.deps.scanner.getLastError() === null,
      marketData: !lastScan || lastScan.marketsListed === 0 || lastScan.failed < lastScan.marketsListed,
    };

    const allHealthy = Object.values(checks).every((v) => v);
    const anyHealthy = Object.values(checks).some((v) => v);

    return {
      status: allHealthy ? 'healthy' : anyHealthy ? 'degraded' : 'unhealthy',
      checks,
      uptime: Date.now() - this.startTime,
      timestamp: Date.now(),
    };
  }

  private getSignals(limit: number): SignalsResponse {
    const capped = Math.min(Math.max(limit, 1), MAX_SIGNALS);
    const signals = this.deps.scanner.getTopSignals(capped).map(toSignalSummary);

    return {
      signals,
      count: signals.length,
      lastScan: this.deps.scanner.getLastScan(),
      timestamp: Date.now(),
    };
  }
}
