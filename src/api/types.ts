/**
 * API Response Types
 */

import type { DeepAnalysisResult } from '../analysis/types.js';
import type { ScanSummary } from '../scanner/scanner.js';

export interface HealthResponse {
  status: 'healthy' | 'degraded' | 'unhealthy';
  checks: {
    scanner: boolean;
    marketData: boolean;
  };
  uptime: number;
  timestamp: number;
}

export interface ErrorResponse {
  error: string;
  code: string;
  timestamp: number;
}

export interface EndpointInfo {
  path: string;
  description: string;
}

export interface APIInfoResponse {
  name: string;
  version: string;
  endpoints: EndpointInfo[];
}

// Compact row for signal listings
export interface SignalSummary {
  conditionId: string;
  question: string;
  side: DeepAnalysisResult['recommendedSide'];
  marketPrice: number;
  modelProbability: number;
  edge: number;
  confidence: number;
  kellyPct: number;
  analyzedAt: number;
}

export interface SignalsResponse {
  signals: SignalSummary[];
  count: number;
  lastScan: ScanSummary | null;
  timestamp: number;
}

export interface AnalyzeResponse {
  bankroll: number;
  fraction: number;
  analysis: DeepAnalysisResult;
}

// WebSocket messages pushed to clients
export type WSMessage =
  | { type: 'connected'; timestamp: number }
  | { type: 'analysis'; data: DeepAnalysisResult }
  | { type: 'scanComplete'; data: ScanSummary };
