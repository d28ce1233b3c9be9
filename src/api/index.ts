/**
 * API Module
 *
 * REST and WebSocket surface over the analysis pipeline.
 */

export { APIServer, toSignalSummary, type APIServerConfig, type APIServerDependencies } from './server.js';
export type {
  HealthResponse,
  ErrorResponse,
  APIInfoResponse,
  EndpointInfo,
  SignalSummary,
  SignalsResponse,
  AnalyzeResponse,
  WSMessage,
} from './types.js';
