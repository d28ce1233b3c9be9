export { buildWhaleFlow, WHALE_FLOW_THRESHOLDS } from './whale-flow.js';
export type { WhaleFlowOptions } from './whale-flow.js';
export {
  calculateSignalScore,
  scoreBreakdown,
  relativeChange,
  whaleScore,
  volumeScore,
  trendScore,
  liquidityScore,
  timeScore,
} from './signal-score.js';
export type { SignalScoreInput, SignalScoreBreakdown } from './signal-score.js';
export { buildSnapshot, daysUntil } from './snapshot.js';
export type { SnapshotOptions } from './snapshot.js';
