export { AnalysisScanner } from './scanner.js';
export type { ScannerConfig, ScannerEvents, ScanSummary, ScannerFeed, ScannerAnalyzer } from './scanner.js';
