export { type CheckOptions, type CheckOutcome, ExitCode, runCheck } from '@/checker';
export { ConfigurationError, isConfigurationError } from '@/errors';
export { type BomExpansion, expandBom, loadBomFile } from '@/features/bomManifest';
export { resolvePath, splitPath } from '@/features/pathResolver';
export {
  parseValuesDocument,
  toValuesNode,
  type ValuesDocument,
  type ValuesNode,
} from '@/features/valuesDocument';
export {
  extractValuesReferences,
  tallyReferences,
  type VariableReference,
} from '@/features/valuesReferenceFeatures';
export { ChartScanner, type FileResult, type ReferenceCheck } from '@/services/chartScanner';
export {
  aggregateResults,
  renderReport,
  type ReportHeader,
  type ReportLine,
  type RunReport,
} from '@/services/reportAggregator';
export { loadValuesFile } from '@/services/valuesLoader';
export { type ChartRoot, type CheckerSettings, defaultSettings, resolveSettings } from '@/types';
export { type LogLevel, type LogSink, Logger, MemorySink } from '@/utils/logger';
