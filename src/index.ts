export {
  startRewriteRun,
  rewriteSentences,
  followRewriteRun,
  type RewriteRun,
  type RewriteRunParams,
  type RewriteRunResult,
  type RewriteProgressEvent,
} from './ai/rewrite/orchestrator';
export { RewriteCache, normalizeCacheKey, DEFAULT_CACHE_CAPACITY, type CacheStats } from './ai/rewrite/rewriteCache';
export { routeSentence } from './ai/rewrite/router';
export { chunkSentence } from './ai/rewrite/chunker';
export { scheduleBatches, classifyComplexity } from './ai/rewrite/batchScheduler';
export { validateCandidate, contentOverlap } from './ai/rewrite/validator';
export { OracleClient, type OracleCallResult, type CredentialCheckResult } from './ai/rewrite/oracleClient';
export {
  createRewritingOracle,
  ChatModelOracle,
  EchoOracle,
  type RewritingOracle,
  type OracleResponse,
  type OracleSubmitOptions,
} from './ai/rewrite/oracle';
export {
  TransientOracleError,
  FatalOracleError,
  PipelineConfigError,
  classifyOracleError,
  type OracleError,
} from './ai/rewrite/errors';
export { estimateRunCost, estimateCallCost } from './ai/rewrite/cost';
export { buildExportRows, buildProcessingLog, type ExportRow, type ProcessingLogRow } from './ai/rewrite/exportRows';
export { summarizeMetrics, formatMetricsSummary, type MetricsSummary } from './ai/rewrite/metricsSummary';
export { RewriteRunOptionsSchema, type RewritePipelineOverrides } from './ai/rewrite/options';
export { DEFAULT_PIPELINE_CONFIG, createCandidate } from './ai/rewrite/types';
export type {
  ProcessingMode,
  SentenceResultRecord,
  RewriteCandidate,
  ValidationVerdict,
  RejectionReason,
  CostRates,
  RewritePipelineConfig,
} from './ai/rewrite/types';
export { createRunMetricsStore, snapshotRunMetrics, type RunMetricsSnapshot } from './stores/runMetricsStore';
export { aiConfigStore } from './stores/aiConfigStore';
export { getAiConfig, getCostRates, getRewriteDefaults, MODEL_PRESETS, type AiConfig, type AiProvider } from './ai/config';
export { cleanSentence } from './utils/textCleaner';
export { countWords, splitWords } from './utils/wordCounter';
export { detectLanguage } from './utils/languageDetector';
