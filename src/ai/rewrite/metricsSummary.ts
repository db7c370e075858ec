/**
 * 실행 지표 요약
 */

import type { RunMetricsSnapshot } from '@/stores/runMetricsStore';

export interface MetricsSummary {
  totalSentences: number;
  directPassThroughs: number;
  oracleSuccesses: number;
  cacheHits: number;
  mechanicalRoutes: number;
  mechanicalFallbacks: number;
  unprocessed: number;
  oracleCalls: number;
  failedOracleCalls: number;
  inputTokens: number;
  outputTokens: number;
  estimatedCost: number;
  costPerSentence: number;
  /** 0~1 */
  cacheHitRate: number;
  sentencesPerSecond: number;
  averageBatchSize: number;
  averageBatchMs: number;
  elapsedMs: number;
}

function average(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}

export function summarizeMetrics(snapshot: RunMetricsSnapshot): MetricsSummary {
  const seconds = snapshot.elapsedMs / 1000;
  return {
    totalSentences: snapshot.sentencesSeen,
    directPassThroughs: snapshot.directPassThroughs,
    oracleSuccesses: snapshot.oracleSuccesses,
    cacheHits: snapshot.cacheHits,
    mechanicalRoutes: snapshot.mechanicalRoutes,
    mechanicalFallbacks: snapshot.mechanicalFallbacks,
    unprocessed: snapshot.unprocessed,
    oracleCalls: snapshot.oracleCalls,
    failedOracleCalls: snapshot.failedOracleCalls,
    inputTokens: snapshot.inputTokens,
    outputTokens: snapshot.outputTokens,
    estimatedCost: snapshot.estimatedCost,
    costPerSentence: snapshot.sentencesSeen > 0 ? snapshot.estimatedCost / snapshot.sentencesSeen : 0,
    cacheHitRate: snapshot.cacheHitRate,
    sentencesPerSecond: seconds > 0 ? snapshot.sentencesSeen / seconds : 0,
    averageBatchSize: average(snapshot.batches.map((b) => b.size)),
    averageBatchMs: average(snapshot.batches.map((b) => b.durationMs)),
    elapsedMs: snapshot.elapsedMs,
  };
}

export function formatMetricsSummary(summary: MetricsSummary): string[] {
  const lines = [
    `Sentences: ${summary.totalSentences} (direct ${summary.directPassThroughs}, oracle ${summary.oracleSuccesses}, ` +
      `cache ${summary.cacheHits}, mechanical ${summary.mechanicalRoutes}, fallback ${summary.mechanicalFallbacks})`,
    `Oracle calls: ${summary.oracleCalls} (failed ${summary.failedOracleCalls}), tokens in/out: ${summary.inputTokens}/${summary.outputTokens}`,
    `Estimated cost: $${summary.estimatedCost.toFixed(4)} ($${summary.costPerSentence.toFixed(6)} per sentence)`,
    `Cache hit rate: ${(summary.cacheHitRate * 100).toFixed(1)}%`,
    `Throughput: ${summary.sentencesPerSecond.toFixed(2)} sentences/s, ` +
      `avg batch ${summary.averageBatchSize.toFixed(1)} sentences in ${Math.round(summary.averageBatchMs)}ms`,
  ];
  if (summary.unprocessed > 0) {
    lines.push(`Unprocessed (cancelled): ${summary.unprocessed}`);
  }
  return lines;
}
