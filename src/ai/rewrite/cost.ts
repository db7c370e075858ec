/**
 * 비용 추정 (정확성과 무관, 표시용)
 */

import { estimateTokenCount } from '@/ai/tokenEstimate';
import { countWords } from '@/utils/wordCounter';
import { buildRewriteSystemPrompt } from './oracle/prompt';
import { routeSentence } from './router';
import { DEFAULT_PIPELINE_CONFIG, type CostRates, type TokenUsage } from './types';

export const ZERO_COST_RATES: CostRates = { inputPer1M: 0, outputPer1M: 0 };

export function estimateCallCost(usage: TokenUsage, rates: CostRates): number {
  return (usage.inputTokens * rates.inputPer1M + usage.outputTokens * rates.outputPer1M) / 1_000_000;
}

export interface RunCostEstimate {
  /** 오라클로 보낼 문장 수 */
  oracleSentences: number;
  inputTokens: number;
  outputTokens: number;
  cost: number;
}

/**
 * 실행 전 비용 추정
 * 오라클 후보 문장만 계산하며, 배치당 시스템 프롬프트는 batchSize 문장마다 한 번으로 봅니다.
 */
export function estimateRunCost(
  sentences: readonly string[],
  limit: number,
  rates: CostRates,
  options: { batchSize?: number | undefined; outputTokenFactor?: number | undefined } = {},
): RunCostEstimate {
  const batchSize = Math.max(1, options.batchSize ?? DEFAULT_PIPELINE_CONFIG.batchSizes.medium);
  const outputFactor = options.outputTokenFactor ?? DEFAULT_PIPELINE_CONFIG.outputTokenFactor;

  const candidates = sentences.filter(
    (sentence) => routeSentence(sentence, limit, { wordCount: countWords(sentence) }) === 'oracle-candidate',
  );
  if (candidates.length === 0) {
    return { oracleSentences: 0, inputTokens: 0, outputTokens: 0, cost: 0 };
  }

  const sentenceTokens = candidates.reduce((sum, sentence) => sum + estimateTokenCount(sentence), 0);
  const batches = Math.ceil(candidates.length / batchSize);
  const inputTokens = sentenceTokens + batches * estimateTokenCount(buildRewriteSystemPrompt(limit));
  const outputTokens = Math.ceil(sentenceTokens * outputFactor);

  return {
    oracleSentences: candidates.length,
    inputTokens,
    outputTokens,
    cost: estimateCallCost({ inputTokens, outputTokens }, rates),
  };
}
