/**
 * 오라클 배치 스케줄러
 *
 * 복잡도(단어 수) 별로 문장을 묶어 배치를 만듭니다.
 * - 복잡할수록 작은 배치 (실패 시 영향 범위와 출력 토큰을 제한)
 * - 배치 추정 토큰이 상한을 넘으면 일찍 닫음
 * - 배치 안의 문장은 입력 순서 유지, 배치는 첫 문장 index 순
 */

import { estimateTokenCount } from '@/ai/tokenEstimate';
import type { BatchComplexityClass, RewriteBatch, RewritePipelineConfig, SentenceTask } from './types';
import { DEFAULT_PIPELINE_CONFIG } from './types';

export type SchedulerConfig = Pick<
  RewritePipelineConfig,
  'mediumThresholdFactor' | 'complexThresholdFactor' | 'batchSizes' | 'maxBatchTokens' | 'outputTokenFactor'
>;

const COMPLEXITY_ORDER: BatchComplexityClass[] = ['simple', 'medium', 'complex'];

export function classifyComplexity(
  wordCount: number,
  limit: number,
  config: SchedulerConfig = DEFAULT_PIPELINE_CONFIG,
): BatchComplexityClass {
  if (wordCount <= config.mediumThresholdFactor * limit) return 'simple';
  if (wordCount <= config.complexThresholdFactor * limit) return 'medium';
  return 'complex';
}

/**
 * 문장 하나의 입력+출력 추정 토큰
 */
export function estimateSentenceTokens(text: string, config: SchedulerConfig = DEFAULT_PIPELINE_CONFIG): number {
  return Math.ceil(estimateTokenCount(text) * (1 + config.outputTokenFactor));
}

export function scheduleBatches(
  tasks: readonly SentenceTask[],
  limit: number,
  config: SchedulerConfig = DEFAULT_PIPELINE_CONFIG,
): RewriteBatch[] {
  const groups = new Map<BatchComplexityClass, SentenceTask[]>();
  for (const task of [...tasks].sort((a, b) => a.index - b.index)) {
    const complexity = classifyComplexity(task.wordCount, limit, config);
    const group = groups.get(complexity) ?? [];
    group.push(task);
    groups.set(complexity, group);
  }

  const batches: Omit<RewriteBatch, 'id'>[] = [];

  for (const complexity of COMPLEXITY_ORDER) {
    const group = groups.get(complexity);
    if (!group) continue;

    const maxSize = Math.max(1, config.batchSizes[complexity]);
    let current: SentenceTask[] = [];
    let currentTokens = 0;

    for (const task of group) {
      const tokens = estimateSentenceTokens(task.text, config);
      const full = current.length >= maxSize;
      const overBudget = current.length > 0 && currentTokens + tokens > config.maxBatchTokens;

      if (full || overBudget) {
        batches.push({ complexity, tasks: current, estimatedTokens: currentTokens });
        current = [];
        currentTokens = 0;
      }
      current.push(task);
      currentTokens += tokens;
    }
    if (current.length > 0) {
      batches.push({ complexity, tasks: current, estimatedTokens: currentTokens });
    }
  }

  return batches
    .sort((a, b) => (a.tasks[0]?.index ?? 0) - (b.tasks[0]?.index ?? 0))
    .map((batch, i) => ({ id: `batch-${i + 1}`, ...batch }));
}
