import { describe, it, expect } from 'vitest';
import { classifyComplexity, estimateSentenceTokens, scheduleBatches } from './batchScheduler';
import { DEFAULT_PIPELINE_CONFIG, type SentenceTask } from './types';

function task(index: number, wordCount: number, text = 'aaaaaaaaa'): SentenceTask {
  return { index, text, wordCount, status: 'routed-oracle' };
}

describe('classifyComplexity', () => {
  it('limit 8 기준 경계 12/18', () => {
    expect(classifyComplexity(9, 8)).toBe('simple');
    expect(classifyComplexity(12, 8)).toBe('simple');
    expect(classifyComplexity(13, 8)).toBe('medium');
    expect(classifyComplexity(18, 8)).toBe('medium');
    expect(classifyComplexity(19, 8)).toBe('complex');
  });
});

describe('estimateSentenceTokens', () => {
  it('입력 추정에 출력 배수를 더함', () => {
    // ceil(ceil(9/3) * 1.2) = 4, ceil(4 * 2.3) = 10
    expect(estimateSentenceTokens('aaaaaaaaa')).toBe(10);
  });
});

describe('scheduleBatches', () => {
  it('빈 입력은 빈 배치 목록', () => {
    expect(scheduleBatches([], 8)).toEqual([]);
  });

  it('복잡도별 목표 크기로 묶음', () => {
    const simple = Array.from({ length: 25 }, (_, i) => task(i, 10));
    const batches = scheduleBatches(simple, 8);
    expect(batches.map((b) => b.tasks.length)).toEqual([20, 5]);
    expect(batches.every((b) => b.complexity === 'simple')).toBe(true);

    const complex = Array.from({ length: 7 }, (_, i) => task(i, 25));
    expect(scheduleBatches(complex, 8).map((b) => b.tasks.length)).toEqual([5, 2]);
  });

  it('배치 안 입력 순서 유지, 배치는 첫 문장 순서', () => {
    const batches = scheduleBatches([task(2, 9), task(1, 20), task(0, 10), task(3, 14)], 8);
    expect(batches.map((b) => ({ id: b.id, complexity: b.complexity, indices: b.tasks.map((t) => t.index) }))).toEqual([
      { id: 'batch-1', complexity: 'simple', indices: [0, 2] },
      { id: 'batch-2', complexity: 'complex', indices: [1] },
      { id: 'batch-3', complexity: 'medium', indices: [3] },
    ]);
  });

  it('토큰 상한을 넘으면 일찍 닫음', () => {
    const config = { ...DEFAULT_PIPELINE_CONFIG, maxBatchTokens: 20 };
    const batches = scheduleBatches(Array.from({ length: 5 }, (_, i) => task(i, 10)), 8, config);
    expect(batches.map((b) => b.tasks.length)).toEqual([2, 2, 1]);
    expect(batches.map((b) => b.estimatedTokens)).toEqual([20, 20, 10]);
  });

  it('상한보다 큰 문장도 단독 배치로 처리', () => {
    const config = { ...DEFAULT_PIPELINE_CONFIG, maxBatchTokens: 5 };
    const batches = scheduleBatches([task(0, 10), task(1, 10)], 8, config);
    expect(batches.map((b) => b.tasks.length)).toEqual([1, 1]);
  });
});
