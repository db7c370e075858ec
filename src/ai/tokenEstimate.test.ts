import { describe, it, expect } from 'vitest';
import { estimateTokenCount, estimateTotalTokens } from './tokenEstimate';

describe('estimateTokenCount', () => {
  it('빈 문자열은 0', () => {
    expect(estimateTokenCount('')).toBe(0);
  });

  it('3자당 1토큰 + 20% 오버헤드', () => {
    // ceil(8 / 3) = 3, ceil(3 * 1.2) = 4
    expect(estimateTokenCount('Il dort.')).toBe(4);
    // ceil(30 / 3) = 10, ceil(10 * 1.2) = 12
    expect(estimateTokenCount('a'.repeat(30))).toBe(12);
  });
});

describe('estimateTotalTokens', () => {
  it('텍스트별 추정치의 합', () => {
    expect(estimateTotalTokens(['Il dort.', 'a'.repeat(30), ''])).toBe(16);
  });
});
