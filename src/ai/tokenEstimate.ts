/**
 * 텍스트 기반 토큰 수 추정
 * - 영어: 약 4자 = 1토큰
 * - 악센트가 많은 로망스어: 약 3자 = 1토큰
 * - 프롬프트/JSON 구조 오버헤드 약 20% 추가
 */
export function estimateTokenCount(text: string): number {
  if (text.length === 0) return 0;
  const estimatedTokens = Math.ceil(text.length / 3);
  return Math.ceil(estimatedTokens * 1.2);
}

/**
 * 여러 텍스트의 토큰 수 합계
 */
export function estimateTotalTokens(texts: readonly string[]): number {
  return texts.reduce((sum, text) => sum + estimateTokenCount(text), 0);
}
