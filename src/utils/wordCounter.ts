/**
 * 문장 단어 수 카운팅 유틸리티
 *
 * 공백으로 구분된 토큰 하나를 한 단어로 셉니다.
 * - 구두점이 붙은 토큰("rue,")도 한 단어
 * - 구두점만 있는 토큰("—")도 한 단어 (출력 조각의 길이 제한과 같은 기준)
 * - 언어 구분 없이 동일한 규칙
 */

/**
 * 공백 기준으로 단어 토큰 분리
 * 앞뒤 공백과 연속 공백은 무시합니다.
 */
export function splitWords(text: string): string[] {
  const trimmed = text.trim();
  if (!trimmed) return [];
  return trimmed.split(/\s+/);
}

/**
 * 단어 수 카운팅
 */
export function countWords(text: string): number {
  return splitWords(text).length;
}

/**
 * 조각 목록 중 가장 긴 조각의 단어 수
 */
export function maxFragmentWords(fragments: readonly string[]): number {
  let max = 0;
  for (const fragment of fragments) {
    const n = countWords(fragment);
    if (n > max) max = n;
  }
  return max;
}

/**
 * 모든 조각이 단어 수 제한 이내인지 확인
 */
export function fitsWordLimit(fragments: readonly string[], limit: number): boolean {
  return fragments.every((fragment) => countWords(fragment) <= limit);
}

/**
 * 조각 목록 전체 단어 수
 */
export function totalWords(fragments: readonly string[]): number {
  return fragments.reduce((sum, fragment) => sum + countWords(fragment), 0);
}
