/**
 * OCR 추출 문장 정리 유틸리티
 *
 * 재작성 전에 OCR 잡음을 보수적으로 정리합니다.
 * 단어를 바꾸거나 지우지 않고, 끊어진 단어/따옴표/공백만 복원합니다.
 */

/**
 * 유니코드 따옴표/공백 정규화 패턴
 */
export const CLEANUP_PATTERNS = {
  // 곡선 작은따옴표 → 직선 '
  singleQuotes: /[\u2018\u2019\u201B\u2032]/g,
  // 곡선 큰따옴표, 프랑스식 겹화살괄호 → 직선 "
  doubleQuotes: /[\u201C\u201D\u201E\u00AB\u00BB]/g,
  // 특수 공백 (non-breaking space, narrow nbsp 등)
  specialSpaces: /[\u00A0\u2007\u202F]/g,
  // 줄바꿈을 넘어 하이픈으로 끊어진 단어: "philo-\n sophe"
  hyphenLineBreak: /([\p{L}\p{N}])[-\u2011\u00AD]\s*[\r\n]+\s*([\p{L}\p{N}])/gu,
  // 공백 사이로 끊어진 단어: "gâ- teaux"
  hyphenSpace: /([\p{L}\p{N}])[-\u2011\u00AD][ \t]+([\p{L}\p{N}])/gu,
  // 띄어 쓴 축약: "l ' été" → "l'été"
  spacedElision: /\b(qu|[cdjlmnst])\s*'\s+(?=\p{L})/giu,
} as const;

/**
 * 따옴표/공백 문자만 정규화 (단어 경계 유지)
 */
export function normalizeQuotesAndSpaces(text: string): string {
  return text
    .replace(CLEANUP_PATTERNS.specialSpaces, ' ')
    .replace(CLEANUP_PATTERNS.singleQuotes, "'")
    .replace(CLEANUP_PATTERNS.doubleQuotes, '"');
}

/**
 * 재작성 전 문장 정리
 *
 * 1. 줄바꿈/공백으로 끊어진 하이픈 단어 복원
 * 2. 따옴표, 아포스트로피, 특수 공백 정규화
 * 3. 띄어 쓴 축약(élision) 복원
 * 4. 연속 공백 → 단일 공백
 */
export function cleanSentence(text: string): string {
  if (!text) return '';

  return normalizeQuotesAndSpaces(
    text
      .replace(CLEANUP_PATTERNS.hyphenLineBreak, '$1$2')
      .replace(CLEANUP_PATTERNS.hyphenSpace, '$1$2'),
  )
    .replace(CLEANUP_PATTERNS.spacedElision, "$1'")
    .replace(/\s+/g, ' ')
    .trim();
}
