/**
 * 재작성 결과 검증기
 *
 * 순서대로 검사하고 처음 실패한 항목을 사유로 반환합니다.
 * 1. malformed-response: 조각이 없거나 빈 조각
 * 2. over-limit: limit 초과 조각 (정확성에 필요한 유일한 검사)
 * 3. wrong-language: 원문과 다른 어족
 * 4. content-drift: 핵심어 보존 비율 미달
 */

import { countWords } from '@/utils/wordCounter';
import { detectLanguage, isStopword } from '@/utils/languageDetector';
import type { RewriteCandidate, ValidationVerdict } from './types';
import { DEFAULT_PIPELINE_CONFIG } from './types';

export interface ValidatorOptions {
  /** 0~1, 원문 핵심어 중 결과에 남아야 하는 비율 */
  minContentOverlap?: number | undefined;
}

const MIN_SIGNIFICANT_LENGTH = 4;

/**
 * 핵심어 추출: 4자 이상, 불용어 제외, 소문자
 */
export function significantWords(text: string): Set<string> {
  const words = text
    .toLowerCase()
    .split(/[^\p{L}\p{N}]+/u)
    .filter((word) => word.length >= MIN_SIGNIFICANT_LENGTH && !isStopword(word));
  return new Set(words);
}

/**
 * 원문 핵심어 중 후보에 남아 있는 비율 (원문 핵심어가 없으면 1)
 */
export function contentOverlap(original: string, candidate: string): number {
  const originalWords = significantWords(original);
  if (originalWords.size === 0) return 1;

  const candidateWords = significantWords(candidate);
  let shared = 0;
  for (const word of originalWords) {
    if (candidateWords.has(word)) shared++;
  }
  return shared / originalWords.size;
}

export function validateCandidate(
  original: string,
  candidate: RewriteCandidate,
  limit: number,
  options: ValidatorOptions = {},
): ValidationVerdict {
  const { fragments } = candidate;

  if (fragments.length === 0) {
    return { accepted: false, reason: 'malformed-response', detail: 'no fragments' };
  }
  const emptyIndex = fragments.findIndex((fragment) => countWords(fragment) === 0);
  if (emptyIndex !== -1) {
    return { accepted: false, reason: 'malformed-response', detail: `fragment ${emptyIndex + 1} is empty` };
  }

  for (let i = 0; i < fragments.length; i++) {
    const words = countWords(fragments[i] ?? '');
    if (words > limit) {
      return {
        accepted: false,
        reason: 'over-limit',
        detail: `fragment ${i + 1} has ${words} words (limit ${limit})`,
      };
    }
  }

  // 조각마다 판정: 짧아서 판정할 수 없는 조각은 통과
  const originalLanguage = detectLanguage(original);
  if (originalLanguage) {
    for (let i = 0; i < fragments.length; i++) {
      const fragmentLanguage = detectLanguage(fragments[i] ?? '');
      if (fragmentLanguage && fragmentLanguage.family !== originalLanguage.family) {
        return {
          accepted: false,
          reason: 'wrong-language',
          detail: `fragment ${i + 1}: expected ${originalLanguage.family}, got ${fragmentLanguage.family}`,
        };
      }
    }
  }

  const joined = fragments.join(' ');

  const minOverlap = options.minContentOverlap ?? DEFAULT_PIPELINE_CONFIG.minContentOverlap;
  const overlap = contentOverlap(original, joined);
  if (overlap < minOverlap) {
    return {
      accepted: false,
      reason: 'content-drift',
      detail: `content overlap ${overlap.toFixed(2)} below ${minOverlap}`,
    };
  }

  return { accepted: true };
}
