/**
 * 문장 라우터
 *
 * 단어 수 기준으로 처리 경로를 결정합니다. 부작용 없음.
 */

import { countWords } from '@/utils/wordCounter';
import type { ProcessingMode, RouteDecision } from './types';
import { DEFAULT_PIPELINE_CONFIG } from './types';

export interface RouteOptions {
  mode?: ProcessingMode | undefined;
  ceilingMultiplier?: number | undefined;
  /** 미리 계산한 단어 수 (없으면 계산) */
  wordCount?: number | undefined;
}

const LETTER_PATTERN = /\p{L}/u;

/**
 * 숫자/구두점만 있는 문장 (표 행, 번호 목록 등)
 */
export function hasNoLetters(text: string): boolean {
  return !LETTER_PATTERN.test(text);
}

export function routeSentence(text: string, limit: number, options: RouteOptions = {}): RouteDecision {
  const wordCount = options.wordCount ?? countWords(text);
  if (wordCount <= limit) return 'direct';

  const mode = options.mode ?? 'oracle-rewrite';
  if (mode === 'mechanical-only') return 'mechanical';

  const ceiling = (options.ceilingMultiplier ?? DEFAULT_PIPELINE_CONFIG.ceilingMultiplier) * limit;
  if (wordCount > ceiling) return 'mechanical';
  if (hasNoLetters(text)) return 'mechanical';

  return 'oracle-candidate';
}
