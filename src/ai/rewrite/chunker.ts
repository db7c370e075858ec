/**
 * 결정적 기계 분할기
 *
 * 오라클 없이 문장을 limit 이하 조각으로 나눕니다.
 * - 단어를 바꾸거나 순서를 바꾸지 않음 (공백만 정규화)
 * - breakpoints: 구두점(, ; :) 뒤와 접속사/관계사 앞을 우선 분할점으로 사용
 * - window: 고정 크기 창
 */

import { splitWords } from '@/utils/wordCounter';
import type { ChunkStrategy } from './types';

/**
 * 이 단어 앞에서 끊는 것을 선호 (프랑스어 접속사/전치사/관계사)
 */
export const BREAK_BEFORE_WORDS: ReadonlySet<string> = new Set([
  'et',
  'mais',
  'ou',
  'car',
  'que',
  'qui',
  'quand',
  'donc',
  'ainsi',
  'avec',
  'dans',
  'pour',
  'par',
  'lorsque',
  'puis',
  'tandis',
]);

const BREAK_AFTER_PATTERN = /[,;:]$/;

function windowChunks(words: readonly string[], limit: number): string[][] {
  const chunks: string[][] = [];
  for (let i = 0; i < words.length; i += limit) {
    chunks.push(words.slice(i, i + limit));
  }
  return chunks;
}

function isBreakWord(word: string): boolean {
  return BREAK_BEFORE_WORDS.has(word.toLowerCase().replace(/^[^\p{L}]+/u, ''));
}

/**
 * 분할 후보 구간으로 나눔
 */
export function splitAtBreakpoints(words: readonly string[]): string[][] {
  const segments: string[][] = [];
  let current: string[] = [];

  for (const word of words) {
    if (current.length > 0 && isBreakWord(word)) {
      segments.push(current);
      current = [];
    }
    current.push(word);
    if (BREAK_AFTER_PATTERN.test(word)) {
      segments.push(current);
      current = [];
    }
  }
  if (current.length > 0) segments.push(current);

  return segments;
}

function packSegments(segments: readonly string[][], limit: number): string[][] {
  const chunks: string[][] = [];
  let current: string[] = [];

  for (const segment of segments) {
    if (segment.length > limit) {
      if (current.length > 0) chunks.push(current);
      const windows = windowChunks(segment, limit);
      const last = windows.pop() ?? [];
      chunks.push(...windows);
      current = last;
      continue;
    }
    if (current.length + segment.length <= limit) {
      current = [...current, ...segment];
    } else {
      if (current.length > 0) chunks.push(current);
      current = [...segment];
    }
  }
  if (current.length > 0) chunks.push(current);

  return chunks;
}

/**
 * 문장을 limit 이하 단어 조각으로 분할
 *
 * 단어가 없으면 빈 배열을 반환합니다.
 */
export function chunkSentence(text: string, limit: number, strategy: ChunkStrategy = 'breakpoints'): string[] {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`limit must be a positive integer, got ${limit}`);
  }

  const words = splitWords(text);
  if (words.length === 0) return [];
  if (words.length <= limit) return [words.join(' ')];

  const chunks = strategy === 'window'
    ? windowChunks(words, limit)
    : packSegments(splitAtBreakpoints(words), limit);

  return chunks.map((chunk) => chunk.join(' '));
}
