/**
 * 불용어 프로필 기반 언어 감지
 *
 * 문장에 나타난 불용어(관사, 전치사, 대명사 등)를 언어별로 세어
 * 가장 많이 맞는 언어와 어족(family)을 추정합니다.
 * - 짧은 텍스트(2토큰 미만)나 불용어가 없는 텍스트는 판정하지 않음 (null)
 * - 같은 어족 안에서 동점이면 어족만 판정 (language = null)
 */

import { z } from 'zod';
import stopwordData from './data/stopwords.json';

export type LanguageFamily = 'romance' | 'germanic';

const StopwordDataSchema = z.object({
  languages: z.record(
    z.string(),
    z.object({
      family: z.enum(['romance', 'germanic']),
      stopwords: z.array(z.string()).min(1),
    }),
  ),
});

interface LanguageProfile {
  language: string;
  family: LanguageFamily;
  stopwords: ReadonlySet<string>;
}

const PROFILES: LanguageProfile[] = Object.entries(
  StopwordDataSchema.parse(stopwordData).languages,
).map(([language, entry]) => ({
  language,
  family: entry.family,
  stopwords: new Set(entry.stopwords),
}));

const ALL_STOPWORDS: ReadonlySet<string> = new Set(
  PROFILES.flatMap((profile) => [...profile.stopwords]),
);

/** 판정에 필요한 최소 토큰 수 */
export const MIN_DETECTION_TOKENS = 2;

export interface LanguageGuess {
  /** 언어 코드 (같은 어족 내 동점이면 null) */
  language: string | null;
  family: LanguageFamily;
  /** 최고 점수 (매칭된 불용어 수) */
  score: number;
}

/**
 * 글자 단위 토큰 분리 (소문자, 아포스트로피/구두점 기준 분리)
 * "l'été" → ["l", "été"]
 */
export function tokenizeLetters(text: string): string[] {
  return text
    .toLowerCase()
    .split(/[^\p{L}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * 언어 감지
 *
 * @returns 판정 불가 시 null
 */
export function detectLanguage(text: string): LanguageGuess | null {
  const tokens = tokenizeLetters(text);
  if (tokens.length < MIN_DETECTION_TOKENS) return null;

  let best = 0;
  let leaders: LanguageProfile[] = [];

  for (const profile of PROFILES) {
    let score = 0;
    for (const token of tokens) {
      if (profile.stopwords.has(token)) score += 1;
    }
    if (score > best) {
      best = score;
      leaders = [profile];
    } else if (score === best && score > 0) {
      leaders.push(profile);
    }
  }

  const first = leaders[0];
  if (!first || best === 0) return null;

  // 서로 다른 어족끼리 동점이면 판정하지 않음
  if (leaders.some((profile) => profile.family !== first.family)) return null;

  return {
    language: leaders.length === 1 ? first.language : null,
    family: first.family,
    score: best,
  };
}

/**
 * 모든 언어 프로필 기준 불용어 여부
 */
export function isStopword(word: string): boolean {
  return ALL_STOPWORDS.has(word.toLowerCase());
}

/**
 * 지원 언어 코드 목록
 */
export function supportedLanguages(): string[] {
  return PROFILES.map((profile) => profile.language);
}
