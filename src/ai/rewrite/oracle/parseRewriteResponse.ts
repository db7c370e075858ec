/**
 * 오라클 응답 파싱
 *
 * 1차: JSON {"results":[{"index":n,"fragments":[...]}]}
 * 2차: 번호 목록 ("1) 조각" 줄 반복, 같은 번호 = 같은 문장)
 * 문장별로 누락/손상된 항목은 malformed-response 항목으로 반환 (배치 전체 실패 아님)
 */

import { z } from 'zod';
import { createCandidate, type OracleItem, type OracleItemError } from '../types';

const RewriteResultSchema = z.object({
  results: z.array(
    z.object({
      index: z.coerce.number().int(),
      fragments: z.array(z.unknown()),
    }),
  ),
});

const FragmentListSchema = z.array(z.string());

const TextPartSchema = z.object({ text: z.string() });

/**
 * 모델 응답 content → 텍스트 (문자열 또는 text 파트 배열)
 */
export function messageText(content: unknown): string {
  if (typeof content === 'string') return content;
  if (!Array.isArray(content)) return '';
  return content
    .map((part: unknown) => {
      if (typeof part === 'string') return part;
      const textPart = TextPartSchema.safeParse(part);
      return textPart.success ? textPart.data.text : '';
    })
    .filter((text) => text.trim().length > 0)
    .join('\n');
}

/**
 * 코드펜스를 벗기고 첫 '{'부터 마지막 '}'까지
 */
export function locateJsonBlock(raw: string): string | null {
  const unfenced = raw
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/```$/, '');
  const start = unfenced.indexOf('{');
  const end = unfenced.lastIndexOf('}');
  return start !== -1 && end > start ? unfenced.slice(start, end + 1) : null;
}

/**
 * 조각 정리: 앞 번호, 글머리표, 감싼 따옴표 제거
 */
export function cleanFragment(fragment: string): string {
  return fragment
    .trim()
    .replace(/^(?:\d+\s*[).:-]|[-*•])\s+/, '')
    .replace(/^"(.*)"$/s, '$1')
    .replace(/\s+/g, ' ')
    .trim();
}

function malformed(detail: string): OracleItemError {
  return { error: 'malformed-response', detail };
}

type ResultGroups = Map<number, string[] | OracleItemError>;

function toItems(groups: ResultGroups, expectedCount: number): OracleItem[] {
  const items: OracleItem[] = [];
  for (let i = 1; i <= expectedCount; i++) {
    const fragments = groups.get(i);
    if (!fragments) {
      items.push(malformed(`missing result for sentence ${i}`));
      continue;
    }
    if (!Array.isArray(fragments)) {
      items.push(fragments);
      continue;
    }
    const cleaned = fragments.map(cleanFragment).filter((f) => f.length > 0);
    items.push(cleaned.length > 0 ? createCandidate(cleaned, 'oracle') : malformed(`empty result for sentence ${i}`));
  }
  return items;
}

function parseJsonResults(raw: string): ResultGroups | null {
  const block = locateJsonBlock(raw);
  if (!block) return null;

  let parsed: unknown;
  try {
    parsed = JSON.parse(block);
  } catch {
    // JSON이 아니면 번호 목록으로
    return null;
  }

  const result = RewriteResultSchema.safeParse(parsed);
  if (!result.success) return null;

  const groups: ResultGroups = new Map();
  for (const entry of result.data.results) {
    // 같은 index가 두 번 오면 첫 번째만 사용
    if (groups.has(entry.index)) continue;
    const fragments = FragmentListSchema.safeParse(entry.fragments);
    groups.set(
      entry.index,
      fragments.success ? fragments.data : malformed(`non-text fragment in result for sentence ${entry.index}`),
    );
  }
  return groups;
}

const NUMBERED_LINE = /^\s*(\d+)\s*[).:-]\s*(.+)$/;

function parseNumberedLines(raw: string): ResultGroups {
  const groups = new Map<number, string[]>();
  for (const line of raw.split(/\r?\n/)) {
    const match = NUMBERED_LINE.exec(line);
    if (!match) continue;
    const index = Number(match[1]);
    const text = match[2] ?? '';
    const group = groups.get(index) ?? [];
    group.push(text);
    groups.set(index, group);
  }
  return groups;
}

export function parseRewriteResponse(raw: string, expectedCount: number): OracleItem[] {
  const groups = parseJsonResults(raw) ?? parseNumberedLines(raw);
  return toItems(groups, expectedCount);
}
