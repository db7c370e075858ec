/**
 * 표 형식 내보내기용 행 구성 (파일 I/O 없음)
 */

import { countWords } from '@/utils/wordCounter';
import type { ResultMethod, SentenceResultRecord } from './types';

export interface ExportRow {
  row: number;
  sentence: string;
  /** showOriginal일 때만, 재작성된 문장의 첫 조각에만 채움 */
  original?: string | undefined;
  method?: ResultMethod | undefined;
  wordCount: number;
}

export interface ProcessingLogRow {
  sentenceNumber: number;
  original: string;
  originalWordCount: number;
  method: ResultMethod;
  outputSentences: string;
  success: boolean;
  error: string;
}

export function buildExportRows(
  records: readonly SentenceResultRecord[],
  options: { showOriginal?: boolean | undefined } = {},
): ExportRow[] {
  const rows: ExportRow[] = [];
  let row = 1;

  for (const record of records) {
    record.outputFragments.forEach((fragment, i) => {
      const base: ExportRow = { row, sentence: fragment, wordCount: countWords(fragment) };
      if (options.showOriginal) {
        const rewritten = record.method !== 'direct';
        base.original = rewritten && i === 0 ? record.originalSentence : '';
        base.method = rewritten ? record.method : undefined;
      }
      rows.push(base);
      row += 1;
    });
  }

  return rows;
}

/**
 * 재작성/분할된 문장만 기록 (direct 제외)
 */
export function buildProcessingLog(records: readonly SentenceResultRecord[]): ProcessingLogRow[] {
  return records
    .filter((record) => record.method !== 'direct')
    .map((record) => ({
      sentenceNumber: record.index + 1,
      original: record.originalSentence,
      originalWordCount: record.wordCount,
      method: record.method,
      outputSentences: record.outputFragments.join(' | '),
      success: record.accepted,
      error: record.reason ?? '',
    }));
}
