/**
 * 재작성 프롬프트 구성
 */

import { HumanMessage, SystemMessage, type BaseMessage } from '@langchain/core/messages';
import type { BatchComplexityClass, RejectionReason } from '../types';

const REJECTION_HINTS: Record<RejectionReason, string> = {
  'over-limit': 'at least one output sentence had too many words',
  'wrong-language': 'the output was not in the language of the original sentence',
  'content-drift': 'the output lost or changed the meaning of the original sentence',
  'malformed-response': 'the output could not be read',
};

const COMPLEXITY_HINTS: Record<BatchComplexityClass, string> = {
  simple: 'These sentences are only slightly too long: two short sentences are usually enough.',
  medium: 'These sentences are long: split them into two or three short sentences.',
  complex: 'These sentences are very long: use as many short sentences as needed, keeping every idea.',
};

export interface RewritePromptOptions {
  strict?: boolean | undefined;
  rejectionReason?: RejectionReason | undefined;
  complexity?: BatchComplexityClass | undefined;
}

export function buildRewriteSystemPrompt(limit: number, options: RewritePromptOptions = {}): string {
  const lines: string[] = [
    'You rewrite long sentences into several shorter, natural sentences.',
    '',
    'Rules:',
    `- Every output sentence must contain at most ${limit} words. Words are separated by spaces.`,
    '- Write in the same language as the original sentence. Never translate.',
    '- Keep the meaning and the key words of the original. Do not add information.',
    '- Keep names, numbers and quotations as they are.',
    '',
    'Output: return only one JSON object, with no markdown and no explanation:',
    '{"results":[{"index":1,"fragments":["first short sentence","second short sentence"]}]}',
    '- Return exactly one result per input sentence, using the same index.',
  ];

  if (options.complexity) {
    lines.push('', COMPLEXITY_HINTS[options.complexity]);
  }

  if (options.strict) {
    const hint = options.rejectionReason ? REJECTION_HINTS[options.rejectionReason] : 'it did not follow the rules';
    lines.push(
      '',
      `STRICT MODE: a previous rewrite of this sentence was rejected because ${hint}.`,
      `Count the words of every output sentence. Each one MUST have ${limit} words or fewer.`,
    );
  }

  return lines.join('\n');
}

/**
 * 입력 문장을 "1) 문장" 형식으로 나열
 */
export function formatNumberedSentences(sentences: readonly string[]): string {
  return sentences.map((sentence, i) => `${i + 1}) ${sentence}`).join('\n');
}

export function buildRewriteMessages(
  sentences: readonly string[],
  limit: number,
  options: RewritePromptOptions = {},
): BaseMessage[] {
  return [
    new SystemMessage(buildRewriteSystemPrompt(limit, options)),
    new HumanMessage(
      [`Rewrite each sentence below (limit: ${limit} words per sentence).`, '', formatNumberedSentences(sentences)].join(
        '\n',
      ),
    ),
  ];
}
