import { describe, it, expect } from 'vitest';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import { buildRewriteMessages, buildRewriteSystemPrompt, formatNumberedSentences } from './prompt';

describe('formatNumberedSentences', () => {
  it('1부터 번호를 붙임', () => {
    expect(formatNumberedSentences(['Il dort.', 'Elle lit.'])).toBe('1) Il dort.\n2) Elle lit.');
  });
});

describe('buildRewriteSystemPrompt', () => {
  it('단어 수 제한을 명시', () => {
    expect(buildRewriteSystemPrompt(8)).toContain('- Every output sentence must contain at most 8 words.');
  });

  it('기본 프롬프트에는 strict 지시가 없음', () => {
    expect(buildRewriteSystemPrompt(8)).not.toContain('STRICT MODE');
  });

  it('strict 모드는 거부 사유를 포함', () => {
    const prompt = buildRewriteSystemPrompt(5, { strict: true, rejectionReason: 'over-limit' });
    expect(prompt).toContain(
      'STRICT MODE: a previous rewrite of this sentence was rejected because at least one output sentence had too many words.',
    );
    expect(prompt).toContain('Each one MUST have 5 words or fewer.');
  });

  it('복잡도 힌트', () => {
    expect(buildRewriteSystemPrompt(8, { complexity: 'complex' })).toContain(
      'These sentences are very long: use as many short sentences as needed, keeping every idea.',
    );
  });
});

describe('buildRewriteMessages', () => {
  it('system + human 메시지', () => {
    const messages = buildRewriteMessages(['Il dort.'], 8);
    expect(messages).toHaveLength(2);
    expect(messages[0]).toBeInstanceOf(SystemMessage);
    expect(messages[1]).toBeInstanceOf(HumanMessage);
    expect(messages[1]?.content).toBe('Rewrite each sentence below (limit: 8 words per sentence).\n\n1) Il dort.');
  });
});
