import { describe, it, expect } from 'vitest';
import { contentOverlap, significantWords, validateCandidate } from './validator';
import { createCandidate } from './types';

const ORIGINAL = 'Le chat noir dormait paisiblement sur le canapé confortable près de la fenêtre';
const oracle = (...fragments: string[]) => createCandidate(fragments, 'oracle');

describe('significantWords', () => {
  it('4자 이상, 불용어 제외', () => {
    expect([...significantWords(ORIGINAL)].sort()).toEqual([
      'canapé',
      'chat',
      'confortable',
      'dormait',
      'fenêtre',
      'noir',
      'paisiblement',
    ]);
  });
});

describe('contentOverlap', () => {
  it('원문 핵심어가 없으면 1', () => {
    expect(contentOverlap('Il est là.', 'Rien du tout.')).toBe(1);
  });

  it('보존된 핵심어 비율', () => {
    expect(contentOverlap(ORIGINAL, 'Le chat dormait sur le canapé.')).toBeCloseTo(3 / 7);
  });
});

describe('validateCandidate', () => {
  it('올바른 재작성은 통과', () => {
    const verdict = validateCandidate(
      ORIGINAL,
      oracle('Le chat noir dormait paisiblement sur le canapé.', 'Il était confortable près de la fenêtre.'),
      8,
    );
    expect(verdict).toEqual({ accepted: true });
  });

  it('조각이 없으면 malformed-response', () => {
    expect(validateCandidate(ORIGINAL, oracle(), 8)).toEqual({
      accepted: false,
      reason: 'malformed-response',
      detail: 'no fragments',
    });
  });

  it('빈 조각이 있으면 malformed-response', () => {
    expect(validateCandidate(ORIGINAL, oracle('Le chat dort.', '  '), 8)).toEqual({
      accepted: false,
      reason: 'malformed-response',
      detail: 'fragment 2 is empty',
    });
  });

  it('limit 초과 조각은 over-limit', () => {
    const verdict = validateCandidate(
      ORIGINAL,
      oracle('Le chat noir dormait paisiblement sur le canapé confortable', 'près de la fenêtre'),
      8,
    );
    expect(verdict).toEqual({
      accepted: false,
      reason: 'over-limit',
      detail: 'fragment 1 has 9 words (limit 8)',
    });
  });

  it('over-limit이 언어 검사보다 먼저', () => {
    const verdict = validateCandidate(ORIGINAL, oracle('The black cat slept peacefully on the comfortable sofa'), 8);
    expect(verdict.accepted).toBe(false);
    if (!verdict.accepted) expect(verdict.reason).toBe('over-limit');
  });

  it('다른 어족으로 바뀌면 wrong-language', () => {
    const verdict = validateCandidate(
      ORIGINAL,
      oracle('The black cat slept peacefully', 'on the comfortable sofa by the window.'),
      8,
    );
    expect(verdict).toEqual({
      accepted: false,
      reason: 'wrong-language',
      detail: 'fragment 1: expected romance, got germanic',
    });
  });

  it('한 조각만 다른 언어여도 wrong-language', () => {
    const verdict = validateCandidate(
      ORIGINAL,
      oracle('Le chat noir dormait sur le canapé.', 'Il était près de la fenêtre.', 'It was very comfortable.'),
      8,
    );
    expect(verdict).toEqual({
      accepted: false,
      reason: 'wrong-language',
      detail: 'fragment 3: expected romance, got germanic',
    });
  });

  it('판정할 수 없는 짧은 조각은 언어 검사 통과', () => {
    const verdict = validateCandidate(
      ORIGINAL,
      oracle('Le chat noir dormait paisiblement sur le canapé', 'confortable', 'près de la fenêtre'),
      8,
    );
    expect(verdict).toEqual({ accepted: true });
  });

  it('언어 판정이 불가능하면 언어 검사는 통과', () => {
    const verdict = validateCandidate('Paisiblement, Minou dormait.', oracle('Minou dormait paisiblement.'), 8);
    expect(verdict).toEqual({ accepted: true });
  });

  it('내용이 바뀌면 content-drift', () => {
    const verdict = validateCandidate(
      ORIGINAL,
      oracle("Il fait beau aujourd'hui dans la ville.", 'Les enfants jouent dans le parc.'),
      8,
    );
    expect(verdict).toEqual({
      accepted: false,
      reason: 'content-drift',
      detail: 'content overlap 0.00 below 0.4',
    });
  });

  it('보존 비율 기준은 설정 가능', () => {
    const candidate = oracle('Le chat dormait sur le canapé.', 'Il était près de la table.');
    expect(validateCandidate(ORIGINAL, candidate, 8)).toEqual({ accepted: true });
    expect(validateCandidate(ORIGINAL, candidate, 8, { minContentOverlap: 0.5 })).toEqual({
      accepted: false,
      reason: 'content-drift',
      detail: 'content overlap 0.43 below 0.5',
    });
  });
});
