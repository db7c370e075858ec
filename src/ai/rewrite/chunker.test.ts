import { describe, it, expect } from 'vitest';
import { chunkSentence, splitAtBreakpoints } from './chunker';
import { countWords, splitWords } from '@/utils/wordCounter';

const LONG = 'Le chat noir dormait paisiblement sur le canapé confortable près de la fenêtre';
const WITH_COMMA = 'Il marchait lentement dans la rue, et il regardait les vitrines illuminées du soir';

describe('chunkSentence', () => {
  it('limit 이하 문장은 한 조각', () => {
    expect(chunkSentence('Il dort.', 8)).toEqual(['Il dort.']);
  });

  it('공백만 정규화', () => {
    expect(chunkSentence('  Il   dort. ', 8)).toEqual(['Il dort.']);
  });

  it('빈 문장은 빈 배열', () => {
    expect(chunkSentence('   ', 8)).toEqual([]);
  });

  it('분할점이 없으면 창 단위로 분할', () => {
    expect(chunkSentence(LONG, 8)).toEqual([
      'Le chat noir dormait paisiblement sur le canapé',
      'confortable près de la fenêtre',
    ]);
  });

  it('쉼표 뒤와 접속사 앞에서 끊음', () => {
    expect(chunkSentence(WITH_COMMA, 8)).toEqual([
      'Il marchait lentement dans la rue,',
      'et il regardait les vitrines illuminées du soir',
    ]);
  });

  it('window 전략은 고정 크기', () => {
    expect(chunkSentence(LONG, 5, 'window')).toEqual([
      'Le chat noir dormait paisiblement',
      'sur le canapé confortable près',
      'de la fenêtre',
    ]);
  });

  it('긴 구간의 나머지는 다음 구간과 합칠 수 있으면 합침', () => {
    expect(chunkSentence('a b c d e, f', 4)).toEqual(['a b c d', 'e, f']);
    expect(chunkSentence('a b c d e, f g', 3)).toEqual(['a b c', 'd e,', 'f g']);
  });

  it('단어를 바꾸거나 순서를 바꾸지 않음', () => {
    for (const limit of [1, 2, 3, 5, 8]) {
      for (const text of [LONG, WITH_COMMA]) {
        const chunks = chunkSentence(text, limit);
        expect(chunks.join(' ')).toBe(splitWords(text).join(' '));
        expect(chunks.every((chunk) => countWords(chunk) <= limit)).toBe(true);
      }
    }
  });

  it('limit이 양의 정수가 아니면 RangeError', () => {
    expect(() => chunkSentence(LONG, 0)).toThrow(RangeError);
    expect(() => chunkSentence(LONG, 2.5)).toThrow(RangeError);
  });
});

describe('splitAtBreakpoints', () => {
  it('구두점 뒤, 접속사 앞에서 구간을 나눔', () => {
    expect(splitAtBreakpoints(splitWords(WITH_COMMA))).toEqual([
      ['Il', 'marchait', 'lentement'],
      ['dans', 'la', 'rue,'],
      ['et', 'il', 'regardait', 'les', 'vitrines', 'illuminées', 'du', 'soir'],
    ]);
  });

  it('대문자 접속사도 인식', () => {
    expect(splitAtBreakpoints(['Il', 'part', 'Mais', 'revient'])).toEqual([
      ['Il', 'part'],
      ['Mais', 'revient'],
    ]);
  });
});
