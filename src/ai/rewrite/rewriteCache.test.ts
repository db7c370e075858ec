import { describe, it, expect } from 'vitest';
import { normalizeCacheKey, RewriteCache } from './rewriteCache';
import { PipelineConfigError } from './errors';
import { createCandidate } from './types';

const oracle = (...fragments: string[]) => createCandidate(fragments, 'oracle');

describe('normalizeCacheKey', () => {
  it('대소문자와 공백만 정규화', () => {
    expect(normalizeCacheKey('  Le  Chat\tNoir. ')).toBe('le chat noir.');
  });

  it('구두점과 악센트는 유지', () => {
    expect(normalizeCacheKey('Été, déjà!')).toBe('été, déjà!');
  });
});

describe('RewriteCache', () => {
  it('저장 후 같은 limit으로 조회', () => {
    const cache = new RewriteCache();
    const candidate = oracle('Il dort', 'sur le canapé');
    expect(cache.store('Il dort sur le canapé', 8, candidate)).toBe(true);
    expect(cache.lookup('il  dort sur le CANAPÉ', 8)).toBe(candidate);
  });

  it('더 큰 limit 요청에는 제공, 더 작은 limit 요청에는 제공하지 않음', () => {
    const cache = new RewriteCache();
    cache.store('phrase longue', 8, oracle('un deux trois quatre cinq six'));
    expect(cache.lookup('phrase longue', 10)).not.toBeNull();
    expect(cache.lookup('phrase longue', 5)).toBeNull();
  });

  it('더 작은 limit에서 만든 결과는 더 큰 limit에도 제공', () => {
    const cache = new RewriteCache();
    const candidate = oracle('un deux trois', 'quatre cinq');
    cache.store('s', 5, candidate);
    expect(cache.lookup('s', 8)).toBe(candidate);
  });

  it('기계적 분할 결과는 저장하지 않음', () => {
    const cache = new RewriteCache();
    expect(cache.store('s', 8, createCandidate(['a b'], 'mechanical'))).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('limit 초과 결과나 빈 결과는 저장하지 않음', () => {
    const cache = new RewriteCache();
    expect(cache.store('s', 2, oracle('un deux trois'))).toBe(false);
    expect(cache.store('s', 2, oracle())).toBe(false);
    expect(cache.size).toBe(0);
  });

  it('용량 초과 시 가장 오래 사용하지 않은 항목 제거', () => {
    const cache = new RewriteCache(2);
    cache.store('a', 8, oracle('a'));
    cache.store('b', 8, oracle('b'));
    cache.lookup('a', 8);
    cache.store('c', 8, oracle('c'));
    expect(cache.has('a', 8)).toBe(true);
    expect(cache.has('b', 8)).toBe(false);
    expect(cache.has('c', 8)).toBe(true);
  });

  it('재저장은 덮어쓰고 최신으로 갱신', () => {
    const cache = new RewriteCache(2);
    cache.store('a', 8, oracle('first'));
    cache.store('b', 8, oracle('b'));
    cache.store('a', 6, oracle('second'));
    cache.store('c', 8, oracle('c'));
    expect(cache.lookup('a', 8)?.fragments).toEqual(['second']);
    expect(cache.has('b', 8)).toBe(false);
  });

  it('통계', () => {
    const cache = new RewriteCache(4);
    cache.store('a', 8, oracle('a'));
    cache.lookup('a', 8);
    cache.lookup('missing', 8);
    cache.lookup('a', 3);
    cache.lookup('a', 8);
    expect(cache.stats()).toEqual({
      size: 1,
      capacity: 4,
      hits: 2,
      misses: 2,
      hitRate: 0.5,
      utilization: 0.25,
    });
  });

  it('clear는 항목과 통계를 비움', () => {
    const cache = new RewriteCache();
    cache.store('a', 8, oracle('a'));
    cache.lookup('a', 8);
    cache.clear();
    expect(cache.stats()).toMatchObject({ size: 0, hits: 0, misses: 0, hitRate: 0 });
  });

  it('잘못된 용량은 PipelineConfigError', () => {
    expect(() => new RewriteCache(0)).toThrow(PipelineConfigError);
    expect(() => new RewriteCache(1.5)).toThrow(PipelineConfigError);
  });
});
