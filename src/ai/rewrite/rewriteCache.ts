/**
 * 재작성 결과 캐시 (LRU)
 *
 * - 실행 간에 공유 (호출자가 인스턴스를 명시적으로 전달)
 * - 검증된 오라클 결과만 저장
 * - limit이 더 큰 요청에서 만든 결과는 더 작은 limit 요청에 쓰지 않음
 * - 만료 없음, 용량 초과 시 가장 오래 사용하지 않은 항목 제거
 */

import { fitsWordLimit } from '@/utils/wordCounter';
import { PipelineConfigError } from './errors';
import type { RewriteCandidate } from './types';

export const DEFAULT_CACHE_CAPACITY = 500;

export interface CacheEntry {
  key: string;
  limit: number;
  candidate: RewriteCandidate;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  /** 0~1 */
  hitRate: number;
  /** 0~1 */
  utilization: number;
}

/**
 * 캐시 키 정규화: 대소문자 통일 + 공백 정리만
 */
export function normalizeCacheKey(sentence: string): string {
  return sentence.toLowerCase().replace(/\s+/g, ' ').trim();
}

export class RewriteCache {
  readonly capacity: number;
  // Map 삽입 순서 = 최근 사용 순서 (뒤가 최신)
  private readonly entries = new Map<string, CacheEntry>();
  private hits = 0;
  private misses = 0;

  constructor(capacity: number = DEFAULT_CACHE_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new PipelineConfigError('Invalid cache capacity', [`capacity must be a positive integer, got ${capacity}`]);
    }
    this.capacity = capacity;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * 캐시 조회. 적중 시 최근 사용으로 갱신
   */
  lookup(sentence: string, limit: number): RewriteCandidate | null {
    const key = normalizeCacheKey(sentence);
    const entry = this.entries.get(key);

    if (!entry || entry.limit > limit || !fitsWordLimit(entry.candidate.fragments, limit)) {
      this.misses++;
      return null;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    this.hits++;
    return entry.candidate;
  }

  /**
   * 검증된 오라클 결과 저장
   * @returns 저장 여부 (기계적 분할 결과나 limit 초과 결과는 거부)
   */
  store(sentence: string, limit: number, candidate: RewriteCandidate): boolean {
    if (candidate.provenance !== 'oracle') return false;
    if (candidate.fragments.length === 0 || !fitsWordLimit(candidate.fragments, limit)) return false;

    const key = normalizeCacheKey(sentence);
    this.entries.delete(key);
    this.entries.set(key, { key, limit, candidate });

    while (this.entries.size > this.capacity) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
    return true;
  }

  /**
   * 통계에 영향 없이 존재 여부만 확인
   */
  has(sentence: string, limit: number): boolean {
    const entry = this.entries.get(normalizeCacheKey(sentence));
    return entry !== undefined && entry.limit <= limit;
  }

  clear(): void {
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
  }

  stats(): CacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      utilization: this.entries.size / this.capacity,
    };
  }
}
