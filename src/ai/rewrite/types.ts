/**
 * 문장 재작성 파이프라인 타입 정의
 *
 * 단어 수 제한을 넘는 문장을 오라클(LLM) 재작성 또는 기계적 분할로
 * 제한 이하의 조각들로 나눕니다.
 */

export type ProcessingMode = 'oracle-rewrite' | 'mechanical-only';

/**
 * 문장 처리 상태
 */
export type SentenceStatus =
  | 'pending'            // 대기 중
  | 'cached'             // 캐시 적중
  | 'routed-direct'      // 제한 이하, 그대로 통과
  | 'routed-oracle'      // 오라클 배치 대기
  | 'routed-mechanical'  // 기계적 분할로 라우팅
  | 'validated'          // 오라클 결과 검증 통과
  | 'fallback'           // 거부/실패 후 기계적 분할
  | 'failed';            // 취소 등으로 처리되지 않음

export interface SentenceTask {
  index: number;
  text: string;
  wordCount: number;
  status: SentenceStatus;
}

export type CandidateProvenance = 'oracle' | 'mechanical';

export interface RewriteCandidate {
  readonly fragments: readonly string[];
  readonly provenance: CandidateProvenance;
}

export function createCandidate(fragments: readonly string[], provenance: CandidateProvenance): RewriteCandidate {
  return Object.freeze({ fragments: Object.freeze([...fragments]), provenance });
}

export type RejectionReason = 'over-limit' | 'wrong-language' | 'content-drift' | 'malformed-response';

export type ValidationVerdict =
  | { accepted: true }
  | { accepted: false; reason: RejectionReason; detail: string };

/**
 * 오라클 응답에서 특정 문장 항목이 누락/손상된 경우
 */
export interface OracleItemError {
  readonly error: 'malformed-response';
  readonly detail: string;
}

export type OracleItem = RewriteCandidate | OracleItemError;

export function isOracleItemError(item: OracleItem): item is OracleItemError {
  return 'error' in item;
}

export type RouteDecision = 'direct' | 'mechanical' | 'oracle-candidate';

export type BatchComplexityClass = 'simple' | 'medium' | 'complex';

export interface RewriteBatch {
  id: string;
  complexity: BatchComplexityClass;
  tasks: SentenceTask[];
  estimatedTokens: number;
}

export type ResultMethod = 'direct' | 'cache' | 'oracle' | 'mechanical' | 'fallback';

/**
 * 문장별 최종 결과 (입력 순서와 동일)
 */
export interface SentenceResultRecord {
  index: number;
  originalSentence: string;
  outputFragments: string[];
  /** direct 통과는 'original' */
  provenance: CandidateProvenance | 'original';
  status: SentenceStatus;
  /** 원문 단어 수 */
  wordCount: number;
  /** 검증 통과(또는 재작성 불필요) 여부. 폴백이면 false */
  accepted: boolean;
  /** 폴백 결과라 사람이 확인해야 함 */
  needsReview: boolean;
  method: ResultMethod;
  reason?: RejectionReason | 'oracle-failure' | 'cancelled' | undefined;
}

export type ChunkStrategy = 'breakpoints' | 'window';

/**
 * 파이프라인 설정
 */
export interface RewritePipelineConfig {
  /** 이 배수 × limit 를 넘는 문장은 바로 기계적 분할 */
  ceilingMultiplier: number;
  /** 배치 복잡도 경계 (limit 배수) */
  mediumThresholdFactor: number;
  complexThresholdFactor: number;
  batchSizes: Record<BatchComplexityClass, number>;
  /** 배치당 추정 토큰 상한 */
  maxBatchTokens: number;
  /** 출력 토큰 추정 배수 (입력 대비) */
  outputTokenFactor: number;
  concurrency: number;
  callTimeoutMs: number;
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
  /** 핵심어 보존 비율 하한 */
  minContentOverlap: number;
  chunkStrategy: ChunkStrategy;
  /** OCR 정리 후 처리 (결과에는 원문 유지) */
  cleanInput: boolean;
}

export const DEFAULT_PIPELINE_CONFIG: RewritePipelineConfig = {
  ceilingMultiplier: 4,
  mediumThresholdFactor: 1.5,
  complexThresholdFactor: 2.25,
  batchSizes: { simple: 20, medium: 10, complex: 5 },
  maxBatchTokens: 2400,
  outputTokenFactor: 1.3,
  concurrency: 2,
  callTimeoutMs: 60000,
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 1000,
  minContentOverlap: 0.4,
  chunkStrategy: 'breakpoints',
  cleanInput: true,
};

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export interface CostRates {
  /** USD per 1M input tokens */
  inputPer1M: number;
  /** USD per 1M output tokens */
  outputPer1M: number;
}
