import { createStore, type StoreApi } from 'zustand/vanilla';

// ============================================
// Run Metrics Types
// ============================================

export type RunPhase = 'routing' | 'oracle' | 'validation' | 'fallback';

export interface BatchTiming {
  id: string;
  size: number;
  durationMs: number;
}

export interface OracleCallRecord {
  inputTokens: number;
  outputTokens: number;
  cost: number;
  failed: boolean;
}

interface RunMetricsCounters {
  sentencesSeen: number;
  directPassThroughs: number;
  /** 라우터가 오라클 후보로 분류한 문장 (캐시 적중 포함) */
  oracleCandidates: number;
  oracleSuccesses: number;
  mechanicalFallbacks: number;
  mechanicalRoutes: number;
  cacheHits: number;
  oracleCalls: number;
  failedOracleCalls: number;
  inputTokens: number;
  outputTokens: number;
  estimatedCost: number;
  fatalErrorWarnings: number;
  validationRejections: number;
  strictRetries: number;
  /** 취소로 처리되지 않은 문장 */
  unprocessed: number;
}

interface RunMetricsState extends RunMetricsCounters {
  phaseMs: Record<RunPhase, number>;
  batches: BatchTiming[];
  startedAt: number | null;
  finishedAt: number | null;
}

interface RunMetricsActions {
  start: (now?: number) => void;
  finish: (now?: number) => void;
  recordSentences: (count: number) => void;
  recordDirect: () => void;
  recordOracleCandidate: () => void;
  recordMechanicalRoute: () => void;
  recordCacheHit: () => void;
  recordOracleSuccess: () => void;
  recordFallback: () => void;
  recordUnprocessed: (count: number) => void;
  /** 오라클 호출(시도) 1회당 정확히 한 번 */
  recordOracleCall: (call: OracleCallRecord) => void;
  recordFatalWarning: () => void;
  recordValidationRejection: () => void;
  recordStrictRetry: () => void;
  addPhaseTime: (phase: RunPhase, ms: number) => void;
  recordBatch: (timing: BatchTiming) => void;
}

export type RunMetricsStore = StoreApi<RunMetricsState & RunMetricsActions>;

export interface RunMetricsSnapshot extends RunMetricsCounters {
  successfulOracleCalls: number;
  /** 오라클 후보 중 캐시 적중 비율 (0~1) */
  cacheHitRate: number;
  elapsedMs: number;
  phaseMs: Record<RunPhase, number>;
  batches: BatchTiming[];
}

// ============================================
// Store
// ============================================

const initialCounters: RunMetricsCounters = {
  sentencesSeen: 0,
  directPassThroughs: 0,
  oracleCandidates: 0,
  oracleSuccesses: 0,
  mechanicalFallbacks: 0,
  mechanicalRoutes: 0,
  cacheHits: 0,
  oracleCalls: 0,
  failedOracleCalls: 0,
  inputTokens: 0,
  outputTokens: 0,
  estimatedCost: 0,
  fatalErrorWarnings: 0,
  validationRejections: 0,
  strictRetries: 0,
  unprocessed: 0,
};

/**
 * 실행(run)마다 새로 만드는 지표 스토어
 * 모든 갱신은 동기 set 한 번으로 끝나 이벤트 루프에서 끼어들 수 없음
 */
export function createRunMetricsStore(): RunMetricsStore {
  return createStore<RunMetricsState & RunMetricsActions>()((set) => ({
    ...initialCounters,
    phaseMs: { routing: 0, oracle: 0, validation: 0, fallback: 0 },
    batches: [],
    startedAt: null,
    finishedAt: null,

    start: (now = Date.now()) => set({ startedAt: now, finishedAt: null }),
    finish: (now = Date.now()) => set({ finishedAt: now }),

    recordSentences: (count) => set((s) => ({ sentencesSeen: s.sentencesSeen + count })),
    recordDirect: () => set((s) => ({ directPassThroughs: s.directPassThroughs + 1 })),
    recordOracleCandidate: () => set((s) => ({ oracleCandidates: s.oracleCandidates + 1 })),
    recordMechanicalRoute: () => set((s) => ({ mechanicalRoutes: s.mechanicalRoutes + 1 })),
    recordCacheHit: () => set((s) => ({ cacheHits: s.cacheHits + 1 })),
    recordOracleSuccess: () => set((s) => ({ oracleSuccesses: s.oracleSuccesses + 1 })),
    recordFallback: () => set((s) => ({ mechanicalFallbacks: s.mechanicalFallbacks + 1 })),
    recordUnprocessed: (count) => set((s) => ({ unprocessed: s.unprocessed + count })),

    recordOracleCall: (call) =>
      set((s) => ({
        oracleCalls: s.oracleCalls + 1,
        failedOracleCalls: s.failedOracleCalls + (call.failed ? 1 : 0),
        inputTokens: s.inputTokens + call.inputTokens,
        outputTokens: s.outputTokens + call.outputTokens,
        estimatedCost: s.estimatedCost + call.cost,
      })),

    recordFatalWarning: () => set((s) => ({ fatalErrorWarnings: s.fatalErrorWarnings + 1 })),
    recordValidationRejection: () => set((s) => ({ validationRejections: s.validationRejections + 1 })),
    recordStrictRetry: () => set((s) => ({ strictRetries: s.strictRetries + 1 })),

    addPhaseTime: (phase, ms) => set((s) => ({ phaseMs: { ...s.phaseMs, [phase]: s.phaseMs[phase] + ms } })),
    recordBatch: (timing) => set((s) => ({ batches: [...s.batches, timing] })),
  }));
}

// ============================================
// Selectors
// ============================================

export function snapshotRunMetrics(store: RunMetricsStore, now: number = Date.now()): RunMetricsSnapshot {
  const s = store.getState();
  const end = s.finishedAt ?? now;
  return {
    sentencesSeen: s.sentencesSeen,
    directPassThroughs: s.directPassThroughs,
    oracleCandidates: s.oracleCandidates,
    oracleSuccesses: s.oracleSuccesses,
    mechanicalFallbacks: s.mechanicalFallbacks,
    mechanicalRoutes: s.mechanicalRoutes,
    cacheHits: s.cacheHits,
    oracleCalls: s.oracleCalls,
    failedOracleCalls: s.failedOracleCalls,
    inputTokens: s.inputTokens,
    outputTokens: s.outputTokens,
    estimatedCost: s.estimatedCost,
    fatalErrorWarnings: s.fatalErrorWarnings,
    validationRejections: s.validationRejections,
    strictRetries: s.strictRetries,
    unprocessed: s.unprocessed,
    successfulOracleCalls: s.oracleCalls - s.failedOracleCalls,
    cacheHitRate: s.oracleCandidates > 0 ? s.cacheHits / s.oracleCandidates : 0,
    elapsedMs: s.startedAt !== null ? Math.max(0, end - s.startedAt) : 0,
    phaseMs: { ...s.phaseMs },
    batches: [...s.batches],
  };
}
