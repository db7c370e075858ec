import { describe, it, expect } from 'vitest';
import { createRunMetricsStore, snapshotRunMetrics } from './runMetricsStore';

describe('runMetricsStore', () => {
  it('스토어마다 독립된 카운터', () => {
    const a = createRunMetricsStore();
    const b = createRunMetricsStore();
    a.getState().recordDirect();
    expect(a.getState().directPassThroughs).toBe(1);
    expect(b.getState().directPassThroughs).toBe(0);
  });

  it('오라클 호출은 토큰/비용/실패를 함께 누적', () => {
    const store = createRunMetricsStore();
    store.getState().recordOracleCall({ inputTokens: 100, outputTokens: 50, cost: 0.001, failed: false });
    store.getState().recordOracleCall({ inputTokens: 0, outputTokens: 0, cost: 0, failed: true });

    const snapshot = snapshotRunMetrics(store);
    expect(snapshot.oracleCalls).toBe(2);
    expect(snapshot.failedOracleCalls).toBe(1);
    expect(snapshot.successfulOracleCalls).toBe(1);
    expect(snapshot.inputTokens).toBe(100);
    expect(snapshot.outputTokens).toBe(50);
    expect(snapshot.estimatedCost).toBeCloseTo(0.001);
  });

  it('캐시 적중률은 오라클 후보 기준', () => {
    const store = createRunMetricsStore();
    const s = store.getState();
    s.recordOracleCandidate();
    s.recordOracleCandidate();
    s.recordOracleCandidate();
    s.recordOracleCandidate();
    s.recordCacheHit();
    expect(snapshotRunMetrics(store).cacheHitRate).toBe(0.25);
  });

  it('후보가 없으면 적중률 0', () => {
    expect(snapshotRunMetrics(createRunMetricsStore()).cacheHitRate).toBe(0);
  });

  it('단계별 시간과 경과 시간', () => {
    const store = createRunMetricsStore();
    store.getState().start(1000);
    store.getState().addPhaseTime('routing', 5);
    store.getState().addPhaseTime('oracle', 40);
    store.getState().addPhaseTime('oracle', 10);

    expect(snapshotRunMetrics(store, 1300).elapsedMs).toBe(300);
    store.getState().finish(1500);
    const snapshot = snapshotRunMetrics(store, 9999);
    expect(snapshot.elapsedMs).toBe(500);
    expect(snapshot.phaseMs).toEqual({ routing: 5, oracle: 50, validation: 0, fallback: 0 });
  });

  it('스냅샷은 이후 변경의 영향을 받지 않음', () => {
    const store = createRunMetricsStore();
    store.getState().recordBatch({ id: 'batch-1', size: 3, durationMs: 12 });
    const snapshot = snapshotRunMetrics(store);
    store.getState().recordBatch({ id: 'batch-2', size: 1, durationMs: 4 });
    expect(snapshot.batches).toEqual([{ id: 'batch-1', size: 3, durationMs: 12 }]);
  });
});
