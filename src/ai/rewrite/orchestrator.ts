/**
 * 문장 재작성 오케스트레이터
 *
 * 문장 하나의 상태 흐름:
 *   pending → cached | routed-direct | routed-mechanical | routed-oracle
 *   routed-oracle → validated | (거부) strict 재요청 1회 → validated | fallback
 *
 * - 배치는 p-limit 작업 풀로 제한된 동시성 실행
 * - strict 재요청은 직렬 실행 (캐시 쓰기 중복 방지)
 * - 치명적 오류는 실행당 한 번 경고하고 남은 배치는 호출 없이 기계적 분할
 * - 취소 시 새 배치는 시작하지 않고, 진행 중인 호출은 끝까지 기다림
 * - 결과는 입력 순서로 재조립
 */

import pLimit from 'p-limit';
import { v4 as uuidv4 } from 'uuid';
import type { RetryConfig } from '@/ai/retry';
import { EventChannel } from '@/utils/eventChannel';
import { cleanSentence } from '@/utils/textCleaner';
import { countWords } from '@/utils/wordCounter';
import {
  createRunMetricsStore,
  snapshotRunMetrics,
  type RunMetricsSnapshot,
  type RunMetricsStore,
  type RunPhase,
} from '@/stores/runMetricsStore';
import { scheduleBatches } from './batchScheduler';
import { chunkSentence } from './chunker';
import { FatalOracleError, PipelineConfigError, type FatalFailureKind, type OracleError } from './errors';
import { formatMetricsSummary, summarizeMetrics } from './metricsSummary';
import type { RewritingOracle } from './oracle/types';
import { OracleClient } from './oracleClient';
import { parseRewriteRunOptions, type RewritePipelineOverrides } from './options';
import { normalizeCacheKey, RewriteCache } from './rewriteCache';
import { routeSentence } from './router';
import {
  isOracleItemError,
  type CostRates,
  type OracleItem,
  type ProcessingMode,
  type RejectionReason,
  type ResultMethod,
  type RewriteBatch,
  type RewriteCandidate,
  type RewritePipelineConfig,
  type SentenceResultRecord,
  type SentenceTask,
  type ValidationVerdict,
} from './types';
import { validateCandidate } from './validator';

// ============================================
// Public Types
// ============================================

export type RewriteProgressEvent =
  | {
      type: 'progress';
      runId: string;
      /** 이벤트를 만든 단계 */
      stage: 'routing' | 'batch' | 'retry' | 'followers';
      completed: number;
      total: number;
      /** 가장 최근에 완료된 문장 (원문) */
      lastSentence: string | null;
      metrics: RunMetricsSnapshot;
    }
  | { type: 'warning'; runId: string; kind: FatalFailureKind; message: string }
  | { type: 'completed'; runId: string; cancelled: boolean; metrics: RunMetricsSnapshot };

export interface RewriteRunParams {
  sentences: readonly string[];
  limit: number;
  mode: ProcessingMode;
  /** oracle-rewrite 모드에서 필수 */
  oracle?: RewritingOracle | undefined;
  /** 실행 간 공유 캐시 (없으면 이번 실행 전용) */
  cache?: RewriteCache | undefined;
  costRates?: CostRates | undefined;
  config?: RewritePipelineOverrides | undefined;
  abortSignal?: AbortSignal | undefined;
  /** 이벤트 채널의 콜백 어댑터 */
  onProgress?: ((event: RewriteProgressEvent) => void) | undefined;
  /** 재시도 대기 함수 (기본: setTimeout) */
  sleep?: ((ms: number) => Promise<void>) | undefined;
  random?: (() => number) | undefined;
}

export interface RewriteRunResult {
  runId: string;
  /** 입력 순서. 취소된 경우 완료된 문장만 */
  records: SentenceResultRecord[];
  metrics: RunMetricsSnapshot;
  cancelled: boolean;
  unprocessedIndices: number[];
  warnings: string[];
}

export interface RewriteRun {
  runId: string;
  events: AsyncIterable<RewriteProgressEvent>;
  result: Promise<RewriteRunResult>;
  cancel: () => void;
}

// ============================================
// Run Context
// ============================================

interface Outcome {
  fragments: readonly string[];
  provenance: SentenceResultRecord['provenance'];
  method: ResultMethod;
  accepted: boolean;
  reason?: SentenceResultRecord['reason'];
}

interface Follower {
  task: SentenceTask;
  original: string;
  leaderIndex: number;
}

class RewriteRunContext {
  readonly runId = uuidv4();
  readonly events = new EventChannel<RewriteProgressEvent>();
  readonly metrics: RunMetricsStore = createRunMetricsStore();
  readonly abort = new AbortController();

  private readonly records = new Map<number, SentenceResultRecord>();
  private readonly unprocessed: number[] = [];
  private readonly warnings: string[] = [];
  private fatalError: FatalOracleError | null = null;
  private lastSentence: string | null = null;
  private readonly client: OracleClient | null;
  private readonly cache: RewriteCache;
  private readonly retryQueue = pLimit(1);

  constructor(
    private readonly sentences: readonly string[],
    private readonly limit: number,
    private readonly mode: ProcessingMode,
    private readonly config: RewritePipelineConfig,
    private readonly params: RewriteRunParams,
  ) {
    this.cache = params.cache ?? new RewriteCache();
    const retry: Partial<RetryConfig> = {
      maxAttempts: config.maxAttempts,
      baseDelayMs: config.baseDelayMs,
      maxDelayMs: config.maxDelayMs,
      jitterMs: config.jitterMs,
    };
    this.client = params.oracle
      ? new OracleClient(params.oracle, {
          metrics: this.metrics,
          costRates: params.costRates,
          timeoutMs: config.callTimeoutMs,
          retry,
          sleep: params.sleep,
          random: params.random,
        })
      : null;
  }

  get signal(): AbortSignal {
    return this.abort.signal;
  }

  async run(): Promise<RewriteRunResult> {
    const metrics = this.metrics.getState();
    metrics.start();
    metrics.recordSentences(this.sentences.length);

    const { leaders, followers } = this.timed('routing', () => this.routeAll());
    this.emitProgress('routing');

    const batches = scheduleBatches(leaders, this.limit, this.config);
    if (batches.length > 0) {
      console.info(
        `[RewriteOrchestrator] ${leaders.length} sentences to rewrite in ${batches.length} batches ` +
          `(concurrency ${this.config.concurrency})`,
      );
    }

    const pool = pLimit(this.config.concurrency);
    await Promise.all(batches.map((batch) => pool(() => this.processBatch(batch))));

    if (followers.length > 0) {
      this.resolveFollowers(followers);
      this.emitProgress('followers');
    }

    const cancelled = this.signal.aborted;
    metrics.recordUnprocessed(this.unprocessed.length);
    metrics.finish();

    const snapshot = snapshotRunMetrics(this.metrics);
    console.info(
      `[RewriteOrchestrator] Run ${this.runId} ${cancelled ? 'cancelled' : 'finished'}\n` +
        formatMetricsSummary(summarizeMetrics(snapshot)).join('\n'),
    );
    this.emit({ type: 'completed', runId: this.runId, cancelled, metrics: snapshot });

    return {
      runId: this.runId,
      records: [...this.records.values()].sort((a, b) => a.index - b.index),
      metrics: snapshot,
      cancelled,
      unprocessedIndices: [...this.unprocessed].sort((a, b) => a - b),
      warnings: [...this.warnings],
    };
  }

  // ------------------------------------------
  // Routing
  // ------------------------------------------

  private routeAll(): { leaders: SentenceTask[]; followers: Follower[] } {
    const metrics = this.metrics.getState();
    const leaders: SentenceTask[] = [];
    const followers: Follower[] = [];
    const leaderByKey = new Map<string, number>();

    this.sentences.forEach((original, index) => {
      const text = this.config.cleanInput ? cleanSentence(original) : original;
      const wordCount = countWords(text);
      const task: SentenceTask = { index, text, wordCount, status: 'pending' };

      const decision = routeSentence(text, this.limit, {
        mode: this.mode,
        ceilingMultiplier: this.config.ceilingMultiplier,
        wordCount,
      });

      if (decision === 'direct') {
        metrics.recordDirect();
        task.status = 'routed-direct';
        this.complete(task, original, {
          fragments: wordCount === 0 ? [original] : [text],
          provenance: 'original',
          method: 'direct',
          accepted: true,
        });
        return;
      }

      if (decision === 'mechanical') {
        metrics.recordMechanicalRoute();
        task.status = 'routed-mechanical';
        this.complete(task, original, {
          fragments: chunkSentence(text, this.limit, this.config.chunkStrategy),
          provenance: 'mechanical',
          method: 'mechanical',
          accepted: true,
        });
        return;
      }

      metrics.recordOracleCandidate();
      const cached = this.cache.lookup(text, this.limit);
      if (cached) {
        metrics.recordCacheHit();
        task.status = 'cached';
        this.complete(task, original, { fragments: cached.fragments, provenance: 'oracle', method: 'cache', accepted: true });
        return;
      }

      // 같은 문장은 한 번만 호출: 첫 문장이 대표, 나머지는 결과를 공유
      const key = normalizeCacheKey(text);
      const leaderIndex = leaderByKey.get(key);
      task.status = 'routed-oracle';
      if (leaderIndex !== undefined) {
        followers.push({ task, original, leaderIndex });
        return;
      }
      leaderByKey.set(key, index);
      leaders.push(task);
    });

    return { leaders, followers };
  }

  // ------------------------------------------
  // Batches
  // ------------------------------------------

  private async processBatch(batch: RewriteBatch): Promise<void> {
    if (this.signal.aborted) {
      for (const task of batch.tasks) this.markUnprocessed(task);
      return;
    }

    if (!this.client || this.fatalError) {
      this.fallbackAll(batch.tasks, 'oracle-failure');
      this.emitProgress('batch');
      return;
    }

    const startedAt = Date.now();
    const result = await this.client.submit(
      batch.tasks.map((task) => task.text),
      this.limit,
      { complexity: batch.complexity, runSignal: this.signal },
    );
    const durationMs = Date.now() - startedAt;
    this.metrics.getState().addPhaseTime('oracle', durationMs);
    this.metrics.getState().recordBatch({ id: batch.id, size: batch.tasks.length, durationMs });

    if (!result.ok) {
      this.handleOracleError(result.error);
      this.fallbackAll(batch.tasks, 'oracle-failure');
      this.emitProgress('batch');
      return;
    }

    const rejected: Array<{ task: SentenceTask; reason: RejectionReason }> = [];
    batch.tasks.forEach((task, i) => {
      const verdict = this.verify(task, result.items[i]);
      if (verdict.accepted) {
        this.acceptOracle(task, result.items[i]);
      } else {
        this.metrics.getState().recordValidationRejection();
        rejected.push({ task, reason: verdict.reason });
      }
    });
    this.emitProgress('batch');

    await Promise.all(rejected.map(({ task, reason }) => this.retryQueue(() => this.strictRetry(task, reason))));
  }

  private async strictRetry(task: SentenceTask, reason: RejectionReason): Promise<void> {
    // 취소/치명적 오류 이후에는 추가 호출 없이 폴백
    if (this.signal.aborted || !this.client || this.fatalError) {
      this.fallback(task, reason);
      this.emitProgress('retry');
      return;
    }

    this.metrics.getState().recordStrictRetry();
    const startedAt = Date.now();
    const result = await this.client.submit([task.text], this.limit, {
      strict: true,
      rejectionReason: reason,
      runSignal: this.signal,
    });
    this.metrics.getState().addPhaseTime('oracle', Date.now() - startedAt);

    if (!result.ok) {
      this.handleOracleError(result.error);
      this.fallback(task, 'oracle-failure');
    } else {
      const item = result.items[0];
      const verdict = this.verify(task, item);
      if (verdict.accepted) {
        this.acceptOracle(task, item);
      } else {
        this.metrics.getState().recordValidationRejection();
        this.fallback(task, verdict.reason);
      }
    }
    this.emitProgress('retry');
  }

  private verify(task: SentenceTask, item: OracleItem | undefined): ValidationVerdict {
    return this.timed('validation', (): ValidationVerdict => {
      if (!item) return { accepted: false, reason: 'malformed-response', detail: 'missing item' };
      if (isOracleItemError(item)) return { accepted: false, reason: 'malformed-response', detail: item.detail };
      return validateCandidate(task.text, item, this.limit, { minContentOverlap: this.config.minContentOverlap });
    });
  }

  private acceptOracle(task: SentenceTask, item: OracleItem | undefined): void {
    if (!item || isOracleItemError(item)) return;
    const candidate: RewriteCandidate = item;
    this.cache.store(task.text, this.limit, candidate);
    this.metrics.getState().recordOracleSuccess();
    task.status = 'validated';
    this.complete(task, this.originalOf(task), {
      fragments: candidate.fragments,
      provenance: 'oracle',
      method: 'oracle',
      accepted: true,
    });
  }

  private fallback(task: SentenceTask, reason: NonNullable<SentenceResultRecord['reason']>): void {
    const fragments = this.timed('fallback', () => chunkSentence(task.text, this.limit, this.config.chunkStrategy));
    this.metrics.getState().recordFallback();
    task.status = 'fallback';
    this.complete(task, this.originalOf(task), {
      fragments,
      provenance: 'mechanical',
      method: 'fallback',
      accepted: false,
      reason,
    });
  }

  private fallbackAll(tasks: readonly SentenceTask[], reason: NonNullable<SentenceResultRecord['reason']>): void {
    for (const task of tasks) this.fallback(task, reason);
  }

  private handleOracleError(error: OracleError): void {
    if (!(error instanceof FatalOracleError) || this.fatalError) return;

    this.fatalError = error;
    this.metrics.getState().recordFatalWarning();
    const message =
      `Rewriting service unavailable (${error.kind}): ${error.message}. ` +
      'Remaining sentences are split mechanically; check the API credentials.';
    this.warnings.push(message);
    console.warn(`[RewriteOrchestrator] ${message}`);
    this.emit({ type: 'warning', runId: this.runId, kind: error.kind, message });
  }

  // ------------------------------------------
  // Followers (same normalized sentence)
  // ------------------------------------------

  private resolveFollowers(followers: readonly Follower[]): void {
    const metrics = this.metrics.getState();
    for (const { task, original, leaderIndex } of followers) {
      const leader = this.records.get(leaderIndex);
      if (!leader) {
        this.markUnprocessed(task);
        continue;
      }

      if (leader.method === 'oracle' || leader.method === 'cache') {
        metrics.recordCacheHit();
        task.status = 'cached';
        this.complete(task, original, {
          fragments: this.cache.lookup(task.text, this.limit)?.fragments ?? leader.outputFragments,
          provenance: 'oracle',
          method: 'cache',
          accepted: true,
        });
        continue;
      }

      metrics.recordFallback();
      task.status = 'fallback';
      this.complete(task, original, {
        fragments: leader.outputFragments,
        provenance: 'mechanical',
        method: 'fallback',
        accepted: false,
        reason: leader.reason,
      });
    }
  }

  // ------------------------------------------
  // Bookkeeping
  // ------------------------------------------

  private originalOf(task: SentenceTask): string {
    return this.sentences[task.index] ?? task.text;
  }

  private complete(task: SentenceTask, original: string, outcome: Outcome): void {
    this.records.set(task.index, {
      index: task.index,
      originalSentence: original,
      outputFragments: [...outcome.fragments],
      provenance: outcome.provenance,
      status: task.status,
      wordCount: countWords(original),
      accepted: outcome.accepted,
      needsReview: !outcome.accepted,
      method: outcome.method,
      ...(outcome.reason !== undefined ? { reason: outcome.reason } : {}),
    });
    this.lastSentence = original;
  }

  private markUnprocessed(task: SentenceTask): void {
    task.status = 'failed';
    this.unprocessed.push(task.index);
  }

  private timed<T>(phase: RunPhase, fn: () => T): T {
    const startedAt = Date.now();
    try {
      return fn();
    } finally {
      this.metrics.getState().addPhaseTime(phase, Date.now() - startedAt);
    }
  }

  private emitProgress(stage: 'routing' | 'batch' | 'retry' | 'followers'): void {
    this.emit({
      type: 'progress',
      runId: this.runId,
      stage,
      completed: this.records.size,
      total: this.sentences.length,
      lastSentence: this.lastSentence,
      metrics: snapshotRunMetrics(this.metrics),
    });
  }

  emit(event: RewriteProgressEvent): void {
    this.events.push(event);
    if (!this.params.onProgress) return;
    try {
      this.params.onProgress(event);
    } catch (error) {
      console.warn('[RewriteOrchestrator] onProgress callback failed:', error);
    }
  }
}

// ============================================
// Entry Points
// ============================================

/**
 * 실행 시작. 잘못된 입력은 처리 전에 PipelineConfigError를 던집니다.
 */
export function startRewriteRun(params: RewriteRunParams): RewriteRun {
  const options = parseRewriteRunOptions({
    sentences: params.sentences,
    limit: params.limit,
    mode: params.mode,
    config: params.config,
  });
  if (options.mode === 'oracle-rewrite' && !params.oracle) {
    throw new PipelineConfigError('Invalid rewrite options', ['oracle: required in oracle-rewrite mode']);
  }

  const context = new RewriteRunContext(options.sentences, options.limit, options.mode, options.config, params);

  const external = params.abortSignal;
  const forwardAbort = () => context.abort.abort();
  if (external?.aborted) {
    context.abort.abort();
  } else {
    external?.addEventListener('abort', forwardAbort, { once: true });
  }

  const result = context.run().finally(() => {
    external?.removeEventListener('abort', forwardAbort);
    context.events.close();
  });

  return {
    runId: context.runId,
    events: context.events,
    result,
    cancel: () => context.abort.abort(),
  };
}

/**
 * 실행 후 결과만 필요할 때
 */
export async function rewriteSentences(params: RewriteRunParams): Promise<RewriteRunResult> {
  return startRewriteRun(params).result;
}

/**
 * 이벤트를 소비하면서 결과를 기다림
 * 결과가 실패하면 이벤트 소비를 마치기 전이라도 바로 reject
 */
export async function followRewriteRun(
  run: Pick<RewriteRun, 'events' | 'result'>,
  onEvent: (event: RewriteProgressEvent) => void,
): Promise<RewriteRunResult> {
  const consume = async () => {
    for await (const event of run.events) onEvent(event);
  };
  const [result] = await Promise.all([run.result, consume()]);
  return result;
}
