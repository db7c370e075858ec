/**
 * 오라클 호출 클라이언트
 *
 * - 호출별 타임아웃 (초과 시 일시적 오류)
 * - 일시적 오류는 같은 배치를 재시도, 치명적 오류는 즉시 실패
 * - 문장별 응답 누락은 malformed-response 항목으로 (배치 전체 실패 아님)
 * - 시도마다 지표를 정확히 한 번 갱신 (실패한 시도는 토큰 0)
 */

import { RETRY_POLICY, withRetry, type RetryConfig } from '@/ai/retry';
import type { RunMetricsStore } from '@/stores/runMetricsStore';
import { estimateCallCost, ZERO_COST_RATES } from './cost';
import { classifyOracleError, TransientOracleError, type OracleError } from './errors';
import type { OracleResponse, OracleSubmitOptions, RewritingOracle } from './oracle/types';
import { DEFAULT_PIPELINE_CONFIG, type CostRates, type OracleItem } from './types';

export interface OracleClientOptions {
  metrics: RunMetricsStore;
  costRates?: CostRates | undefined;
  timeoutMs?: number | undefined;
  retry?: Partial<RetryConfig> | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  random?: (() => number) | undefined;
}

export interface OracleCallOptions extends Omit<OracleSubmitOptions, 'signal'> {
  /** 실행 취소 신호: 진행 중인 호출은 끝까지 기다리고, 이후 재시도만 막음 */
  runSignal?: AbortSignal | undefined;
}

export type OracleCallResult =
  | { ok: true; items: OracleItem[]; attempts: number }
  | { ok: false; error: OracleError; attempts: number };

export interface CredentialCheckResult {
  ok: boolean;
  message: string;
}

const CREDENTIAL_CHECK_SENTENCE = 'Ceci est une courte phrase de test pour vérifier la connexion au service.';

function fitItems(items: readonly OracleItem[], expected: number): OracleItem[] {
  const fitted = items.slice(0, expected);
  for (let i = fitted.length; i < expected; i++) {
    fitted.push({ error: 'malformed-response', detail: `missing result for sentence ${i + 1}` });
  }
  return fitted;
}

export class OracleClient {
  readonly oracle: RewritingOracle;
  private readonly options: OracleClientOptions;

  constructor(oracle: RewritingOracle, options: OracleClientOptions) {
    this.oracle = oracle;
    this.options = options;
  }

  /**
   * 배치 제출 (재시도 포함). 오류를 던지지 않고 결과로 반환
   */
  async submit(sentences: readonly string[], limit: number, options: OracleCallOptions = {}): Promise<OracleCallResult> {
    const { runSignal, ...submitOptions } = options;
    let attempts = 0;

    try {
      const response = await withRetry(
        async (attempt) => {
          attempts = attempt;
          return this.callOnce(sentences, limit, submitOptions);
        },
        {
          config: this.retryConfig(),
          sleep: this.options.sleep,
          random: this.options.random,
          shouldRetry: (error) => !runSignal?.aborted && RETRY_POLICY[classifyOracleError(error).kind] === 'retry',
        },
      );
      return { ok: true, items: fitItems(response.items, sentences.length), attempts };
    } catch (error) {
      const classified = classifyOracleError(error);
      console.warn(
        `[OracleClient] ${this.oracle.name} call failed after ${attempts} attempt(s) (${classified.kind}):`,
        classified.message,
      );
      return { ok: false, error: classified, attempts };
    }
  }

  /**
   * 최소 호출로 자격 증명 확인 (재시도 없음)
   */
  async verifyCredentials(): Promise<CredentialCheckResult> {
    try {
      const response = await this.callOnce([CREDENTIAL_CHECK_SENTENCE], 8, {});
      const answered = response.items.length > 0;
      return {
        ok: true,
        message: answered
          ? `${this.oracle.name} (${this.oracle.model}) is reachable`
          : `${this.oracle.name} (${this.oracle.model}) answered with no result`,
      };
    } catch (error) {
      const classified = classifyOracleError(error);
      return { ok: false, message: `${classified.kind}: ${classified.message}` };
    }
  }

  private retryConfig(): Partial<RetryConfig> {
    return { maxAttempts: DEFAULT_PIPELINE_CONFIG.maxAttempts, ...this.options.retry };
  }

  private async callOnce(
    sentences: readonly string[],
    limit: number,
    submitOptions: Omit<OracleSubmitOptions, 'signal'>,
  ): Promise<OracleResponse> {
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_PIPELINE_CONFIG.callTimeoutMs;
    const rates = this.options.costRates ?? ZERO_COST_RATES;
    const metrics = this.options.metrics.getState();
    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new TransientOracleError('timeout', `Oracle call timed out after ${timeoutMs}ms`));
        controller.abort();
      }, timeoutMs);
    });

    try {
      const response = await Promise.race([
        this.oracle.submit(sentences, limit, { ...submitOptions, signal: controller.signal }),
        timeout,
      ]);
      metrics.recordOracleCall({
        inputTokens: response.usage.inputTokens,
        outputTokens: response.usage.outputTokens,
        cost: estimateCallCost(response.usage, rates),
        failed: false,
      });
      return response;
    } catch (error) {
      metrics.recordOracleCall({ inputTokens: 0, outputTokens: 0, cost: 0, failed: true });
      throw classifyOracleError(error);
    } finally {
      clearTimeout(timer);
    }
  }
}
