/**
 * AI API 호출 재시도 유틸리티
 * 시도 횟수 카운터 + 실패 종류별 정책 테이블로 동작하는 exponential backoff
 */

import { classifyOracleError, type OracleFailureKind } from './rewrite/errors';

export interface RetryConfig {
  /** 총 시도 횟수 (첫 시도 포함) */
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  jitterMs: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterMs: 1000,
};

export type RetryDecision = 'retry' | 'fail';

export const RETRY_POLICY: Readonly<Record<OracleFailureKind, RetryDecision>> = {
  timeout: 'retry',
  'rate-limit': 'retry',
  server: 'retry',
  network: 'retry',
  auth: 'fail',
  quota: 'fail',
  'bad-request': 'fail',
  configuration: 'fail',
  unknown: 'fail',
};

export interface RetryOptions {
  config?: Partial<RetryConfig> | undefined;
  shouldRetry?: ((error: unknown) => boolean) | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  random?: (() => number) | undefined;
  onRetry?: ((info: { attempt: number; delayMs: number; error: unknown }) => void) | undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function isRateLimitError(error: unknown): boolean {
  return classifyOracleError(error).kind === 'rate-limit';
}

function isRetryableError(error: unknown): boolean {
  return RETRY_POLICY[classifyOracleError(error).kind] === 'retry';
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * attempt(1부터)번째 실패 후 대기 시간
 */
export function computeBackoffDelay(attempt: number, config: RetryConfig, random: () => number = Math.random): number {
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter = random() * config.jitterMs;
  return Math.min(exponentialDelay + jitter, config.maxDelayMs);
}

export async function withRetry<T>(fn: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const config: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...options.config };
  const shouldRetry = options.shouldRetry ?? isRetryableError;
  const wait = options.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(config.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      // 호출자가 취소한 경우 재시도하지 않음
      if (isAbortError(error)) {
        throw error;
      }

      if (!shouldRetry(error) || attempt >= maxAttempts) {
        throw error;
      }

      const delay = computeBackoffDelay(attempt, config, options.random);

      console.warn(
        `[Retry] Attempt ${attempt}/${maxAttempts} failed, retrying in ${Math.round(delay)}ms:`,
        error instanceof Error ? error.message : error,
      );
      options.onRetry?.({ attempt, delayMs: delay, error });

      await wait(delay);
    }
  }

  throw lastError;
}

export { isRateLimitError, isRetryableError };
