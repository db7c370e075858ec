/**
 * 재작성 파이프라인 에러 분류
 *
 * - TransientOracleError: 타임아웃, rate limit, 5xx, 네트워크 → 재시도
 * - FatalOracleError: 인증/크레딧/잘못된 요청/설정 → 재시도 없이 기계적 분할로 폴백
 * - PipelineConfigError: 잘못된 입력 (처리 시작 전에 거부)
 */

export type TransientFailureKind = 'timeout' | 'rate-limit' | 'server' | 'network';
export type FatalFailureKind = 'auth' | 'quota' | 'bad-request' | 'configuration' | 'unknown';
export type OracleFailureKind = TransientFailureKind | FatalFailureKind;

export class TransientOracleError extends Error {
  readonly kind: TransientFailureKind;
  readonly status: number | undefined;

  constructor(kind: TransientFailureKind, message: string, options?: { status?: number | undefined; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'TransientOracleError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export class FatalOracleError extends Error {
  readonly kind: FatalFailureKind;
  readonly status: number | undefined;

  constructor(kind: FatalFailureKind, message: string, options?: { status?: number | undefined; cause?: unknown }) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'FatalOracleError';
    this.kind = kind;
    this.status = options?.status;
  }
}

export type OracleError = TransientOracleError | FatalOracleError;

export class PipelineConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'PipelineConfigError';
    this.issues = issues;
  }
}

export function isOracleError(error: unknown): error is OracleError {
  return error instanceof TransientOracleError || error instanceof FatalOracleError;
}

function readStatus(error: unknown): number | undefined {
  if (typeof error !== 'object' || error === null) return undefined;
  const response = 'response' in error && typeof error.response === 'object' ? error.response : null;
  const candidates = [
    'status' in error ? error.status : undefined,
    'statusCode' in error ? error.statusCode : undefined,
    response !== null && 'status' in response ? response.status : undefined,
  ];
  for (const candidate of candidates) {
    const n = Number(candidate);
    if (Number.isInteger(n) && n >= 100 && n <= 599) return n;
  }
  return undefined;
}

function readMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return String(error);
}

function readName(error: unknown): string {
  if (typeof error !== 'object' || error === null) return '';
  return 'name' in error && typeof error.name === 'string' ? error.name : '';
}

/**
 * SDK/HTTP 에러를 일시적/치명적 에러로 분류
 * OpenAI, Anthropic, Google SDK 에러는 status 필드 또는 메시지 패턴으로 판별합니다.
 */
export function classifyOracleError(error: unknown): OracleError {
  if (isOracleError(error)) return error;

  const status = readStatus(error);
  const message = readMessage(error);
  const lower = message.toLowerCase();
  const name = readName(error).toLowerCase();
  const options = { status, cause: error };

  // 크레딧 부족은 429로 오더라도 재시도 의미 없음
  if (lower.includes('insufficient_quota') || lower.includes('insufficient credits') || status === 402) {
    return new FatalOracleError('quota', message, options);
  }
  if (
    status === 401 ||
    status === 403 ||
    lower.includes('invalid_api_key') ||
    lower.includes('incorrect api key') ||
    lower.includes('invalid api key') ||
    lower.includes('api_key_invalid') ||
    lower.includes('unauthorized')
  ) {
    return new FatalOracleError('auth', message, options);
  }
  if (status === 429 || lower.includes('rate limit') || lower.includes('too many requests') || lower.includes('resource_exhausted')) {
    return new TransientOracleError('rate-limit', message, options);
  }
  if (
    status === 408 ||
    name.includes('timeout') ||
    name === 'aborterror' ||
    lower.includes('timeout') ||
    lower.includes('timed out') ||
    lower.includes('etimedout')
  ) {
    return new TransientOracleError('timeout', message, options);
  }
  if (status !== undefined && status >= 500) {
    return new TransientOracleError('server', message, options);
  }
  if (status !== undefined && status >= 400) {
    return new FatalOracleError('bad-request', message, options);
  }
  if (
    lower.includes('econnreset') ||
    lower.includes('econnrefused') ||
    lower.includes('enotfound') ||
    lower.includes('eai_again') ||
    lower.includes('socket hang up') ||
    lower.includes('fetch failed') ||
    lower.includes('connection error') ||
    lower.includes('network')
  ) {
    return new TransientOracleError('network', message, options);
  }

  return new FatalOracleError('unknown', message, options);
}
