import type { BatchComplexityClass, OracleItem, RejectionReason, TokenUsage } from '../types';

export interface OracleSubmitOptions {
  /** 이전 결과가 거부된 경우 더 엄격한 지시로 재요청 */
  strict?: boolean | undefined;
  rejectionReason?: RejectionReason | undefined;
  complexity?: BatchComplexityClass | undefined;
  signal?: AbortSignal | undefined;
}

export interface OracleResponse {
  /** 입력 문장당 하나, 입력 순서 */
  items: OracleItem[];
  usage: TokenUsage;
}

/**
 * 재작성 오라클 (제공자별 구현)
 * 오케스트레이터는 이 인터페이스에만 의존합니다.
 */
export interface RewritingOracle {
  readonly name: string;
  readonly model: string;
  submit(sentences: readonly string[], limit: number, options?: OracleSubmitOptions): Promise<OracleResponse>;
}
