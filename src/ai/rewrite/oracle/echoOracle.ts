/**
 * mock 제공자용 오프라인 오라클
 * 실제 재작성 대신 결정적 분할 결과를 오라클 결과처럼 반환하여 파이프라인을 점검할 수 있게 함
 */

import { chunkSentence } from '../chunker';
import { createCandidate } from '../types';
import type { OracleResponse, OracleSubmitOptions, RewritingOracle } from './types';

export class EchoOracle implements RewritingOracle {
  readonly name = 'mock';
  readonly model = 'echo';

  async submit(sentences: readonly string[], limit: number, _options: OracleSubmitOptions = {}): Promise<OracleResponse> {
    return {
      items: sentences.map((sentence) => createCandidate(chunkSentence(sentence, limit), 'oracle')),
      usage: { inputTokens: 0, outputTokens: 0 },
    };
  }
}
