import { createChatModel } from '@/ai/client';
import { getAiConfig, type AiConfig } from '@/ai/config';
import { ChatModelOracle } from './chatModelOracle';
import { EchoOracle } from './echoOracle';
import type { RewritingOracle } from './types';

export type { OracleResponse, OracleSubmitOptions, RewritingOracle } from './types';
export { ChatModelOracle } from './chatModelOracle';
export { EchoOracle } from './echoOracle';

/**
 * 설정에 맞는 오라클 생성
 * API 키가 없으면 FatalOracleError('configuration')
 */
export function createRewritingOracle(cfg: AiConfig = getAiConfig()): RewritingOracle {
  if (cfg.provider === 'mock') {
    return new EchoOracle();
  }
  return new ChatModelOracle(createChatModel(cfg), { name: cfg.provider, model: cfg.model });
}
