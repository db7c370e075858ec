import { ChatOpenAI } from '@langchain/openai';
import { ChatAnthropic } from '@langchain/anthropic';
import { ChatGoogleGenerativeAI } from '@langchain/google-genai';
import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { getAiConfig, type AiConfig } from '@/ai/config';
import { FatalOracleError } from '@/ai/rewrite/errors';

export interface ChatModelOptions {
  maxTokens?: number | undefined;
}

/**
 * 제공자별 LangChain 채팅 모델 생성
 * 재시도는 OracleClient가 담당하므로 SDK 자체 재시도는 끕니다.
 */
export function createChatModel(cfg: AiConfig = getAiConfig(), options: ChatModelOptions = {}): BaseChatModel {
  const model = cfg.model;
  const temperatureOption = cfg.temperature !== undefined ? { temperature: cfg.temperature } : {};

  if (cfg.provider === 'openai') {
    if (!cfg.openaiApiKey) {
      throw new FatalOracleError('configuration', 'OPENAI API key is missing (OPENAI_API_KEY).');
    }
    return new ChatOpenAI({
      apiKey: cfg.openaiApiKey,
      model,
      maxRetries: 0,
      ...temperatureOption,
      ...(options.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
    });
  }

  if (cfg.provider === 'anthropic') {
    if (!cfg.anthropicApiKey) {
      throw new FatalOracleError('configuration', 'Anthropic API key is missing (ANTHROPIC_API_KEY).');
    }
    return new ChatAnthropic({
      apiKey: cfg.anthropicApiKey,
      model,
      maxRetries: 0,
      ...temperatureOption,
      ...(options.maxTokens !== undefined ? { maxTokens: options.maxTokens } : {}),
    });
  }

  if (cfg.provider === 'google') {
    if (!cfg.googleApiKey) {
      throw new FatalOracleError('configuration', 'Google API key is missing (GOOGLE_API_KEY).');
    }
    return new ChatGoogleGenerativeAI({
      apiKey: cfg.googleApiKey,
      model,
      maxRetries: 0,
      ...temperatureOption,
      ...(options.maxTokens !== undefined ? { maxOutputTokens: options.maxTokens } : {}),
    });
  }

  throw new FatalOracleError('configuration', 'AI provider is set to mock.');
}
