/**
 * LangChain 채팅 모델 기반 오라클
 */

import type { BaseChatModel } from '@langchain/core/language_models/chat_models';
import { estimateTokenCount } from '@/ai/tokenEstimate';
import type { TokenUsage } from '../types';
import { buildRewriteMessages } from './prompt';
import { messageText, parseRewriteResponse } from './parseRewriteResponse';
import type { OracleResponse, OracleSubmitOptions, RewritingOracle } from './types';

interface UsageMetadataLike {
  input_tokens?: unknown;
  output_tokens?: unknown;
}

function readUsage(message: { usage_metadata?: UsageMetadataLike | undefined }): TokenUsage | null {
  const usage = message.usage_metadata;
  if (!usage) return null;
  const inputTokens = Number(usage.input_tokens);
  const outputTokens = Number(usage.output_tokens);
  if (!Number.isFinite(inputTokens) || !Number.isFinite(outputTokens)) return null;
  return { inputTokens, outputTokens };
}

export class ChatModelOracle implements RewritingOracle {
  readonly name: string;
  readonly model: string;
  private readonly chat: BaseChatModel;

  constructor(chat: BaseChatModel, info: { name: string; model: string }) {
    this.chat = chat;
    this.name = info.name;
    this.model = info.model;
  }

  async submit(sentences: readonly string[], limit: number, options: OracleSubmitOptions = {}): Promise<OracleResponse> {
    const messages = buildRewriteMessages(sentences, limit, {
      strict: options.strict,
      rejectionReason: options.rejectionReason,
      complexity: options.complexity,
    });

    const response = await this.chat.invoke(messages, options.signal ? { signal: options.signal } : undefined);
    const raw = messageText(response.content);

    // 제공자가 사용량을 주지 않으면 추정치 사용
    const usage = readUsage(response) ?? {
      inputTokens: messages.reduce((sum, m) => sum + estimateTokenCount(messageText(m.content)), 0),
      outputTokens: estimateTokenCount(raw),
    };

    return { items: parseRewriteResponse(raw, sentences.length), usage };
  }
}
