import * as dotenv from 'dotenv';
import { aiConfigStore } from '@/stores/aiConfigStore';
import type { CostRates, ProcessingMode } from '@/ai/rewrite/types';

dotenv.config();

export type AiProvider = 'openai' | 'anthropic' | 'google' | 'mock';

const AI_PROVIDERS: readonly AiProvider[] = ['openai', 'anthropic', 'google', 'mock'];

/**
 * 제공자별 모델 프리셋 (가격: USD / 1M 토큰)
 * 첫 번째 항목이 기본 모델
 */
export const MODEL_PRESETS = {
  openai: [
    { value: 'gpt-4o-mini', label: 'GPT-4o mini', inputPer1M: 0.15, outputPer1M: 0.6 },
    { value: 'gpt-4.1-mini', label: 'GPT-4.1 mini', inputPer1M: 0.4, outputPer1M: 1.6 },
    { value: 'gpt-4o', label: 'GPT-4o', inputPer1M: 2.5, outputPer1M: 10 },
  ],
  anthropic: [
    { value: 'claude-3-5-haiku-latest', label: 'Claude 3.5 Haiku', inputPer1M: 0.8, outputPer1M: 4 },
    { value: 'claude-3-5-sonnet-latest', label: 'Claude 3.5 Sonnet', inputPer1M: 3, outputPer1M: 15 },
  ],
  google: [
    { value: 'gemini-2.5-flash-lite', label: 'Gemini 2.5 Flash Lite', inputPer1M: 0.1, outputPer1M: 0.4 },
    { value: 'gemini-2.5-flash', label: 'Gemini 2.5 Flash', inputPer1M: 0.3, outputPer1M: 2.5 },
  ],
} as const;

export interface AiConfig {
  provider: AiProvider;
  model: string;
  /**
   * 일부 모델은 temperature를 무시/제약할 수 있어 선택 사항으로 둡니다.
   * (값이 없으면 클라이언트에 temperature를 전달하지 않습니다.)
   */
  temperature?: number;
  openaiApiKey?: string;
  anthropicApiKey?: string;
  googleApiKey?: string;
}

export interface RewriteDefaults {
  limit: number;
  mode: ProcessingMode;
  concurrency: number;
  callTimeoutMs: number;
  cacheSize: number;
}

export function getEnvString(key: string): string | undefined {
  const v = process.env[key];
  return typeof v === 'string' && v.trim().length > 0 ? v.trim() : undefined;
}

export function getEnvNumber(key: string, fallback: number): number {
  const raw = getEnvString(key);
  if (!raw) return fallback;
  const n = Number(raw);
  return Number.isFinite(n) ? n : fallback;
}

export function getEnvOptionalNumber(key: string): number | undefined {
  const raw = getEnvString(key);
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isFinite(n) ? n : undefined;
}

function parseProvider(raw: string | undefined): AiProvider {
  const value = raw?.toLowerCase();
  const match = AI_PROVIDERS.find((provider) => provider === value);
  if (raw && !match) {
    console.warn(`[config] Unknown AI_PROVIDER "${raw}", falling back to openai`);
  }
  return match ?? 'openai';
}

function defaultModelFor(provider: AiProvider): string {
  const providerKey: Exclude<AiProvider, 'mock'> = provider === 'mock' ? 'openai' : provider;
  return MODEL_PRESETS[providerKey][0].value;
}

export function getAiConfig(): AiConfig {
  // 1. Store 오버라이드 > 환경 변수
  const store = aiConfigStore.getState();
  const provider = store.provider ?? parseProvider(getEnvString('AI_PROVIDER'));
  const model = store.model ?? getEnvString('AI_MODEL') ?? defaultModelFor(provider);

  // 2. API Key 우선순위: Store의 사용자 입력 키 > 환경 변수
  const openaiApiKey = store.openaiApiKey ?? getEnvString('OPENAI_API_KEY');
  const anthropicApiKey = store.anthropicApiKey ?? getEnvString('ANTHROPIC_API_KEY');
  const googleApiKey = store.googleApiKey ?? getEnvString('GOOGLE_API_KEY');

  const temperature = getEnvOptionalNumber('AI_TEMPERATURE');

  // exactOptionalPropertyTypes 대응: undefined 값은 프로퍼티 자체를 생략
  return {
    provider,
    model,
    ...(temperature !== undefined ? { temperature } : {}),
    ...(openaiApiKey ? { openaiApiKey } : {}),
    ...(anthropicApiKey ? { anthropicApiKey } : {}),
    ...(googleApiKey ? { googleApiKey } : {}),
  };
}

/**
 * 비용 단가: 환경 변수 > 모델 프리셋 > 0 (mock, 알 수 없는 모델)
 */
export function getCostRates(cfg: Pick<AiConfig, 'provider' | 'model'> = getAiConfig()): CostRates {
  let preset: { inputPer1M: number; outputPer1M: number } | undefined;
  if (cfg.provider !== 'mock') {
    const presets: ReadonlyArray<{ value: string; inputPer1M: number; outputPer1M: number }> = MODEL_PRESETS[cfg.provider];
    preset = presets.find((p) => p.value === cfg.model);
  }

  return {
    inputPer1M: getEnvNumber('REWRITE_INPUT_PRICE_PER_1M', preset?.inputPer1M ?? 0),
    outputPer1M: getEnvNumber('REWRITE_OUTPUT_PRICE_PER_1M', preset?.outputPer1M ?? 0),
  };
}

export function getRewriteDefaults(): RewriteDefaults {
  const mode = getEnvString('REWRITE_MODE');
  return {
    limit: Math.max(1, Math.floor(getEnvNumber('REWRITE_WORD_LIMIT', 8))),
    mode: mode === 'mechanical-only' ? 'mechanical-only' : 'oracle-rewrite',
    concurrency: Math.max(1, Math.floor(getEnvNumber('REWRITE_CONCURRENCY', 2))),
    callTimeoutMs: Math.max(1, getEnvNumber('REWRITE_CALL_TIMEOUT_MS', 60000)),
    cacheSize: Math.max(1, Math.floor(getEnvNumber('REWRITE_CACHE_SIZE', 500))),
  };
}
