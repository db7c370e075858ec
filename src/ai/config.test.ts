import { describe, it, expect, vi, beforeEach } from 'vitest';
import { aiConfigStore } from '@/stores/aiConfigStore';
import { getAiConfig, getCostRates, getEnvNumber, getEnvOptionalNumber, getEnvString, getRewriteDefaults } from './config';

const ENV_KEYS = [
  'AI_PROVIDER',
  'AI_MODEL',
  'AI_TEMPERATURE',
  'OPENAI_API_KEY',
  'ANTHROPIC_API_KEY',
  'GOOGLE_API_KEY',
  'REWRITE_WORD_LIMIT',
  'REWRITE_MODE',
  'REWRITE_CONCURRENCY',
  'REWRITE_CALL_TIMEOUT_MS',
  'REWRITE_CACHE_SIZE',
  'REWRITE_INPUT_PRICE_PER_1M',
  'REWRITE_OUTPUT_PRICE_PER_1M',
];

beforeEach(() => {
  // 실행 환경의 값이 섞이지 않도록 비움 (빈 문자열 = 미설정)
  for (const key of ENV_KEYS) vi.stubEnv(key, '');
});

describe('env helpers', () => {
  it('공백 값은 미설정으로 취급', () => {
    vi.stubEnv('AI_MODEL', '   ');
    expect(getEnvString('AI_MODEL')).toBeUndefined();
    vi.stubEnv('AI_MODEL', ' gpt-4o ');
    expect(getEnvString('AI_MODEL')).toBe('gpt-4o');
  });

  it('숫자가 아니면 기본값', () => {
    vi.stubEnv('REWRITE_WORD_LIMIT', 'eight');
    expect(getEnvNumber('REWRITE_WORD_LIMIT', 8)).toBe(8);
    expect(getEnvOptionalNumber('REWRITE_WORD_LIMIT')).toBeUndefined();
    vi.stubEnv('REWRITE_WORD_LIMIT', '12');
    expect(getEnvNumber('REWRITE_WORD_LIMIT', 8)).toBe(12);
  });
});

describe('getAiConfig', () => {
  it('기본값은 openai + 첫 번째 프리셋 모델', () => {
    expect(getAiConfig()).toEqual({ provider: 'openai', model: 'gpt-4o-mini' });
  });

  it('환경 변수에서 제공자/모델/키/temperature', () => {
    vi.stubEnv('AI_PROVIDER', 'Anthropic');
    vi.stubEnv('ANTHROPIC_API_KEY', 'test-secret');
    vi.stubEnv('AI_TEMPERATURE', '0.2');

    expect(getAiConfig()).toEqual({
      provider: 'anthropic',
      model: 'claude-3-5-haiku-latest',
      temperature: 0.2,
      anthropicApiKey: 'test-secret',
    });
  });

  it('알 수 없는 제공자는 경고 후 openai', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.stubEnv('AI_PROVIDER', 'mistral');

    expect(getAiConfig().provider).toBe('openai');
    expect(warn).toHaveBeenCalledWith('[config] Unknown AI_PROVIDER "mistral", falling back to openai');
  });

  it('스토어 오버라이드가 환경 변수보다 우선', () => {
    vi.stubEnv('AI_PROVIDER', 'openai');
    vi.stubEnv('OPENAI_API_KEY', 'env-key');
    aiConfigStore.getState().setProvider('google');
    aiConfigStore.getState().setModel('gemini-2.5-flash');
    aiConfigStore.getState().setGoogleApiKey('  test-secret  ');

    expect(getAiConfig()).toEqual({
      provider: 'google',
      model: 'gemini-2.5-flash',
      openaiApiKey: 'env-key',
      googleApiKey: 'test-secret',
    });
  });

  it('빈 키 입력은 오버라이드 해제', () => {
    vi.stubEnv('OPENAI_API_KEY', 'env-key');
    aiConfigStore.getState().setOpenaiApiKey('   ');
    expect(aiConfigStore.getState().openaiApiKey).toBeUndefined();
    expect(getAiConfig().openaiApiKey).toBe('env-key');
  });
});

describe('getCostRates', () => {
  it('프리셋 단가', () => {
    expect(getCostRates({ provider: 'anthropic', model: 'claude-3-5-sonnet-latest' })).toEqual({
      inputPer1M: 3,
      outputPer1M: 15,
    });
  });

  it('mock과 알 수 없는 모델은 0', () => {
    expect(getCostRates({ provider: 'mock', model: 'echo' })).toEqual({ inputPer1M: 0, outputPer1M: 0 });
    expect(getCostRates({ provider: 'openai', model: 'custom-model' })).toEqual({ inputPer1M: 0, outputPer1M: 0 });
  });

  it('환경 변수가 프리셋보다 우선', () => {
    vi.stubEnv('REWRITE_INPUT_PRICE_PER_1M', '1.5');
    expect(getCostRates({ provider: 'openai', model: 'gpt-4o-mini' })).toEqual({ inputPer1M: 1.5, outputPer1M: 0.6 });
  });
});

describe('getRewriteDefaults', () => {
  it('기본값', () => {
    expect(getRewriteDefaults()).toEqual({
      limit: 8,
      mode: 'oracle-rewrite',
      concurrency: 2,
      callTimeoutMs: 60000,
      cacheSize: 500,
    });
  });

  it('환경 변수 값 정리', () => {
    vi.stubEnv('REWRITE_WORD_LIMIT', '10.7');
    vi.stubEnv('REWRITE_MODE', 'mechanical-only');
    vi.stubEnv('REWRITE_CONCURRENCY', '0');
    vi.stubEnv('REWRITE_CACHE_SIZE', '50');

    expect(getRewriteDefaults()).toMatchObject({
      limit: 10,
      mode: 'mechanical-only',
      concurrency: 1,
      cacheSize: 50,
    });
  });
});
