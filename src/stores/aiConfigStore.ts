import { createStore } from 'zustand/vanilla';
import type { AiProvider } from '@/ai/config';

/**
 * 런타임 AI 설정 오버라이드 (메모리 전용)
 * 값이 없으면 환경 변수 / 기본값을 사용합니다.
 */
interface AiConfigState {
  provider: AiProvider | undefined;
  model: string | undefined;
  openaiApiKey: string | undefined;
  anthropicApiKey: string | undefined;
  googleApiKey: string | undefined;
}

interface AiConfigActions {
  setProvider: (provider: AiProvider | undefined) => void;
  setModel: (model: string | undefined) => void;
  setOpenaiApiKey: (key: string | undefined) => void;
  setAnthropicApiKey: (key: string | undefined) => void;
  setGoogleApiKey: (key: string | undefined) => void;
  reset: () => void;
}

function normalizeKey(key: string | undefined): string | undefined {
  const trimmed = key?.trim();
  return trimmed ? trimmed : undefined;
}

const initialState: AiConfigState = {
  provider: undefined,
  model: undefined,
  openaiApiKey: undefined,
  anthropicApiKey: undefined,
  googleApiKey: undefined,
};

export const aiConfigStore = createStore<AiConfigState & AiConfigActions>()((set) => ({
  ...initialState,

  setProvider: (provider) => set({ provider }),
  setModel: (model) => set({ model: normalizeKey(model) }),
  setOpenaiApiKey: (key) => set({ openaiApiKey: normalizeKey(key) }),
  setAnthropicApiKey: (key) => set({ anthropicApiKey: normalizeKey(key) }),
  setGoogleApiKey: (key) => set({ googleApiKey: normalizeKey(key) }),
  reset: () => set({ ...initialState }),
}));
