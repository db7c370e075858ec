import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // 파이프라인은 Node에서만 동작 (DOM 불필요)
    environment: 'node',

    // 글로벌 테스트 API (describe, it, expect 등)
    globals: true,

    // 테스트 셋업 파일
    setupFiles: ['./src/test/setup.ts'],

    // 테스트 파일 패턴
    include: ['src/**/*.{test,spec}.ts'],

    exclude: ['node_modules', 'dist'],

    // 타임아웃 설정
    testTimeout: 10000,
    hookTimeout: 10000,
  },

  resolve: {
    alias: {
      '@': fileURLToPath(new URL('./src', import.meta.url)),
    },
  },
});
