import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['packages/*/src/**/__tests__/**/*.test.{ts,tsx}'],
    environment: 'node',
    // sharp 디코딩 테스트는 첫 로드가 느릴 수 있음
    testTimeout: 20000,
  },
});
