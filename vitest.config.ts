import { defineConfig } from 'vitest/config';
import react from '@vitejs/plugin-react';

export default defineConfig({
  plugins: [react()],
  test: {
    include: ['frontend/src/**/*.test.{ts,tsx}', 'backend/src/**/*.test.ts'],
    environment: 'node',
  },
});
