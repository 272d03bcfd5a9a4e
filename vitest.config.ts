import { defineConfig } from 'vitest/config';
import path, { dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Mocks the engine logger so no pino transport threads are started
    setupFiles: ['./engine/src/__tests__/setup.ts'],
  },
  resolve: {
    alias: {
      '@stationfall/shared': path.resolve(__dirname, 'shared/index.ts'),
    },
  },
});
