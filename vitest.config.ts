import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    projects: ['tools/logger', 'tools/vitest-config', 'packages/*'],
  },
});
