import { defineConfig as defineBaseConfig } from '../../tools/vitest-config/src/index';
import { defineConfig } from 'vitest/config';

const baseConfig = defineBaseConfig();

export default defineConfig({
  ...baseConfig,
  test: {
    ...baseConfig.test,
    coverage: {
      ...baseConfig.test?.coverage,
      exclude: ['**/index.ts', '**/*.test.ts', 'src/**/translation-provider.ts'],
    },
  },
});
