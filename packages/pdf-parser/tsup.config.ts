import { defineConfig } from '../../tools/tsup-config/src/index';

export default defineConfig({
  entry: {
    index: 'src/index.ts',
  },
});
