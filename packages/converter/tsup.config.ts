import { defineConfig } from '../../tools/tsup-config/src/index';

export default defineConfig();
