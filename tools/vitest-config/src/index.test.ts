import { existsSync, readFileSync, readdirSync } from 'node:fs';
import { join } from 'node:path';
import { describe, expect, test } from 'vitest';

import { defineConfig } from './index';

const ROOT = join(__dirname, '..', '..', '..');

describe('defineConfig', () => {
  test('applies the shared test defaults', () => {
    const config = defineConfig();

    expect(config.test).toMatchObject({
      environment: 'node',
      globals: true,
      mockReset: true,
      clearMocks: true,
      include: ['src/**/*.{test,spec}.ts'],
    });
  });

  test('lets a package override test fields', () => {
    const config = defineConfig({ test: { include: ['lib/**/*.test.ts'] } });

    expect(config.test?.include).toEqual(['lib/**/*.test.ts']);
    expect(config.test?.environment).toBe('node');
  });

  test('is loaded by relative path from every workspace config', () => {
    const configs = [
      ...readdirSync(join(ROOT, 'packages')).map((name) =>
        join(ROOT, 'packages', name),
      ),
      join(ROOT, 'tools', 'logger'),
    ]
      .map((dir) => join(dir, 'vitest.config.ts'))
      .filter((file) => existsSync(file));

    expect(configs.length).toBeGreaterThan(0);
    for (const file of configs) {
      const source = readFileSync(file, 'utf-8');
      expect(source).toContain("from '../../tools/vitest-config/src/index'");
      expect(source).not.toContain('@papertrans/vitest-config');
    }
  });
});
