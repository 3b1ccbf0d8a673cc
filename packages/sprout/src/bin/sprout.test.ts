import * as fs from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, it, expect } from 'vitest';

function readJson(relative: string): unknown {
  return JSON.parse(fs.readFileSync(fileURLToPath(new URL(relative, import.meta.url)), 'utf8'));
}

describe('published layout', () => {
  it('points the bin at the compiled entry of this file', () => {
    expect(readJson('../../package.json')).toMatchObject({ bin: { sprout: './dist/bin/sprout.js' } });
    expect(readJson('../../tsconfig.json')).toMatchObject({
      compilerOptions: { rootDir: 'src', outDir: 'dist', noEmit: false },
      references: [{ path: '../core' }],
    });
  });

  it('loads @sprout/core from its build output at run time', () => {
    expect(readJson('../../../core/package.json')).toMatchObject({
      exports: { '.': { types: './src/index.ts', default: './dist/index.js' } },
    });
    expect(readJson('../../../core/tsconfig.json')).toMatchObject({
      compilerOptions: { composite: true, rootDir: 'src', outDir: 'dist' },
    });
  });

  it('keeps the root bin in step with the package', () => {
    expect(readJson('../../../../package.json')).toMatchObject({
      bin: { sprout: 'packages/sprout/dist/bin/sprout.js' },
      scripts: { build: 'tsc -b packages/core packages/sprout' },
    });
  });
});
