import { readFileSync } from 'fs';
import { describe, expect, it } from 'vitest';
import { z } from 'zod';

const PackageSchema = z.object({
  main: z.string(),
  types: z.string(),
  exports: z.object({ '.': z.object({ types: z.string(), default: z.string() }) }),
});

const BuildConfigSchema = z.object({
  compilerOptions: z.object({ rootDir: z.string(), outDir: z.string() }),
});

function readJson(relative: string): unknown {
  return JSON.parse(readFileSync(new URL(relative, import.meta.url), 'utf8'));
}

describe('package layout', () => {
  it('points runtime entries at the build output and types at the sources', () => {
    const pkg = PackageSchema.parse(readJson('../package.json'));

    expect(pkg.main).toBe('./dist/index.js');
    expect(pkg.exports['.'].default).toBe('./dist/index.js');
    expect(pkg.types).toBe('./src/index.ts');
    expect(pkg.exports['.'].types).toBe('./src/index.ts');
  });

  it('builds the sources into the directory the package points at', () => {
    const build = BuildConfigSchema.parse(readJson('../../../tsconfig.build.json'));

    expect(build.compilerOptions.rootDir).toBe('services/fs-monitor/src');
    expect(build.compilerOptions.outDir).toBe('services/fs-monitor/dist');
  });
});
