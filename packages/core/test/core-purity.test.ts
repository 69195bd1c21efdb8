/**
 * Promote Core — Purity Test
 *
 * Statically verifies that packages/core/src/ performs no I/O of its own:
 * no imports of node:fs, node:child_process, node:net or their bare forms.
 * Git, the filesystem and the clock reach the core only through injected
 * capabilities, which is what lets the guard and write logic run against fakes.
 *
 * node:path is allowed: path joining is string computation.
 */

import { describe, it, expect } from 'vitest';
import { readdirSync, readFileSync, statSync } from 'node:fs';
import { join, relative } from 'node:path';
import { fileURLToPath } from 'node:url';

const testDir = fileURLToPath(new URL('.', import.meta.url));
const coreSrcDir = join(testDir, '..', 'src');

const FORBIDDEN_IMPORT_PATTERNS: ReadonlyArray<{ label: string; pattern: RegExp }> = [
  { label: 'node:fs', pattern: /from ['"](node:)?fs(\/promises)?['"]/ },
  { label: 'node:child_process', pattern: /from ['"](node:)?child_process['"]/ },
  { label: 'node:net', pattern: /from ['"](node:)?net['"]/ },
  { label: '@promote/runtime-host', pattern: /from ['"]@promote\/runtime-host['"]/ },
];

function collectTsFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of readdirSync(dir)) {
    const fullPath = join(dir, entry);
    if (statSync(fullPath).isDirectory()) {
      files.push(...collectTsFiles(fullPath));
    } else if (entry.endsWith('.ts') && !entry.endsWith('.d.ts')) {
      files.push(fullPath);
    }
  }
  return files;
}

describe('core package must not import side-effectful modules', () => {
  const sourceFiles = collectTsFiles(coreSrcDir);

  it('core/src contains .ts sources (sanity check)', () => {
    expect(sourceFiles.length).toBeGreaterThan(0);
  });

  it.each(FORBIDDEN_IMPORT_PATTERNS)('no core source file imports $label', ({ label, pattern }) => {
    const violations = sourceFiles
      .filter((file) => pattern.test(readFileSync(file, 'utf-8')))
      .map((file) => `  ${relative(coreSrcDir, file)} imports ${label}`);

    expect(violations, `core boundary violation:\n${violations.join('\n')}`).toHaveLength(0);
  });

  it('core/src does use node:path, so the allowlist is not vacuous', () => {
    const usesPath = sourceFiles.some((file) => /from ['"]node:path['"]/.test(readFileSync(file, 'utf-8')));
    expect(usesPath).toBe(true);
  });
});
