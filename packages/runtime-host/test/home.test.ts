/**
 * Promote Runtime Host — Home Resolution Tests
 *
 *   HOME-U1: an explicit home wins over PROMOTE_HOME
 *   HOME-U2: PROMOTE_HOME is used when no explicit home is given
 *   HOME-U3: relative paths are made absolute
 *   HOME-U4: the resolved directory is created
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join, relative } from 'node:path';
import { resolvePromoteHome } from '../src/home.js';

describe('resolvePromoteHome', () => {
  it('HOME-U1: explicit home takes precedence over PROMOTE_HOME', () => {
    const base = mkdtempSync(join(tmpdir(), 'promote-home-'));
    const explicit = join(base, 'explicit');

    const home = resolvePromoteHome({ home: explicit, env: { PROMOTE_HOME: join(base, 'from-env') } });

    expect(home).toBe(explicit);
  });

  it('HOME-U2: PROMOTE_HOME is honored', () => {
    const base = mkdtempSync(join(tmpdir(), 'promote-home-'));

    expect(resolvePromoteHome({ env: { PROMOTE_HOME: join(base, 'from-env') } })).toBe(join(base, 'from-env'));
  });

  it('HOME-U3: a relative home resolves against the working directory', () => {
    const base = mkdtempSync(join(tmpdir(), 'promote-home-'));
    const relativeHome = relative(process.cwd(), join(base, 'rel'));

    expect(resolvePromoteHome({ home: relativeHome, env: {} })).toBe(join(base, 'rel'));
  });

  it('HOME-U4: creates missing directories', () => {
    const base = mkdtempSync(join(tmpdir(), 'promote-home-'));
    const nested = join(base, 'a', 'b');

    resolvePromoteHome({ home: nested, env: {} });

    expect(existsSync(nested)).toBe(true);
  });
});
