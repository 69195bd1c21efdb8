/**
 * Promote Runtime Host — YamlRecordStore Tests
 *
 *   YAML-U1: writing existing scalars changes only their bytes
 *   YAML-U2: missing anchor fields and mappings are created, other content kept
 *   YAML-U3: numeric scalars read back as written
 *   YAML-U4: unparsable or non-mapping records fail with MalformedRecord
 *   YAML-U5: a field whose parent is not a mapping is refused, file untouched
 *   YAML-U6: restoreText puts back the exact original bytes, no temp files remain
 *   YAML-U7: listEnvironments finds env directories holding a record file
 *   YAML-U8: a field that is an alias of a scalar reads and writes like the scalar
 *
 * Isolation: each test writes into its own temp directory.
 */

import { describe, it, expect } from 'vitest';
import { mkdirSync, mkdtempSync, readFileSync, readdirSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';
import { parse } from 'yaml';
import { PromotionErrorKind, RecordField, type FieldAssignment } from '@promote/core';
import { YamlRecordStore } from '../src/records/yaml-record-store.js';

// ---------------------------------------------------------------------------
// Fixtures
// ---------------------------------------------------------------------------

const PROMOTION: ReadonlyArray<FieldAssignment> = [
  { path: RecordField.ImageTag, value: 'v2' },
  { path: RecordField.ImageRepository, value: 'registry.example.com/hello-web' },
  { path: RecordField.LastPromotedTag, value: 'v2' },
  { path: RecordField.AnchorGitSha, value: 'a12a8eb3' },
  { path: RecordField.AnchorPromotedAt, value: '2026-10-19T08:15:00Z' },
  { path: RecordField.AnchorFromEnv, value: 'dev' },
];

const STAGING = `# hello-web staging values
replicaCount: 2

image:
  repository: registry.example.com/hello-web  # pushed by CI
  tag: v1
  pullPolicy: IfNotPresent

appMetadata:
  environment: staging
  lastPromotedTag: v1
  promotionAnchor:
    gitSHA: ""
    promotedAt: "2026-10-01T10:00:00Z"
    fromEnv: dev

ingress:
  hosts:
    - staging.hello.example.com
`;

function writeRecord(content: string, env = 'staging'): string {
  const root = mkdtempSync(join(tmpdir(), 'promote-yaml-'));
  const path = join(root, 'gitops-repo', 'apps', 'hello-web', env, 'values.yaml');
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf-8');
  return path;
}

// ---------------------------------------------------------------------------
// Writes
// ---------------------------------------------------------------------------

describe('YamlRecordStore.writeFields', () => {
  it('YAML-U1: patches existing scalars in place, keeping quoting and comments', async () => {
    const path = writeRecord(STAGING);

    await new YamlRecordStore().writeFields(path, PROMOTION);

    const expected = STAGING.replace('tag: v1', 'tag: v2')
      .replace('lastPromotedTag: v1', 'lastPromotedTag: v2')
      .replace('gitSHA: ""', 'gitSHA: "a12a8eb3"')
      .replace('promotedAt: "2026-10-01T10:00:00Z"', 'promotedAt: "2026-10-19T08:15:00Z"');
    expect(readFileSync(path, 'utf-8')).toBe(expected);
  });

  it('YAML-U2: creates lastPromotedTag and promotionAnchor when absent', async () => {
    const path = writeRecord(`image:
  repository: registry.example.com/hello-web
  tag: v1
resources:
  limits:
    cpu: 200m
appMetadata:
  environment: prod # owned by platform
`);
    const store = new YamlRecordStore();

    await store.writeFields(path, PROMOTION);

    const text = readFileSync(path, 'utf-8');
    expect(parse(text)).toEqual({
      image: { repository: 'registry.example.com/hello-web', tag: 'v2' },
      resources: { limits: { cpu: '200m' } },
      appMetadata: {
        environment: 'prod',
        lastPromotedTag: 'v2',
        promotionAnchor: { gitSHA: 'a12a8eb3', promotedAt: '2026-10-19T08:15:00Z', fromEnv: 'dev' },
      },
    });
    expect(text).toContain('# owned by platform');
    expect(await store.readField(path, RecordField.AnchorGitSha)).toBe('a12a8eb3');
  });

  it('YAML-U2b: replaces an empty promotionAnchor mapping value', async () => {
    const path = writeRecord(`image:
  repository: r
  tag: v1
appMetadata:
  promotionAnchor:
  environment: staging
`);
    const store = new YamlRecordStore();

    await store.writeFields(path, PROMOTION);

    expect(await store.readField(path, RecordField.AnchorFromEnv)).toBe('dev');
    expect(await store.readField(path, RecordField.Environment)).toBe('staging');
  });

  it('quotes values that would otherwise read back as another type', async () => {
    const path = writeRecord('image:\n  repository: r\n  tag: v1\n');

    await new YamlRecordStore().writeFields(path, [{ path: RecordField.ImageTag, value: '1.20' }]);

    expect(readFileSync(path, 'utf-8')).toBe('image:\n  repository: r\n  tag: "1.20"\n');
  });

  it('YAML-U5: refuses to write below a scalar and leaves the file as it was', async () => {
    const content = 'image:\n  repository: r\n  tag: v1\nappMetadata: staging\n';
    const path = writeRecord(content);

    await expect(new YamlRecordStore().writeFields(path, PROMOTION)).rejects.toMatchObject({
      kind: PromotionErrorKind.MalformedRecord,
      message: `${path}: appMetadata is not a mapping`,
    });
    expect(readFileSync(path, 'utf-8')).toBe(content);
  });

  it('refuses to overwrite a mapping with a scalar', async () => {
    const path = writeRecord('image:\n  repository: r\n  tag:\n    name: v1\n');

    await expect(new YamlRecordStore().writeFields(path, PROMOTION)).rejects.toMatchObject({
      kind: PromotionErrorKind.MalformedRecord,
      message: `${path}: image.tag is not a scalar`,
    });
  });
});

// ---------------------------------------------------------------------------
// Reads
// ---------------------------------------------------------------------------

describe('YamlRecordStore.readField', () => {
  it('reads nested scalars and reports absent fields as undefined', async () => {
    const path = writeRecord(STAGING);
    const store = new YamlRecordStore();

    expect(await store.readField(path, RecordField.ImageRepository)).toBe('registry.example.com/hello-web');
    expect(await store.readField(path, RecordField.AnchorGitSha)).toBe('');
    expect(await store.readField(path, ['image', 'digest'])).toBeUndefined();
    expect(await store.readField(path, ['missing', 'deeper'])).toBeUndefined();
  });

  it('YAML-U3: keeps the written form of numeric scalars', async () => {
    const path = writeRecord('image:\n  repository: r\n  tag: 1.10\nreplicaCount: 3\n');
    const store = new YamlRecordStore();

    expect(await store.readField(path, RecordField.ImageTag)).toBe('1.10');
    expect(await store.readField(path, ['replicaCount'])).toBe('3');
  });

  it('treats an explicit null as absent', async () => {
    const path = writeRecord('image:\n  repository: r\n  tag: null\n');

    expect(await new YamlRecordStore().readField(path, RecordField.ImageTag)).toBeUndefined();
  });

  it('YAML-U4: fails with MalformedRecord on invalid YAML', async () => {
    const path = writeRecord('image:\n  tag: [unclosed\n');

    await expect(new YamlRecordStore().readField(path, RecordField.ImageTag)).rejects.toMatchObject({
      kind: PromotionErrorKind.MalformedRecord,
      details: { path },
    });
  });

  it('YAML-U4b: fails with MalformedRecord when the top level is not a mapping', async () => {
    const path = writeRecord('- image\n- tag\n');

    await expect(new YamlRecordStore().readField(path, RecordField.ImageTag)).rejects.toMatchObject({
      kind: PromotionErrorKind.MalformedRecord,
      message: `${path}: top level is not a mapping`,
    });
  });

  it('fails with MalformedRecord when a field holds a mapping', async () => {
    const path = writeRecord('image:\n  tag:\n    name: v1\n');

    await expect(new YamlRecordStore().readField(path, RecordField.ImageTag)).rejects.toMatchObject({
      kind: PromotionErrorKind.MalformedRecord,
    });
  });
});

describe('YamlRecordStore aliases', () => {
  const ALIASED = `defaults:
  tag: &defaultTag v1
image:
  repository: registry.example.com/hello-web
  tag: *defaultTag
`;

  it('YAML-U8: reads an alias leaf as the value of its anchor', async () => {
    const path = writeRecord(ALIASED);

    expect(await new YamlRecordStore().readField(path, RecordField.ImageTag)).toBe('v1');
  });

  it('YAML-U8b: writing an alias leaf replaces it and leaves the anchor alone', async () => {
    const path = writeRecord(ALIASED);
    const store = new YamlRecordStore();

    await store.writeFields(path, [{ path: RecordField.ImageTag, value: 'v2' }]);

    expect(await store.readField(path, RecordField.ImageTag)).toBe('v2');
    expect(await store.readField(path, ['defaults', 'tag'])).toBe('v1');
  });

  it('YAML-U8c: an alias of a mapping is still not a scalar', async () => {
    const path = writeRecord('defaults: &d\n  name: v1\nimage:\n  repository: r\n  tag: *d\n');

    await expect(new YamlRecordStore().readField(path, RecordField.ImageTag)).rejects.toMatchObject({
      kind: PromotionErrorKind.MalformedRecord,
      message: `${path}: image.tag is not a scalar`,
    });
  });
});

// ---------------------------------------------------------------------------
// Files
// ---------------------------------------------------------------------------

describe('YamlRecordStore files', () => {
  it('YAML-U6: restoreText writes back the exact bytes and leaves no temp file', async () => {
    const path = writeRecord(STAGING);
    const store = new YamlRecordStore();
    const before = await store.readText(path);

    await store.writeFields(path, PROMOTION);
    await store.restoreText(path, before);

    expect(readFileSync(path, 'utf-8')).toBe(STAGING);
    expect(readdirSync(dirname(path))).toEqual(['values.yaml']);
  });

  it('exists is true only for files', async () => {
    const path = writeRecord(STAGING);
    const store = new YamlRecordStore();

    expect(await store.exists(path)).toBe(true);
    expect(await store.exists(dirname(path))).toBe(false);
    expect(await store.exists(join(dirname(path), 'other.yaml'))).toBe(false);
    expect(await store.exists(join(path, 'below-a-file.yaml'))).toBe(false);
  });

  it('YAML-U7: lists environments that have a record file', async () => {
    const path = writeRecord(STAGING, 'staging');
    const appDir = dirname(dirname(path));
    const repoRoot = dirname(dirname(dirname(appDir)));
    for (const env of ['prod', 'dev']) {
      mkdirSync(join(appDir, env));
      writeFileSync(join(appDir, env, 'values.yaml'), 'image: {}\n', 'utf-8');
    }
    mkdirSync(join(appDir, 'empty'));
    writeFileSync(join(appDir, 'README.md'), 'notes', 'utf-8');

    const layout = { repoRoot, recordsDir: 'gitops-repo/apps', recordFile: 'values.yaml' };
    const store = new YamlRecordStore();

    expect(await store.listEnvironments(layout, 'hello-web')).toEqual(['dev', 'prod', 'staging']);
    expect(await store.listEnvironments(layout, 'no-such-app')).toEqual([]);
  });
});
