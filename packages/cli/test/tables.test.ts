/**
 * Promote CLI — Table Formatting Tests
 *
 *   TAB-U1: columns are padded to the widest cell and separated by two spaces
 *   TAB-U2: environments follow the configured chain, unknown ones last by name
 *   TAB-U3: status shows '-' for empty anchor fields and the reason for unreadable records
 *   TAB-U4: history keeps only promotion commits, optionally for one app
 *   TAB-U5: log lines show outcome, promotion and detail
 */

import { describe, it, expect } from 'vitest';
import { PromotionErrorKind, PromotionLogOutcome, type CommitInfo, type RecordSummary } from '@promote/core';
import type { PromotionLogEvent } from '@promote/runtime-host';
import {
  formatHistory,
  formatLogEvent,
  formatStatus,
  formatTable,
  promotionCommits,
  sortEnvironments,
} from '../src/output/tables.js';

function summary(env: string, overrides: Partial<RecordSummary> = {}): RecordSummary {
  return {
    location: { app: 'hello-web', env, path: `/srv/gitops/gitops-repo/apps/hello-web/${env}/values.yaml` },
    repository: 'registry.example.com/hello-web',
    tag: 'v2',
    lastPromotedTag: 'v2',
    anchorSha: '',
    promotedAt: '',
    fromEnv: '',
    environment: env,
    ...overrides,
  };
}

describe('formatTable', () => {
  it('TAB-U1: pads columns and trims trailing blanks', () => {
    expect(formatTable(['A', 'BB'], [['long', 'x'], ['y', '']])).toEqual(['A     BB', 'long  x', 'y']);
  });
});

describe('sortEnvironments', () => {
  it('TAB-U2: orders by chain position, then by name', () => {
    expect(sortEnvironments(['prod', 'qa', 'dev', 'staging', 'alpha'], ['dev', 'staging', 'prod'])).toEqual([
      'dev',
      'staging',
      'prod',
      'alpha',
      'qa',
    ]);
  });
});

describe('formatStatus', () => {
  it('TAB-U3: one row per environment', () => {
    const lines = formatStatus([
      { env: 'dev', summary: summary('dev') },
      {
        env: 'staging',
        summary: summary('staging', { anchorSha: 'a12a8eb3', fromEnv: 'dev', promotedAt: '2026-10-19T08:15:00Z' }),
      },
    ]);

    expect(lines).toEqual([
      'ENV      TAG  ANCHOR    FROM  PROMOTED AT',
      'dev      v2   -         -     -',
      'staging  v2   a12a8eb3  dev   2026-10-19T08:15:00Z',
    ]);
  });

  it('TAB-U3b: an unreadable record shows why', () => {
    expect(formatStatus([{ env: 'prod', error: 'bad' }])[1]).toBe('prod  unreadable: bad');
  });
});

describe('history', () => {
  const commits: CommitInfo[] = [
    {
      sha: 'c0ffee00c0ffee00c0ffee00c0ffee00c0ffee00',
      author: 'Test Operator',
      date: '2026-10-19T08:15:00+00:00',
      subject: 'chore(gitops): promote hello-web dev→staging tag=v2 anchor=a12a8eb3',
    },
    {
      sha: '1111111111111111111111111111111111111111',
      author: 'ci-bot',
      date: '2026-10-19T08:00:00+00:00',
      subject: 'ci: bump hello-web dev to v2',
    },
    {
      sha: '2222222222222222222222222222222222222222',
      author: 'Test Operator',
      date: '2026-10-18T17:00:00+00:00',
      subject: 'chore(gitops): promote api staging→prod tag=v9 anchor=0badc0de',
    },
  ];

  it('TAB-U4: parses promotion subjects and skips other commits', () => {
    expect(promotionCommits(commits).map((c) => c.sha.slice(0, 4))).toEqual(['c0ff', '2222']);
    expect(promotionCommits(commits, 'hello-web')).toEqual([
      {
        sha: 'c0ffee00c0ffee00c0ffee00c0ffee00c0ffee00',
        date: '2026-10-19T08:15:00+00:00',
        author: 'Test Operator',
        app: 'hello-web',
        fromEnv: 'dev',
        toEnv: 'staging',
        tag: 'v2',
        anchorSha: 'a12a8eb3',
      },
    ]);
  });

  it('TAB-U4b: renders one row per promotion', () => {
    const lines = formatHistory(promotionCommits(commits, 'hello-web'));

    expect(lines).toHaveLength(2);
    expect(lines[1]).toBe(
      'c0ffee00c0ff  2026-10-19T08:15:00+00:00  hello-web  dev→staging  v2   a12a8eb3  Test Operator',
    );
  });
});

describe('formatLogEvent', () => {
  const base: PromotionLogEvent = {
    event_id: '01JAB0000000000000000000000',
    app: 'hello-web',
    from_env: 'dev',
    to_env: 'staging',
    timestamp: '2026-10-19T08:15:00.000Z',
  };

  it('TAB-U5: a promoted entry shows image, anchor and commit', () => {
    const line = formatLogEvent({
      ...base,
      outcome: PromotionLogOutcome.Promoted,
      error_kind: null,
      image: 'registry.example.com/hello-web:v2',
      anchor_sha: 'a12a8eb3',
      commit_sha: 'c0ffee00c0ffee00c0ffee00c0ffee00c0ffee00',
    });

    expect(line).toBe(
      '2026-10-19T08:15:00.000Z  Promoted  hello-web dev→staging  ' +
        'registry.example.com/hello-web:v2 anchor=a12a8eb3 commit=c0ffee00c0ff',
    );
  });

  it('TAB-U5b: a rejected entry shows the error kind and message', () => {
    const line = formatLogEvent({
      ...base,
      outcome: PromotionLogOutcome.Rejected,
      error_kind: PromotionErrorKind.BrokenChain,
      message: 'staging has no promotion anchor',
    });

    expect(line).toBe(
      '2026-10-19T08:15:00.000Z  Rejected  hello-web dev→staging  BrokenChain: staging has no promotion anchor',
    );
  });
});
