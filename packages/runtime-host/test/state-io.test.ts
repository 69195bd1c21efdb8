/**
 * Promote Runtime Host — StateIO Tests
 *
 *   SIO-U1: MemoryStateIO returns '' for a log that was never written
 *   SIO-U2: MemoryStateIO raw content is the lines joined with '\n', newline-terminated
 *   SIO-U3: FileStateIO returns '' for a missing log file
 *   SIO-U4: FileStateIO appends under <home>/logs and reads the raw content back
 *   SIO-U5: describe names where a log lives
 */

import { describe, it, expect } from 'vitest';
import { existsSync, mkdtempSync, readFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { FileStateIO, MemoryStateIO } from '../src/state/state-io.js';

describe('MemoryStateIO', () => {
  it('SIO-U1: returns an empty string for an unwritten log', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('other.jsonl', 'line');

    expect(stateIO.readLogRaw('promotions.jsonl')).toBe('');
  });

  it('SIO-U2: joins lines with a terminal newline', () => {
    const stateIO = new MemoryStateIO();
    stateIO.appendLine('promotions.jsonl', '{"event_id":"A"}');
    stateIO.appendLine('promotions.jsonl', '{"event_id":"B"}');

    expect(stateIO.readLogRaw('promotions.jsonl')).toBe('{"event_id":"A"}\n{"event_id":"B"}\n');
    expect(stateIO.readLines('promotions.jsonl')).toEqual(['{"event_id":"A"}', '{"event_id":"B"}']);
  });
});

describe('FileStateIO', () => {
  it('SIO-U3: returns an empty string when the log does not exist', () => {
    const home = mkdtempSync(join(tmpdir(), 'promote-sio-'));

    expect(new FileStateIO(home).readLogRaw('promotions.jsonl')).toBe('');
  });

  it('SIO-U4: creates the logs directory and appends newline-terminated lines', () => {
    const home = mkdtempSync(join(tmpdir(), 'promote-sio-'));
    const stateIO = new FileStateIO(home);

    stateIO.appendLine('promotions.jsonl', 'one');
    stateIO.appendLine('promotions.jsonl', 'two');

    const logPath = join(home, 'logs', 'promotions.jsonl');
    expect(existsSync(logPath)).toBe(true);
    expect(readFileSync(logPath, 'utf-8')).toBe('one\ntwo\n');
    expect(stateIO.readLogRaw('promotions.jsonl')).toBe('one\ntwo\n');
  });

  it('SIO-U5: describes the log file path', () => {
    const home = mkdtempSync(join(tmpdir(), 'promote-sio-'));

    expect(new FileStateIO(home).describe('promotions.jsonl')).toBe(join(home, 'logs', 'promotions.jsonl'));
    expect(new MemoryStateIO().describe('promotions.jsonl')).toBe('memory:promotions.jsonl');
  });
});
