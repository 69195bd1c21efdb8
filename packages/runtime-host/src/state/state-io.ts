/**
 * Promote Runtime Host — StateIO
 *
 * Append-only audit files kept in `<home>/logs/`. FileStateIO writes them to
 * disk; MemoryStateIO keeps them in memory for tests.
 */

import { appendFileSync, mkdirSync, readFileSync } from 'node:fs';
import { join } from 'node:path';

/** Audit file access by bare filename (`promotions.jsonl`), never by path. */
export interface StateIO {
  /** Append `line` and a newline. */
  appendLine(file: string, line: string): void;

  /** Whole content of `file`; '' when it was never written. */
  readLogRaw(file: string): string;

  /** Where `file` lives, for messages. */
  describe(file: string): string;
}

export class FileStateIO implements StateIO {
  readonly logsDir: string;

  constructor(homeDir: string) {
    this.logsDir = join(homeDir, 'logs');
  }

  appendLine(file: string, line: string): void {
    // Synchronous: the entry is on disk before the command exits.
    mkdirSync(this.logsDir, { recursive: true });
    appendFileSync(this.describe(file), `${line}\n`, 'utf-8');
  }

  readLogRaw(file: string): string {
    try {
      return readFileSync(this.describe(file), 'utf-8');
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT')) return '';
      throw err;
    }
  }

  describe(file: string): string {
    return join(this.logsDir, file);
  }
}

export class MemoryStateIO implements StateIO {
  private readonly contents = new Map<string, string>();

  appendLine(file: string, line: string): void {
    this.contents.set(file, `${this.readLogRaw(file)}${line}\n`);
  }

  readLogRaw(file: string): string {
    return this.contents.get(file) ?? '';
  }

  describe(file: string): string {
    return `memory:${file}`;
  }

  /** Appended lines, without their newlines. */
  readLines(file: string): string[] {
    return this.readLogRaw(file).split('\n').filter((line) => line !== '');
  }
}

/** Narrow an unknown error to a Node.js errno exception with a specific code. */
export function isNodeError(err: unknown, code: string): err is NodeJS.ErrnoException {
  return err instanceof Error && 'code' in err && err.code === code;
}
