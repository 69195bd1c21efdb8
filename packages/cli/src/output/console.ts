/**
 * Line-oriented console output. Formatters return plain strings; colour is
 * applied here or by the caller, never inside a formatter.
 */

import type { ChalkInstance } from 'chalk';

export function printLines(lines: ReadonlyArray<string>, color?: ChalkInstance): void {
  for (const line of lines) {
    // eslint-disable-next-line no-console
    console.log(color === undefined ? line : color(line));
  }
}

export function printErrorLines(lines: ReadonlyArray<string>, color?: ChalkInstance): void {
  for (const line of lines) {
    // eslint-disable-next-line no-console
    console.error(color === undefined ? line : color(line));
  }
}

export function printJson(value: unknown): void {
  // eslint-disable-next-line no-console
  console.log(JSON.stringify(value, null, 2));
}
