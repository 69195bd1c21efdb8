/**
 * Promote Runtime Host — YAML Record Store
 *
 * Implements the RecordStore capability from @promote/core over YAML files,
 * using the `yaml` package's Document API so that comments, key order and
 * formatting of everything the promotion does not write are preserved.
 *
 * Writes take one of two routes:
 *
 *   1. In-place patch: when every target field already exists as a simple
 *      scalar, only the bytes of those scalars are replaced. The rest of the
 *      file is untouched byte for byte.
 *   2. Document rewrite: when a field or one of its parent mappings has to be
 *      created, the parsed Document is edited and re-serialized.
 *
 * Either way the new text is re-parsed and compared with the old content plus
 * the assignments; any other difference is refused as MalformedRecord, so a
 * write can never lose data. Files are replaced atomically (temp file +
 * rename in the same directory).
 */

import type { Dirent } from 'node:fs';
import { readFile, readdir, rename, rm, stat, writeFile } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { isDeepStrictEqual } from 'node:util';
import { Scalar, isAlias, isMap, isScalar, parse, parseDocument, type Document } from 'yaml';
import {
  PromotionError,
  PromotionErrorKind,
  formatFieldPath,
  type FieldAssignment,
  type FieldPath,
  type RecordLayout,
  type RecordStore,
} from '@promote/core';
import { isNodeError } from '../state/state-io.js';

type PlainMap = { [key: string]: unknown };

export class YamlRecordStore implements RecordStore {
  async exists(path: string): Promise<boolean> {
    try {
      return (await stat(path)).isFile();
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) return false;
      throw err;
    }
  }

  async readField(path: string, field: FieldPath): Promise<string | undefined> {
    const doc = parseRecord(path, await this.readText(path));
    const node = leafNode(doc, field);
    if (node === undefined || node === null) return undefined;
    if (!isScalar(node)) {
      throw malformed(path, `${formatFieldPath(field)} is not a scalar`);
    }
    return scalarText(path, field, node);
  }

  async writeFields(path: string, fields: ReadonlyArray<FieldAssignment>): Promise<void> {
    const original = await this.readText(path);
    const doc = parseRecord(path, original);
    for (const { path: field } of fields) assertWritable(path, doc, field);

    const expected: unknown = doc.toJS();
    applyToPlain(expected, fields);

    const patched = patchScalars(doc, original, fields);
    if (patched !== null && sameContent(patched, expected)) {
      await replaceFile(path, patched);
      return;
    }

    const rewritten = rewriteDocument(doc, fields);
    if (!sameContent(rewritten, expected)) {
      throw malformed(path, 'rewriting the record would change fields outside the promotion');
    }
    await replaceFile(path, rewritten);
  }

  async readText(path: string): Promise<string> {
    return readFile(path, 'utf-8');
  }

  async restoreText(path: string, text: string): Promise<void> {
    await replaceFile(path, text);
  }

  /**
   * Environments of `app` that have a record file, sorted by name.
   * Returns an empty list when the app directory does not exist.
   */
  async listEnvironments(layout: RecordLayout, app: string): Promise<string[]> {
    const appDir = join(layout.repoRoot, layout.recordsDir, app);
    let entries: Dirent[];
    try {
      entries = await readdir(appDir, { withFileTypes: true });
    } catch (err: unknown) {
      if (isNodeError(err, 'ENOENT') || isNodeError(err, 'ENOTDIR')) return [];
      throw err;
    }

    const envs: string[] = [];
    for (const entry of entries) {
      if (entry.isDirectory() && (await this.exists(join(appDir, entry.name, layout.recordFile)))) {
        envs.push(entry.name);
      }
    }
    return envs.sort();
  }
}

// ---------------------------------------------------------------------------
// Parsing
// ---------------------------------------------------------------------------

function parseRecord(path: string, text: string): Document {
  const doc = parseDocument(text);
  const [firstError] = doc.errors;
  if (firstError !== undefined) {
    throw malformed(path, `invalid YAML: ${firstError.message}`);
  }
  if (!isMap(doc.contents)) {
    throw malformed(path, 'top level is not a mapping');
  }
  return doc;
}

/** The node at `field`, with an alias (`tag: *defaultTag`) resolved to its anchor. */
function leafNode(doc: Document, field: FieldPath): unknown {
  const node: unknown = doc.getIn(field, true);
  return isAlias(node) ? node.resolve(doc) : node;
}

/**
 * String form of a scalar as written in the file. Numbers keep their source
 * text, so a tag written as `1.10` reads back as "1.10", not "1.1".
 */
function scalarText(path: string, field: FieldPath, node: Scalar): string | undefined {
  const { value } = node;
  if (value === null || value === undefined) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'bigint' || typeof value === 'boolean') {
    return node.source ?? String(value);
  }
  throw malformed(path, `${formatFieldPath(field)} is not a string or number`);
}

/**
 * Every parent of `field` must be a mapping or absent; the field itself a
 * scalar, an alias of one, or absent. An alias leaf is replaced by the
 * rewrite; its anchor keeps its value.
 */
function assertWritable(path: string, doc: Document, field: FieldPath): void {
  for (let depth = 1; depth < field.length; depth++) {
    const parent = field.slice(0, depth);
    const node: unknown = doc.getIn(parent, true);
    if (node === undefined || isMap(node) || isNullScalar(node)) continue;
    throw malformed(path, `${parent.join('.')} is not a mapping`);
  }
  const leaf = leafNode(doc, field);
  if (leaf !== undefined && !isScalar(leaf)) {
    throw malformed(path, `${formatFieldPath(field)} is not a scalar`);
  }
}

function isNullScalar(node: unknown): boolean {
  return isScalar(node) && (node.value === null || node.value === undefined);
}

// ---------------------------------------------------------------------------
// In-place patch
// ---------------------------------------------------------------------------

/**
 * Replace the source bytes of each target scalar. Returns null when any
 * field cannot be patched in place (absent, null, an alias, anchored, tagged,
 * or a block scalar).
 */
function patchScalars(doc: Document, original: string, fields: ReadonlyArray<FieldAssignment>): string | null {
  const edits: Array<{ start: number; end: number; text: string }> = [];

  for (const { path: field, value } of fields) {
    const node: unknown = doc.getIn(field, true);
    if (!isScalar(node) || isNullScalar(node)) return null;
    if (node.anchor !== undefined || node.tag !== undefined) return null;
    if (node.range === undefined || node.range === null) return null;

    const text = renderScalar(node.type, value);
    if (text === null) return null;
    const [start, end] = node.range;
    edits.push({ start, end, text });
  }

  let result = original;
  for (const edit of edits.sort((a, b) => b.start - a.start)) {
    result = result.slice(0, edit.start) + edit.text + result.slice(edit.end);
  }
  return result;
}

/** Render `value` in the quoting style of the scalar it replaces. */
function renderScalar(type: Scalar.Type | undefined, value: string): string | null {
  if (value.includes('\n')) return null;
  switch (type) {
    case Scalar.QUOTE_DOUBLE:
      return JSON.stringify(value);
    case Scalar.QUOTE_SINGLE:
      return `'${value.replaceAll("'", "''")}'`;
    case Scalar.PLAIN:
    case undefined:
      return isPlainSafe(value) ? value : JSON.stringify(value);
    default:
      return null;
  }
}

const PLAIN_CHARS = /^[A-Za-z0-9_./][A-Za-z0-9_./:@+-]*$/;

/**
 * True if `value` can be written unquoted and still reads back as the same
 * string under both YAML 1.2 and 1.1 resolution (so `1.10`, `true`, `yes`
 * and `null` are quoted).
 */
function isPlainSafe(value: string): boolean {
  if (!PLAIN_CHARS.test(value)) return false;
  const v12: unknown = parse(value);
  const v11: unknown = parse(value, { version: '1.1' });
  return v12 === value && v11 === value;
}

// ---------------------------------------------------------------------------
// Document rewrite
// ---------------------------------------------------------------------------

function rewriteDocument(doc: Document, fields: ReadonlyArray<FieldAssignment>): string {
  const working = doc.clone();
  for (const { path: field, value } of fields) {
    for (let depth = 1; depth < field.length; depth++) {
      const parent = field.slice(0, depth);
      if (isNullScalar(working.getIn(parent, true))) {
        working.setIn(parent, working.createNode({}));
      }
    }
    working.setIn(field, value);
  }
  return working.toString({ lineWidth: 0 });
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

function isPlainMap(value: unknown): value is PlainMap {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Apply the assignments to the plain-object form of a document. */
function applyToPlain(root: unknown, fields: ReadonlyArray<FieldAssignment>): void {
  for (const { path: field, value } of fields) {
    if (!isPlainMap(root)) return;
    let node: PlainMap = root;
    for (const key of field.slice(0, -1)) {
      const next = node[key];
      if (isPlainMap(next)) {
        node = next;
      } else {
        const created: PlainMap = {};
        node[key] = created;
        node = created;
      }
    }
    const leaf = field[field.length - 1] ?? field[0];
    node[leaf] = value;
  }
}

function sameContent(text: string, expected: unknown): boolean {
  const reparsed = parseDocument(text);
  if (reparsed.errors.length > 0) return false;
  const actual: unknown = reparsed.toJS();
  return isDeepStrictEqual(actual, expected);
}

// ---------------------------------------------------------------------------
// File replacement
// ---------------------------------------------------------------------------

/** Write `text` to a sibling temp file, then rename it over `path`. */
async function replaceFile(path: string, text: string): Promise<void> {
  const { mode } = await stat(path);
  const tmp = join(dirname(path), `.${basename(path)}.${process.pid}.tmp`);
  try {
    await writeFile(tmp, text, { encoding: 'utf-8', mode });
    await rename(tmp, path);
  } catch (err: unknown) {
    await rm(tmp, { force: true });
    throw err;
  }
}

function malformed(path: string, detail: string): PromotionError {
  return new PromotionError(PromotionErrorKind.MalformedRecord, `${path}: ${detail}`, { path });
}
