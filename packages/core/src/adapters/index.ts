/**
 * Promote Core — Capability Interfaces
 *
 * The promotion workflow performs all I/O through the capabilities declared
 * here. Nothing in @promote/core shells out, touches the filesystem, or reads
 * the clock directly; implementations are injected.
 *
 * Concrete implementations (git CLI, YAML files) live in
 * @promote/runtime-host. Tests inject in-memory fakes.
 */

import type { FieldAssignment, FieldPath } from '../types/record.js';

// ---------------------------------------------------------------------------
// Version control
// ---------------------------------------------------------------------------

/** One entry of a path-scoped history query. */
export interface CommitInfo {
  /** Full revision identifier. */
  readonly sha: string;
  readonly author: string;
  /** ISO-8601 author date. */
  readonly date: string;
  /** First line of the commit message. */
  readonly subject: string;
}

/**
 * Version-control operations the workflow depends on.
 *
 * All paths are absolute paths inside the working copy.
 */
export interface VersionControl {
  /**
   * True if `path` differs from its last committed version, counting both
   * staged and unstaged modifications of that single path.
   */
  isDirty(path: string): Promise<boolean>;

  /** Full revision id of the most recent commit that modified `path`, or null if none. */
  lastRevision(path: string): Promise<string | null>;

  /**
   * Stage and commit exactly `paths`, leaving anything else in the index
   * out of the commit. Resolves to the new commit's full revision id.
   */
  commit(paths: ReadonlyArray<string>, message: string): Promise<string>;

  /** Push the current branch head to `remote`/`branch`. */
  push(remote: string, branch: string): Promise<void>;

  /** True if `revision` names a commit whose change set includes `path`. */
  commitTouches(revision: string, path: string): Promise<boolean>;

  /** Most recent commits, newest first, optionally restricted to `path`. */
  log(path: string | undefined, limit: number): Promise<ReadonlyArray<CommitInfo>>;
}

// ---------------------------------------------------------------------------
// Structured records
// ---------------------------------------------------------------------------

/**
 * Field-level access to record documents.
 *
 * Implementations must raise PromotionError(MalformedRecord) when a document
 * cannot be parsed, and must preserve every node they are not asked to write.
 */
export interface RecordStore {
  exists(path: string): Promise<boolean>;

  /**
   * Read a scalar field as a string. Resolves to undefined when the field or
   * any ancestor is absent, or the value is null.
   */
  readField(path: string, field: FieldPath): Promise<string | undefined>;

  /** Replace the given fields in one write, creating intermediate mappings as needed. */
  writeFields(path: string, fields: ReadonlyArray<FieldAssignment>): Promise<void>;

  /** Raw document text, used to restore a record after a failed commit. */
  readText(path: string): Promise<string>;

  restoreText(path: string, text: string): Promise<void>;
}

// ---------------------------------------------------------------------------
// Clock
// ---------------------------------------------------------------------------

export interface Clock {
  now(): Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};

// ---------------------------------------------------------------------------
// Bundle
// ---------------------------------------------------------------------------

/** Everything a PromotionWorkflow needs injected. */
export interface PromotionCapabilities {
  readonly vcs: VersionControl;
  readonly store: RecordStore;
  readonly clock: Clock;
}
