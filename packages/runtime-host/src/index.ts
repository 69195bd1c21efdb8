/**
 * @promote/runtime-host
 *
 * Concrete capabilities for @promote/core: git over the CLI, YAML record
 * files, the JSONL promotion log, home directory and configuration
 * resolution.
 */

export type { ExecAdapter, ExecOptions, ExecResult } from './adapters/exec.js';
export { NodeExecAdapter } from './adapters/exec.js';

export { GitVersionControl, parseLog } from './git/git-version-control.js';
export { YamlRecordStore } from './records/yaml-record-store.js';

export type { StateIO } from './state/state-io.js';
export { FileStateIO, MemoryStateIO, isNodeError } from './state/state-io.js';

export { FileLogSink, PROMOTION_LOG_FILE } from './logging/file-log-sink.js';
export type { LogFilter, LogReadResult, LogReadStats, PromotionLogEvent } from './logging/log-reader.js';
export { filterEvents, readLog } from './logging/log-reader.js';
export { ulid } from './logging/ulid.js';

export type { ResolvePromoteHomeOptions } from './home.js';
export { resolvePromoteHome } from './home.js';

export type { LoadConfigOptions, PromoteConfig, PromoteConfigInput } from './config/config.js';
export { CONFIG_ENV_VARS, CONFIG_FILENAME, PromoteConfigSchema, loadConfig } from './config/config.js';
