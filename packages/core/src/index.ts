/**
 * @promote/core
 *
 * Git-SHA-anchored promotion engine: record types, error taxonomy, capability
 * interfaces, and the resolver → guards → anchor writer → commit publisher
 * workflow.
 *
 * This package is side-effect free. It contains no imports of node:fs,
 * node:child_process, node:net, or any other I/O API. Concrete capabilities
 * live in @promote/runtime-host.
 */

// Types
export type {
  FieldAssignment,
  FieldPath,
  RecordLayout,
  RecordLocation,
  RecordSummary,
} from './types/record.js';
export { PROMOTION_FIELDS, RecordField, formatFieldPath } from './types/record.js';

export type {
  PromoteOptions,
  PromotionContext,
  PromotionOutcome,
  PromotionPlan,
  PromotionRequest,
  PromotionResult,
  PublishReceipt,
  SourceImage,
} from './types/promotion.js';

export type { PromotionErrorDetails, PublishStage } from './types/errors.js';
export {
  PromotionError,
  PromotionErrorKind,
  REJECTION_KINDS,
  describeError,
  isPromotionError,
} from './types/errors.js';

export type { PromotionLogEntry } from './types/log.js';
export { PromotionLogOutcome } from './types/log.js';

// Capability interfaces (implementations live in runtime-host)
export type {
  Clock,
  CommitInfo,
  PromotionCapabilities,
  RecordStore,
  VersionControl,
} from './adapters/index.js';
export { systemClock } from './adapters/index.js';

// Log sink interface (implementation lives in runtime-host)
export type { LogSink } from './logging/log-sink.js';
export type { AttemptEnd } from './logging/promotion-log.js';
export { PromotionLogger, promotionLogEntry } from './logging/promotion-log.js';

// Stages
export { assertSegment, recordPath, resolveRecord } from './resolver/environment-resolver.js';
export type { GuardInput, GuardReport } from './guards/evaluator.js';
export { GuardName, evaluateGuards } from './guards/evaluator.js';
export {
  anchorAssignments,
  buildPlan,
  formatPromotedAt,
  readSourceImage,
  shortRevision,
  writeAnchor,
} from './anchor/writer.js';
export type { AnchorVerification } from './anchor/inspect.js';
export { readSummary, verifyAnchor } from './anchor/inspect.js';
export type { PromotionMessage } from './publish/commit-message.js';
export {
  PROMOTION_COMMIT_PREFIX,
  formatPromotionMessage,
  parsePromotionMessage,
} from './publish/commit-message.js';
export type { PublishDestination } from './publish/commit-publisher.js';
export { CommitPublisher } from './publish/commit-publisher.js';

// Workflow
export { PromotionWorkflow } from './workflow/promotion-workflow.js';
