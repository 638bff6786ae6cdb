// Streaming module — normalization, timeouts, cancellation and run coordination
export type {
  ChainEndPayload,
  ChatModelEndPayload,
  ChatModelStreamPayload,
  DegradedPayload,
  ErrorPayload,
  MessageChunkPayload,
  NamedPayload,
  ToolCallPayload,
  WireEvent,
  WireEventKind,
  WireEventMetadata,
  WireMessage,
} from './wire-events.js';
export {
  WIRE_EVENT_KINDS,
  isDegradedPayload,
  serializeWireEvent,
  toWireMessage,
  withMetadata,
} from './wire-events.js';

export { serializeChunk, serializeMessage, summarizeValue, toSafeValue } from './safe-value.js';

export type { RelayedKind } from './event-normalizer.js';
export {
  DEGRADED_EVENT_MESSAGE,
  INTERRUPT_KEY,
  LEGACY_TOOL_EVENT_NAMES,
  normalizeEvent,
  wireKindOf,
} from './event-normalizer.js';

export type { TimeoutHierarchy, TimeoutScope, TimeoutScopeName } from './timeout-hierarchy.js';
export {
  createTimeoutHierarchy,
  findTimeoutViolations,
  validateTimeoutHierarchy,
  withDeadline,
} from './timeout-hierarchy.js';

export type { CancellationCause } from './cancellation.js';
export { CancellationScope, describeCancellation } from './cancellation.js';

export type { LateSignalClass, RunRaceGuard } from './checkpoint-race-guard.js';
export {
  cleanupExpiredCheckpoints,
  cleanupFalseErrors,
  createRunRaceGuard,
} from './checkpoint-race-guard.js';

export type {
  EngineResolver,
  EventSink,
  RunOutcome,
  RunRequest,
  StreamCoordinator,
  StreamCoordinatorOptions,
  TerminalReason,
} from './stream-coordinator.js';
export { createStreamCoordinator } from './stream-coordinator.js';
