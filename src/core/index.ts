// Core module — shared types, errors and result helpers
export type {
  CheckpointId,
  JsonObject,
  JsonPrimitive,
  JsonValue,
  RequestId,
  RunSession,
  RunState,
  TerminalReason,
  ThreadId,
  TraceId,
} from './types.js';

export type { Result } from './result.js';
export { ok, err, unwrap } from './result.js';

export type { TimeoutInvariantViolation } from './errors.js';
export {
  ConduitError,
  ValidationError,
  ConfigInvariantError,
  TimeoutExceededError,
  ToolExecutionError,
  ToolNotFoundError,
  ProviderError,
  ThreadNotFoundError,
  NoPendingApprovalError,
  EngineNotFoundError,
} from './errors.js';

export { createAsyncMemo } from './memo.js';
export type { AsyncMemo } from './memo.js';
