// Agent engine — raw event source for the streaming pipeline
export type {
  AgentEngine,
  ApprovalAction,
  ApprovalDecision,
  EngineInput,
  PendingApproval,
  RawEngineEvent,
  StreamEventsOptions,
  ThreadState,
} from './types.js';
export * from './messages.js';
export { createAgentEngine, NOT_APPROVED_MESSAGE } from './agent-engine.js';
export type { AgentEngineOptions } from './agent-engine.js';
export { createEngineRegistry } from './engine-registry.js';
export type { EngineFactory, EngineRegistry } from './engine-registry.js';
export { readEngineState, toThreadState, writeEngineState } from './thread-state.js';
export type { EngineState } from './thread-state.js';
