import type { Settings } from '@/config/schema.js';
import type { EngineRegistry } from '@/engine/engine-registry.js';
import type { Logger } from '@/observability/logger.js';
import type { MaintenanceScheduler } from '@/scheduling/maintenance-scheduler.js';
import type { StreamCoordinator } from '@/streaming/stream-coordinator.js';
import type { TimeoutHierarchy } from '@/streaming/timeout-hierarchy.js';

// ─── API Response Envelope ───────────────────────────────────────

export interface ApiResponse<T> {
  success: boolean;
  data?: T;
  error?: ApiError;
}

export interface ApiError {
  code: string;
  message: string;
  details?: Record<string, unknown>;
}

// ─── Chat Response ──────────────────────────────────────────────

/** One tool invocation of a buffered run. */
export interface ChatToolCall {
  id?: string;
  name: string;
  input?: unknown;
  output?: unknown;
  error?: true;
}

export interface ChatResponse {
  thread_id: string;
  trace_id: string;
  state: string;
  /** Text of the last model call. */
  response: string;
  tool_calls: ChatToolCall[];
  /** Every wire message of the run, the terminal event included. */
  events: unknown[];
  /** HITL interrupt when the run paused for approval. */
  interrupt?: unknown;
}

// ─── Route Dependencies (DI) ───────────────────────────────────

/** Dependencies injected into all route plugins via Fastify register options. */
export interface RouteDependencies {
  coordinator: StreamCoordinator;
  engines: EngineRegistry;
  timeouts: TimeoutHierarchy;
  maintenance: MaintenanceScheduler;
  settings: Pick<
    Settings,
    'heartbeatIntervalSeconds' | 'httpTransportEnabled' | 'streamTimeoutSeconds' | 'hitlEnabled'
  >;
  logger: Logger;
}
