// ─── Logging ────────────────────────────────────────────────────

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'fatal';

export interface LogContext {
  threadId?: string;
  traceId?: string;
  requestId?: string;
  component: string;
  [key: string]: unknown;
}
