import type { z } from 'zod';

import type { ConduitError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import type { ThreadId, TraceId } from '@/core/types.js';

// ─── Risk Levels ────────────────────────────────────────────────

export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

/** Deadline scope a tool runs under. Network-bound search tools get the tighter one. */
export type ToolTimeoutScope = 'tool' | 'web_search';

// ─── Tool Definition ────────────────────────────────────────────

export interface ToolDefinition {
  readonly id: string;
  readonly name: string;
  readonly description: string;
  readonly category: string;
  readonly inputSchema: z.ZodType;
  readonly riskLevel: RiskLevel;
  /** Pauses the run for a human decision when HITL is enabled. */
  readonly requiresApproval: boolean;
  readonly sideEffects: boolean;
  readonly timeoutScope: ToolTimeoutScope;
}

// ─── Execution ──────────────────────────────────────────────────

export interface ToolContext {
  threadId: ThreadId;
  traceId?: TraceId;
  /** Aborts when the run is cancelled or the tool's deadline passes. */
  signal: AbortSignal;
}

export interface ToolResult {
  success: boolean;
  output: unknown;
  durationMs: number;
  metadata?: Record<string, unknown>;
}

export interface ExecutableTool extends ToolDefinition {
  /** Execute the tool. Input has already been validated against `inputSchema`. */
  execute(input: unknown, context: ToolContext): Promise<Result<ToolResult, ConduitError>>;
}
