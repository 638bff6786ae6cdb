/**
 * Fake tool implementations for testing.
 */
import { z } from 'zod';

import type { ConduitError } from '@/core/errors.js';
import { ToolExecutionError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import type { ThreadId } from '@/core/types.js';
import type { ExecutableTool, ToolContext, ToolResult, ToolTimeoutScope } from '@/tools/types.js';

const echoInput = z.object({ message: z.string() });

/** A minimal echo tool for testing. Low risk, no approval required. */
export function createEchoTool(): ExecutableTool {
  return {
    id: 'echo',
    name: 'Echo',
    description: 'Echoes the input message back.',
    category: 'utility',
    inputSchema: echoInput,
    riskLevel: 'low',
    requiresApproval: false,
    sideEffects: false,
    timeoutScope: 'tool',

    execute(input: unknown): Promise<Result<ToolResult, ConduitError>> {
      const parsed = echoInput.parse(input);
      return Promise.resolve(ok({ success: true, output: { echo: parsed.message }, durationMs: 1 }));
    },
  };
}

const dangerousInput = z.object({ target: z.string() });

/** A high-risk tool that requires approval. For testing HITL interrupts. */
export function createDangerousTool(): ExecutableTool {
  return {
    id: 'dangerous-action',
    name: 'Dangerous Action',
    description: 'A high-risk tool that requires human approval.',
    category: 'admin',
    inputSchema: dangerousInput,
    riskLevel: 'high',
    requiresApproval: true,
    sideEffects: true,
    timeoutScope: 'tool',

    execute(input: unknown): Promise<Result<ToolResult, ConduitError>> {
      const parsed = dangerousInput.parse(input);
      return Promise.resolve(ok({ success: true, output: { executed: parsed.target }, durationMs: 5 }));
    },
  };
}

/** A tool that always returns a ToolExecutionError. */
export function createFailingTool(): ExecutableTool {
  return {
    id: 'failing',
    name: 'Failing',
    description: 'Always fails.',
    category: 'utility',
    inputSchema: z.object({}),
    riskLevel: 'low',
    requiresApproval: false,
    sideEffects: false,
    timeoutScope: 'tool',

    execute(): Promise<Result<ToolResult, ConduitError>> {
      return Promise.resolve(err(new ToolExecutionError('failing', 'bad input')));
    },
  };
}

/** A tool that never settles until its signal aborts. */
export function createHangingTool(timeoutScope: ToolTimeoutScope = 'tool'): ExecutableTool {
  return {
    id: 'hanging',
    name: 'Hanging',
    description: 'Waits until aborted.',
    category: 'utility',
    inputSchema: z.object({}),
    riskLevel: 'low',
    requiresApproval: false,
    sideEffects: false,
    timeoutScope,

    execute(_input: unknown, context: ToolContext): Promise<Result<ToolResult, ConduitError>> {
      return new Promise((_resolve, reject) => {
        context.signal.addEventListener('abort', () => reject(context.signal.reason), { once: true });
      });
    },
  };
}

/** Build a ToolContext with a fresh, unaborted signal. */
export function createToolContext(overrides?: Partial<ToolContext>): ToolContext {
  return {
    threadId: 'thread-1' as ThreadId,
    signal: new AbortController().signal,
    ...overrides,
  };
}
