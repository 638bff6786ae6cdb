/**
 * Agent run routes — run status per thread and HITL decisions.
 *
 * Status is derived from the thread's latest checkpoint: `running` while a
 * tool call waits for approval, otherwise `completed`. A decision is stored
 * on the thread and applied when the next message resumes the run.
 * `/respond` is a shorthand for `/approve` with the respond action.
 */
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { ValidationError } from '@/core/errors.js';
import type { ThreadId } from '@/core/types.js';
import type { ApprovalDecision, ThreadState } from '@/engine/types.js';
import type { RouteDependencies } from '../types.js';
import { sendSuccess, sendNotFound } from '../error-handler.js';

// ─── Zod Schemas ────────────────────────────────────────────────

const agentQuerySchema = z.object({
  agent: z.string().trim().min(1).optional(),
});

const approvalRequestSchema = z
  .object({
    run_id: z.string().trim().min(1),
    thread_id: z.string().trim().min(1),
    action: z.enum(['accept', 'respond', 'edit']),
    response_text: z.string().trim().min(1).optional(),
    tool_edits: z.record(z.unknown()).optional(),
  })
  .superRefine((value, ctx) => {
    if (value.action === 'respond' && value.response_text === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['response_text'],
        message: 'response_text is required for the respond action',
      });
    }
    if (value.action === 'edit' && value.tool_edits === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['tool_edits'],
        message: 'tool_edits is required for the edit action',
      });
    }
  });

type ApprovalRequestBody = z.infer<typeof approvalRequestSchema>;

/** `/respond` always records a respond decision, whatever `action` says. */
const respondRequestSchema = z.object({
  run_id: z.string().trim().min(1),
  thread_id: z.string().trim().min(1),
  action: z.enum(['accept', 'respond', 'edit']).optional(),
  response_text: z.string().trim().min(1, 'response_text cannot be empty'),
});

// ─── Response Shapes ────────────────────────────────────────────

export type AgentRunStatus = 'running' | 'completed';

export interface AgentRunInfo {
  thread_id: string;
  run_id: string;
  status: AgentRunStatus;
  message_count: number;
  updated_at: string;
  pending_approval?: {
    tool_call_id: string;
    tool_name: string;
    args: Record<string, unknown>;
    description: string;
    requested_at: string;
  };
}

export interface DecisionRecorded {
  thread_id: string;
  run_id: string;
  action: ApprovalRequestBody['action'];
  status: 'running';
  checkpoint_id: string;
}

export function toRunInfo(state: ThreadState): AgentRunInfo {
  const info: AgentRunInfo = {
    thread_id: state.threadId,
    run_id: state.checkpointId,
    status: state.pendingApproval ? 'running' : 'completed',
    message_count: state.messageCount,
    updated_at: state.updatedAt.toISOString(),
  };
  if (state.pendingApproval) {
    const { toolCall, description, requestedAt } = state.pendingApproval;
    info.pending_approval = {
      tool_call_id: toolCall.id,
      tool_name: toolCall.name,
      args: toolCall.args,
      description,
      requested_at: requestedAt,
    };
  }
  return info;
}

function toDecision(body: ApprovalRequestBody): ApprovalDecision {
  const decision: ApprovalDecision = { action: body.action };
  if (body.action === 'respond') decision.responseText = body.response_text;
  if (body.action === 'edit') decision.toolEdits = body.tool_edits;
  return decision;
}

// ─── Route Plugin ───────────────────────────────────────────────

/** Register agent run routes. */
export function agentRoutes(
  fastify: FastifyInstance,
  deps: RouteDependencies,
): void {
  const { engines, logger } = deps;

  // GET /agents/:threadId: run status from the latest checkpoint
  fastify.get<{ Params: { threadId: string } }>(
    '/agents/:threadId',
    async (request, reply) => {
      const { agent } = agentQuerySchema.parse(request.query);
      const engine = await engines.get(agent);
      const state = await engine.getThreadState(request.params.threadId as ThreadId);
      if (!state) return sendNotFound(reply, 'Thread', request.params.threadId);
      return sendSuccess(reply, toRunInfo(state));
    },
  );

  const recordDecision = async (
    threadId: string,
    query: unknown,
    body: ApprovalRequestBody,
  ): Promise<DecisionRecorded> => {
    if (body.thread_id !== threadId) {
      throw new ValidationError(
        `Thread ID mismatch: path=${threadId}, body=${body.thread_id}`,
        { pathThreadId: threadId, bodyThreadId: body.thread_id },
      );
    }

    const { agent } = agentQuerySchema.parse(query);
    const engine = await engines.get(agent);
    const state = await engine.submitDecision(threadId as ThreadId, toDecision(body));

    logger.info('HITL decision recorded', {
      component: 'agents',
      threadId,
      runId: body.run_id,
      action: body.action,
    });

    return {
      thread_id: threadId,
      run_id: body.run_id,
      action: body.action,
      status: 'running',
      checkpoint_id: state.checkpointId,
    };
  };

  // POST /agents/:threadId/approve: record a HITL decision
  fastify.post<{ Params: { threadId: string } }>(
    '/agents/:threadId/approve',
    async (request, reply) => {
      const body = approvalRequestSchema.parse(request.body);
      const result = await recordDecision(request.params.threadId, request.query, body);
      return sendSuccess(reply, result);
    },
  );

  // POST /agents/:threadId/respond: answer the pending tool call with text
  fastify.post<{ Params: { threadId: string } }>(
    '/agents/:threadId/respond',
    async (request, reply) => {
      const body = respondRequestSchema.parse(request.body);
      const result = await recordDecision(request.params.threadId, request.query, {
        run_id: body.run_id,
        thread_id: body.thread_id,
        action: 'respond',
        response_text: body.response_text,
      });
      return sendSuccess(reply, result);
    },
  );
}
