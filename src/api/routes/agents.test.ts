import { describe, it, expect, vi } from 'vitest';
import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import { NoPendingApprovalError } from '@/core/errors.js';
import type { ThreadId } from '@/core/types.js';
import type { ThreadState } from '@/engine/types.js';
import { createScriptedEngine } from '@/testing/fixtures/streaming.js';
import type { ScriptedEngine } from '@/testing/fixtures/streaming.js';
import { createMockDeps } from '@/testing/fixtures/routes.js';
import type { MockRouteDependencies } from '@/testing/fixtures/routes.js';
import { registerErrorHandler } from '../error-handler.js';
import { agentRoutes } from './agents.js';

vi.mock('@/observability/logger.js', () => ({
  createLogger: () => ({
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    child: vi.fn(),
  }),
}));

const pausedState: ThreadState = {
  threadId: 'thread-1' as ThreadId,
  checkpointId: 'ckpt-3',
  messageCount: 2,
  updatedAt: new Date('2025-01-01T10:00:00.000Z'),
  pendingApproval: {
    toolCall: { id: 'call-1', name: 'http-request', args: { url: 'https://example.com' } },
    description: 'Tool "http-request" requires approval before it runs',
    requestedAt: '2025-01-01T09:59:59.000Z',
  },
};

function createApp(): { app: FastifyInstance; engine: ScriptedEngine; deps: MockRouteDependencies } {
  const engine = createScriptedEngine([]);
  const deps = createMockDeps(engine);
  const app = Fastify();
  registerErrorHandler(app);
  agentRoutes(app, deps);
  return { app, engine, deps };
}

describe('agentRoutes', () => {
  describe('GET /agents/:threadId', () => {
    it('reports a paused thread as running with its pending approval', async () => {
      const { app, engine } = createApp();
      vi.mocked(engine.getThreadState).mockResolvedValue(pausedState);

      const response = await app.inject({ method: 'GET', url: '/agents/thread-1' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: {
          thread_id: 'thread-1',
          run_id: 'ckpt-3',
          status: 'running',
          message_count: 2,
          updated_at: '2025-01-01T10:00:00.000Z',
          pending_approval: {
            tool_call_id: 'call-1',
            tool_name: 'http-request',
            args: { url: 'https://example.com' },
            description: 'Tool "http-request" requires approval before it runs',
            requested_at: '2025-01-01T09:59:59.000Z',
          },
        },
      });
      expect(engine.getThreadState).toHaveBeenCalledWith('thread-1');
    });

    it('reports a thread without pending approval as completed', async () => {
      const { app, engine } = createApp();
      vi.mocked(engine.getThreadState).mockResolvedValue({
        threadId: 'thread-2' as ThreadId,
        checkpointId: 'ckpt-9',
        messageCount: 4,
        updatedAt: new Date('2025-01-02T00:00:00.000Z'),
      });

      const response = await app.inject({ method: 'GET', url: '/agents/thread-2' });

      expect(response.json<{ data: { status: string } }>().data.status).toBe('completed');
    });

    it('returns 404 for an unknown thread', async () => {
      const { app } = createApp();

      const response = await app.inject({ method: 'GET', url: '/agents/missing' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        success: false,
        error: { code: 'NOT_FOUND', message: 'Thread "missing" not found' },
      });
    });

    it('resolves the engine named in the query', async () => {
      const { app, deps } = createApp();

      await app.inject({ method: 'GET', url: '/agents/thread-1?agent=research' });

      expect(deps.engines.get).toHaveBeenCalledWith('research');
    });
  });

  describe('POST /agents/:threadId/approve', () => {
    it('records an accept decision', async () => {
      const { app, engine } = createApp();
      vi.mocked(engine.submitDecision).mockResolvedValue({ ...pausedState, checkpointId: 'ckpt-4' });

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/approve',
        payload: { run_id: 'ckpt-3', thread_id: 'thread-1', action: 'accept' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: {
          thread_id: 'thread-1',
          run_id: 'ckpt-3',
          action: 'accept',
          status: 'running',
          checkpoint_id: 'ckpt-4',
        },
      });
      expect(engine.submitDecision).toHaveBeenCalledWith('thread-1', { action: 'accept' });
    });

    it('passes response text and tool edits through', async () => {
      const { app, engine } = createApp();
      vi.mocked(engine.submitDecision).mockResolvedValue(pausedState);

      await app.inject({
        method: 'POST',
        url: '/agents/thread-1/approve',
        payload: { run_id: 'r', thread_id: 'thread-1', action: 'respond', response_text: ' Use the cache ' },
      });
      await app.inject({
        method: 'POST',
        url: '/agents/thread-1/approve',
        payload: { run_id: 'r', thread_id: 'thread-1', action: 'edit', tool_edits: { url: 'https://example.org' } },
      });

      expect(engine.submitDecision).toHaveBeenNthCalledWith(1, 'thread-1', {
        action: 'respond',
        responseText: 'Use the cache',
      });
      expect(engine.submitDecision).toHaveBeenNthCalledWith(2, 'thread-1', {
        action: 'edit',
        toolEdits: { url: 'https://example.org' },
      });
    });

    it('requires response_text for respond', async () => {
      const { app, engine } = createApp();

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/approve',
        payload: { run_id: 'r', thread_id: 'thread-1', action: 'respond' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: {
            issues: [{ path: 'response_text', message: 'response_text is required for the respond action' }],
          },
        },
      });
      expect(engine.submitDecision).not.toHaveBeenCalled();
    });

    it('rejects a body whose thread differs from the path', async () => {
      const { app } = createApp();

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/approve',
        payload: { run_id: 'r', thread_id: 'thread-2', action: 'accept' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: { message: string } }>().error.message).toBe(
        'Thread ID mismatch: path=thread-1, body=thread-2',
      );
    });

    it('maps a missing interrupt to 400 NO_PENDING_APPROVAL', async () => {
      const { app, engine } = createApp();
      vi.mocked(engine.submitDecision).mockRejectedValue(new NoPendingApprovalError('thread-1'));

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/approve',
        payload: { run_id: 'r', thread_id: 'thread-1', action: 'accept' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: { code: string } }>().error.code).toBe('NO_PENDING_APPROVAL');
    });
  });

  describe('POST /agents/:threadId/respond', () => {
    it('records a respond decision whatever action the body names', async () => {
      const { app, engine } = createApp();
      vi.mocked(engine.submitDecision).mockResolvedValue({ ...pausedState, checkpointId: 'ckpt-5' });

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/respond',
        payload: { run_id: 'ckpt-3', thread_id: 'thread-1', action: 'accept', response_text: ' Try the cache first ' },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        success: true,
        data: {
          thread_id: 'thread-1',
          run_id: 'ckpt-3',
          action: 'respond',
          status: 'running',
          checkpoint_id: 'ckpt-5',
        },
      });
      expect(engine.submitDecision).toHaveBeenCalledWith('thread-1', {
        action: 'respond',
        responseText: 'Try the cache first',
      });
    });

    it('rejects a blank response_text', async () => {
      const { app, engine } = createApp();

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/respond',
        payload: { run_id: 'r', thread_id: 'thread-1', response_text: '   ' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toEqual({
        success: false,
        error: {
          code: 'VALIDATION_ERROR',
          message: 'Request validation failed',
          details: { issues: [{ path: 'response_text', message: 'response_text cannot be empty' }] },
        },
      });
      expect(engine.submitDecision).not.toHaveBeenCalled();
    });

    it('requires response_text', async () => {
      const { app } = createApp();

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/respond',
        payload: { run_id: 'r', thread_id: 'thread-1' },
      });

      expect(response.statusCode).toBe(400);
      expect(
        response.json<{ error: { details: { issues: { path: string; message: string }[] } } }>().error.details.issues,
      ).toEqual([{ path: 'response_text', message: 'Required' }]);
    });

    it('rejects a body whose thread differs from the path', async () => {
      const { app, engine } = createApp();

      const response = await app.inject({
        method: 'POST',
        url: '/agents/thread-1/respond',
        payload: { run_id: 'r', thread_id: 'thread-9', response_text: 'ok' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json<{ error: { message: string } }>().error.message).toBe(
        'Thread ID mismatch: path=thread-1, body=thread-9',
      );
      expect(engine.submitDecision).not.toHaveBeenCalled();
    });
  });
});
