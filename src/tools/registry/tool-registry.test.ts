import { afterEach, describe, expect, it, vi } from 'vitest';
import { z } from 'zod';

import { TimeoutExceededError } from '@/core/errors.js';
import {
  createDangerousTool,
  createEchoTool,
  createFailingTool,
  createHangingTool,
  createToolContext,
} from '@/testing/fixtures/tools.js';
import type { ExecutableTool } from '@/tools/types.js';

import { createToolRegistry } from './tool-registry.js';

const timeouts = {
  tool: { name: 'tool', deadlineMs: 1_000 },
  webSearch: { name: 'web_search', deadlineMs: 200 },
} as const;

function throwingTool(): ExecutableTool {
  return {
    ...createEchoTool(),
    id: 'throwing',
    inputSchema: z.object({}),
    execute: () => Promise.reject(new Error('socket hang up')),
  };
}

describe('ToolRegistry', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  describe('register / unregister', () => {
    it('registers a tool and makes it retrievable', () => {
      const registry = createToolRegistry({ timeouts });
      const echo = createEchoTool();
      registry.register(echo);

      expect(registry.has('echo')).toBe(true);
      expect(registry.get('echo')).toBe(echo);
    });

    it('lists all registered tool IDs', () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createEchoTool());
      registry.register(createDangerousTool());

      expect(registry.listAll()).toEqual(['echo', 'dangerous-action']);
    });

    it('unregisters a tool', () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createEchoTool());

      expect(registry.unregister('echo')).toBe(true);
      expect(registry.has('echo')).toBe(false);
      expect(registry.unregister('echo')).toBe(false);
    });
  });

  describe('formatForProvider', () => {
    it('emits JSON Schema without $schema', () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createEchoTool());

      expect(registry.formatForProvider()).toEqual([
        {
          name: 'echo',
          description: 'Echoes the input message back.',
          inputSchema: {
            type: 'object',
            properties: { message: { type: 'string' } },
            required: ['message'],
            additionalProperties: false,
          },
        },
      ]);
    });
  });

  describe('resolve', () => {
    it('executes a registered tool with validated input', async () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createEchoTool());

      const result = await registry.resolve('echo', { message: 'hi' }, createToolContext());

      expect(result).toEqual({ ok: true, value: { success: true, output: { echo: 'hi' }, durationMs: 1 } });
    });

    it('returns ToolNotFoundError for unknown tools', async () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createEchoTool());

      const result = await registry.resolve('nope', {}, createToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TOOL_NOT_FOUND');
        expect(result.error.context).toEqual({ toolId: 'nope', availableTools: ['echo'] });
      }
    });

    it('rejects invalid input before executing', async () => {
      const registry = createToolRegistry({ timeouts });
      const echo = createEchoTool();
      const execute = vi.spyOn(echo, 'execute');
      registry.register(echo);

      const result = await registry.resolve('echo', { message: 42 }, createToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.code).toBe('VALIDATION_ERROR');
      expect(execute).not.toHaveBeenCalled();
    });

    it('passes tool errors through as results', async () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createFailingTool());

      const result = await registry.resolve('failing', {}, createToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) expect(result.error.message).toBe('Tool "failing" execution failed: bad input');
    });

    it('wraps thrown errors in ToolExecutionError', async () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(throwingTool());

      const result = await registry.resolve('throwing', {}, createToolContext());

      expect(result.ok).toBe(false);
      if (!result.ok) {
        expect(result.error.code).toBe('TOOL_EXECUTION_ERROR');
        expect(result.error.message).toBe('Tool "throwing" execution failed: socket hang up');
      }
    });

    it('throws TimeoutExceededError when the tool deadline passes', async () => {
      vi.useFakeTimers();
      const registry = createToolRegistry({ timeouts });
      registry.register(createHangingTool('tool'));

      const pending = registry.resolve('hanging', {}, createToolContext());
      const assertion = expect(pending).rejects.toThrow('tool timeout of 1s exceeded');
      await vi.advanceTimersByTimeAsync(1_000);

      await assertion;
    });

    it('uses the web_search deadline for search-scoped tools', async () => {
      vi.useFakeTimers();
      const registry = createToolRegistry({ timeouts });
      registry.register(createHangingTool('web_search'));

      const pending = registry.resolve('hanging', {}, createToolContext());
      const assertion = expect(pending).rejects.toBeInstanceOf(TimeoutExceededError);
      await vi.advanceTimersByTimeAsync(200);

      await assertion;
      await expect(pending).rejects.toMatchObject({ scope: 'web_search', timeoutMs: 200 });
    });

    it('rethrows the run abort reason', async () => {
      const registry = createToolRegistry({ timeouts });
      registry.register(createHangingTool());
      const controller = new AbortController();
      const reason = new Error('client went away');

      const pending = registry.resolve('hanging', {}, createToolContext({ signal: controller.signal }));
      controller.abort(reason);

      await expect(pending).rejects.toBe(reason);
    });
  });
});
