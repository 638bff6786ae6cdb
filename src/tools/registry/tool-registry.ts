/**
 * ToolRegistry — central registry for all tool definitions.
 * Resolves tools by ID, validates input, and runs each call under the
 * deadline of its timeout scope.
 */
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';

import type { ConduitError } from '@/core/errors.js';
import { TimeoutExceededError, ToolExecutionError, ToolNotFoundError, ValidationError } from '@/core/errors.js';
import type { Result } from '@/core/result.js';
import { err, ok } from '@/core/result.js';
import { createLogger } from '@/observability/logger.js';
import type { ToolDefinitionForProvider } from '@/providers/types.js';
import type { TimeoutHierarchy, TimeoutScope } from '@/streaming/timeout-hierarchy.js';
import { withDeadline } from '@/streaming/timeout-hierarchy.js';

import type { ExecutableTool, ToolContext, ToolResult } from '../types.js';

const logger = createLogger({ name: 'tool-registry' });

export interface ToolRegistryOptions {
  /** Deadlines for the `tool` and `web_search` scopes. */
  timeouts: Pick<TimeoutHierarchy, 'tool' | 'webSearch'>;
}

export interface ToolRegistry {
  /** Register a tool. Replaces existing registration for same ID. */
  register(tool: ExecutableTool): void;

  /** Unregister a tool by ID. Returns true if it was registered. */
  unregister(toolId: string): boolean;

  get(toolId: string): ExecutableTool | undefined;

  has(toolId: string): boolean;

  /** List all registered tool IDs. */
  listAll(): string[];

  /** Format every registered tool for an LLM provider. */
  formatForProvider(): ToolDefinitionForProvider[];

  /**
   * Resolve and execute a tool call under its scope's deadline.
   *
   * Unknown tools, invalid input and tool failures come back as `err`.
   * A passed deadline or an aborted run signal is thrown, so the run ends.
   */
  resolve(
    toolId: string,
    input: Record<string, unknown>,
    context: ToolContext,
  ): Promise<Result<ToolResult, ConduitError>>;
}

/**
 * Create a new ToolRegistry instance.
 */
export function createToolRegistry(options: ToolRegistryOptions): ToolRegistry {
  const tools = new Map<string, ExecutableTool>();

  function scopeFor(tool: ExecutableTool): TimeoutScope {
    return tool.timeoutScope === 'web_search' ? options.timeouts.webSearch : options.timeouts.tool;
  }

  function validateInput(tool: ExecutableTool, input: Record<string, unknown>): Result<unknown, ConduitError> {
    const parsed = tool.inputSchema.safeParse(input);
    if (!parsed.success) {
      logger.warn('Tool input validation failed', {
        component: 'tool-registry',
        toolId: tool.id,
        errors: parsed.error.issues,
      });
      return err(
        new ValidationError(`Invalid input for tool "${tool.id}"`, { toolId: tool.id, issues: parsed.error.issues }),
      );
    }
    return ok(parsed.data);
  }

  async function execute(
    tool: ExecutableTool,
    input: unknown,
    context: ToolContext,
  ): Promise<Result<ToolResult, ConduitError>> {
    try {
      return await withDeadline(
        scopeFor(tool),
        (signal) => tool.execute(input, { ...context, signal }),
        context.signal,
      );
    } catch (error) {
      if (error instanceof TimeoutExceededError || context.signal.aborted) {
        throw error;
      }
      const cause = error instanceof Error ? error : new Error(String(error));
      logger.warn('Tool threw during execution', {
        component: 'tool-registry',
        toolId: tool.id,
        threadId: context.threadId,
        error: cause.message,
      });
      return err(new ToolExecutionError(tool.id, cause.message, cause));
    }
  }

  return {
    register(tool: ExecutableTool): void {
      logger.info('Registering tool', {
        component: 'tool-registry',
        toolId: tool.id,
        riskLevel: tool.riskLevel,
        requiresApproval: tool.requiresApproval,
        timeoutScope: tool.timeoutScope,
      });
      tools.set(tool.id, tool);
    },

    unregister(toolId: string): boolean {
      const existed = tools.delete(toolId);
      if (existed) {
        logger.info('Unregistered tool', { component: 'tool-registry', toolId });
      }
      return existed;
    },

    get(toolId: string): ExecutableTool | undefined {
      return tools.get(toolId);
    },

    has(toolId: string): boolean {
      return tools.has(toolId);
    },

    listAll(): string[] {
      return [...tools.keys()];
    },

    formatForProvider(): ToolDefinitionForProvider[] {
      return [...tools.values()].map((tool) => ({
        name: tool.id,
        description: tool.description,
        inputSchema: toProviderSchema(tool.inputSchema),
      }));
    },

    async resolve(
      toolId: string,
      input: Record<string, unknown>,
      context: ToolContext,
    ): Promise<Result<ToolResult, ConduitError>> {
      const tool = tools.get(toolId);
      if (!tool) {
        const available = [...tools.keys()];
        logger.warn('Tool hallucination detected', {
          component: 'tool-registry',
          toolId,
          availableTools: available,
          threadId: context.threadId,
          traceId: context.traceId,
        });
        return err(new ToolNotFoundError(toolId, available));
      }

      const inputResult = validateInput(tool, input);
      if (!inputResult.ok) return inputResult;

      logger.info('Executing tool', {
        component: 'tool-registry',
        toolId: tool.id,
        threadId: context.threadId,
        traceId: context.traceId,
        deadlineMs: scopeFor(tool).deadlineMs,
      });

      return execute(tool, inputResult.value, context);
    },
  };
}

const jsonObjectSchema = z.record(z.unknown());

/**
 * Convert a Zod schema to JSON Schema for function parameters.
 * Uses the `jsonSchema7` target; `$schema` is removed since OpenAI rejects it.
 */
function toProviderSchema(zodSchema: z.ZodType): Record<string, unknown> {
  const raw = jsonObjectSchema.parse(zodToJsonSchema(zodSchema, { target: 'jsonSchema7' }));
  delete raw['$schema'];
  return raw;
}
