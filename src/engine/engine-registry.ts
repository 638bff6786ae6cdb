/**
 * Engine Registry — lazily built agent engines keyed by agent name.
 *
 * Each engine is built by its factory on first use and memoized; concurrent
 * first requests share one build, and a failed build is retried next time.
 */
import { EngineNotFoundError } from '@/core/errors.js';
import type { AsyncMemo } from '@/core/memo.js';
import { createAsyncMemo } from '@/core/memo.js';
import type { Logger } from '@/observability/logger.js';

import type { AgentEngine } from './types.js';

// ─── Types ───────────────────────────────────────────────────────

export type EngineFactory = () => Promise<AgentEngine>;

export interface EngineRegistry {
  /** Resolve an engine by name, or the default engine when omitted. */
  get(agentName?: string): Promise<AgentEngine>;
  /** Registered agent names. */
  names(): string[];
  readonly defaultName: string;
}

interface EngineRegistryDeps {
  factories: Record<string, EngineFactory>;
  defaultName: string;
  logger: Logger;
}

// ─── Factory Function ────────────────────────────────────────────

export function createEngineRegistry(deps: EngineRegistryDeps): EngineRegistry {
  const { factories, defaultName, logger } = deps;
  const memos = new Map<string, AsyncMemo<AgentEngine>>();

  for (const [name, factory] of Object.entries(factories)) {
    memos.set(
      name,
      createAsyncMemo(async () => {
        logger.info('Building agent engine', { component: 'engine-registry', agentName: name });
        return factory();
      }),
    );
  }

  if (!memos.has(defaultName)) {
    throw new EngineNotFoundError(defaultName, [...memos.keys()]);
  }

  return {
    defaultName,

    get(agentName?: string): Promise<AgentEngine> {
      const name = agentName ?? defaultName;
      const memo = memos.get(name);
      if (!memo) {
        logger.warn('Unknown agent requested', { component: 'engine-registry', agentName: name });
        return Promise.reject(new EngineNotFoundError(name, [...memos.keys()]));
      }
      return memo.get();
    },

    names(): string[] {
      return [...memos.keys()];
    },
  };
}
