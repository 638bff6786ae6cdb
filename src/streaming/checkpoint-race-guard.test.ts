import { describe, expect, it } from 'vitest';

import type { CheckpointId, ThreadId } from '@/core/types.js';
import { ERROR_CHANNEL } from '@/infrastructure/repositories/checkpoint-repository.js';
import { createInMemoryCheckpointStore } from '@/infrastructure/repositories/in-memory-checkpoint-repository.js';
import { createMockLogger } from '@/testing/fixtures/streaming.js';

import { cleanupExpiredCheckpoints, cleanupFalseErrors, createRunRaceGuard } from './checkpoint-race-guard.js';

function clock(start = 1_000): { now: () => number; advance: (ms: number) => void } {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
  };
}

describe('createRunRaceGuard', () => {
  const context = { threadId: 'thread-1', traceId: 'trace-1' };

  it('classifies signals before completion without logging them', () => {
    const logger = createMockLogger();
    const guard = createRunRaceGuard({ graceWindowMs: 500, logger, context });

    expect(guard.isComplete()).toBe(false);
    expect(guard.remainingGraceMs()).toBe(0);
    expect(guard.report(new Error('early'), 'engine')).toBe('before_completion');
    expect(logger.debug).not.toHaveBeenCalled();
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('suppresses signals within the grace window at debug level', () => {
    const logger = createMockLogger();
    const time = clock();
    const guard = createRunRaceGuard({ graceWindowMs: 500, logger, context, now: time.now });

    guard.markComplete();
    time.advance(500);

    expect(guard.remainingGraceMs()).toBe(0);
    expect(guard.report(new Error('write cancelled'), 'engine')).toBe('suppressed');
    expect(logger.debug).toHaveBeenCalledWith('Post-completion race suppressed', {
      component: 'checkpoint-race-guard',
      threadId: 'thread-1',
      traceId: 'trace-1',
      source: 'engine',
      errorType: 'Error',
      error: 'write cancelled',
      elapsedMs: 500,
      graceWindowMs: 500,
    });
    expect(logger.error).not.toHaveBeenCalled();
  });

  it('logs signals after the grace window at error level', () => {
    const logger = createMockLogger();
    const time = clock();
    const guard = createRunRaceGuard({ graceWindowMs: 500, logger, context, now: time.now });

    guard.markComplete();
    time.advance(501);

    expect(guard.report(new Error('late'), 'close')).toBe('late');
    expect(logger.error).toHaveBeenCalledWith(
      'Post-completion error after grace window',
      expect.objectContaining({ source: 'close', elapsedMs: 501 }),
    );
  });

  it('fixes the completion time on the first mark', () => {
    const time = clock();
    const guard = createRunRaceGuard({ graceWindowMs: 500, logger: createMockLogger(), context, now: time.now });

    guard.markComplete();
    time.advance(200);
    guard.markComplete();

    expect(guard.remainingGraceMs()).toBe(300);
  });
});

describe('cleanupFalseErrors', () => {
  const thread = 'thread-1' as ThreadId;

  it('deletes error writes of completed checkpoints only', async () => {
    const store = createInMemoryCheckpointStore();
    const logger = createMockLogger();
    const completed = await store.put({ threadId: thread, state: {}, metadata: { source: 'loop', status: 'completed' } });
    const aborted = await store.put({ threadId: thread, state: {}, metadata: { source: 'loop', status: 'aborted' } });
    await store.putWrite({
      threadId: thread,
      checkpointId: completed.checkpointId,
      taskId: 'task-1',
      channel: ERROR_CHANNEL,
      value: 'CancelledError',
    });
    const genuine = await store.putWrite({
      threadId: thread,
      checkpointId: aborted.checkpointId,
      taskId: 'task-1',
      channel: ERROR_CHANNEL,
      value: 'CancelledError',
    });
    await store.putWrite({
      threadId: thread,
      checkpointId: completed.checkpointId,
      taskId: 'task-1',
      channel: 'messages',
      value: [],
    });

    const removed = await cleanupFalseErrors(store, logger);

    expect(removed).toBe(1);
    expect((await store.listWritesByChannel(ERROR_CHANNEL)).map((w) => w.id)).toEqual([genuine.id]);
    expect(logger.info).toHaveBeenCalledWith('Cleaned up false error entries from successful runs', {
      component: 'checkpoint-race-guard',
      removedCount: 1,
      scannedCount: 2,
    });
  });

  it('ignores error writes whose checkpoint is gone', async () => {
    const store = createInMemoryCheckpointStore();
    await store.putWrite({
      threadId: thread,
      checkpointId: 'missing' as CheckpointId,
      taskId: 'task-1',
      channel: ERROR_CHANNEL,
      value: 'CancelledError',
    });

    expect(await cleanupFalseErrors(store, createMockLogger())).toBe(0);
  });
});

describe('cleanupExpiredCheckpoints', () => {
  it('deletes checkpoints older than the retention period', async () => {
    let current = new Date('2024-01-01T00:00:00.000Z');
    const store = createInMemoryCheckpointStore({ now: () => current });
    const thread = 'thread-1' as ThreadId;
    await store.put({ threadId: thread, state: {}, metadata: {} });
    current = new Date('2024-03-01T00:00:00.000Z');
    const recent = await store.put({ threadId: thread, state: {}, metadata: {} });
    const logger = createMockLogger();

    const deleted = await cleanupExpiredCheckpoints(store, 30, logger, new Date('2024-03-02T00:00:00.000Z'));

    expect(deleted).toBe(1);
    expect((await store.getLatest(thread))?.checkpointId).toBe(recent.checkpointId);
    expect(logger.info).toHaveBeenCalledWith(
      'Cleaned up old checkpoints',
      expect.objectContaining({ deletedCount: 1, retentionDays: 30, cutoff: '2024-01-31T00:00:00.000Z' }),
    );
  });
});
