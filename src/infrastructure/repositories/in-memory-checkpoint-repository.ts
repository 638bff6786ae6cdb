/**
 * In-memory CheckpointStore — used when DATABASE_URL is unset and in tests.
 * State lives for the life of the process.
 */
import { nanoid } from 'nanoid';

import type { CheckpointId, ThreadId } from '@/core/types.js';

import type {
  CheckpointCreateInput,
  CheckpointRecord,
  CheckpointStore,
  CheckpointWrite,
  CheckpointWriteInput,
} from './checkpoint-repository.js';

export interface InMemoryCheckpointStoreOptions {
  /** Clock used for `createdAt`. Defaults to the system clock. */
  now?: () => Date;
}

export function createInMemoryCheckpointStore(
  options?: InMemoryCheckpointStoreOptions,
): CheckpointStore {
  const now = options?.now ?? ((): Date => new Date());
  /** Per thread, oldest first. */
  const checkpoints = new Map<ThreadId, CheckpointRecord[]>();
  const writes = new Map<string, CheckpointWrite>();

  return {
    getLatest(threadId: ThreadId): Promise<CheckpointRecord | null> {
      const history = checkpoints.get(threadId);
      return Promise.resolve(history?.[history.length - 1] ?? null);
    },

    getCheckpoint(threadId: ThreadId, checkpointId: CheckpointId): Promise<CheckpointRecord | null> {
      const found = checkpoints.get(threadId)?.find((c) => c.checkpointId === checkpointId);
      return Promise.resolve(found ?? null);
    },

    put(input: CheckpointCreateInput): Promise<CheckpointRecord> {
      const record: CheckpointRecord = {
        threadId: input.threadId,
        checkpointId: nanoid() as CheckpointId,
        parentCheckpointId: input.parentCheckpointId,
        state: structuredClone(input.state),
        metadata: { ...input.metadata },
        createdAt: now(),
      };
      const history = checkpoints.get(input.threadId) ?? [];
      history.push(record);
      checkpoints.set(input.threadId, history);
      return Promise.resolve(record);
    },

    putWrite(input: CheckpointWriteInput): Promise<CheckpointWrite> {
      const write: CheckpointWrite = {
        id: nanoid(),
        ...input,
        value: structuredClone(input.value),
        createdAt: now(),
      };
      writes.set(write.id, write);
      return Promise.resolve(write);
    },

    listWritesByChannel(channel: string): Promise<CheckpointWrite[]> {
      return Promise.resolve([...writes.values()].filter((w) => w.channel === channel));
    },

    deleteWrites(ids: string[]): Promise<number> {
      let deleted = 0;
      for (const id of ids) {
        if (writes.delete(id)) deleted++;
      }
      return Promise.resolve(deleted);
    },

    deleteOlderThan(cutoff: Date): Promise<number> {
      let deleted = 0;
      for (const [threadId, history] of checkpoints) {
        const expired = history.filter((c) => c.createdAt < cutoff);
        if (expired.length === 0) continue;

        const expiredIds = new Set<string>(expired.map((c) => c.checkpointId));
        for (const [id, write] of writes) {
          if (write.threadId === threadId && expiredIds.has(write.checkpointId)) writes.delete(id);
        }

        const kept = history.filter((c) => c.createdAt >= cutoff);
        if (kept.length > 0) checkpoints.set(threadId, kept);
        else checkpoints.delete(threadId);
        deleted += expired.length;
      }
      return Promise.resolve(deleted);
    },
  };
}
