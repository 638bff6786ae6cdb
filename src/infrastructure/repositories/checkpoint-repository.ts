/**
 * Checkpoint repository — per-thread engine state plus pending channel writes.
 *
 * The streaming pipeline only reads checkpoint metadata and reads/deletes
 * writes on the `__error__` channel; the engine owns everything else.
 */
import { nanoid } from 'nanoid';
import type postgres from 'postgres';

import type { CheckpointId, JsonObject, JsonValue, ThreadId } from '@/core/types.js';

// ─── Types ──────────────────────────────────────────────────────

/** Channel the engine writes to when a run is interrupted mid-checkpoint. */
export const ERROR_CHANNEL = '__error__';

export interface CheckpointMetadata {
  /** `loop` for checkpoints written by the agent loop, `update` for external state edits. */
  source?: 'input' | 'loop' | 'update';
  /** `completed` once the run finished naturally. */
  status?: 'completed' | 'interrupted' | 'aborted';
  step?: number;
  traceId?: string;
}

export interface CheckpointRecord {
  threadId: ThreadId;
  checkpointId: CheckpointId;
  parentCheckpointId?: CheckpointId;
  state: JsonObject;
  metadata: CheckpointMetadata;
  createdAt: Date;
}

export interface CheckpointCreateInput {
  threadId: ThreadId;
  parentCheckpointId?: CheckpointId;
  state: JsonObject;
  metadata: CheckpointMetadata;
}

export interface CheckpointWrite {
  id: string;
  threadId: ThreadId;
  checkpointId: CheckpointId;
  taskId: string;
  channel: string;
  value: JsonValue;
  createdAt: Date;
}

export interface CheckpointWriteInput {
  threadId: ThreadId;
  checkpointId: CheckpointId;
  taskId: string;
  channel: string;
  value: JsonValue;
}

// ─── Repository ─────────────────────────────────────────────────

export interface CheckpointStore {
  getLatest(threadId: ThreadId): Promise<CheckpointRecord | null>;
  getCheckpoint(threadId: ThreadId, checkpointId: CheckpointId): Promise<CheckpointRecord | null>;
  put(input: CheckpointCreateInput): Promise<CheckpointRecord>;
  putWrite(input: CheckpointWriteInput): Promise<CheckpointWrite>;
  listWritesByChannel(channel: string): Promise<CheckpointWrite[]>;
  /** Delete writes by ID. Returns the number deleted. */
  deleteWrites(ids: string[]): Promise<number>;
  /** Delete checkpoints (and their writes) created before the cutoff. Returns checkpoints deleted. */
  deleteOlderThan(cutoff: Date): Promise<number>;
}

// ─── PostgreSQL ─────────────────────────────────────────────────

interface CheckpointRow {
  thread_id: string;
  checkpoint_id: string;
  parent_checkpoint_id: string | null;
  state: JsonObject;
  metadata: CheckpointMetadata;
  created_at: Date;
}

interface WriteRow {
  id: string;
  thread_id: string;
  checkpoint_id: string;
  task_id: string;
  channel: string;
  value: JsonValue;
  created_at: Date;
}

function toCheckpointModel(row: CheckpointRow): CheckpointRecord {
  return {
    threadId: row.thread_id as ThreadId,
    checkpointId: row.checkpoint_id as CheckpointId,
    parentCheckpointId: (row.parent_checkpoint_id ?? undefined) as CheckpointId | undefined,
    state: row.state,
    metadata: row.metadata,
    createdAt: row.created_at,
  };
}

function toWriteModel(row: WriteRow): CheckpointWrite {
  return {
    id: row.id,
    threadId: row.thread_id as ThreadId,
    checkpointId: row.checkpoint_id as CheckpointId,
    taskId: row.task_id,
    channel: row.channel,
    value: row.value,
    createdAt: row.created_at,
  };
}

/** Create the checkpoint tables if they do not exist yet. */
export async function ensureCheckpointSchema(sql: postgres.Sql): Promise<void> {
  await sql`
    CREATE TABLE IF NOT EXISTS checkpoints (
      thread_id TEXT NOT NULL,
      checkpoint_id TEXT NOT NULL,
      parent_checkpoint_id TEXT,
      state JSONB NOT NULL,
      metadata JSONB NOT NULL DEFAULT '{}'::jsonb,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
      PRIMARY KEY (thread_id, checkpoint_id)
    )
  `;
  await sql`
    CREATE INDEX IF NOT EXISTS checkpoints_thread_created_idx
      ON checkpoints (thread_id, created_at DESC)
  `;
  await sql`
    CREATE TABLE IF NOT EXISTS checkpoint_writes (
      id TEXT PRIMARY KEY,
      thread_id TEXT NOT NULL,
      checkpoint_id TEXT NOT NULL,
      task_id TEXT NOT NULL,
      channel TEXT NOT NULL,
      value JSONB,
      created_at TIMESTAMPTZ NOT NULL DEFAULT now()
    )
  `;
  await sql`
    CREATE INDEX IF NOT EXISTS checkpoint_writes_channel_idx
      ON checkpoint_writes (channel)
  `;
}

/**
 * Create a CheckpointStore backed by PostgreSQL (postgres.js).
 * Call `ensureCheckpointSchema` once before first use.
 */
export function createPostgresCheckpointStore(sql: postgres.Sql): CheckpointStore {
  return {
    async getLatest(threadId: ThreadId): Promise<CheckpointRecord | null> {
      const rows = await sql<CheckpointRow[]>`
        SELECT * FROM checkpoints
        WHERE thread_id = ${threadId}
        ORDER BY created_at DESC
        LIMIT 1
      `;
      const row = rows[0];
      return row ? toCheckpointModel(row) : null;
    },

    async getCheckpoint(
      threadId: ThreadId,
      checkpointId: CheckpointId,
    ): Promise<CheckpointRecord | null> {
      const rows = await sql<CheckpointRow[]>`
        SELECT * FROM checkpoints
        WHERE thread_id = ${threadId} AND checkpoint_id = ${checkpointId}
      `;
      const row = rows[0];
      return row ? toCheckpointModel(row) : null;
    },

    async put(input: CheckpointCreateInput): Promise<CheckpointRecord> {
      const rows = await sql<CheckpointRow[]>`
        INSERT INTO checkpoints (thread_id, checkpoint_id, parent_checkpoint_id, state, metadata)
        VALUES (
          ${input.threadId},
          ${nanoid()},
          ${input.parentCheckpointId ?? null},
          ${sql.json(input.state)},
          ${sql.json({ ...input.metadata })}
        )
        RETURNING *
      `;
      const row = rows[0];
      if (!row) throw new Error('Checkpoint insert returned no row');
      return toCheckpointModel(row);
    },

    async putWrite(input: CheckpointWriteInput): Promise<CheckpointWrite> {
      const rows = await sql<WriteRow[]>`
        INSERT INTO checkpoint_writes (id, thread_id, checkpoint_id, task_id, channel, value)
        VALUES (
          ${nanoid()},
          ${input.threadId},
          ${input.checkpointId},
          ${input.taskId},
          ${input.channel},
          ${sql.json(input.value)}
        )
        RETURNING *
      `;
      const row = rows[0];
      if (!row) throw new Error('Checkpoint write insert returned no row');
      return toWriteModel(row);
    },

    async listWritesByChannel(channel: string): Promise<CheckpointWrite[]> {
      const rows = await sql<WriteRow[]>`
        SELECT * FROM checkpoint_writes
        WHERE channel = ${channel}
        ORDER BY created_at ASC
      `;
      return rows.map(toWriteModel);
    },

    async deleteWrites(ids: string[]): Promise<number> {
      if (ids.length === 0) return 0;
      const result = await sql`
        DELETE FROM checkpoint_writes WHERE id IN ${sql(ids)}
      `;
      return result.count;
    },

    async deleteOlderThan(cutoff: Date): Promise<number> {
      return sql.begin(async (tx) => {
        await tx`
          DELETE FROM checkpoint_writes w
          USING checkpoints c
          WHERE w.thread_id = c.thread_id
            AND w.checkpoint_id = c.checkpoint_id
            AND c.created_at < ${cutoff}
        `;
        const result = await tx`
          DELETE FROM checkpoints WHERE created_at < ${cutoff}
        `;
        return result.count;
      });
    },
  };
}
