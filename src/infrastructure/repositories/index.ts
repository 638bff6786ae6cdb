// Checkpoint stores
export {
  ERROR_CHANNEL,
  createPostgresCheckpointStore,
  ensureCheckpointSchema,
} from './checkpoint-repository.js';
export type {
  CheckpointCreateInput,
  CheckpointMetadata,
  CheckpointRecord,
  CheckpointStore,
  CheckpointWrite,
  CheckpointWriteInput,
} from './checkpoint-repository.js';

export { createInMemoryCheckpointStore } from './in-memory-checkpoint-repository.js';
export type { InMemoryCheckpointStoreOptions } from './in-memory-checkpoint-repository.js';
