// PostgreSQL client
export { createDatabase } from './database.js';
export type { Database, DatabaseOptions } from './database.js';

// Checkpoint stores
export {
  ERROR_CHANNEL,
  createPostgresCheckpointStore,
  createInMemoryCheckpointStore,
  ensureCheckpointSchema,
} from './repositories/index.js';
export type {
  CheckpointCreateInput,
  CheckpointMetadata,
  CheckpointRecord,
  CheckpointStore,
  CheckpointWrite,
  CheckpointWriteInput,
  InMemoryCheckpointStoreOptions,
} from './repositories/index.js';
