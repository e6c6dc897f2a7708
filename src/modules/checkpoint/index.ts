export type {
  CheckpointMetadata,
  CheckpointStore,
  CheckpointStoreOptions,
  CreateCheckpointOptions,
  LoadedCheckpoint,
} from './checkpoint-store.js'
export {
  CHECKPOINT_FORMAT_VERSION,
  SqliteCheckpointStore,
  createCheckpointStore,
  toCheckpointMetadata,
} from './checkpoint-store.js'
