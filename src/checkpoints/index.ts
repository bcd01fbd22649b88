export { FileCheckpointStore } from "./file-store.js";
export { RedisCheckpointStore, type RedisCheckpointClient } from "./redis-store.js";
export { MemoryCheckpointStore, assertRunId, type CheckpointStore } from "./store.js";
