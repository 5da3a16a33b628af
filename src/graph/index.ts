/**
 * Graph runtime public exports.
 */

export { StateGraph } from './state-graph';
export { CompiledStateGraph } from './compiled-graph';
export type { CompiledGraphInit } from './compiled-graph';
export { START, END } from './types';
export type {
    StateUpdate,
    NodeConfig,
    NodeFunction,
    Router,
    Destinations,
    GraphNode,
    GraphEdge,
    StateGraphConfig,
    CompileOptions,
    RunOptions,
    StreamChunk,
    RunOutcome,
    BatchOutcome,
    BatchRequest,
    BatchOptions,
    UpdateStateOptions,
} from './types';

// State model
export {
    replace,
    accumulate,
    reducer,
    mergeState,
    toChannelMap,
    deepFreeze,
} from './state';
export type {
    MergePolicy,
    UpdateValue,
    Channel,
    Channels,
    ChannelMap,
    StateRecord,
} from './state';

// Configuration
export { DEFAULT_RECURSION_LIMIT } from './config';

// Checkpoint stores
export {
    MemoryCheckpointStore,
    createCheckpointId,
    checkpointPayload,
} from './checkpointer';
export type {
    Checkpoint,
    CheckpointDraft,
    CheckpointSource,
    CheckpointStore,
    PendingInterrupt,
} from './checkpointer';
export {
    serializeCheckpoint,
    deserializeCheckpoint,
    decodeCheckpoint,
    checkpointRecordSchema,
} from './serde';
export type { CheckpointRecord, StateDecoder } from './serde';

// Redis store (bring your own ioredis client)
export { RedisCheckpointStore } from './redis-checkpointer';
export type { RedisClient, RedisCheckpointStoreConfig } from './redis-checkpointer';

// Postgres store (bring your own pg client)
export { PostgresCheckpointStore } from './postgres-checkpointer';
export type { PostgresClient, PostgresCheckpointStoreConfig } from './postgres-checkpointer';
