/**
 * Redis checkpoint store.
 * Works with any ioredis-compatible client.
 *
 * @example
 * ```typescript
 * import Redis from 'ioredis';
 * import { z } from 'zod';
 * import { RedisCheckpointStore } from 'stepgraph';
 *
 * const State = z.object({ counter: z.number() });
 * const redis = new Redis('redis://localhost:6379');
 * const checkpointer = new RedisCheckpointStore(redis, { stateSchema: State, prefix: 'myapp:' });
 * ```
 */

import { createKeyedMutex, type KeyedMutex } from '../lib/semaphore';
import type { Checkpoint, CheckpointDraft, CheckpointStore } from './checkpointer';
import { assertSamePayload, createCheckpointId } from './checkpointer';
import { deserializeCheckpoint, serializeCheckpoint, type StateDecoder } from './serde';

/** Redis client interface (compatible with ioredis) */
export interface RedisClient {
    set(key: string, value: string, ...args: Array<string | number>): Promise<'OK' | null>;
    get(key: string): Promise<string | null>;
    del(key: string | string[]): Promise<number>;
    rpush(key: string, ...values: string[]): Promise<number>;
    lrange(key: string, start: number, stop: number): Promise<string[]>;
    expire(key: string, seconds: number): Promise<number>;
}

/** Redis store configuration */
export interface RedisCheckpointStoreConfig<S> {
    /** Decodes stored state values (usually the graph's zod schema) */
    stateSchema: StateDecoder<S>;
    /** Key prefix (default: 'stepgraph:') */
    prefix?: string;
    /** TTL in seconds (default: no expiry) */
    ttlSeconds?: number;
}

/**
 * Redis-based checkpoint store.
 *
 * Layout: one JSON string per checkpoint plus a list per thread holding
 * checkpoint ids in write order.
 */
export class RedisCheckpointStore<S> implements CheckpointStore<S> {
    private readonly redis: RedisClient;
    private readonly stateSchema: StateDecoder<S>;
    private readonly prefix: string;
    private readonly ttlSeconds?: number;
    private readonly mutex: KeyedMutex = createKeyedMutex();

    constructor(client: RedisClient, config: RedisCheckpointStoreConfig<S>) {
        this.redis = client;
        this.stateSchema = config.stateSchema;
        this.prefix = config.prefix ?? 'stepgraph:';
        this.ttlSeconds = config.ttlSeconds;
    }

    private checkpointKey(threadId: string, checkpointId: string): string {
        return `${this.prefix}checkpoint:${threadId}:${checkpointId}`;
    }

    private threadKey(threadId: string): string {
        return `${this.prefix}thread:${threadId}`;
    }

    async put(draft: CheckpointDraft<S>): Promise<string> {
        const checkpointId = draft.checkpointId ?? createCheckpointId();
        const key = this.checkpointKey(draft.threadId, checkpointId);

        const data = serializeCheckpoint({ ...draft, checkpointId });
        const expiry = this.ttlSeconds ? ['EX', this.ttlSeconds] : [];

        // The mutex only orders writers in this process; SET NX decides between processes
        return this.mutex.runExclusive(draft.threadId, async () => {
            for (;;) {
                const reply = await this.redis.set(key, data, ...expiry, 'NX');
                if (reply === 'OK') {
                    await this.indexCheckpoint(draft.threadId, checkpointId);
                    return checkpointId;
                }

                const existing = await this.redis.get(key);
                if (existing) {
                    assertSamePayload(deserializeCheckpoint(existing, this.stateSchema), draft);
                    return checkpointId;
                }
                // Expired between SET and GET: try again
            }
        });
    }

    /** Append to the thread index unless a retried put after expiry left it there already */
    private async indexCheckpoint(threadId: string, checkpointId: string): Promise<void> {
        const threadKey = this.threadKey(threadId);
        const ids = await this.redis.lrange(threadKey, 0, -1);
        if (!ids.includes(checkpointId)) {
            await this.redis.rpush(threadKey, checkpointId);
        }
        if (this.ttlSeconds) {
            await this.redis.expire(threadKey, this.ttlSeconds);
        }
    }

    async getLatest(threadId: string): Promise<Checkpoint<S> | null> {
        const ids = await this.redis.lrange(this.threadKey(threadId), 0, -1);

        // Newest first; entries whose data expired are skipped
        for (const id of ids.reverse()) {
            const checkpoint = await this.get(threadId, id);
            if (checkpoint) {
                return checkpoint;
            }
        }

        return null;
    }

    async get(threadId: string, checkpointId: string): Promise<Checkpoint<S> | null> {
        const data = await this.redis.get(this.checkpointKey(threadId, checkpointId));
        return data ? deserializeCheckpoint(data, this.stateSchema) : null;
    }

    async history(threadId: string): Promise<Checkpoint<S>[]> {
        const ids = await this.redis.lrange(this.threadKey(threadId), 0, -1);
        const result: Checkpoint<S>[] = [];

        for (const id of ids.reverse()) {
            const checkpoint = await this.get(threadId, id);
            if (checkpoint) {
                result.push(checkpoint);
            }
        }

        return result;
    }

    async deleteThread(threadId: string): Promise<number> {
        return this.mutex.runExclusive(threadId, async () => {
            const ids = await this.redis.lrange(this.threadKey(threadId), 0, -1);
            if (ids.length === 0) return 0;

            const keys = ids.map(id => this.checkpointKey(threadId, id));
            await this.redis.del(keys);
            await this.redis.del(this.threadKey(threadId));

            return ids.length;
        });
    }
}
