/**
 * PostgreSQL checkpoint store.
 * Works with any pg-compatible client (Pool or Client).
 *
 * @example
 * ```typescript
 * import { Pool } from 'pg';
 * import { PostgresCheckpointStore } from 'stepgraph';
 *
 * const pool = new Pool({ connectionString: process.env.DATABASE_URL });
 * const checkpointer = new PostgresCheckpointStore(pool, { stateSchema: State });
 *
 * // Create table (run once)
 * await checkpointer.createTable();
 * ```
 */

import { z } from 'zod';
import type { Checkpoint, CheckpointDraft, CheckpointStore } from './checkpointer';
import { assertSamePayload, createCheckpointId } from './checkpointer';
import { checkpointSourceSchema, decodeCheckpoint, type StateDecoder } from './serde';
import { stableStringify } from '../lib/stable-json';

/** Postgres client interface (compatible with pg Pool) */
export interface PostgresClient {
    query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount?: number | null }>;
}

/** Postgres store configuration */
export interface PostgresCheckpointStoreConfig<S> {
    /** Decodes stored state values (usually the graph's zod schema) */
    stateSchema: StateDecoder<S>;
    /** Table name (default: 'graph_checkpoints') */
    tableName?: string;
    /** Schema name (default: 'public') */
    schema?: string;
}

/** pg returns BIGINT as string and JSONB as parsed JSON */
const checkpointRowSchema = z.object({
    thread_id: z.string(),
    checkpoint_id: z.string(),
    parent_checkpoint_id: z.string().nullable(),
    sequence_number: z.coerce.number().int(),
    pending_next_node: z.string(),
    source: checkpointSourceSchema,
    created_at: z.coerce.number(),
    state_snapshot: z.unknown(),
    pending_interrupt: z.unknown().nullable(),
});

const COLUMNS = 'thread_id, checkpoint_id, parent_checkpoint_id, sequence_number, pending_next_node, source, created_at, state_snapshot, pending_interrupt';

/**
 * PostgreSQL-based checkpoint store.
 *
 * One row per checkpoint. A BIGSERIAL `position` column records write order,
 * which defines "latest" and history order.
 */
export class PostgresCheckpointStore<S> implements CheckpointStore<S> {
    private readonly client: PostgresClient;
    private readonly stateSchema: StateDecoder<S>;
    private readonly tableName: string;
    private readonly schema: string;

    constructor(client: PostgresClient, config: PostgresCheckpointStoreConfig<S>) {
        this.client = client;
        this.stateSchema = config.stateSchema;
        this.tableName = config.tableName ?? 'graph_checkpoints';
        this.schema = config.schema ?? 'public';
    }

    private get table(): string {
        return `"${this.schema}"."${this.tableName}"`;
    }

    /**
     * Create the checkpoints table if it doesn't exist.
     * Run this during application setup.
     */
    async createTable(): Promise<void> {
        await this.client.query(`
            CREATE TABLE IF NOT EXISTS ${this.table} (
                position BIGSERIAL PRIMARY KEY,
                thread_id TEXT NOT NULL,
                checkpoint_id TEXT NOT NULL,
                parent_checkpoint_id TEXT,
                sequence_number INTEGER NOT NULL,
                pending_next_node TEXT NOT NULL,
                source TEXT NOT NULL,
                created_at BIGINT NOT NULL,
                state_snapshot JSONB NOT NULL,
                pending_interrupt JSONB,
                UNIQUE (thread_id, checkpoint_id)
            )
        `);

        await this.client.query(`
            CREATE INDEX IF NOT EXISTS idx_${this.tableName}_thread_position
            ON ${this.table} (thread_id, position DESC)
        `);
    }

    async put(draft: CheckpointDraft<S>): Promise<string> {
        const checkpointId = draft.checkpointId ?? createCheckpointId();

        // Single statement, so concurrent writers to one thread never interleave
        const inserted = await this.client.query(
            `INSERT INTO ${this.table} (${COLUMNS})
             VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9)
             ON CONFLICT (thread_id, checkpoint_id) DO NOTHING
             RETURNING checkpoint_id`,
            [
                draft.threadId,
                checkpointId,
                draft.parentCheckpointId,
                draft.sequence,
                draft.next,
                draft.source,
                draft.createdAt,
                stableStringify(draft.values),
                draft.interrupt ? stableStringify(draft.interrupt) : null,
            ]
        );

        if (inserted.rows.length === 0) {
            const existing = await this.get(draft.threadId, checkpointId);
            if (existing) {
                assertSamePayload(existing, draft);
            }
        }

        return checkpointId;
    }

    async getLatest(threadId: string): Promise<Checkpoint<S> | null> {
        const result = await this.client.query(
            `SELECT ${COLUMNS}
             FROM ${this.table}
             WHERE thread_id = $1
             ORDER BY position DESC
             LIMIT 1`,
            [threadId]
        );

        const [row] = result.rows;
        return row === undefined ? null : this.decodeRow(row);
    }

    async get(threadId: string, checkpointId: string): Promise<Checkpoint<S> | null> {
        const result = await this.client.query(
            `SELECT ${COLUMNS}
             FROM ${this.table}
             WHERE thread_id = $1 AND checkpoint_id = $2`,
            [threadId, checkpointId]
        );

        const [row] = result.rows;
        return row === undefined ? null : this.decodeRow(row);
    }

    async history(threadId: string): Promise<Checkpoint<S>[]> {
        const result = await this.client.query(
            `SELECT ${COLUMNS}
             FROM ${this.table}
             WHERE thread_id = $1
             ORDER BY position DESC`,
            [threadId]
        );

        return result.rows.map(row => this.decodeRow(row));
    }

    async deleteThread(threadId: string): Promise<number> {
        const result = await this.client.query(
            `DELETE FROM ${this.table} WHERE thread_id = $1`,
            [threadId]
        );
        return result.rowCount ?? 0;
    }

    private decodeRow(raw: unknown): Checkpoint<S> {
        const row = checkpointRowSchema.parse(raw);

        return decodeCheckpoint({
            threadId: row.thread_id,
            checkpointId: row.checkpoint_id,
            parentCheckpointId: row.parent_checkpoint_id,
            sequence: row.sequence_number,
            next: row.pending_next_node,
            source: row.source,
            createdAt: row.created_at,
            values: row.state_snapshot,
            interrupt: row.pending_interrupt ?? undefined,
        }, this.stateSchema);
    }
}
