/**
 * Checkpointer - State persistence for graph execution.
 *
 * A checkpoint is written after every step so that any thread can be
 * resumed, replayed or forked from any point of its history.
 */

import { randomUUID } from 'node:crypto';
import { CheckpointConflictError } from '../lib/errors';
import { stableStringify } from '../lib/stable-json';

/**
 * How a checkpoint came to be.
 * - input: created from caller input (initial state or a new turn)
 * - loop: written by the interpreter after a node ran
 * - update: written by `updateState()` (fork)
 * - interrupt: a node paused itself through `config.interrupt()`; values are unchanged
 */
export type CheckpointSource = 'input' | 'loop' | 'update' | 'interrupt';

/**
 * Interrupt raised from inside a node and waiting for a resume value.
 */
export interface PendingInterrupt {
    /** Node that raised it; it re-runs on resume */
    node: string;
    /** Value handed to `interrupt()`, for the caller to act on */
    payload: unknown;
    /** Answers to the node's earlier `interrupt()` calls, in call order */
    resumes: unknown[];
}

/**
 * Stored checkpoint. Never mutated once written.
 */
export interface Checkpoint<S> {
    threadId: string;
    checkpointId: string;
    /** Checkpoint this one was derived from (null for the first one of a thread) */
    parentCheckpointId: string | null;
    /** Depth on the branch: parent's sequence + 1 */
    sequence: number;
    values: S;
    /** Node to run next, or END */
    next: string;
    source: CheckpointSource;
    /** Set only on `interrupt` checkpoints */
    interrupt?: PendingInterrupt;
    /** Epoch milliseconds */
    createdAt: number;
}

/** Checkpoint as handed to `put()`; the store assigns an id when missing */
export type CheckpointDraft<S> = Omit<Checkpoint<S>, 'checkpointId'> & { checkpointId?: string };

/**
 * Checkpoint store interface.
 *
 * Implementations must append atomically per thread and never overwrite
 * a stored checkpoint.
 */
export interface CheckpointStore<S> {
    /**
     * Append a checkpoint.
     * Re-putting an existing id is allowed only with an identical payload.
     *
     * @throws CheckpointConflictError - Same id, different payload
     */
    put(checkpoint: CheckpointDraft<S>): Promise<string>;

    /**
     * Most recently stored checkpoint of a thread.
     */
    getLatest(threadId: string): Promise<Checkpoint<S> | null>;

    get(threadId: string, checkpointId: string): Promise<Checkpoint<S> | null>;

    /**
     * All checkpoints of a thread, most recent first.
     */
    history(threadId: string): Promise<Checkpoint<S>[]>;

    /**
     * Remove every checkpoint of a thread.
     * @returns Number of checkpoints removed
     */
    deleteThread(threadId: string): Promise<number>;
}

export function createCheckpointId(): string {
    return `ckpt_${randomUUID()}`;
}

/**
 * Canonical payload used for idempotent-put comparison.
 * `createdAt` is excluded so a retried write does not conflict with itself.
 */
export function checkpointPayload<S>(checkpoint: CheckpointDraft<S>): string {
    return stableStringify({
        threadId: checkpoint.threadId,
        parentCheckpointId: checkpoint.parentCheckpointId,
        sequence: checkpoint.sequence,
        values: checkpoint.values,
        next: checkpoint.next,
        source: checkpoint.source,
        interrupt: checkpoint.interrupt,
    });
}

/**
 * Shared idempotency rule: identical payload is a no-op, anything else conflicts.
 */
export function assertSamePayload<S>(existing: Checkpoint<S>, incoming: CheckpointDraft<S>): void {
    if (checkpointPayload(existing) !== checkpointPayload(incoming)) {
        throw new CheckpointConflictError(existing.threadId, existing.checkpointId);
    }
}

/**
 * In-memory checkpoint store.
 * Suitable for testing and short-lived processes; stores deep copies.
 */
export class MemoryCheckpointStore<S> implements CheckpointStore<S> {
    private readonly threads = new Map<string, Checkpoint<S>[]>();

    async put(draft: CheckpointDraft<S>): Promise<string> {
        const checkpointId = draft.checkpointId ?? createCheckpointId();
        const chain = this.threads.get(draft.threadId) ?? [];

        const existing = chain.find(c => c.checkpointId === checkpointId);
        if (existing) {
            assertSamePayload(existing, draft);
            return checkpointId;
        }

        chain.push(structuredClone({ ...draft, checkpointId }));
        this.threads.set(draft.threadId, chain);

        return checkpointId;
    }

    async getLatest(threadId: string): Promise<Checkpoint<S> | null> {
        const chain = this.threads.get(threadId) ?? [];
        const latest = chain.at(-1);
        return latest ? structuredClone(latest) : null;
    }

    async get(threadId: string, checkpointId: string): Promise<Checkpoint<S> | null> {
        const found = this.threads.get(threadId)?.find(c => c.checkpointId === checkpointId);
        return found ? structuredClone(found) : null;
    }

    async history(threadId: string): Promise<Checkpoint<S>[]> {
        const chain = this.threads.get(threadId) ?? [];
        return chain.map(c => structuredClone(c)).reverse();
    }

    async deleteThread(threadId: string): Promise<number> {
        const count = this.threads.get(threadId)?.length ?? 0;
        this.threads.delete(threadId);
        return count;
    }
}
