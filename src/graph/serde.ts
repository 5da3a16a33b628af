/**
 * JSON encoding of checkpoints for durable stores.
 * Decoded records are validated with zod; state values go through the
 * caller's state schema so they come back typed.
 */

import { z } from 'zod';
import { stableStringify } from '../lib/stable-json';
import type { Checkpoint, PendingInterrupt } from './checkpointer';

export const checkpointSourceSchema = z.enum(['input', 'loop', 'update', 'interrupt']);

/** Envelope of a stored checkpoint, with `values` still undecoded */
export const checkpointRecordSchema = z.object({
    threadId: z.string().min(1),
    checkpointId: z.string().min(1),
    parentCheckpointId: z.string().min(1).nullable(),
    sequence: z.number().int().nonnegative(),
    next: z.string().min(1),
    source: checkpointSourceSchema,
    createdAt: z.number(),
    values: z.unknown(),
    interrupt: z.object({
        node: z.string().min(1),
        payload: z.unknown(),
        resumes: z.array(z.unknown()),
    }).optional(),
});

export type CheckpointRecord = z.infer<typeof checkpointRecordSchema>;

/** Anything that can decode unknown JSON into a state (a zod schema works) */
export interface StateDecoder<S> {
    parse(data: unknown): S;
}

export function serializeCheckpoint<S>(checkpoint: Checkpoint<S>): string {
    return stableStringify(checkpoint);
}

export function decodeCheckpoint<S>(record: unknown, stateSchema: StateDecoder<S>): Checkpoint<S> {
    const envelope = checkpointRecordSchema.parse(record);
    const checkpoint: Checkpoint<S> = {
        threadId: envelope.threadId,
        checkpointId: envelope.checkpointId,
        parentCheckpointId: envelope.parentCheckpointId,
        sequence: envelope.sequence,
        next: envelope.next,
        source: envelope.source,
        createdAt: envelope.createdAt,
        values: stateSchema.parse(envelope.values),
    };
    if (envelope.interrupt) {
        const pending: PendingInterrupt = {
            node: envelope.interrupt.node,
            payload: envelope.interrupt.payload,
            resumes: envelope.interrupt.resumes,
        };
        checkpoint.interrupt = pending;
    }
    return checkpoint;
}

export function deserializeCheckpoint<S>(data: string, stateSchema: StateDecoder<S>): Checkpoint<S> {
    const raw: unknown = JSON.parse(data);
    return decodeCheckpoint(raw, stateSchema);
}
