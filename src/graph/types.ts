/**
 * Graph runtime types.
 */

import type { z } from 'zod';
import type { Logger, LogLevel } from '../lib/logger';
import type { Tracer } from '../lib/tracer';
import type { RecursionLimitExceeded } from '../lib/errors';
import type { Channels, UpdateValue } from './state';
import type { CheckpointStore, PendingInterrupt } from './checkpointer';

/** Virtual node that precedes the entry point */
export const START = '__start__';

/** Terminal sentinel: routing here ends the run */
export const END = '__end__';

/** Partial state returned by a node; array keys also accept a single element */
export type StateUpdate<S> = { [K in keyof S]?: UpdateValue<S[K]> };

/** Per-call context handed to every node */
export interface NodeConfig {
    threadId: string;
    /** 1-based index of the node execution within the current call */
    step: number;
    signal?: AbortSignal;
    logger: Logger;
    /**
     * Pause this node and hand `payload` to the caller. On a run resumed with
     * `{ resume }` the same call returns the resume value instead; the node
     * re-runs from its start, so work before the call must be repeatable.
     */
    interrupt(payload: unknown): unknown;
}

/** Graph node function signature */
export type NodeFunction<S> = (
    state: Readonly<S>,
    config: NodeConfig,
) => Promise<StateUpdate<S>> | StateUpdate<S>;

/**
 * Conditional edge router. Returns a label that is looked up in the
 * edge's destination table, not a node name.
 */
export type Router<S> = (state: Readonly<S>) => Promise<string> | string;

/** Destination table: label to node, or a list of node names routed by name */
export type Destinations = readonly string[] | Readonly<Record<string, string>>;

/** Graph node definition */
export interface GraphNode<S> {
    name: string;
    fn: NodeFunction<S>;
}

/** Graph edge definition */
export type GraphEdge<S> =
    | { kind: 'static'; from: string; to: string }
    | { kind: 'conditional'; from: string; router: Router<S>; destinations: Record<string, string> };

/** Graph builder config */
export interface StateGraphConfig<S> {
    /** Validates every state produced by a merge and fills in defaults */
    schema: z.ZodType<S, z.ZodTypeDef, unknown>;
    /** Merge policy for each state key */
    channels: Channels<S>;
}

/** Options accepted by `compile()` */
export interface CompileOptions<S> {
    /** Checkpoint store (default: a fresh in-memory store) */
    checkpointer?: CheckpointStore<S>;
    /** Pause before these nodes run */
    interruptBefore?: string[];
    /** Pause after these nodes run */
    interruptAfter?: string[];
    /** Default recursion limit for calls that do not set one */
    recursionLimit?: number;
    /** Default: silent */
    logger?: Logger;
    /** Only applies if using a logger (default: 'info') */
    logLevel?: LogLevel;
    /** Default: no-op */
    tracer?: Tracer;
}

/** Per-call options */
export interface RunOptions {
    /** Thread to run on (default: a new random thread) */
    threadId?: string;
    /** Start from this checkpoint instead of the thread's latest */
    checkpointId?: string;
    /** Maximum node executions in this call */
    recursionLimit?: number;
    /** Checked between steps */
    signal?: AbortSignal;
    /** Answer to the pending `interrupt()` of the starting checkpoint; input must be null */
    resume?: unknown;
}

/** Chunk yielded by `stream()` after every persisted step */
export interface StreamChunk<S> {
    node: string;
    update: StateUpdate<S>;
    values: S;
    checkpointId: string;
    /** Set when the node paused through `config.interrupt()`; `update` is then empty */
    interrupt?: PendingInterrupt;
}

/** Result-style outcome of a run */
export type RunOutcome<S, E extends Error = RecursionLimitExceeded> =
    | { success: true; threadId: string; values: S }
    | { success: false; threadId: string; error: E };

/**
 * Outcome of one `batch()` request. `threadId` is undefined when the request
 * failed before a thread was assigned (invalid options without a thread id).
 */
export type BatchOutcome<S> =
    | { success: true; threadId: string; values: S }
    | { success: false; threadId: string | undefined; error: Error };

export interface BatchRequest<S> {
    input: StateUpdate<S> | null;
    options?: RunOptions;
}

export interface BatchOptions {
    /** Maximum runs in flight (default: unlimited) */
    maxConcurrency?: number;
}

/** Options for `updateState()` */
export interface UpdateStateOptions {
    /** Checkpoint to fork from (default: latest) */
    checkpointId?: string;
    /** Treat the update as if this node had produced it */
    asNode?: string;
}
