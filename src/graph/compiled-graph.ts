/**
 * CompiledStateGraph - the step interpreter.
 *
 * Runs one node per step, merges its update, picks the next node and writes a
 * checkpoint. Replay and fork reuse the same loop from a stored checkpoint.
 */

import type { z } from 'zod';
import {
    CheckpointNotFoundError,
    EmptyThreadError,
    GraphAbortedError,
    GraphInterrupt,
    InvalidOptionsError,
    InvalidUpdateError,
    NoPendingInterruptError,
    RecursionLimitExceeded,
    RoutingError,
    UnknownNodeError,
} from '../lib/errors';
import { withLogContext, type Logger } from '../lib/logger';
import { createSemaphore } from '../lib/semaphore';
import type { Tracer } from '../lib/tracer';
import type { Checkpoint, CheckpointDraft, CheckpointStore, PendingInterrupt } from './checkpointer';
import { resolveBatchOptions, resolveRunOptions, toValidationItems, type ResolvedRunOptions } from './config';
import { frozenCopy, mergeState, type ChannelMap } from './state';
import type {
    BatchOptions,
    BatchOutcome,
    BatchRequest,
    GraphEdge,
    GraphNode,
    RunOptions,
    RunOutcome,
    StateUpdate,
    StreamChunk,
    UpdateStateOptions,
} from './types';
import { END } from './types';

/** Everything `StateGraph.compile()` hands over */
export interface CompiledGraphInit<S> {
    schema: z.ZodType<S, z.ZodTypeDef, unknown>;
    channels: ChannelMap;
    nodes: ReadonlyMap<string, GraphNode<S>>;
    /** Outgoing edge per node */
    edges: ReadonlyMap<string, GraphEdge<S>>;
    entryPoint: string;
    checkpointer: CheckpointStore<S>;
    interruptBefore: ReadonlySet<string>;
    interruptAfter: ReadonlySet<string>;
    recursionLimit: number;
    logger: Logger;
    tracer: Tracer;
}

type ReplayOptions = Omit<RunOptions, 'threadId' | 'checkpointId'>;

/** What one step leaves behind: the node's update and the checkpoint written for it */
interface StepResult<S> {
    update: StateUpdate<S>;
    checkpoint: Checkpoint<S>;
}

export class CompiledStateGraph<S extends object> {
    constructor(private readonly graph: CompiledGraphInit<S>) { }

    get checkpointer(): CheckpointStore<S> {
        return this.graph.checkpointer;
    }

    // ========================================================================
    // Execution
    // ========================================================================

    /**
     * Run the thread until END, an interrupt, or an error.
     *
     * - New thread: `input` becomes the initial checkpoint.
     * - Existing thread with `input`: the input is merged in and the run restarts at the entry point.
     * - Existing thread without `input`: resumes the pending node.
     * - Paused by `config.interrupt()`: pass `{ resume }` with null input to answer it;
     *   without `resume` the paused values are returned and nothing runs.
     *
     * @returns State values of the last checkpoint reached
     * @throws RecursionLimitExceeded - More than `recursionLimit` nodes would run
     */
    async invoke(input: StateUpdate<S> | null | undefined, options?: RunOptions): Promise<S> {
        return this.execute(input, resolveRunOptions(options, this.graph.recursionLimit));
    }

    /**
     * Like `invoke`, but a hit recursion limit comes back as a failed outcome.
     * Every other error is rethrown.
     */
    async invokeSafe(input: StateUpdate<S> | null | undefined, options?: RunOptions): Promise<RunOutcome<S>> {
        const resolved = resolveRunOptions(options, this.graph.recursionLimit);

        try {
            const values = await this.execute(input, resolved);
            return { success: true, threadId: resolved.threadId, values };
        } catch (error) {
            if (error instanceof RecursionLimitExceeded) {
                return { success: false, threadId: resolved.threadId, error };
            }
            throw error;
        }
    }

    /**
     * Same loop as `invoke`, yielding each node's update as soon as its checkpoint is stored.
     * Stopping iteration early stops the run between steps.
     */
    async *stream(
        input: StateUpdate<S> | null | undefined,
        options?: RunOptions,
    ): AsyncGenerator<StreamChunk<S>, S, undefined> {
        return yield* this.run(input, resolveRunOptions(options, this.graph.recursionLimit));
    }

    /**
     * Run independent requests concurrently. Outcomes come back in request order
     * and a failed request never aborts the others.
     */
    async batch(requests: BatchRequest<S>[], options?: BatchOptions): Promise<BatchOutcome<S>[]> {
        const { maxConcurrency } = resolveBatchOptions(options);
        const semaphore = maxConcurrency ? createSemaphore(maxConcurrency) : null;

        return Promise.all(requests.map(async (request): Promise<BatchOutcome<S>> => {
            if (semaphore) await semaphore.acquire();

            let threadId = request.options?.threadId;
            try {
                const resolved = resolveRunOptions(request.options, this.graph.recursionLimit);
                threadId = resolved.threadId;
                const values = await this.execute(request.input, resolved);
                return { success: true, threadId: resolved.threadId, values };
            } catch (error) {
                return { success: false, threadId, error: toError(error) };
            } finally {
                if (semaphore) semaphore.release();
            }
        }));
    }

    // ========================================================================
    // History & time travel
    // ========================================================================

    /**
     * Latest checkpoint of a thread, or a specific one.
     */
    async getState(threadId: string, checkpointId?: string): Promise<Checkpoint<S> | null> {
        return checkpointId
            ? this.graph.checkpointer.get(threadId, checkpointId)
            : this.graph.checkpointer.getLatest(threadId);
    }

    /**
     * All checkpoints of a thread, most recent first.
     */
    async getStateHistory(threadId: string): Promise<Checkpoint<S>[]> {
        return this.graph.checkpointer.history(threadId);
    }

    /**
     * Resume from a past checkpoint. Only nodes after it run; the new
     * checkpoints branch off it and the existing history is left untouched.
     */
    async replay(threadId: string, checkpointId: string, options: ReplayOptions = {}): Promise<S> {
        return this.invoke(null, { ...options, threadId, checkpointId });
    }

    /**
     * Fork: write a checkpoint holding `values` merged into the base checkpoint,
     * as if `asNode` had produced them. The next node is whatever follows
     * `asNode`; without `asNode` the base checkpoint's next node is kept.
     * No node body runs.
     */
    async updateState(
        threadId: string,
        values: StateUpdate<S>,
        options: UpdateStateOptions = {},
    ): Promise<Checkpoint<S>> {
        const { checkpointId, asNode } = options;
        const base = await this.getState(threadId, checkpointId);

        if (!base) {
            throw checkpointId
                ? new CheckpointNotFoundError(threadId, checkpointId)
                : new EmptyThreadError(threadId);
        }
        if (asNode !== undefined && !this.graph.nodes.has(asNode)) {
            throw new UnknownNodeError(asNode);
        }

        const merged = this.applyUpdate(base.values, values, asNode);
        const next = asNode === undefined ? base.next : await this.nextNode(asNode, merged);

        const checkpoint = await this.persist({
            threadId,
            parentCheckpointId: base.checkpointId,
            sequence: base.sequence + 1,
            values: merged,
            next,
            source: 'update',
            createdAt: Date.now(),
        });

        this.graph.logger.info('State updated', {
            threadId,
            checkpointId: checkpoint.checkpointId,
            forkedFrom: base.checkpointId,
            asNode,
            next,
        });

        return checkpoint;
    }

    /**
     * Remove a thread and all its checkpoints.
     */
    async deleteThread(threadId: string): Promise<number> {
        return this.graph.checkpointer.deleteThread(threadId);
    }

    // ========================================================================
    // Interpreter
    // ========================================================================

    private async execute(input: StateUpdate<S> | null | undefined, options: ResolvedRunOptions): Promise<S> {
        const run = this.run(input, options);

        let result = await run.next();
        while (!result.done) {
            result = await run.next();
        }

        return result.value;
    }

    private async *run(
        input: StateUpdate<S> | null | undefined,
        options: ResolvedRunOptions,
    ): AsyncGenerator<StreamChunk<S>, S, undefined> {
        const { threadId, recursionLimit, signal, resume } = options;
        const logger = withLogContext(this.graph.logger, { threadId });

        if (resume !== undefined && input != null) {
            throw new InvalidOptionsError('Invalid run options: resume requires null input', [
                { path: ['resume'], message: 'cannot be combined with input' },
            ]);
        }

        let current = await this.resolveStart(input, options);
        // A resumed run must not stop again at the breakpoint it paused on
        let resumedAt: string | null = input == null ? current.next : null;
        let steps = 0;

        // Answers for the interrupt() calls of the first node, in call order
        let answers: unknown[] = [];
        if (resume !== undefined) {
            if (!current.interrupt) {
                throw new NoPendingInterruptError(threadId, current.checkpointId);
            }
            answers = [...current.interrupt.resumes, resume];
        } else if (current.interrupt && input == null) {
            logger.info('Thread is waiting on an interrupt', {
                node: current.interrupt.node,
                checkpointId: current.checkpointId,
            });
            return current.values;
        }

        logger.debug('Run started', {
            checkpointId: current.checkpointId,
            next: current.next,
            recursionLimit,
        });

        while (true) {
            if (signal?.aborted) {
                throw new GraphAbortedError(threadId);
            }

            if (current.next === END) {
                logger.info('Run finished', { steps, checkpointId: current.checkpointId });
                return current.values;
            }

            const name = current.next;

            if (this.graph.interruptBefore.has(name) && resumedAt !== name) {
                logger.info('Interrupted before node', { node: name, checkpointId: current.checkpointId });
                return current.values;
            }
            resumedAt = null;

            if (steps >= recursionLimit) {
                logger.warn('Recursion limit reached', { recursionLimit, checkpointId: current.checkpointId });
                throw new RecursionLimitExceeded(recursionLimit, threadId, current.checkpointId);
            }

            const node = this.graph.nodes.get(name);
            if (!node) {
                throw new UnknownNodeError(name);
            }

            steps++;
            const step = steps;
            const state = frozenCopy(current.values);

            const parent = current;
            const interrupt = createInterrupt(answers);
            answers = [];

            const { update, checkpoint } = await this.graph.tracer.withSpan<StepResult<S>>('graph.node', async (span) => {
                let update: StateUpdate<S>;
                try {
                    update = await node.fn(state, { threadId, step, signal, logger, interrupt });
                } catch (error) {
                    if (!(error instanceof GraphInterrupt)) {
                        throw error;
                    }
                    const checkpoint = await this.persistInterrupt(parent, name, error);
                    span.setAttributes({ 'graph.interrupted': true, 'graph.checkpoint_id': checkpoint.checkpointId });
                    return { update: {}, checkpoint };
                }

                const values = this.applyUpdate(parent.values, update, name);
                const next = await this.nextNode(name, values);

                const checkpoint = await this.persist({
                    threadId,
                    parentCheckpointId: parent.checkpointId,
                    sequence: parent.sequence + 1,
                    values,
                    next,
                    source: 'loop',
                    createdAt: Date.now(),
                });
                span.setAttributes({ 'graph.next': next, 'graph.checkpoint_id': checkpoint.checkpointId });

                return { update, checkpoint };
            }, { 'graph.node': name, 'graph.thread_id': threadId, 'graph.step': step });

            current = checkpoint;
            const { next } = checkpoint;

            if (checkpoint.interrupt) {
                logger.info('Interrupted inside node', { node: name, step, checkpointId: checkpoint.checkpointId });
                yield {
                    node: name,
                    update,
                    values: structuredClone(checkpoint.values),
                    checkpointId: checkpoint.checkpointId,
                    interrupt: structuredClone(checkpoint.interrupt),
                };
                return current.values;
            }

            logger.debug('Step completed', { node: name, step, checkpointId: checkpoint.checkpointId, next });

            yield { node: name, update, values: structuredClone(checkpoint.values), checkpointId: checkpoint.checkpointId };

            if (this.graph.interruptAfter.has(name) && next !== END) {
                logger.info('Interrupted after node', { node: name, checkpointId: current.checkpointId });
                return current.values;
            }
        }
    }

    /**
     * Checkpoint the run starts from, writing an input checkpoint when input is given.
     */
    private async resolveStart(
        input: StateUpdate<S> | null | undefined,
        options: ResolvedRunOptions,
    ): Promise<Checkpoint<S>> {
        const { threadId, checkpointId } = options;
        const base = await this.getState(threadId, checkpointId);

        if (checkpointId && !base) {
            throw new CheckpointNotFoundError(threadId, checkpointId);
        }

        if (input == null) {
            if (!base) {
                throw new EmptyThreadError(threadId);
            }
            return base;
        }

        return this.persist({
            threadId,
            parentCheckpointId: base?.checkpointId ?? null,
            sequence: base ? base.sequence + 1 : 0,
            values: this.applyUpdate(base?.values ?? {}, input),
            next: this.graph.entryPoint,
            source: 'input',
            createdAt: Date.now(),
        });
    }

    /**
     * Store a paused node: values stay as they were and the node stays pending.
     */
    private async persistInterrupt(parent: Checkpoint<S>, node: string, raised: GraphInterrupt): Promise<Checkpoint<S>> {
        const pending: PendingInterrupt = { node, payload: raised.payload, resumes: raised.resumes };

        return this.persist({
            threadId: parent.threadId,
            parentCheckpointId: parent.checkpointId,
            sequence: parent.sequence + 1,
            values: parent.values,
            next: node,
            source: 'interrupt',
            interrupt: pending,
            createdAt: Date.now(),
        });
    }

    private async persist(draft: CheckpointDraft<S>): Promise<Checkpoint<S>> {
        const checkpointId = await this.graph.checkpointer.put(draft);
        return { ...draft, checkpointId };
    }

    /**
     * Merge an update and validate the result against the state schema.
     */
    private applyUpdate(values: object, update: unknown, node?: string): S {
        const merged = mergeState(this.graph.channels, values, update, node);
        const result = this.graph.schema.safeParse(merged);

        if (!result.success) {
            const issues = toValidationItems(result.error);
            const source = node ? `node "${node}"` : 'input';
            throw new InvalidUpdateError(
                `State after ${source} failed validation: ` +
                issues.map(i => `${i.path.join('.') || '(root)'} ${i.message}`).join('; '),
                node,
                issues,
            );
        }

        return result.data;
    }

    /**
     * Follow the outgoing edge of `from`.
     *
     * @throws RoutingError - Router label not in the destination table
     */
    private async nextNode(from: string, values: S): Promise<string> {
        const edge = this.graph.edges.get(from);
        if (!edge) {
            return END;
        }
        if (edge.kind === 'static') {
            return edge.to;
        }

        const label = await edge.router(frozenCopy(values));
        const target = Object.hasOwn(edge.destinations, label) ? edge.destinations[label] : undefined;

        if (target === undefined) {
            throw new RoutingError(from, String(label), Object.keys(edge.destinations));
        }

        return target;
    }
}

/**
 * `config.interrupt` for one node run. The i-th call returns the i-th answer;
 * a call past the answers pauses the node.
 */
function createInterrupt(answers: readonly unknown[]): (payload: unknown) => unknown {
    let calls = 0;

    return (payload: unknown): unknown => {
        const index = calls++;
        if (index < answers.length) {
            return answers[index];
        }
        throw new GraphInterrupt(payload, answers.slice());
    };
}

function toError(error: unknown): Error {
    return error instanceof Error ? error : new Error(String(error));
}
