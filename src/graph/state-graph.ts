/**
 * StateGraph - graph builder.
 *
 * Nodes and edges are registered on an explicit builder and validated once,
 * at `compile()`.
 */

import { DuplicateNodeError, GraphValidationError, UnknownNodeError } from '../lib/errors';
import { createFilteredLogger, noopLogger } from '../lib/logger';
import { NoopTracer } from '../lib/tracer';
import { MemoryCheckpointStore } from './checkpointer';
import { CompiledStateGraph } from './compiled-graph';
import { resolveLogLevel, resolveRecursionLimit } from './config';
import { toChannelMap } from './state';
import type {
    CompileOptions,
    Destinations,
    GraphEdge,
    GraphNode,
    NodeFunction,
    Router,
    StateGraphConfig,
} from './types';
import { END, START } from './types';

/**
 * StateGraph builder for checkpointed workflows.
 *
 * @example
 * ```typescript
 * const State = z.object({ counter: z.number(), log: z.array(z.string()).default([]) });
 *
 * const app = new StateGraph({
 *     schema: State,
 *     channels: { counter: replace(), log: accumulate() },
 * })
 *     .addNode('increment', (s) => ({ counter: s.counter + 1, log: 'increment' }))
 *     .setEntryPoint('increment')
 *     .setFinishPoint('increment')
 *     .compile({ checkpointer: new MemoryCheckpointStore() });
 * ```
 */
export class StateGraph<S extends object> {
    private readonly nodes = new Map<string, GraphNode<S>>();
    private readonly edges: GraphEdge<S>[] = [];
    private readonly entryPoints: string[] = [];

    constructor(private readonly config: StateGraphConfig<S>) { }

    /**
     * Add a node to the graph.
     *
     * @throws DuplicateNodeError - Name already registered
     */
    addNode(name: string, fn: NodeFunction<S>): this {
        if (this.nodes.has(name)) {
            throw new DuplicateNodeError(name);
        }
        this.nodes.set(name, { name, fn });
        return this;
    }

    /**
     * Add a static edge. `addEdge(START, name)` sets the entry point.
     *
     * @throws UnknownNodeError - An endpoint is not registered
     */
    addEdge(from: string, to: string): this {
        if (to !== END) {
            this.assertKnown(to);
        }

        if (from === START) {
            this.entryPoints.push(to);
            return this;
        }

        this.assertKnown(from);
        this.edges.push({ kind: 'static', from, to });
        return this;
    }

    /**
     * Add a conditional edge. The router's return value is a label looked up in
     * `destinations`; a list of node names routes each name to itself.
     * Destinations are checked at compile.
     *
     * @throws UnknownNodeError - `from` is not registered
     */
    addConditionalEdges(from: string, router: Router<S>, destinations: Destinations): this {
        this.assertKnown(from);

        const table: Record<string, string> = isDestinationList(destinations)
            ? Object.fromEntries(destinations.map(name => [name, name]))
            : { ...destinations };

        this.edges.push({ kind: 'conditional', from, router, destinations: table });
        return this;
    }

    /**
     * Set the entry point.
     */
    setEntryPoint(name: string): this {
        this.entryPoints.push(name);
        return this;
    }

    /**
     * Shorthand for `addEdge(name, END)`.
     */
    setFinishPoint(name: string): this {
        return this.addEdge(name, END);
    }

    /**
     * Validate the graph and bind it to a checkpoint store.
     *
     * @throws GraphValidationError - With every violation found
     */
    compile(options: CompileOptions<S> = {}): CompiledStateGraph<S> {
        const violations = this.validate(options);
        if (violations.length > 0) {
            throw new GraphValidationError(violations);
        }

        const [entryPoint] = this.entryPoints;
        const logLevel = resolveLogLevel(options.logLevel);

        return new CompiledStateGraph<S>({
            schema: this.config.schema,
            channels: toChannelMap(this.config.channels),
            nodes: new Map(this.nodes),
            edges: new Map(this.edges.map(edge => [edge.from, edge])),
            entryPoint: entryPoint ?? END,
            checkpointer: options.checkpointer ?? new MemoryCheckpointStore<S>(),
            interruptBefore: new Set(options.interruptBefore ?? []),
            interruptAfter: new Set(options.interruptAfter ?? []),
            recursionLimit: resolveRecursionLimit(options.recursionLimit),
            logger: options.logger ? createFilteredLogger(options.logger, logLevel) : noopLogger,
            tracer: options.tracer ?? new NoopTracer(),
        });
    }

    private assertKnown(name: string): void {
        if (!this.nodes.has(name)) {
            throw new UnknownNodeError(name);
        }
    }

    private validate(options: CompileOptions<S>): string[] {
        const violations: string[] = [];

        for (const name of this.nodes.keys()) {
            if (name === START || name === END) {
                violations.push(`Node name "${name}" is reserved.`);
            }
        }

        const uniqueEntries = [...new Set(this.entryPoints)];
        if (uniqueEntries.length === 0) {
            violations.push('No entry point set.');
        } else if (uniqueEntries.length > 1) {
            violations.push(`Multiple entry points set: ${uniqueEntries.join(', ')}.`);
        }
        for (const entry of uniqueEntries) {
            if (!this.nodes.has(entry)) {
                violations.push(`Entry point "${entry}" is not a registered node.`);
            }
        }

        for (const edge of this.edges) {
            if (edge.kind !== 'conditional') continue;
            for (const [label, target] of Object.entries(edge.destinations)) {
                if (target !== END && !this.nodes.has(target)) {
                    violations.push(
                        `Conditional edge from "${edge.from}" routes "${label}" to unregistered node "${target}".`
                    );
                }
            }
        }

        const outgoing = new Map<string, number>();
        for (const edge of this.edges) {
            outgoing.set(edge.from, (outgoing.get(edge.from) ?? 0) + 1);
        }
        for (const name of this.nodes.keys()) {
            const count = outgoing.get(name) ?? 0;
            if (count === 0) {
                violations.push(`Node "${name}" has no outgoing edge.`);
            } else if (count > 1) {
                violations.push(`Node "${name}" has ${count} outgoing edges; only one is allowed.`);
            }
        }

        if (uniqueEntries.length === 1) {
            const reachable = this.reachableFrom(uniqueEntries[0]);
            for (const name of this.nodes.keys()) {
                if (!reachable.has(name)) {
                    violations.push(`Node "${name}" is unreachable from the entry point.`);
                }
            }
        }

        for (const [option, names] of [
            ['interruptBefore', options.interruptBefore ?? []],
            ['interruptAfter', options.interruptAfter ?? []],
        ] as const) {
            for (const name of names) {
                if (!this.nodes.has(name)) {
                    violations.push(`${option} names unregistered node "${name}".`);
                }
            }
        }

        return violations;
    }

    private reachableFrom(entry: string): Set<string> {
        const seen = new Set<string>();
        const queue = [entry];

        while (queue.length > 0) {
            const name = queue.shift();
            if (name === undefined || seen.has(name) || !this.nodes.has(name)) continue;
            seen.add(name);

            for (const edge of this.edges) {
                if (edge.from !== name) continue;
                const targets = edge.kind === 'static' ? [edge.to] : Object.values(edge.destinations);
                queue.push(...targets.filter(t => t !== END));
            }
        }

        return seen;
    }
}

function isDestinationList(destinations: Destinations): destinations is readonly string[] {
    return Array.isArray(destinations);
}
