/**
 * Small graphs shared by the graph tests.
 */
import { z } from 'zod';
import { StateGraph } from '../../src/graph/state-graph';
import { accumulate, replace, type Channels } from '../../src/graph/state';
import { END, START, type CompileOptions } from '../../src/graph/types';

// ----------------------------------------------------------------------------
// start -> finish, each adding one to a replace-policy counter
// ----------------------------------------------------------------------------

export const CounterState = z.object({ counter: z.number() });
export type CounterState = z.infer<typeof CounterState>;

export const counterChannels: Channels<CounterState> = { counter: replace() };

export function createCounterGraph(): StateGraph<CounterState> {
    return new StateGraph({ schema: CounterState, channels: counterChannels })
        .addNode('start', (s) => ({ counter: s.counter + 1 }))
        .addNode('finish', (s) => ({ counter: s.counter + 1 }))
        .addEdge(START, 'start')
        .addEdge('start', 'finish')
        .addEdge('finish', END);
}

// ----------------------------------------------------------------------------
// Self-looping "add" node accumulating 3 per pass until the sum reaches 10
// ----------------------------------------------------------------------------

export const NumbersState = z.object({ numbers: z.array(z.number()).default([]) });
export type NumbersState = z.infer<typeof NumbersState>;

export const sum = (values: readonly number[]): number => values.reduce((a, b) => a + b, 0);

export function createAccumulatingLoop(options: CompileOptions<NumbersState> = {}) {
    return new StateGraph({ schema: NumbersState, channels: { numbers: accumulate<number>() } })
        .addNode('add', () => ({ numbers: 3 }))
        .setEntryPoint('add')
        .addConditionalEdges(
            'add',
            (s) => (sum(s.numbers) < 10 ? 'continue' : 'done'),
            { continue: 'add', done: END },
        )
        .compile(options);
}

// ----------------------------------------------------------------------------
// plan -> act -> review, recording visited nodes
// ----------------------------------------------------------------------------

export const PipelineState = z.object({
    topic: z.string(),
    visited: z.array(z.string()).default([]),
    approved: z.boolean().default(false),
});
export type PipelineState = z.infer<typeof PipelineState>;

export const pipelineChannels: Channels<PipelineState> = {
    topic: replace(),
    visited: accumulate(),
    approved: replace(),
};

export function createPipeline(options: CompileOptions<PipelineState> = {}) {
    return new StateGraph({ schema: PipelineState, channels: pipelineChannels })
        .addNode('plan', () => ({ visited: 'plan' }))
        .addNode('act', () => ({ visited: 'act' }))
        .addNode('review', () => ({ visited: 'review', approved: true }))
        .addEdge(START, 'plan')
        .addEdge('plan', 'act')
        .addEdge('act', 'review')
        .setFinishPoint('review')
        .compile(options);
}
