import { z } from 'zod';
import {
    END,
    MemoryCheckpointStore,
    StateGraph,
    accumulate,
    consoleLogger,
    replace,
} from '../src';

const State = z.object({
    counter: z.number(),
    log: z.array(z.string()).default([]),
});
type State = z.infer<typeof State>;

async function main() {
    const app = new StateGraph<State>({
        schema: State,
        channels: { counter: replace(), log: accumulate() },
    })
        .addNode('increment', (s) => ({ counter: s.counter + 1, log: `increment -> ${s.counter + 1}` }))
        .setEntryPoint('increment')
        .addConditionalEdges(
            'increment',
            (s) => (s.counter < 3 ? 'again' : 'stop'),
            { again: 'increment', stop: END },
        )
        .compile({
            checkpointer: new MemoryCheckpointStore<State>(),
            logger: consoleLogger,
        });

    const threadId = 'demo';
    console.log('Final:', await app.invoke({ counter: 0 }, { threadId }));

    const history = await app.getStateHistory(threadId);
    for (const checkpoint of history) {
        console.log(`#${checkpoint.sequence} ${checkpoint.source} next=${checkpoint.next}`, checkpoint.values);
    }

    // Fork from the first increment with a different counter
    const first = history[history.length - 2];
    await app.updateState(threadId, { counter: -5, log: 'manual reset' }, {
        checkpointId: first.checkpointId,
        asNode: 'increment',
    });
    console.log('Fork:', await app.invoke(null, { threadId }));

    // Replay the original branch from the same point
    console.log('Replay:', await app.replay(threadId, first.checkpointId));
}

main().catch((error) => {
    console.error(error);
    process.exit(1);
});
