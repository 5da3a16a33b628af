import { z } from 'zod';
import { START, StateGraph, accumulate, replace } from '../src';

const State = z.object({
    request: z.string(),
    draft: z.string().default(''),
    approved: z.boolean().default(false),
    audit: z.array(z.string()).default([]),
});
type State = z.infer<typeof State>;

async function main() {
    const app = new StateGraph<State>({
        schema: State,
        channels: { request: replace(), draft: replace(), approved: replace(), audit: accumulate() },
    })
        .addNode('draft', (s) => ({ draft: `Reply to: ${s.request}`, audit: 'drafted' }))
        .addNode('send', (s) => ({ audit: s.approved ? `sent: ${s.draft}` : 'discarded' }))
        .addEdge(START, 'draft')
        .addEdge('draft', 'send')
        .setFinishPoint('send')
        .compile({ interruptBefore: ['send'] });

    const threadId = 'ticket-42';
    const paused = await app.invoke({ request: 'refund order #42' }, { threadId });
    console.log('Waiting for approval:', paused.draft);

    // A reviewer signs off; the pending node stays "send"
    await app.updateState(threadId, { approved: true, audit: 'approved by reviewer' });

    const done = await app.invoke(null, { threadId });
    console.log(done.audit);
}

main().catch((error) => {
    console.error(error);
    process.exit(1);
});
