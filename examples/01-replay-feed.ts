/**
 * Replay Example
 *
 * Feeds a few canned records through ChunkFeed and prints each frame.
 * Run: npm run example
 */

import { ChunkFeed, TextRenderer } from '../src/index.js';

// Mock a feed response arriving in uneven pieces
async function* mockStream(): AsyncIterable<string> {
    const records = [
        '{"t":"featured","d":{"id":"demo","fen":"rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR","players":['
            + '{"color":"white","user":{"name":"Bob"},"rating":2400},'
            + '{"color":"black","user":{"name":"Alice"},"rating":2500}]}}',
        '',
        '{"t":"fen","d":{"fen":"rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b","lm":"e2e4"}}',
        '{"t":"fen","d":{"fen":"rnbqkbnr/pp1ppppp/8/2p5/4P3/8/PPPP1PPP/RNBQKBNR w","lm":"c7c5"}}',
    ];
    const text = records.join('\n') + '\n';

    for (let i = 0; i < text.length; i += 40) {
        await new Promise(resolve => setTimeout(resolve, 50)); // Simulate network delay
        yield text.slice(i, i + 40);
    }
}

async function main() {
    const feed = new ChunkFeed({ stream: mockStream() });
    const renderer = new TextRenderer();

    for await (const update of feed) {
        const frame = renderer.apply(update);
        console.log(`--- ${update.kind} (${frame.scope} redraw) ---`);
        console.log(frame.lines.join('\n'));
    }

    console.log('\nStats:', feed.stats);
}

main().catch((error: unknown) => {
    console.error(error);
    process.exitCode = 1;
});
