/**
 * In-place Parsing Example
 *
 * Shows the views parseChunk returns and the terminators it writes.
 * Run: npx tsx examples/02-parse-in-place.ts
 */

import { parseChunk, readView } from '../src/index.js';

const record = '{"t":"featured","d":{"fen":"8/8/8/8/8/8/8/8","players":['
    + '{"color":"black","rating":2500,"user":{"name":"Alice"}},'
    + '{"color":"white","rating":2400,"user":{"name":"Bob"}}]}}';

const buf = new TextEncoder().encode(record);
const result = parseChunk(buf);

if (!result.ok) {
    console.log('record rejected');
} else {
    const { chunk } = result;
    console.log('kind:    ', chunk.kind);
    if (chunk.position) {
        console.log('position:', chunk.position, JSON.stringify(readView(buf, chunk.position)));
    }
    chunk.players.forEach((player, index) => {
        const color = index === 0 ? 'black' : 'white';
        const name = player?.name ? readView(buf, player.name) : '(none)';
        const rating = player?.rating ? readView(buf, player.rating) : '(none)';
        console.log(`${color}:    `, name, rating);
    });

    // Quotes and the byte after each rating are now 0
    console.log('\nbuffer:', new TextDecoder().decode(buf).replaceAll('\0', '␀'));
}

// Any structural problem drops the whole record
console.log('\nbogus type tag:', parseChunk(new TextEncoder().encode('{"t":"bogus","d":{}}')));
