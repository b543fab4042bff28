import { parseChunk } from '../src/core/walker.js';
import { readView } from '../src/core/view.js';
import type { ParseResult, StringView } from '../src/types.js';

const encoder = new TextEncoder();

/**
 * Helper to turn text into a fresh, mutable record buffer
 */
export function bytes(text: string): Uint8Array {
    return encoder.encode(text);
}

/**
 * Helper to create an async iterable from an array of chunks
 */
export async function* toStream(chunks: (string | Uint8Array)[]): AsyncIterable<string | Uint8Array> {
    for (const chunk of chunks) {
        yield chunk;
    }
}

/**
 * Helper to drain any async iterable
 */
export async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
    const results: T[] = [];
    for await (const item of source) {
        results.push(item);
    }
    return results;
}

/**
 * Helper to parse text and keep the mutated buffer for inspection
 */
export function parseText(text: string): { buf: Uint8Array; result: ParseResult } {
    const buf = bytes(text);
    return { buf, result: parseChunk(buf) };
}

/**
 * Helper to read an optional view as text
 */
export function textOf(buf: Uint8Array, view: StringView | undefined): string | undefined {
    return view ? readView(buf, view) : undefined;
}

export const START_FEN = 'rnbqkbnr/pppppppp/8/8/8/8/PPPPPPPP/RNBQKBNR';

export function featuredRecord(fen: string = START_FEN): string {
    return `{"t":"featured","d":{"id":"game1","fen":"${fen}","players":[`
        + '{"color":"white","user":{"name":"Bob","id":"bob"},"rating":2400,"seconds":180},'
        + '{"color":"black","user":{"name":"Alice","title":"GM"},"rating":2500,"seconds":175}]}}';
}

export function fenRecord(fen: string): string {
    return `{"t":"fen","d":{"fen":"${fen}","lm":"e2e4","wc":180,"bc":175}}`;
}
