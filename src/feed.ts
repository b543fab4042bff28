import type { FeedStats, GameUpdate } from './types.js';
import { parseChunk } from './core/walker.js';
import { decodeChunk } from './core/view.js';
import { type Logger, silentLogger } from './logger.js';

const LF = 0x0a;
const INITIAL_CAPACITY = 4096;

/**
 * Options for creating a ChunkFeed.
 */
export interface FeedOptions {
    /** The source yielding raw feed bytes (or text) in arbitrary pieces */
    stream: AsyncIterable<Uint8Array | string>;

    /** Records longer than this are dropped (default: 65536) */
    maxRecordBytes?: number;

    logger?: Logger;
}

/**
 * Splits a newline-delimited feed into records and yields one update per
 * record that parses. Every record is parsed in place inside one reusable
 * buffer, so each update is decoded before the next record overwrites it.
 */
export class ChunkFeed implements AsyncIterable<GameUpdate> {
    readonly stats: FeedStats = { records: 0, updates: 0, rejected: 0, oversized: 0 };

    private stream: AsyncIterable<Uint8Array | string>;
    private maxRecordBytes: number;
    private logger: Logger;
    private encoder = new TextEncoder();
    private buffer: Uint8Array;
    private length = 0;
    private discarding = false;
    private highSurrogate = '';

    constructor(options: FeedOptions) {
        this.stream = options.stream;
        this.maxRecordBytes = options.maxRecordBytes ?? 64 * 1024;
        this.logger = options.logger ?? silentLogger;
        this.buffer = new Uint8Array(Math.min(INITIAL_CAPACITY, this.maxRecordBytes));
    }

    async *[Symbol.asyncIterator](): AsyncIterator<GameUpdate> {
        for await (const chunk of this.stream) {
            for (const update of this.split(this.toBytes(chunk))) {
                yield update;
            }
        }

        // A lone high surrogate left at the end encodes as U+FFFD
        if (this.highSurrogate) {
            for (const update of this.split(this.toBytes(new Uint8Array(0)))) {
                yield update;
            }
        }

        // The last record may arrive without a trailing newline
        if (this.length > 0 || this.discarding) {
            const update = this.endRecord();
            if (update) yield update;
        }

        this.logger.info('feed:end', { ...this.stats });
    }

    /**
     * Text chunks may end halfway through a surrogate pair. That half is
     * held back and encoded with the next chunk.
     */
    private toBytes(chunk: Uint8Array | string): Uint8Array {
        const held = this.highSurrogate;
        this.highSurrogate = '';

        if (typeof chunk !== 'string') {
            return held ? concat(this.encoder.encode(held), chunk) : chunk;
        }

        let text = held + chunk;
        const last = text.charCodeAt(text.length - 1);
        if (last >= 0xd800 && last <= 0xdbff) {
            this.highSurrogate = text.slice(-1);
            text = text.slice(0, -1);
        }
        return this.encoder.encode(text);
    }

    private *split(bytes: Uint8Array): Generator<GameUpdate> {
        let start = 0;
        while (start < bytes.length) {
            const newline = bytes.indexOf(LF, start);
            this.append(bytes, start, newline === -1 ? bytes.length : newline);
            if (newline === -1) return;

            const update = this.endRecord();
            if (update) yield update;
            start = newline + 1;
        }
    }

    private append(bytes: Uint8Array, start: number, end: number): void {
        if (this.discarding || end === start) return;

        const needed = this.length + (end - start);
        if (needed > this.maxRecordBytes) {
            // Drop everything up to the next delimiter
            this.discarding = true;
            this.length = 0;
            return;
        }

        if (needed > this.buffer.length) {
            const grown = new Uint8Array(Math.min(this.maxRecordBytes, Math.max(needed, this.buffer.length * 2)));
            grown.set(this.buffer.subarray(0, this.length));
            this.buffer = grown;
        }

        this.buffer.set(bytes.subarray(start, end), this.length);
        this.length = needed;
    }

    private endRecord(): GameUpdate | null {
        const length = this.length;
        this.length = 0;

        if (this.discarding) {
            this.discarding = false;
            this.stats.oversized++;
            this.logger.warn('feed:oversized-record', { maxRecordBytes: this.maxRecordBytes });
            return null;
        }
        if (isBlank(this.buffer, length)) {
            return null;  // keep-alive
        }

        this.stats.records++;
        const result = parseChunk(this.buffer, length);
        const update = result.ok ? decodeChunk(this.buffer, result.chunk) : null;

        if (!update) {
            this.stats.rejected++;
            this.logger.debug('feed:record-rejected', { bytes: length, parsed: result.ok });
            return null;
        }

        this.stats.updates++;
        this.logger.debug('feed:update', { kind: update.kind });
        return update;
    }
}

function concat(a: Uint8Array, b: Uint8Array): Uint8Array {
    const joined = new Uint8Array(a.length + b.length);
    joined.set(a);
    joined.set(b, a.length);
    return joined;
}

function isBlank(buf: Uint8Array, length: number): boolean {
    for (let i = 0; i < length; i++) {
        const c = buf[i];
        if (c !== 0x20 && c !== 0x09 && c !== 0x0d && c !== 0x0a) {
            return false;
        }
    }
    return true;
}
