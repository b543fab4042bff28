import { createReadStream } from 'node:fs';
import { type Readable, addAbortSignal } from 'node:stream';
import { FeedConnectionError } from './errors.js';
import type { Logger } from './logger.js';
import { silentLogger } from './logger.js';

export interface HttpSourceOptions {
    /** Defaults to the global fetch */
    fetch?: typeof fetch;
    signal?: AbortSignal;
    logger?: Logger;
}

export interface FileSourceOptions {
    /** Aborting destroys the stream, so a read that never ends still stops */
    signal?: AbortSignal;

    /** Read for "-" (default: process.stdin) */
    stdin?: Readable;
}

/**
 * Open the feed endpoint and return its body as a byte stream.
 */
export async function openHttpSource(url: string, options: HttpSourceOptions = {}): Promise<AsyncIterable<Uint8Array>> {
    const doFetch = options.fetch ?? fetch;
    const logger = options.logger ?? silentLogger;

    let response: Response;
    try {
        response = await doFetch(url, {
            headers: { accept: 'application/x-ndjson' },
            signal: options.signal,
        });
    } catch (error) {
        throw new FeedConnectionError(url, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
        throw new FeedConnectionError(url, `HTTP ${response.status}`, response.status);
    }
    if (!response.body) {
        throw new FeedConnectionError(url, 'response has no body', response.status);
    }

    logger.info('source:connected', { url, status: response.status });
    return streamToIterable(response.body);
}

/**
 * Read the feed from a file, or from stdin when the path is "-".
 */
export function openFileSource(path: string, options: FileSourceOptions = {}): AsyncIterable<Uint8Array> {
    const stream: Readable = path === '-' ? options.stdin ?? process.stdin : createReadStream(path);
    return options.signal ? addAbortSignal(options.signal, stream) : stream;
}

async function* streamToIterable(stream: NonNullable<Response['body']>): AsyncIterable<Uint8Array> {
    const reader = stream.getReader();

    try {
        while (true) {
            const { done, value } = await reader.read();
            if (done) break;
            yield value;
        }
    } finally {
        reader.releaseLock();
    }
}
