import { describe, it, expect } from 'vitest';
import { ChunkFeed } from '../src/feed.js';
import { createLogger, type LogEntry } from '../src/logger.js';
import { type Frame, TextRenderer } from '../src/render.js';
import { bytes, collect, featuredRecord, fenRecord, START_FEN, toStream } from './helpers.js';

const E4 = 'rnbqkbnr/pppppppp/8/8/4P3/8/PPPP1PPP/RNBQKBNR b';
const SHORT = '{"t":"fen","d":{"fen":"8/8/8/8/8/8/8/8"}}';

function chunksOf(text: string, size: number): string[] {
    const chunks: string[] = [];
    for (let i = 0; i < text.length; i += size) {
        chunks.push(text.slice(i, i + size));
    }
    return chunks;
}

describe('ChunkFeed', () => {
    describe('record splitting', () => {
        it('reassembles records split across chunks', async () => {
            const text = featuredRecord() + '\n' + fenRecord(E4) + '\n';
            const feed = new ChunkFeed({ stream: toStream(chunksOf(text, 7)) });
            const updates = await collect(feed);

            expect(updates).toEqual([
                {
                    kind: 'featured',
                    fen: START_FEN,
                    players: [
                        { name: 'Alice', rating: '2500' },
                        { name: 'Bob', rating: '2400' },
                    ],
                },
                { kind: 'fen-update', fen: E4 },
            ]);
            expect(feed.stats).toEqual({ records: 2, updates: 2, rejected: 0, oversized: 0 });
        });

        it('handles several records in one chunk', async () => {
            const feed = new ChunkFeed({ stream: toStream([fenRecord('8/8') + '\n' + fenRecord('7k/8') + '\n']) });
            const updates = await collect(feed);

            expect(updates).toEqual([
                { kind: 'fen-update', fen: '8/8' },
                { kind: 'fen-update', fen: '7k/8' },
            ]);
        });

        it('decodes multi-byte names split between byte chunks', async () => {
            const record = bytes(featuredRecord().replace('Alice', 'Ægir Þór') + '\n');
            const pieces: Uint8Array[] = [];
            for (let i = 0; i < record.length; i += 3) {
                pieces.push(record.slice(i, i + 3));
            }

            const updates = await collect(new ChunkFeed({ stream: toStream(pieces) }));
            const first = updates[0];
            expect(first?.kind).toBe('featured');
            if (first?.kind === 'featured') {
                expect(first.players[0]).toEqual({ name: 'Ægir Þór', rating: '2500' });
            }
        });

        it('keeps a surrogate pair split between text chunks', async () => {
            const record = '{"t":"featured","d":{"players":[{"color":"black","user":{"name":"A😀B"}},{"color":"white"}]}}\n';
            const cut = record.indexOf('\uD83D') + 1;

            const updates = await collect(new ChunkFeed({ stream: toStream([record.slice(0, cut), record.slice(cut)]) }));

            expect(updates).toEqual([
                {
                    kind: 'featured',
                    fen: null,
                    players: [{ name: 'A😀B', rating: null }, { name: null, rating: null }],
                },
            ]);
        });

        it('parses a final record without a trailing newline', async () => {
            const feed = new ChunkFeed({ stream: toStream(['\n', fenRecord('8/8')]) });
            expect(await collect(feed)).toEqual([{ kind: 'fen-update', fen: '8/8' }]);
            expect(feed.stats.records).toBe(1);
        });

        it('grows its buffer for long records', async () => {
            const record = `{"t":"fen","pad":"${'x'.repeat(5000)}","d":{"fen":"8/8"}}\n`;
            const feed = new ChunkFeed({ stream: toStream(chunksOf(record, 1000)) });
            expect(await collect(feed)).toEqual([{ kind: 'fen-update', fen: '8/8' }]);
        });
    });

    describe('dropped records', () => {
        it('skips keep-alives and counts rejected records', async () => {
            const feed = new ChunkFeed({
                stream: toStream([
                    '\n',
                    fenRecord('8/8'),
                    '\n\n',
                    '{"t":"bogus","d":{}}\n',
                    '\r\n',
                    '{"d":{"fen":"8/8"}}\n',
                    fenRecord('7k/8') + '\r\n',
                ]),
            });
            const updates = await collect(feed);

            expect(updates).toEqual([
                { kind: 'fen-update', fen: '8/8' },
                { kind: 'fen-update', fen: '7k/8' },
            ]);
            expect(feed.stats).toEqual({ records: 4, updates: 2, rejected: 2, oversized: 0 });
        });

        it('drops an oversized record and resumes at the next newline', async () => {
            const entries: LogEntry[] = [];
            const logger = createLogger({ level: 'warn', sink: (entry) => entries.push(entry) });
            const feed = new ChunkFeed({
                stream: toStream(chunksOf(featuredRecord() + '\n' + SHORT + '\n', 50)),
                maxRecordBytes: 64,
                logger,
            });
            const updates = await collect(feed);

            expect(updates).toEqual([{ kind: 'fen-update', fen: '8/8/8/8/8/8/8/8' }]);
            expect(feed.stats).toEqual({ records: 1, updates: 1, rejected: 0, oversized: 1 });
            expect(entries.map((entry) => [entry.level, entry.event, entry.data])).toEqual([
                ['warn', 'feed:oversized-record', { maxRecordBytes: 64 }],
            ]);
        });

        it('accepts a record of exactly maxRecordBytes', async () => {
            const feed = new ChunkFeed({ stream: toStream([SHORT + '\n']), maxRecordBytes: SHORT.length });
            expect(await collect(feed)).toHaveLength(1);
        });

        it('counts an oversized final record', async () => {
            const feed = new ChunkFeed({ stream: toStream([featuredRecord()]), maxRecordBytes: 64 });
            expect(await collect(feed)).toEqual([]);
            expect(feed.stats.oversized).toBe(1);
        });

        it('logs each record at debug level', async () => {
            const entries: LogEntry[] = [];
            const logger = createLogger({ level: 'debug', sink: (entry) => entries.push(entry) });
            const feed = new ChunkFeed({ stream: toStream(['{"t":"bogus","d":{}}\n', fenRecord('8/8') + '\n']), logger });
            await collect(feed);

            expect(entries.map((entry) => [entry.level, entry.event, entry.data])).toEqual([
                ['debug', 'feed:record-rejected', { bytes: 20, parsed: false }],
                ['debug', 'feed:update', { kind: 'fen-update' }],
                ['info', 'feed:end', { records: 2, updates: 1, rejected: 1, oversized: 0 }],
            ]);
        });
    });

    describe('with a renderer', () => {
        it('redraws everything for featured records and only the board for updates', async () => {
            const feed = new ChunkFeed({ stream: toStream([featuredRecord() + '\n', fenRecord(E4) + '\n']) });
            const renderer = new TextRenderer({ glyphs: 'ascii' });

            const frames: Frame[] = [];
            for await (const update of feed) {
                frames.push(renderer.apply(update));
            }

            expect(frames.map((frame) => frame.scope)).toEqual(['full', 'board']);
            expect(frames[1]?.lines[0]).toBe('B Alice 2500');
            expect(frames[1]?.lines[6]).toBe('4 . . . . P . . .');
        });
    });
});
