// =============================================================================
// fenfeed app — argument handling and the watch loop behind the CLI
// =============================================================================

import { parseArgs } from 'node:util';
import type { Readable } from 'node:stream';
import { type Config, type ConfigInput, loadConfig } from './config.js';
import { FenfeedError } from './errors.js';
import { ChunkFeed } from './feed.js';
import { CLEAR_SCREEN, CURSOR_HOME, HIDE_CURSOR, SHOW_CURSOR } from './format.js';
import { type LogSink, type Logger, createLogger, silentLogger } from './logger.js';
import { type Frame, TextRenderer } from './render.js';
import { openFileSource, openHttpSource } from './source.js';
import type { FeedStats } from './types.js';

export const VERSION = '0.1.0';

export const HELP = `
fenfeed — watch the featured chess game as text

Usage:
  fenfeed [options]

Options:
  --url <url>           Feed endpoint (default: https://lichess.org/api/tv/feed)
  --file <path>         Replay a saved feed instead; "-" reads stdin
  --ascii               Letters instead of chess glyphs
  --plain               No colours
  --log-level <level>   debug, info, warn, error or silent (default: warn)
  --help                Show this help
  --version             Show version

Environment Variables:
  FENFEED_URL, FENFEED_GLYPHS, FENFEED_COLOR, FENFEED_LOG_LEVEL,
  FENFEED_MAX_RECORD_BYTES
`;

export interface Output {
    write(text: string): unknown;
}

/**
 * Everything `run` touches outside its arguments.
 */
export interface RunContext {
    env: Record<string, string | undefined>;
    out: Output;
    err: Output;

    /** Whether `out` is a terminal that takes cursor escapes */
    interactive: boolean;

    /** Aborting stops the feed and `run` resolves with 0 */
    signal?: AbortSignal;

    /** Defaults to the global fetch */
    fetch?: typeof fetch;

    /** Read for `--file -` (default: process.stdin) */
    stdin?: Readable;

    /** Defaults to one line per entry on stderr */
    logSink?: LogSink;
}

/**
 * Run the command line and resolve with the exit code. Failures that are
 * a FenfeedError are reported on `err` and give 1; anything else rejects.
 */
export async function run(argv: string[], context: RunContext): Promise<number> {
    try {
        return await dispatch(argv, context);
    } catch (error) {
        if (error instanceof FenfeedError) {
            context.err.write(`fenfeed: ${error.message}\n`);
            return 1;
        }
        throw error;
    }
}

async function dispatch(argv: string[], context: RunContext): Promise<number> {
    const { values } = parseCommandLine(argv);

    if (values.help) {
        context.out.write(HELP + '\n');
        return 0;
    }
    if (values.version) {
        context.out.write(`fenfeed v${VERSION}\n`);
        return 0;
    }

    const overrides: Partial<ConfigInput> = {
        feedUrl: values.url,
        glyphs: values.ascii ? 'ascii' : undefined,
        color: values.plain ? false : undefined,
        logLevel: parseLogLevel(values['log-level']),
    };

    const config = loadConfig(context.env, overrides);
    const logger = createLogger({ level: config.logLevel, sink: context.logSink });
    const stream = values.file !== undefined
        ? openFileSource(values.file, { signal: context.signal, stdin: context.stdin })
        : await openHttpSource(config.feedUrl, { fetch: context.fetch, signal: context.signal, logger });

    const stats = await watch({
        stream,
        config,
        out: context.out,
        interactive: context.interactive,
        signal: context.signal,
        logger,
    });

    logger.info('cli:done', { ...stats });
    return 0;
}

function parseCommandLine(argv: string[]) {
    try {
        return parseArgs({
            args: argv,
            options: {
                url: { type: 'string' },
                file: { type: 'string' },
                ascii: { type: 'boolean' },
                plain: { type: 'boolean' },
                'log-level': { type: 'string' },
                help: { type: 'boolean', short: 'h' },
                version: { type: 'boolean', short: 'v' },
            },
        });
    } catch (error) {
        throw new FenfeedError('CLI_ERROR', error instanceof Error ? error.message : String(error));
    }
}

function parseLogLevel(value: string | undefined): ConfigInput['logLevel'] {
    switch (value) {
        case undefined:
            return undefined;
        case 'debug':
        case 'info':
        case 'warn':
        case 'error':
        case 'silent':
            return value;
        default:
            throw new FenfeedError('CLI_ERROR', `Unknown log level "${value}"`);
    }
}

// ============ Watch loop ============

export interface WatchOptions {
    stream: AsyncIterable<Uint8Array | string>;
    config: Pick<Config, 'glyphs' | 'color' | 'maxRecordBytes'>;
    out: Output;
    interactive: boolean;

    /** Once aborted, the error the stream ends with is not rethrown */
    signal?: AbortSignal;

    logger?: Logger;
}

/**
 * Draw every update until the stream ends or the signal aborts it.
 * The cursor is hidden while drawing on a terminal and always restored.
 */
export async function watch(options: WatchOptions): Promise<FeedStats> {
    const logger = options.logger ?? silentLogger;
    const feed = new ChunkFeed({
        stream: options.stream,
        maxRecordBytes: options.config.maxRecordBytes,
        logger,
    });
    const renderer = new TextRenderer({
        glyphs: options.config.glyphs,
        color: options.config.color && options.interactive,
        logger,
    });

    if (options.interactive) options.out.write(HIDE_CURSOR);

    try {
        for await (const update of feed) {
            options.out.write(frameText(renderer.apply(update), options.interactive));
        }
    } catch (error) {
        if (options.signal?.aborted !== true) throw error;
        logger.debug('cli:aborted');
    } finally {
        if (options.interactive) options.out.write(SHOW_CURSOR);
    }

    return feed.stats;
}

/**
 * On a terminal a full frame clears the screen and a board frame redraws
 * over the previous one. Otherwise frames are appended, a blank line apart.
 */
export function frameText(frame: Frame, interactive: boolean): string {
    const text = frame.lines.join('\n') + '\n';
    if (!interactive) {
        return text + '\n';
    }
    return (frame.scope === 'full' ? CLEAR_SCREEN : CURSOR_HOME) + text;
}
