export { parseChunk } from './core/walker.js';
export { createScanner, nextToken } from './core/tokenizer.js';
export { recognize, KNOWN_SYMBOLS } from './core/symbols.js';
export { readView, decodeChunk } from './core/view.js';
export { ChunkFeed, type FeedOptions } from './feed.js';
export { TextRenderer, type Frame, type GlyphSet, type RenderOptions } from './render.js';
export { fenToBoard, type Board, type Piece } from './board.js';
export { openHttpSource, openFileSource, type HttpSourceOptions, type FileSourceOptions } from './source.js';
export { run, watch, frameText, type RunContext, type WatchOptions, type Output } from './app.js';
export { loadConfig, configSchema, DEFAULT_FEED_URL, type Config, type ConfigInput } from './config.js';
export { createLogger, silentLogger, type Logger, type LogEntry, type LogLevel, type LoggerOptions } from './logger.js';
export { FenfeedError, ConfigError, FeedConnectionError } from './errors.js';
export type {
    ChunkKind,
    ChunkRecord,
    FeedStats,
    GameUpdate,
    KnownSymbol,
    ParseResult,
    PlayerInfo,
    PlayerSlot,
    Scanner,
    StringView,
    SymbolName,
    Token,
    TokenType,
} from './types.js';
