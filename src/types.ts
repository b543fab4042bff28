/**
 * Token types produced by the tokenizer.
 */
export type TokenType =
    | 'BEGIN_OBJECT'    // {
    | 'END_OBJECT'      // }
    | 'BEGIN_ARRAY'     // [
    | 'END_ARRAY'       // ]
    | 'COLON'           // :
    | 'COMMA'           // ,
    | 'STRING'          // "..." (no escapes)
    | 'NUMBER'          // unsigned digits only
    | 'TRUE'            // true
    | 'FALSE'           // false
    | 'ERROR';          // Unexpected byte, end of input, or truncated token

/**
 * A token produced by the tokenizer.
 * Only valid until the next tokenizer call on the same buffer.
 */
export interface Token {
    type: TokenType;

    /** Start of the token content in the buffer (for strings: after the quote) */
    offset: number;

    /** Byte length of the token content */
    length: number;
}

/**
 * Cursor over one record buffer.
 * `off === len` means "stop": every routine treats it as the abort signal.
 */
export interface Scanner {
    readonly buf: Uint8Array;
    readonly len: number;
    off: number;
}

/**
 * Field and enum names the walker knows about.
 */
export type KnownSymbol =
    | 'd'
    | 't'
    | 'featured'
    | 'user'
    | 'rating'
    | 'black'
    | 'color'
    | 'fen'
    | 'white'
    | 'players'
    | 'name';

export type SymbolName = KnownSymbol | 'unknown';

/**
 * A span of the input buffer. The byte at `offset + length` has been
 * overwritten with 0 by the parser.
 */
export interface StringView {
    offset: number;
    length: number;
}

export interface PlayerSlot {
    name?: StringView;
    rating?: StringView;
}

export type ChunkKind = 'unknown' | 'featured' | 'fen-update';

/**
 * One parsed feed record. Views alias the buffer that was parsed.
 */
export interface ChunkRecord {
    kind: ChunkKind;
    position?: StringView;

    /** Index 0 is black, index 1 is white */
    players: [PlayerSlot | undefined, PlayerSlot | undefined];
}

/**
 * Either the whole record or nothing.
 */
export type ParseResult =
    | { ok: true; chunk: ChunkRecord }
    | { ok: false };

// ============ Decoded updates ============

export interface PlayerInfo {
    name: string | null;
    rating: string | null;
}

/**
 * A record copied out of its buffer, safe to keep after the buffer is reused.
 */
export type GameUpdate =
    | {
        kind: 'featured';
        fen: string | null;
        players: [PlayerInfo | null, PlayerInfo | null];
    }
    | {
        kind: 'fen-update';
        fen: string | null;
    };

/**
 * Counters kept by a feed while it runs.
 */
export interface FeedStats {
    /** Non-blank records handed to the parser */
    records: number;

    /** Records that produced an update */
    updates: number;

    /** Records the parser aborted on, or that carried no type tag */
    rejected: number;

    /** Records dropped for exceeding maxRecordBytes */
    oversized: number;
}
