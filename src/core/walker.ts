/**
 * Schema Walker
 *
 * Recursive descent over the one record shape the feed sends:
 *
 *   { "t": "featured" | "fen",
 *     "d": { "fen": "...",
 *            "players": [ { "color": "black" | "white",
 *                           "rating": 1234,
 *                           "user": { "name": "..." } },
 *                         { ... } ] } }
 *
 * One function per nesting level. Keys may come in any order and unknown
 * keys with scalar values are skipped. Every structural violation forces
 * the cursor to the end of the buffer and the whole record is dropped.
 */

import type { ChunkKind, ChunkRecord, ParseResult, PlayerSlot, Scanner, StringView, SymbolName } from '../types.js';
import { createScanner, nextToken } from './tokenizer.js';
import { recognize } from './symbols.js';

/**
 * Player fields collected before the color is known.
 */
interface PlayerDraft {
    index?: 0 | 1;
    name?: StringView;
    rating?: StringView;
}

type MemberEnd = 'next' | 'close';

/**
 * Parse one record held in the first `len` bytes of `buf`.
 * The buffer is modified in place; the returned views point into it.
 */
export function parseChunk(buf: Uint8Array, len: number = buf.length): ParseResult {
    const scan = createScanner(buf, len);
    const draft: ChunkRecord = { kind: 'unknown', players: [undefined, undefined] };

    if (!walkRecord(scan, draft)) {
        return { ok: false };
    }
    return { ok: true, chunk: draft };
}

// ============ Level 0: record ============

function walkRecord(scan: Scanner, draft: ChunkRecord): boolean {
    if (nextToken(scan).type !== 'BEGIN_OBJECT') {
        return fail(scan);
    }

    for (;;) {
        const key = readKey(scan);
        if (key === null) {
            return false;
        }

        switch (key) {
            case 't': {
                const kind = recordKind(readEnum(scan));
                if (kind === null) {
                    return fail(scan);
                }
                draft.kind = kind;
                break;
            }
            case 'd':
                if (!walkData(scan, draft)) {
                    return false;
                }
                break;
            default:
                if (!skipValue(scan)) {
                    return false;
                }
        }

        const end = readMemberEnd(scan);
        if (end === null) {
            return false;
        }
        if (end === 'close') {
            return true;
        }
    }
}

function recordKind(tag: SymbolName | null): ChunkKind | null {
    switch (tag) {
        case 'featured':
            return 'featured';
        case 'fen':
            return 'fen-update';
        default:
            return null;
    }
}

// ============ Level 1: data ============

function walkData(scan: Scanner, draft: ChunkRecord): boolean {
    if (nextToken(scan).type !== 'BEGIN_OBJECT') {
        return fail(scan);
    }

    for (;;) {
        const key = readKey(scan);
        if (key === null) {
            return false;
        }

        switch (key) {
            case 'fen': {
                const position = readString(scan);
                if (position === null) {
                    return false;
                }
                draft.position = position;
                break;
            }
            case 'players':
                if (!walkPlayers(scan, draft.players)) {
                    return false;
                }
                break;
            default:
                if (!skipValue(scan)) {
                    return false;
                }
        }

        const end = readMemberEnd(scan);
        if (end === null) {
            return false;
        }
        if (end === 'close') {
            return true;
        }
    }
}

/**
 * Exactly two players: `[ player , player ]`.
 */
function walkPlayers(scan: Scanner, players: ChunkRecord['players']): boolean {
    if (nextToken(scan).type !== 'BEGIN_ARRAY') {
        return fail(scan);
    }
    if (!walkPlayer(scan, players)) {
        return false;
    }
    if (nextToken(scan).type !== 'COMMA') {
        return fail(scan);
    }
    if (!walkPlayer(scan, players)) {
        return false;
    }
    if (nextToken(scan).type !== 'END_ARRAY') {
        return fail(scan);
    }
    return true;
}

// ============ Level 2: player ============

function walkPlayer(scan: Scanner, players: ChunkRecord['players']): boolean {
    const player: PlayerDraft = {};

    if (nextToken(scan).type !== 'BEGIN_OBJECT') {
        return fail(scan);
    }

    for (;;) {
        const key = readKey(scan);
        if (key === null) {
            return false;
        }

        switch (key) {
            case 'color': {
                const color = readEnum(scan);
                if (color === null) {
                    return false;
                }
                if (color === 'black') player.index = 0;
                else if (color === 'white') player.index = 1;
                break;
            }
            case 'user':
                if (!walkUser(scan, player)) {
                    return false;
                }
                break;
            case 'rating': {
                const rating = readNumber(scan);
                if (rating === null) {
                    return false;
                }
                player.rating = rating;
                break;
            }
            default:
                if (!skipValue(scan)) {
                    return false;
                }
        }

        const end = readMemberEnd(scan);
        if (end === null) {
            return false;
        }
        if (end === 'next') {
            continue;
        }

        // A player whose color is missing or unrecognized cannot be placed
        if (player.index === undefined) {
            return fail(scan);
        }
        players[player.index] = commitPlayer(scan, player);
        return true;
    }
}

function walkUser(scan: Scanner, player: PlayerDraft): boolean {
    if (nextToken(scan).type !== 'BEGIN_OBJECT') {
        return fail(scan);
    }

    for (;;) {
        const key = readKey(scan);
        if (key === null) {
            return false;
        }

        if (key === 'name') {
            const name = readString(scan);
            if (name === null) {
                return false;
            }
            player.name = name;
        } else if (!skipValue(scan)) {
            return false;
        }

        const end = readMemberEnd(scan);
        if (end === null) {
            return false;
        }
        if (end === 'close') {
            return true;
        }
    }
}

function commitPlayer(scan: Scanner, player: PlayerDraft): PlayerSlot {
    const slot: PlayerSlot = {};
    if (player.name) {
        slot.name = player.name;
    }
    if (player.rating) {
        terminateNumber(scan, player.rating);
        slot.rating = player.rating;
    }
    return slot;
}

/**
 * The byte after a number's digits was already consumed as a delimiter
 * (the rating was followed by `,` `}` or whitespace before the player
 * closed), so it can be reused as the terminator.
 */
function terminateNumber(scan: Scanner, view: StringView): void {
    const end = view.offset + view.length;
    if (end < scan.len) {
        scan.buf[end] = 0;
    }
}

// ============ Token Helpers ============

/**
 * `"key" :` classified, or null on a structural violation.
 */
function readKey(scan: Scanner): SymbolName | null {
    const key = nextToken(scan);
    if (key.type !== 'STRING') {
        return miss(scan);
    }
    if (nextToken(scan).type !== 'COLON') {
        return miss(scan);
    }
    return recognize(scan.buf, key.offset, key.length);
}

function readEnum(scan: Scanner): SymbolName | null {
    const value = nextToken(scan);
    if (value.type !== 'STRING') {
        return miss(scan);
    }
    return recognize(scan.buf, value.offset, value.length);
}

function readString(scan: Scanner): StringView | null {
    const value = nextToken(scan);
    if (value.type !== 'STRING') {
        return miss(scan);
    }
    return { offset: value.offset, length: value.length };
}

function readNumber(scan: Scanner): StringView | null {
    const value = nextToken(scan);
    if (value.type !== 'NUMBER') {
        return miss(scan);
    }
    return { offset: value.offset, length: value.length };
}

/**
 * Step over one scalar value of an unrecognized key. Objects and arrays
 * under unknown keys are not supported and abort the record.
 */
function skipValue(scan: Scanner): boolean {
    switch (nextToken(scan).type) {
        case 'STRING':
        case 'NUMBER':
        case 'TRUE':
        case 'FALSE':
            return true;
        default:
            return fail(scan);
    }
}

function readMemberEnd(scan: Scanner): MemberEnd | null {
    switch (nextToken(scan).type) {
        case 'COMMA':
            return 'next';
        case 'END_OBJECT':
            return 'close';
        default:
            return miss(scan);
    }
}

/**
 * Force the end-of-buffer sentinel so nothing further makes progress.
 */
function fail(scan: Scanner): false {
    scan.off = scan.len;
    return false;
}

function miss(scan: Scanner): null {
    scan.off = scan.len;
    return null;
}
