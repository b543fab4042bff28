import type { KnownSymbol, SymbolName } from '../types.js';

/**
 * Every name the walker dispatches on, in hash-slot order.
 *
 * The multiplier below places each of these in its own slot (index ===
 * position in this list). Adding or renaming a symbol means finding a new
 * multiplier and reordering the table; the symbol tests check every slot.
 */
export const KNOWN_SYMBOLS = [
    'd',
    't',
    'featured',
    'user',
    'rating',
    'black',
    'color',
    'fen',
    'white',
    'players',
    'name',
] as const satisfies readonly KnownSymbol[];

export const HASH_MULTIPLIER = 2367153;
export const TABLE_SIZE = 16;

interface Entry {
    symbol: KnownSymbol;
    bytes: Uint8Array;
}

const TABLE: (Entry | null)[] = buildTable();

/**
 * Slot index for a span: the first four bytes as a little-endian word
 * (zero padded), times the multiplier, top four bits of the 32-bit product.
 */
export function hashSlot(buf: Uint8Array, offset: number, length: number): number {
    let word = 0;
    const n = Math.min(length, 4);
    for (let i = 0; i < n; i++) {
        word |= buf[offset + i] << (8 * i);
    }
    return Math.imul(word, HASH_MULTIPLIER) >>> 28;
}

/**
 * Classify a span of the buffer. Only an exact match (length and every
 * byte) of a known name is recognized.
 */
export function recognize(buf: Uint8Array, offset: number, length: number): SymbolName {
    const entry = TABLE[hashSlot(buf, offset, length)];
    if (!entry || entry.bytes.length !== length) {
        return 'unknown';
    }
    for (let i = 0; i < length; i++) {
        if (buf[offset + i] !== entry.bytes[i]) {
            return 'unknown';
        }
    }
    return entry.symbol;
}

/**
 * Which symbol occupies a slot, or null for an empty slot.
 */
export function slotSymbol(slot: number): KnownSymbol | null {
    return TABLE[slot]?.symbol ?? null;
}

function buildTable(): (Entry | null)[] {
    const table: (Entry | null)[] = new Array<Entry | null>(TABLE_SIZE).fill(null);
    KNOWN_SYMBOLS.forEach((symbol, slot) => {
        table[slot] = { symbol, bytes: asciiBytes(symbol) };
    });
    return table;
}

function asciiBytes(text: string): Uint8Array {
    const bytes = new Uint8Array(text.length);
    for (let i = 0; i < text.length; i++) {
        bytes[i] = text.charCodeAt(i);
    }
    return bytes;
}
