import type { ChunkRecord, GameUpdate, PlayerInfo, PlayerSlot, StringView } from '../types.js';

const decoder = new TextDecoder();

/**
 * Decode a view of `buf` as UTF-8.
 */
export function readView(buf: Uint8Array, view: StringView): string {
    return decoder.decode(buf.subarray(view.offset, view.offset + view.length));
}

/**
 * Copy a parsed record out of its buffer.
 * Returns null for a record that carried no type tag.
 */
export function decodeChunk(buf: Uint8Array, chunk: ChunkRecord): GameUpdate | null {
    const fen = chunk.position ? readView(buf, chunk.position) : null;

    switch (chunk.kind) {
        case 'featured':
            return {
                kind: 'featured',
                fen,
                players: [decodePlayer(buf, chunk.players[0]), decodePlayer(buf, chunk.players[1])],
            };
        case 'fen-update':
            return { kind: 'fen-update', fen };
        case 'unknown':
            return null;
    }
}

function decodePlayer(buf: Uint8Array, slot: PlayerSlot | undefined): PlayerInfo | null {
    if (!slot) return null;
    return {
        name: slot.name ? readView(buf, slot.name) : null,
        rating: slot.rating ? readView(buf, slot.rating) : null,
    };
}
