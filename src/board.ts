import { Chess, type Color, type PieceSymbol } from 'chess.js';

export interface Piece {
    type: PieceSymbol;
    color: Color;
}

/** Eight ranks, rank 8 first; each rank runs from the a-file to the h-file */
export type Board = (Piece | null)[][];

const RANK = /^[pnbrqkPNBRQK1-8]+$/;

/**
 * Build a board from a FEN. Only the piece placement field is read; the
 * feed's position updates often carry nothing else. Returns null when the
 * placement is malformed.
 */
export function fenToBoard(fen: string): Board | null {
    const [placement] = fen.trim().split(/\s+/);
    if (!placement || !isPlacement(placement)) {
        return null;
    }

    // Placement-only positions (no kings, impossible castling) are fine to draw
    const chess = new Chess();
    try {
        chess.load(`${placement} w - - 0 1`, { skipValidation: true });
    } catch {
        return null;
    }

    return chess.board().map((rank) =>
        rank.map((square) => (square ? { type: square.type, color: square.color } : null)),
    );
}

function isPlacement(placement: string): boolean {
    const ranks = placement.split('/');
    return ranks.length === 8 && ranks.every((rank) => RANK.test(rank) && rankWidth(rank) === 8);
}

function rankWidth(rank: string): number {
    let width = 0;
    for (const c of rank) {
        width += c >= '1' && c <= '8' ? Number(c) : 1;
    }
    return width;
}
