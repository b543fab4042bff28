import type { GameUpdate, PlayerInfo } from './types.js';
import { type Board, type Piece, fenToBoard } from './board.js';
import { PALETTE, paint } from './format.js';
import { type Logger, silentLogger } from './logger.js';

export type GlyphSet = 'unicode' | 'ascii';

export interface RenderOptions {
    /** Piece glyphs (default: 'unicode') */
    glyphs?: GlyphSet;

    /** Paint squares and pieces with ANSI colours (default: false) */
    color?: boolean;

    logger?: Logger;
}

/**
 * One screenful. `full` frames replace the screen; `board` frames only
 * change the position, the player panels are the same as before.
 */
export interface Frame {
    scope: 'full' | 'board';
    lines: string[];
}

const FILES = 'abcdefgh';

const UNICODE_WHITE: Record<Piece['type'], string> = { k: '♔', q: '♕', r: '♖', b: '♗', n: '♘', p: '♙' };
const UNICODE_BLACK: Record<Piece['type'], string> = { k: '♚', q: '♛', r: '♜', b: '♝', n: '♞', p: '♟' };

const MARKERS: Record<GlyphSet, { black: string; white: string; empty: string }> = {
    unicode: { black: '●', white: '○', empty: '·' },
    ascii: { black: 'B', white: 'W', empty: '.' },
};

/**
 * Turns feed updates into text frames: black's panel on top, the board
 * from white's side, white's panel underneath.
 */
export class TextRenderer {
    private glyphs: GlyphSet;
    private color: boolean;
    private logger: Logger;
    private players: [PlayerInfo | null, PlayerInfo | null] | null = null;
    private board: Board | null = null;

    constructor(options: RenderOptions = {}) {
        this.glyphs = options.glyphs ?? 'unicode';
        this.color = options.color ?? false;
        this.logger = options.logger ?? silentLogger;
    }

    apply(update: GameUpdate): Frame {
        if (update.kind === 'featured') {
            this.players = update.players;
        }
        if (update.fen !== null) {
            this.setPosition(update.fen);
        }

        return {
            scope: update.kind === 'featured' ? 'full' : 'board',
            lines: this.render(),
        };
    }

    render(): string[] {
        return [
            this.playerLine(0),
            '',
            ...this.boardLines(),
            '',
            this.playerLine(1),
        ];
    }

    private setPosition(fen: string): void {
        const board = fenToBoard(fen);
        if (!board) {
            this.logger.debug('render:bad-position', { fen });
            return;
        }
        this.board = board;
    }

    private boardLines(): string[] {
        const lines: string[] = [];

        for (let row = 0; row < 8; row++) {
            let line = this.coordinate(String(8 - row)) + ' ';
            for (let col = 0; col < 8; col++) {
                line += this.square(row, col, this.board?.[row]?.[col] ?? null);
            }
            lines.push(this.color ? line : line.trimEnd());
        }

        lines.push('  ' + [...FILES].map((file) => this.coordinate(file)).join(' '));
        return lines;
    }

    private square(row: number, col: number, piece: Piece | null): string {
        if (!this.color) {
            return `${this.glyph(piece)} `;
        }

        const light = (row + col) % 2 === 0;
        const bg = light ? PALETTE.lightSquare : PALETTE.darkSquare;
        if (!piece) {
            return paint('  ', PALETTE.whitePiece, bg);
        }

        // Colour tells the sides apart, so both use the solid glyphs
        const glyph = this.glyphs === 'unicode' ? UNICODE_BLACK[piece.type] : this.glyph(piece);
        const fg = piece.color === 'w' ? PALETTE.whitePiece : PALETTE.blackPiece;
        return paint(`${glyph} `, fg, bg);
    }

    private glyph(piece: Piece | null): string {
        if (!piece) {
            return MARKERS[this.glyphs].empty;
        }
        if (this.glyphs === 'ascii') {
            return piece.color === 'w' ? piece.type.toUpperCase() : piece.type;
        }
        return piece.color === 'w' ? UNICODE_WHITE[piece.type] : UNICODE_BLACK[piece.type];
    }

    private coordinate(text: string): string {
        return this.color ? paint(text, PALETTE.coordinate) : text;
    }

    private playerLine(index: 0 | 1): string {
        if (!this.players) {
            return '';
        }

        const markers = MARKERS[this.glyphs];
        const marker = index === 0 ? markers.black : markers.white;
        const player = this.players[index];
        const name = player?.name ?? '?';
        const rating = player?.rating ?? null;

        if (!this.color) {
            return rating ? `${marker} ${name} ${rating}` : `${marker} ${name}`;
        }

        const fg = index === 0 ? PALETTE.blackPiece : PALETTE.whitePiece;
        const text = `${paint(marker, fg)} ${paint(name, PALETTE.label)}`;
        return rating ? `${text} ${paint(rating, PALETTE.coordinate)}` : text;
    }
}
