// =============================================================================
// ANSI helpers for board squares (zero dependencies)
// =============================================================================

const RESET = '\x1b[0m';

export const PALETTE = {
    lightSquare: 146,
    darkSquare: 60,
    whitePiece: 231,
    blackPiece: 16,
    coordinate: 60,
    label: 146,
} as const;

export function paint(text: string, fg: number, bg?: number): string {
    const background = bg === undefined ? '' : `\x1b[48;5;${bg}m`;
    return `${background}\x1b[38;5;${fg}m${text}${RESET}`;
}

export const CLEAR_SCREEN = '\x1b[2J\x1b[H';
export const CURSOR_HOME = '\x1b[H';
export const HIDE_CURSOR = '\x1b[?25l';
export const SHOW_CURSOR = '\x1b[?25h';
