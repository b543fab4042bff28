/**
 * Record Tokenizer
 *
 * ┌─────────────────────────────────────────────────────────────────────────────┐
 * │                           DISPATCH ON FIRST BYTE                            │
 * └─────────────────────────────────────────────────────────────────────────────┘
 *
 *                         ┌──────────────────┐
 *                         │ skip ' ' \t \r \n│
 *                         └────────┬─────────┘
 *                                  │
 *        ┌──────────┬──────────────┼──────────────┬─────────────┐
 *        │          │              │              │             │
 *        ▼          ▼              ▼              ▼             ▼
 *   ┌─────────┐ ┌────────┐   ┌──────────┐   ┌──────────┐  ┌───────────┐
 *   │{ } [ ] ,│ │   "    │   │   0-9    │   │  f / t   │  │ other/EOF │
 *   │    :    │ └───┬────┘   └────┬─────┘   └────┬─────┘  └─────┬─────┘
 *   └────┬────┘     │             │              │              │
 *        │          ▼             ▼              ▼              ▼
 *        │     scan to next "  scan digits   exact match?    ERROR
 *        │      found │ EOF        │          yes │  no      (cursor
 *        │            │   │        │              │   │       stays)
 *        ▼            ▼   ▼        ▼              ▼   ▼
 *    1-byte      STRING  ERROR   NUMBER     TRUE/FALSE ERROR
 *    token      (" := 0) (cursor            (cursor = len)
 *                         = len)
 *
 * Strings are terminated in place: the closing quote becomes a 0 byte.
 * Backslash escapes are not recognized.
 */

import type { Scanner, Token, TokenType } from '../types.js';

const TAB = 0x09;
const LF = 0x0a;
const CR = 0x0d;
const SPACE = 0x20;
const QUOTE = 0x22;
const COMMA = 0x2c;
const DIGIT_0 = 0x30;
const DIGIT_9 = 0x39;
const COLON = 0x3a;
const OPEN_BRACKET = 0x5b;
const CLOSE_BRACKET = 0x5d;
const LOWER_F = 0x66;
const LOWER_T = 0x74;
const OPEN_BRACE = 0x7b;
const CLOSE_BRACE = 0x7d;

const FALSE_BYTES = [0x66, 0x61, 0x6c, 0x73, 0x65];  // false
const TRUE_BYTES = [0x74, 0x72, 0x75, 0x65];         // true

/**
 * Create a cursor over the first `len` bytes of `buf`.
 */
export function createScanner(buf: Uint8Array, len: number = buf.length): Scanner {
    return {
        buf,
        len: Math.max(0, Math.min(len, buf.length)),
        off: 0,
    };
}

/**
 * Read the next token and advance the cursor past it.
 */
export function nextToken(scan: Scanner): Token {
    const { buf, len } = scan;
    const off = skipWhitespace(buf, len, scan.off);

    if (off === len) {
        scan.off = off;
        return errorToken(len);
    }

    switch (buf[off]) {
        case OPEN_BRACE:
            return punctuation(scan, off, 'BEGIN_OBJECT');
        case CLOSE_BRACE:
            return punctuation(scan, off, 'END_OBJECT');
        case OPEN_BRACKET:
            return punctuation(scan, off, 'BEGIN_ARRAY');
        case CLOSE_BRACKET:
            return punctuation(scan, off, 'END_ARRAY');
        case COMMA:
            return punctuation(scan, off, 'COMMA');
        case COLON:
            return punctuation(scan, off, 'COLON');
        case QUOTE:
            return scanString(scan, off);
        case LOWER_F:
            return scanLiteral(scan, off, FALSE_BYTES, 'FALSE');
        case LOWER_T:
            return scanLiteral(scan, off, TRUE_BYTES, 'TRUE');
    }

    if (isDigit(buf[off])) {
        return scanNumber(scan, off);
    }

    scan.off = off;
    return errorToken(len);
}

export function isDigit(byte: number): boolean {
    return byte >= DIGIT_0 && byte <= DIGIT_9;
}

// ============ Token Scanners ============

function skipWhitespace(buf: Uint8Array, len: number, off: number): number {
    while (off < len) {
        const c = buf[off];
        if (c !== SPACE && c !== TAB && c !== LF && c !== CR) {
            return off;
        }
        off++;
    }
    return off;
}

function punctuation(scan: Scanner, off: number, type: TokenType): Token {
    scan.off = off + 1;
    return { type, offset: off, length: 1 };
}

function scanString(scan: Scanner, off: number): Token {
    const { buf, len } = scan;
    const start = off + 1;

    let end = start;
    while (end < len && buf[end] !== QUOTE) {
        end++;
    }

    if (end === len) {
        // Unterminated: the record was cut short
        scan.off = len;
        return errorToken(len);
    }

    buf[end] = 0;
    scan.off = end + 1;
    return { type: 'STRING', offset: start, length: end - start };
}

function scanNumber(scan: Scanner, off: number): Token {
    const { buf, len } = scan;

    let end = off;
    while (end < len && isDigit(buf[end])) {
        end++;
    }

    scan.off = end;
    return { type: 'NUMBER', offset: off, length: end - off };
}

function scanLiteral(scan: Scanner, off: number, literal: number[], type: TokenType): Token {
    const { buf, len } = scan;

    if (len - off < literal.length || !literal.every((byte, i) => buf[off + i] === byte)) {
        scan.off = len;
        return errorToken(len);
    }

    scan.off = off + literal.length;
    return { type, offset: off, length: literal.length };
}

function errorToken(len: number): Token {
    return { type: 'ERROR', offset: len, length: 0 };
}
