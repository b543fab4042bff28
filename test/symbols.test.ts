import { describe, it, expect } from 'vitest';
import { KNOWN_SYMBOLS, TABLE_SIZE, hashSlot, recognize, slotSymbol } from '../src/core/symbols.js';
import { bytes } from './helpers.js';

function classify(text: string) {
    const buf = bytes(text);
    return recognize(buf, 0, buf.length);
}

describe('Symbol Recognizer', () => {
    describe('hash table', () => {
        it('places every known symbol in its own slot', () => {
            KNOWN_SYMBOLS.forEach((symbol, slot) => {
                const buf = bytes(symbol);
                expect(hashSlot(buf, 0, buf.length)).toBe(slot);
                expect(slotSymbol(slot)).toBe(symbol);
            });
        });

        it('leaves the remaining slots empty', () => {
            for (let slot = KNOWN_SYMBOLS.length; slot < TABLE_SIZE; slot++) {
                expect(slotSymbol(slot)).toBeNull();
            }
        });

        it('returns unknown for spans that land in empty slots', () => {
            const samples: Record<number, string> = { 11: 'aa', 12: 'ua', 13: 'ai', 14: 'ab', 15: 'aq' };
            for (const [slot, sample] of Object.entries(samples)) {
                const buf = bytes(sample);
                expect(hashSlot(buf, 0, buf.length)).toBe(Number(slot));
                expect(classify(sample)).toBe('unknown');
            }
        });
    });

    describe('recognition', () => {
        it('recognizes every known symbol', () => {
            for (const symbol of KNOWN_SYMBOLS) {
                expect(classify(symbol)).toBe(symbol);
            }
        });

        it('rejects every one-byte flip of a known symbol', () => {
            for (const symbol of KNOWN_SYMBOLS) {
                for (let i = 0; i < symbol.length; i++) {
                    const buf = bytes(symbol);
                    buf[i] ^= 0x01;
                    expect(recognize(buf, 0, buf.length)).toBe('unknown');
                }
            }
        });

        it('rejects a known symbol with its last byte cut off', () => {
            for (const symbol of KNOWN_SYMBOLS) {
                const buf = bytes(symbol);
                expect(recognize(buf, 0, buf.length - 1)).toBe('unknown');
            }
        });

        it('rejects longer names sharing a four-byte prefix', () => {
            expect(classify('featur')).toBe('unknown');
            expect(classify('players2')).toBe('unknown');
            expect(classify('playerz')).toBe('unknown');
            expect(classify('users')).toBe('unknown');
            expect(classify('names')).toBe('unknown');
        });

        it('collides on the hash but fails verification for a different case', () => {
            const buf = bytes('Name');
            expect(hashSlot(buf, 0, buf.length)).toBe(10);
            expect(recognize(buf, 0, buf.length)).toBe('unknown');
        });

        it('reads only the given span of a larger buffer', () => {
            const buf = bytes('xnamex');
            expect(recognize(buf, 1, 4)).toBe('name');
            expect(recognize(buf, 1, 5)).toBe('unknown');
        });

        it('treats an empty span as unknown', () => {
            expect(recognize(bytes('d'), 0, 0)).toBe('unknown');
        });
    });
});
