import { describe, expect, it } from 'vitest';
import { FIELD_PRIME, parseFelt, toFelt } from '../../src/src/types/Felt.js';

describe('Felt', () => {
    describe('parseFelt', () => {
        it('should canonicalize case and leading zeros', () => {
            expect(parseFelt('0x00FF')).toBe('0xff');
            expect(parseFelt('0x0000')).toBe('0x0');
        });

        it('should reject values without the 0x prefix', () => {
            expect(parseFelt('ff')).toBeUndefined();
            expect(parseFelt('0x')).toBeUndefined();
        });

        it('should reject non-string values', () => {
            expect(parseFelt(255)).toBeUndefined();
            expect(parseFelt(null)).toBeUndefined();
        });

        it('should reject more than 64 hex digits', () => {
            expect(parseFelt(`0x${'0'.repeat(64)}1`)).toBeUndefined();
            expect(parseFelt(`0x${'0'.repeat(63)}1`)).toBe('0x1');
        });

        it('should reject values outside of the field', () => {
            expect(parseFelt(`0x${FIELD_PRIME.toString(16)}`)).toBeUndefined();
            expect(parseFelt(`0x${(FIELD_PRIME - 1n).toString(16)}`)).toBe(
                `0x${(FIELD_PRIME - 1n).toString(16)}`,
            );
        });
    });

    describe('toFelt', () => {
        it('should encode in lowercase hex', () => {
            expect(toFelt(3054n)).toBe('0xbee');
        });

        it('should throw for negative values', () => {
            expect(() => toFelt(-1n)).toThrow(RangeError);
        });
    });
});
