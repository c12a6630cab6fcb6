import { describe, expect, it } from 'vitest';
import { ParamsParser } from '../../src/src/api/json-rpc/params/ParamsParser.js';
import { InvalidParamsError } from '../../src/src/errors/InvalidParamsError.js';
import { BlockIdType } from '../../src/src/types/BlockId.js';

describe('ParamsParser', () => {
    describe('named', () => {
        it('should accept positional parameters', () => {
            expect(ParamsParser.named(['latest', 3], ['block_id', 'index'])).toEqual({
                block_id: 'latest',
                index: 3,
            });
        });

        it('should accept named parameters', () => {
            expect(ParamsParser.named({ index: 3 }, ['block_id', 'index'])).toEqual({ index: 3 });
        });

        it('should return nothing for absent params', () => {
            expect(ParamsParser.named(undefined, ['block_id'])).toEqual({});
        });

        it('should reject surplus positional parameters', () => {
            expect(() => ParamsParser.named(['latest', 1], ['block_id'])).toThrow(
                'Expected at most 1 parameters, got 2',
            );
        });

        it('should reject unknown names', () => {
            expect(() => ParamsParser.named({ block: 'latest' }, ['block_id'])).toThrow(
                'Unknown field "block"',
            );
        });
    });

    describe('required', () => {
        it('should reject missing and null values', () => {
            expect(() => ParamsParser.required({}, 'block_id')).toThrow('Missing field "block_id"');
            expect(() => ParamsParser.required({ block_id: null }, 'block_id')).toThrow(
                InvalidParamsError,
            );
        });
    });

    describe('blockId', () => {
        it('should parse block tags', () => {
            expect(ParamsParser.blockId('latest')).toEqual({ type: BlockIdType.LATEST });
            expect(ParamsParser.blockId('pending')).toEqual({ type: BlockIdType.PENDING });
        });

        it('should parse a block number', () => {
            expect(ParamsParser.blockId({ block_number: 12 })).toEqual({
                type: BlockIdType.NUMBER,
                number: 12,
            });
        });

        it('should canonicalize a block hash', () => {
            expect(ParamsParser.blockId({ block_hash: '0x0B1' })).toEqual({
                type: BlockIdType.HASH,
                hash: '0xb1',
            });
        });

        it('should reject an unknown tag', () => {
            expect(() => ParamsParser.blockId('earliest')).toThrow(
                'Invalid block_id: expected a block tag or an object',
            );
        });

        it('should reject both a number and a hash', () => {
            expect(() => ParamsParser.blockId({ block_number: 1, block_hash: '0x1' })).toThrow(
                'Invalid block_id: expected exactly one of "block_number" or "block_hash"',
            );
        });

        it('should reject a negative block number', () => {
            expect(() => ParamsParser.blockId({ block_number: -1 })).toThrow(
                'Invalid block_id: block_number must be a non-negative integer',
            );
        });

        it('should accept heights beyond the safe integer range', () => {
            expect(ParamsParser.blockId({ block_number: 2 ** 60 })).toEqual({
                type: BlockIdType.NUMBER,
                number: 2 ** 60,
            });
        });

        it('should reject heights above the largest signed 64-bit value', () => {
            expect(() => ParamsParser.blockId({ block_number: 2 ** 64 })).toThrow(
                'Invalid block_id: block_number must be a non-negative integer',
            );
            expect(() => ParamsParser.blockId({ block_number: 1.5 })).toThrow(
                'Invalid block_id: block_number must be a non-negative integer',
            );
        });

        it('should reject a malformed block hash', () => {
            expect(() => ParamsParser.blockId({ block_hash: 'b1' })).toThrow(
                'Invalid block_id.block_hash: expected a field element',
            );
        });
    });

    describe('index', () => {
        it('should accept non-negative integers', () => {
            expect(ParamsParser.index(0)).toBe(0);
        });

        it('should reject fractions and strings', () => {
            expect(() => ParamsParser.index(1.5)).toThrow(
                'Invalid index: expected a non-negative integer',
            );
            expect(() => ParamsParser.index('1')).toThrow(InvalidParamsError);
        });
    });
});
