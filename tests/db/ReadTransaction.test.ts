import Database from 'better-sqlite3';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { ReadTransaction } from '../../src/src/db/ReadTransaction.js';
import type { Storage } from '../../src/src/db/Storage.js';
import { BlockLookupType } from '../../src/src/types/BlockId.js';
import { ExecutionStatus } from '../../src/src/types/ExecutionStatus.js';
import {
    BLOCK_ONE_HEADER,
    createFixtureStorage,
    GENESIS_HEADER,
    L1_HANDLER_TX,
} from '../mocks/fixtures.js';

describe('ReadTransaction', () => {
    let db: Database.Database;
    let storage: Storage;

    beforeEach(() => {
        db = new Database(':memory:');
        storage = createFixtureStorage(0, db);
    });

    afterEach(() => {
        storage.close();
    });

    function read<T>(fn: (transaction: ReadTransaction) => T): T {
        const connection = storage.connection();
        try {
            return connection.read(fn);
        } finally {
            connection.release();
        }
    }

    describe('blockHeader', () => {
        it('should find the latest block', () => {
            expect(read((tx) => tx.blockHeader({ by: BlockLookupType.LATEST }))).toEqual(
                BLOCK_ONE_HEADER,
            );
        });

        it('should find a block by hash and by number', () => {
            expect(read((tx) => tx.blockHeader({ by: BlockLookupType.HASH, hash: '0xb0' }))).toEqual(
                GENESIS_HEADER,
            );
            expect(read((tx) => tx.blockHeader({ by: BlockLookupType.NUMBER, number: 1 }))).toEqual(
                BLOCK_ONE_HEADER,
            );
        });

        it('should return undefined for unknown blocks', () => {
            expect(
                read((tx) => tx.blockHeader({ by: BlockLookupType.NUMBER, number: 5 })),
            ).toBeUndefined();
        });
    });

    describe('L1 acceptance', () => {
        it('should read the highest L1 accepted height', () => {
            expect(read((tx) => tx.highestL1AcceptedHeight())).toBe(0);
            expect(read((tx) => tx.blockIsL1Accepted(0))).toBe(true);
            expect(read((tx) => tx.blockIsL1Accepted(1))).toBe(false);
        });

        it('should report nothing when the marker is unset', () => {
            const unset = createFixtureStorage(null);

            const connection = unset.connection();
            try {
                expect(connection.read((tx) => tx.highestL1AcceptedHeight())).toBeUndefined();
                expect(connection.read((tx) => tx.blockIsL1Accepted(0))).toBe(false);
            } finally {
                connection.release();
                unset.close();
            }
        });
    });

    describe('transactions', () => {
        it('should list hashes in block order', () => {
            expect(read((tx) => tx.transactionHashesForBlock(1))).toEqual(['0x71', '0x72']);
            expect(read((tx) => tx.transactionHashesForBlock(0))).toEqual([]);
            expect(read((tx) => tx.transactionHashesForBlock(9))).toBeUndefined();
        });

        it('should count transactions', () => {
            expect(read((tx) => tx.transactionCountForBlock(1))).toBe(2);
            expect(read((tx) => tx.transactionCountForBlock(0))).toBe(0);
            expect(read((tx) => tx.transactionCountForBlock(9))).toBeUndefined();
        });

        it('should read a transaction at an index', () => {
            expect(read((tx) => tx.transactionAtIndex(1, 1))).toEqual({
                hash: '0x72',
                blockNumber: 1,
                index: 1,
                body: JSON.stringify(L1_HANDLER_TX.body),
                executionStatus: ExecutionStatus.REVERTED,
            });
            expect(read((tx) => tx.transactionAtIndex(1, 2))).toBeUndefined();
        });

        it('should read a transaction by hash', () => {
            expect(read((tx) => tx.transactionByHash('0x71'))?.index).toBe(0);
            expect(read((tx) => tx.transactionByHash('0x99'))).toBeUndefined();
        });

        it('should refuse an unknown execution status', () => {
            db.prepare(`UPDATE transactions SET execution_status = 'MAYBE' WHERE hash = '0x72'`).run();

            expect(() => read((tx) => tx.transactionByHash('0x72'))).toThrow(
                'Unknown execution status "MAYBE" for transaction 0x72',
            );
        });
    });
});
