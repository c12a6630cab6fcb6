import Database from 'better-sqlite3';
import { describe, expect, it } from 'vitest';
import { Storage } from '../../src/src/db/Storage.js';
import { BlockLookupType } from '../../src/src/types/BlockId.js';
import { ExecutionStatus } from '../../src/src/types/ExecutionStatus.js';
import { BLOCK_ONE_HEADER, createEmptyStorage, createFixtureStorage } from '../mocks/fixtures.js';

describe('Storage', () => {
    it('should hand out at most the configured number of connections', () => {
        const storage = Storage.fromDatabase(new Database(':memory:'));

        const first = storage.connection();
        expect(() => storage.connection()).toThrow('No database connection available (1 in use)');

        first.release();
        expect(storage.openConnections).toBe(1);

        storage.connection().release();
        storage.close();
    });

    it('should release a connection only once', () => {
        const storage = createEmptyStorage();

        const connection = storage.connection();
        connection.release();
        connection.release();

        expect(() => connection.read(() => 1)).toThrow('Connection was already released');

        storage.connection().release();
        storage.close();
    });

    it('should refuse connections once closed', () => {
        const storage = createEmptyStorage();
        storage.close();

        expect(() => storage.connection()).toThrow('Storage is closed');
    });

    it('should roll back the read transaction when the callback throws', () => {
        const storage = createFixtureStorage();
        const connection = storage.connection();

        expect(() =>
            connection.read(() => {
                throw new Error('reader failed');
            }),
        ).toThrow('reader failed');

        expect(connection.read((tx) => tx.transactionCountForBlock(1))).toBe(2);

        connection.release();
        storage.close();
    });
});

describe('StorageWriter', () => {
    it('should store hashes in canonical form', () => {
        const storage = createFixtureStorage();
        const connection = storage.connection();

        connection.writer().insertBlock({
            header: { ...BLOCK_ONE_HEADER, number: 2, hash: '0x00B2', parentHash: '0xB1' },
            transactions: [
                {
                    hash: '0x0073',
                    body: { type: 'DECLARE', version: '0x1' },
                    executionStatus: ExecutionStatus.SUCCEEDED,
                },
            ],
        });

        const header = connection.read((tx) =>
            tx.blockHeader({ by: BlockLookupType.HASH, hash: '0xb2' }),
        );
        expect(header?.number).toBe(2);
        expect(header?.parentHash).toBe('0xb1');
        expect(connection.read((tx) => tx.transactionHashesForBlock(2))).toEqual(['0x73']);

        connection.release();
        storage.close();
    });

    it('should reject an invalid felt without writing anything', () => {
        const storage = createFixtureStorage();
        const connection = storage.connection();

        expect(() =>
            connection.writer().insertBlock({
                header: { ...BLOCK_ONE_HEADER, number: 2, hash: '0xb2' },
                transactions: [
                    {
                        hash: 'not-a-felt',
                        body: { type: 'DECLARE' },
                        executionStatus: ExecutionStatus.SUCCEEDED,
                    },
                ],
            }),
        ).toThrow('Invalid felt for transaction hash: not-a-felt');

        expect(
            connection.read((tx) => tx.blockHeader({ by: BlockLookupType.NUMBER, number: 2 })),
        ).toBeUndefined();

        connection.release();
        storage.close();
    });

    it('should move and clear the L1 marker', () => {
        const storage = createFixtureStorage();
        const connection = storage.connection();

        connection.writer().setL1AcceptedHeight(1);
        expect(connection.read((tx) => tx.highestL1AcceptedHeight())).toBe(1);

        connection.writer().setL1AcceptedHeight(undefined);
        expect(connection.read((tx) => tx.highestL1AcceptedHeight())).toBeUndefined();

        connection.release();
        storage.close();
    });
});
