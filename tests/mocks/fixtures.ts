import Database from 'better-sqlite3';
import type { RpcContext } from '../../src/src/api/routes/RpcContext.js';
import type { IBlockHeader } from '../../src/src/db/interfaces/IBlockHeader.js';
import { Storage } from '../../src/src/db/Storage.js';
import type { IBlockTransactionInput } from '../../src/src/db/StorageWriter.js';
import type { IPendingBlock } from '../../src/src/pending/interfaces/IPendingBlock.js';
import { PendingData } from '../../src/src/pending/PendingData.js';
import { InlineStorageExecutor } from '../../src/src/threading/InlineStorageExecutor.js';
import { ExecutionStatus } from '../../src/src/types/ExecutionStatus.js';

export const GENESIS_HEADER: IBlockHeader = {
    number: 0,
    hash: '0xb0',
    parentHash: '0x0',
    stateRoot: '0x50',
    timestamp: 1700000000,
    sequencerAddress: '0x5e',
    gasPrice: '0x3b9aca00',
    version: '0.12.3',
};

export const BLOCK_ONE_HEADER: IBlockHeader = {
    number: 1,
    hash: '0xb1',
    parentHash: '0xb0',
    stateRoot: '0x51',
    timestamp: 1700000060,
    sequencerAddress: '0x5e',
    gasPrice: '0x3b9aca00',
    version: '0.12.3',
};

export const INVOKE_TX: IBlockTransactionInput = {
    hash: '0x71',
    body: {
        type: 'INVOKE',
        version: '0x1',
        sender_address: '0xa1',
        calldata: ['0x1', '0x2'],
        max_fee: '0x10',
        signature: [],
        nonce: '0x0',
    },
    executionStatus: ExecutionStatus.SUCCEEDED,
};

export const L1_HANDLER_TX: IBlockTransactionInput = {
    hash: '0x72',
    body: {
        type: 'L1_HANDLER',
        version: '0x0',
        contract_address: '0xc1',
        entry_point_selector: '0xe1',
        calldata: ['0x3'],
        nonce: '0x1',
    },
    executionStatus: ExecutionStatus.REVERTED,
};

export const PENDING_BLOCK: IPendingBlock = {
    parentHash: '0xb1',
    timestamp: 1700000120,
    sequencerAddress: '0x5e',
    gasPrice: '0x3b9aca00',
    version: '0.12.3',
    transactions: [
        {
            hash: '0x81',
            body: { type: 'INVOKE', version: '0x1', sender_address: '0xa2', nonce: '0x2' },
            executionStatus: ExecutionStatus.SUCCEEDED,
        },
    ],
};

/** In-memory store with the schema only. */
export function createEmptyStorage(db: Database.Database = new Database(':memory:')): Storage {
    const storage = Storage.fromDatabase(db);
    const connection = storage.connection();
    try {
        connection.writer().createSchema();
    } finally {
        connection.release();
    }

    return storage;
}

/**
 * Genesis block 0 without transactions, block 1 holding 0x71 then 0x72. Block 0 is accepted on
 * L1 unless another height is given; `null` leaves the L1 marker unset.
 */
export function createFixtureStorage(
    l1AcceptedHeight: number | null = 0,
    db: Database.Database = new Database(':memory:'),
): Storage {
    const storage = createEmptyStorage(db);
    const connection = storage.connection();
    try {
        const writer = connection.writer();
        writer.insertBlock({ header: GENESIS_HEADER, transactions: [] });
        writer.insertBlock({ header: BLOCK_ONE_HEADER, transactions: [INVOKE_TX, L1_HANDLER_TX] });
        writer.setL1AcceptedHeight(l1AcceptedHeight ?? undefined);
    } finally {
        connection.release();
    }

    return storage;
}

export function createPendingData(block: IPendingBlock = PENDING_BLOCK): PendingData {
    const pendingData = new PendingData();
    pendingData.replace({ block });

    return pendingData;
}

export interface ContextOptions {
    readonly pendingData?: PendingData;
    readonly exposeInternalErrors?: boolean;
}

export function createContext(storage: Storage, options: ContextOptions = {}): RpcContext {
    return {
        storage: new InlineStorageExecutor(storage),
        pendingData: options.pendingData,
        exposeInternalErrors: options.exposeInternalErrors ?? false,
    };
}
