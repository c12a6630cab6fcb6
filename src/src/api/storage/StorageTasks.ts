import type { ReadTransaction } from '../../db/ReadTransaction.js';
import type { Storage } from '../../db/Storage.js';
import type { StorageConnection } from '../../db/StorageConnection.js';
import type { IBlockHeader } from '../../db/interfaces/IBlockHeader.js';
import { InternalFault } from '../../errors/InternalFault.js';
import { RpcErrorKind } from '../../errors/RpcErrorKind.js';
import { err, ok } from '../../errors/RpcResult.js';
import { type BlockLookupKey, BlockLookupType } from '../../types/BlockId.js';
import { TransactionFinalityStatus } from '../../types/TransactionFinalityStatus.js';
import { BlockReplyAssembler } from '../data-converter/BlockReplyAssembler.js';
import { TransactionConverterForAPI } from '../data-converter/TransactionConverterForAPI.js';
import type { StorageTask, StorageTaskMap, StorageTaskOutcome } from './StorageTask.js';
import { StorageTaskType } from './StorageTaskType.js';

type StorageTaskHandler<T extends StorageTaskType> = (
    transaction: ReadTransaction,
    params: StorageTaskMap[T]['params'],
) => StorageTaskOutcome<T>;

const BLOCK_NOT_FOUND = { kind: RpcErrorKind.BlockNotFound } as const;
const TXN_HASH_NOT_FOUND = { kind: RpcErrorKind.TxnHashNotFound } as const;
const INVALID_TXN_INDEX = { kind: RpcErrorKind.InvalidTxnIndex } as const;
const NO_BLOCKS = { kind: RpcErrorKind.NoBlocks } as const;

function readHeader(transaction: ReadTransaction, key: BlockLookupKey): IBlockHeader | undefined {
    return InternalFault.context('Reading block header', () => transaction.blockHeader(key));
}

function readHighestL1AcceptedHeight(transaction: ReadTransaction): number | undefined {
    return InternalFault.context('Reading L1 acceptance', () =>
        transaction.highestL1AcceptedHeight(),
    );
}

const handlers: { readonly [T in StorageTaskType]: StorageTaskHandler<T> } = {
    [StorageTaskType.BLOCK_WITH_TX_HASHES]: (transaction, { key }) => {
        const header = readHeader(transaction, key);
        if (!header) {
            return err(BLOCK_NOT_FOUND);
        }

        const status = BlockReplyAssembler.statusFor(
            header.number,
            readHighestL1AcceptedHeight(transaction),
        );

        const hashes = InternalFault.context('Reading transaction hashes', () =>
            transaction.transactionHashesForBlock(header.number),
        );

        // the header was read in this same transaction
        if (!hashes) {
            throw new InternalFault('Missing block');
        }

        return ok(BlockReplyAssembler.assemble(header, status, hashes));
    },

    [StorageTaskType.BLOCK_WITH_TXS]: (transaction, { key }) => {
        const header = readHeader(transaction, key);
        if (!header) {
            return err(BLOCK_NOT_FOUND);
        }

        const status = BlockReplyAssembler.statusFor(
            header.number,
            readHighestL1AcceptedHeight(transaction),
        );

        const stored = InternalFault.context('Reading transactions', () =>
            transaction.transactionsForBlock(header.number),
        );

        if (!stored) {
            throw new InternalFault('Missing block');
        }

        const transactions = InternalFault.context('Decoding transactions', () =>
            stored.map((tx) => TransactionConverterForAPI.convertStoredTransactionToAPI(tx)),
        );

        return ok(BlockReplyAssembler.assemble(header, status, transactions));
    },

    [StorageTaskType.BLOCK_TRANSACTION_COUNT]: (transaction, { key }) => {
        const header = readHeader(transaction, key);
        if (!header) {
            return err(BLOCK_NOT_FOUND);
        }

        const count = InternalFault.context('Counting transactions', () =>
            transaction.transactionCountForBlock(header.number),
        );

        if (count === undefined) {
            throw new InternalFault('Missing block');
        }

        return ok(count);
    },

    [StorageTaskType.TRANSACTION_BY_BLOCK_AND_INDEX]: (transaction, { key, index }) => {
        const header = readHeader(transaction, key);
        if (!header) {
            return err(BLOCK_NOT_FOUND);
        }

        const stored = InternalFault.context('Reading transaction', () =>
            transaction.transactionAtIndex(header.number, index),
        );

        if (!stored) {
            return err(INVALID_TXN_INDEX);
        }

        return ok(
            InternalFault.context('Decoding transaction', () =>
                TransactionConverterForAPI.convertStoredTransactionToAPI(stored),
            ),
        );
    },

    [StorageTaskType.TRANSACTION_BY_HASH]: (transaction, { hash }) => {
        const stored = InternalFault.context('Reading transaction', () =>
            transaction.transactionByHash(hash),
        );

        if (!stored) {
            return err(TXN_HASH_NOT_FOUND);
        }

        return ok(
            InternalFault.context('Decoding transaction', () =>
                TransactionConverterForAPI.convertStoredTransactionToAPI(stored),
            ),
        );
    },

    [StorageTaskType.TRANSACTION_STATUS]: (transaction, { hash }) => {
        const stored = InternalFault.context('Reading transaction', () =>
            transaction.transactionByHash(hash),
        );

        if (!stored) {
            return err(TXN_HASH_NOT_FOUND);
        }

        const acceptedOnL1 = InternalFault.context('Reading L1 acceptance', () =>
            transaction.blockIsL1Accepted(stored.blockNumber),
        );

        return ok({
            finality_status: acceptedOnL1
                ? TransactionFinalityStatus.ACCEPTED_ON_L1
                : TransactionFinalityStatus.ACCEPTED_ON_L2,
            execution_status: stored.executionStatus,
        });
    },

    [StorageTaskType.LATEST_BLOCK_HASH_AND_NUMBER]: (transaction) => {
        const header = readHeader(transaction, { by: BlockLookupType.LATEST });
        if (!header) {
            return err(NO_BLOCKS);
        }

        return ok({ block_hash: header.hash, block_number: header.number });
    },
};

/**
 * Runs one unit of storage work to completion on the calling thread: connection, read
 * transaction, reads, assembly. Never throws; faults come back as `Internal` with the failing
 * step first in the chain.
 */
export function executeStorageTask<T extends StorageTaskType>(
    storage: Storage,
    task: StorageTask<T>,
): StorageTaskOutcome<T> {
    const handler: StorageTaskHandler<T> = handlers[task.type];

    let connection: StorageConnection | undefined;
    try {
        connection = InternalFault.context('Opening database connection', () =>
            storage.connection(),
        );

        return connection.read((transaction) => handler(transaction, task.params));
    } catch (e: unknown) {
        return err(InternalFault.toInternalError(e));
    } finally {
        connection?.release();
    }
}
