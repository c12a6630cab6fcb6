import type { InternalError, RpcError, RpcErrorKind } from '../../errors/RpcErrorKind.js';
import type { RpcResult } from '../../errors/RpcResult.js';
import type { BlockLookupKey } from '../../types/BlockId.js';
import type { Felt } from '../../types/Felt.js';
import type { BlockWithTxHashesResult } from '../json-rpc/types/interfaces/results/blocks/BlockWithTxHashesResult.js';
import type { BlockWithTxsResult } from '../json-rpc/types/interfaces/results/blocks/BlockWithTxsResult.js';
import type { BlockHashAndNumberResult } from '../json-rpc/types/interfaces/results/chain/BlockHashAndNumberResult.js';
import type { TransactionResult } from '../json-rpc/types/interfaces/results/transactions/TransactionResult.js';
import type { TransactionStatusResult } from '../json-rpc/types/interfaces/results/transactions/TransactionStatusResult.js';
import { StorageTaskType } from './StorageTaskType.js';

/**
 * Parameters, result and declared error kinds of every unit of storage work. Everything here
 * must survive structured cloning into a worker thread.
 */
export interface StorageTaskMap {
    [StorageTaskType.BLOCK_WITH_TX_HASHES]: {
        params: { readonly key: BlockLookupKey };
        result: BlockWithTxHashesResult;
        error: RpcErrorKind.BlockNotFound;
    };
    [StorageTaskType.BLOCK_WITH_TXS]: {
        params: { readonly key: BlockLookupKey };
        result: BlockWithTxsResult;
        error: RpcErrorKind.BlockNotFound;
    };
    [StorageTaskType.BLOCK_TRANSACTION_COUNT]: {
        params: { readonly key: BlockLookupKey };
        result: number;
        error: RpcErrorKind.BlockNotFound;
    };
    [StorageTaskType.TRANSACTION_BY_BLOCK_AND_INDEX]: {
        params: { readonly key: BlockLookupKey; readonly index: number };
        result: TransactionResult;
        error: RpcErrorKind.BlockNotFound | RpcErrorKind.InvalidTxnIndex;
    };
    [StorageTaskType.TRANSACTION_BY_HASH]: {
        params: { readonly hash: Felt };
        result: TransactionResult;
        error: RpcErrorKind.TxnHashNotFound;
    };
    [StorageTaskType.TRANSACTION_STATUS]: {
        params: { readonly hash: Felt };
        result: TransactionStatusResult;
        error: RpcErrorKind.TxnHashNotFound;
    };
    [StorageTaskType.LATEST_BLOCK_HASH_AND_NUMBER]: {
        params: Readonly<Record<string, never>>;
        result: BlockHashAndNumberResult;
        error: RpcErrorKind.NoBlocks;
    };
}

export interface StorageTask<T extends StorageTaskType = StorageTaskType> {
    readonly type: T;
    readonly params: StorageTaskMap[T]['params'];
}

export type StorageTaskOutcome<T extends StorageTaskType> = RpcResult<
    StorageTaskMap[T]['result'],
    RpcError<StorageTaskMap[T]['error']>
>;

/** Outcome as seen at a thread boundary, before it is re-associated with its task type. */
export type UntypedStorageTaskOutcome = RpcResult<unknown, RpcError | InternalError>;
