import { JSONRpcMethods } from '../enums/JSONRpcMethods.js';
import type { BlockTransactionCountResult } from './results/blocks/BlockTransactionCountResult.js';
import type { BlockWithTxHashesResult } from './results/blocks/BlockWithTxHashesResult.js';
import type { BlockWithTxsResult } from './results/blocks/BlockWithTxsResult.js';
import type { BlockHashAndNumberResult } from './results/chain/BlockHashAndNumberResult.js';
import type { SpecVersionResult } from './results/chain/SpecVersionResult.js';
import type { TransactionResult } from './results/transactions/TransactionResult.js';
import type { TransactionStatusResult } from './results/transactions/TransactionStatusResult.js';

export interface JSONRpc2ResultMap {
    [JSONRpcMethods.GET_BLOCK_WITH_TX_HASHES]: BlockWithTxHashesResult;
    [JSONRpcMethods.GET_BLOCK_WITH_TXS]: BlockWithTxsResult;
    [JSONRpcMethods.GET_BLOCK_TRANSACTION_COUNT]: BlockTransactionCountResult;
    [JSONRpcMethods.GET_TRANSACTION_BY_HASH]: TransactionResult;
    [JSONRpcMethods.GET_TRANSACTION_BY_BLOCK_ID_AND_INDEX]: TransactionResult;
    [JSONRpcMethods.GET_TRANSACTION_STATUS]: TransactionStatusResult;
    [JSONRpcMethods.BLOCK_NUMBER]: number;
    [JSONRpcMethods.BLOCK_HASH_AND_NUMBER]: BlockHashAndNumberResult;
    [JSONRpcMethods.SPEC_VERSION]: SpecVersionResult;
}

export type JSONRpc2ResultData<T extends JSONRpcMethods> = JSONRpc2ResultMap[T];
