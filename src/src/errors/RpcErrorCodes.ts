import { JSONRPCErrorCode } from '../api/json-rpc/types/enums/JSONRPCErrorCode.js';
import { RpcErrorKind } from './RpcErrorKind.js';

export interface RpcErrorCodeEntry {
    readonly code: JSONRPCErrorCode;
    readonly message: string;
}

export const RpcErrorCodes: { readonly [K in RpcErrorKind]: RpcErrorCodeEntry } = {
    [RpcErrorKind.BlockNotFound]: {
        code: JSONRPCErrorCode.BLOCK_NOT_FOUND,
        message: 'Block not found',
    },
    [RpcErrorKind.InvalidTxnIndex]: {
        code: JSONRPCErrorCode.INVALID_TXN_INDEX,
        message: 'Invalid transaction index in a block',
    },
    [RpcErrorKind.TxnHashNotFound]: {
        code: JSONRPCErrorCode.TXN_HASH_NOT_FOUND,
        message: 'Transaction hash not found',
    },
    [RpcErrorKind.NoBlocks]: {
        code: JSONRPCErrorCode.NO_BLOCKS,
        message: 'There are no blocks',
    },
    [RpcErrorKind.PendingNotSupported]: {
        code: JSONRPCErrorCode.PENDING_NOT_SUPPORTED,
        message: 'Pending data not supported in this configuration',
    },
};

export const InternalErrorCode: RpcErrorCodeEntry = {
    code: JSONRPCErrorCode.INTERNAL_ERROR,
    message: 'Internal error',
};
