export enum JSONRpcMethods {
    /** Blocks */
    GET_BLOCK_WITH_TX_HASHES = 'starknet_getBlockWithTxHashes',
    GET_BLOCK_WITH_TXS = 'starknet_getBlockWithTxs',
    GET_BLOCK_TRANSACTION_COUNT = 'starknet_getBlockTransactionCount',

    /** Transactions */
    GET_TRANSACTION_BY_HASH = 'starknet_getTransactionByHash',
    GET_TRANSACTION_BY_BLOCK_ID_AND_INDEX = 'starknet_getTransactionByBlockIdAndIndex',
    GET_TRANSACTION_STATUS = 'starknet_getTransactionStatus',

    /** Chain */
    BLOCK_NUMBER = 'starknet_blockNumber',
    BLOCK_HASH_AND_NUMBER = 'starknet_blockHashAndNumber',
    SPEC_VERSION = 'starknet_specVersion',
}
