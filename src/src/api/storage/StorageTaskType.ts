export enum StorageTaskType {
    BLOCK_WITH_TX_HASHES = 'block_with_tx_hashes',
    BLOCK_WITH_TXS = 'block_with_txs',
    BLOCK_TRANSACTION_COUNT = 'block_transaction_count',
    TRANSACTION_BY_BLOCK_AND_INDEX = 'transaction_by_block_and_index',
    TRANSACTION_BY_HASH = 'transaction_by_hash',
    TRANSACTION_STATUS = 'transaction_status',
    LATEST_BLOCK_HASH_AND_NUMBER = 'latest_block_hash_and_number',
}
