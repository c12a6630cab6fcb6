export type BlockTransactionCountResult = number;
