import type { BlockId } from '../../../../../types/BlockId.js';

export interface TransactionByBlockIdAndIndexParams {
    readonly block_id: BlockId;
    readonly index: number;
}
