import type { BlockId } from '../../../../../types/BlockId.js';

export interface BlockIdParams {
    readonly block_id: BlockId;
}
