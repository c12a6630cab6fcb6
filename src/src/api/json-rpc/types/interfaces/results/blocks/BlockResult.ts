import type { BlockStatus } from '../../../../../../types/BlockStatus.js';
import type { Felt } from '../../../../../../types/Felt.js';

export interface ResourcePrice {
    readonly price_in_wei: Felt;
}

/**
 * Block header on the wire. `block_hash`, `block_number` and `new_root` are absent for the
 * pending block.
 */
export interface BlockHeaderResult {
    readonly block_hash?: Felt;
    readonly parent_hash: Felt;
    readonly block_number?: number;
    readonly new_root?: Felt;
    readonly timestamp: number;
    readonly sequencer_address: Felt;
    readonly l1_gas_price: ResourcePrice;
    readonly starknet_version: string;
}

export interface BlockResult<T> extends BlockHeaderResult {
    readonly status: BlockStatus;
    readonly transactions: readonly T[];
}
