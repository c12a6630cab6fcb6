import type { Felt } from '../../../../../../types/Felt.js';

export interface BlockHashAndNumberResult {
    readonly block_hash: Felt;
    readonly block_number: number;
}
