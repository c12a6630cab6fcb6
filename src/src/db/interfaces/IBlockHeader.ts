import type { BlockNumber } from '../../types/BlockNumber.js';
import type { Felt } from '../../types/Felt.js';

export interface IBlockHeader {
    readonly number: BlockNumber;
    readonly hash: Felt;
    readonly parentHash: Felt;
    readonly stateRoot: Felt;
    readonly timestamp: number;
    readonly sequencerAddress: Felt;

    /** L1 gas price in wei. */
    readonly gasPrice: Felt;
    readonly version: string;
}
