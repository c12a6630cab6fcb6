import type { ExecutionStatus } from '../../types/ExecutionStatus.js';
import type { BlockNumber } from '../../types/BlockNumber.js';
import type { Felt } from '../../types/Felt.js';

export interface IStoredTransaction {
    readonly hash: Felt;
    readonly blockNumber: BlockNumber;
    readonly index: number;

    /** Raw JSON body as written by the sync component. */
    readonly body: string;
    readonly executionStatus: ExecutionStatus;
}
