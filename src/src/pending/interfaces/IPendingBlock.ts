import type { ExecutionStatus } from '../../types/ExecutionStatus.js';
import type { Felt } from '../../types/Felt.js';
import type { JsonObject } from '../../types/JsonValue.js';

export interface IPendingTransaction {
    readonly hash: Felt;
    readonly body: JsonObject;
    readonly executionStatus: ExecutionStatus;
}

/** Block under construction. It has no hash, number or state root yet. */
export interface IPendingBlock {
    readonly parentHash: Felt;
    readonly timestamp: number;
    readonly sequencerAddress: Felt;
    readonly gasPrice: Felt;
    readonly version: string;
    readonly transactions: readonly IPendingTransaction[];
}

export interface IPendingSnapshot {
    readonly block?: IPendingBlock;
}
