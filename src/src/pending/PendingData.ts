import { Logger } from '../logger/Logger.js';
import { type Felt, parseFelt } from '../types/Felt.js';
import type { IPendingBlock, IPendingSnapshot } from './interfaces/IPendingBlock.js';

const EMPTY_SNAPSHOT: IPendingSnapshot = Object.freeze({});

function canonicalHash(hash: Felt): Felt {
    const felt = parseFelt(hash);
    if (felt === undefined) {
        throw new Error(`Invalid pending transaction hash: ${hash}`);
    }

    return felt;
}

function freezeBlock(block: IPendingBlock): IPendingBlock {
    return Object.freeze({
        ...block,
        transactions: Object.freeze(
            block.transactions.map((transaction) =>
                Object.freeze({ ...transaction, hash: canonicalHash(transaction.hash) }),
            ),
        ),
    });
}

/**
 * Holder of the pending overlay. The producer swaps whole snapshots; readers always observe
 * either the previous snapshot or the next one, never a mix.
 */
export class PendingData extends Logger {
    public readonly logColor: string = '#ffa07a';

    private snapshot: IPendingSnapshot = EMPTY_SNAPSHOT;

    public current(): IPendingSnapshot {
        return this.snapshot;
    }

    public replace(snapshot: IPendingSnapshot): void {
        this.snapshot = snapshot.block
            ? Object.freeze({ block: freezeBlock(snapshot.block) })
            : EMPTY_SNAPSHOT;

        this.debug(
            `Pending snapshot replaced (${snapshot.block ? snapshot.block.transactions.length : 0} transactions)`,
        );
    }

    public clear(): void {
        this.snapshot = EMPTY_SNAPSHOT;
    }
}
