import type { BlockNumber } from './BlockNumber.js';
import type { Felt } from './Felt.js';

export enum BlockIdType {
    PENDING = 'pending',
    LATEST = 'latest',
    NUMBER = 'number',
    HASH = 'hash',
}

export interface PendingBlockId {
    readonly type: BlockIdType.PENDING;
}

export interface LatestBlockId {
    readonly type: BlockIdType.LATEST;
}

export interface NumberBlockId {
    readonly type: BlockIdType.NUMBER;
    readonly number: BlockNumber;
}

export interface HashBlockId {
    readonly type: BlockIdType.HASH;
    readonly hash: Felt;
}

/** Client-supplied block reference. */
export type BlockId = PendingBlockId | LatestBlockId | NumberBlockId | HashBlockId;

export type PersistedBlockId = Exclude<BlockId, PendingBlockId>;

export enum BlockLookupType {
    LATEST = 'latest',
    NUMBER = 'number',
    HASH = 'hash',
}

/** Key understood by the block store. Pending blocks are never persisted. */
export type BlockLookupKey =
    | { readonly by: BlockLookupType.LATEST }
    | { readonly by: BlockLookupType.NUMBER; readonly number: BlockNumber }
    | { readonly by: BlockLookupType.HASH; readonly hash: Felt };

export const BlockIds = {
    pending(): PendingBlockId {
        return { type: BlockIdType.PENDING };
    },

    latest(): LatestBlockId {
        return { type: BlockIdType.LATEST };
    },

    number(number: BlockNumber): NumberBlockId {
        return { type: BlockIdType.NUMBER, number };
    },

    hash(hash: Felt): HashBlockId {
        return { type: BlockIdType.HASH, hash };
    },
} as const;

export function toLookupKey(blockId: PersistedBlockId): BlockLookupKey {
    switch (blockId.type) {
        case BlockIdType.LATEST:
            return { by: BlockLookupType.LATEST };
        case BlockIdType.NUMBER:
            return { by: BlockLookupType.NUMBER, number: blockId.number };
        case BlockIdType.HASH:
            return { by: BlockLookupType.HASH, hash: blockId.hash };
    }
}
