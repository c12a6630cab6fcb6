import { type ApplicationError, RpcErrorKind } from '../../errors/RpcErrorKind.js';
import { err, ok, type RpcResult } from '../../errors/RpcResult.js';
import type { IPendingBlock } from '../../pending/interfaces/IPendingBlock.js';
import type { PendingData } from '../../pending/PendingData.js';
import { type BlockId, BlockIdType, type BlockLookupKey, toLookupKey } from '../../types/BlockId.js';

export enum ResolutionType {
    PENDING = 'pending',
    PERSISTED = 'persisted',
}

export type ResolutionPlan =
    | { readonly type: ResolutionType.PENDING; readonly block: IPendingBlock }
    | { readonly type: ResolutionType.PERSISTED; readonly key: BlockLookupKey };

export type ResolutionError = ApplicationError<
    RpcErrorKind.BlockNotFound | RpcErrorKind.PendingNotSupported
>;

export class BlockIdResolver {
    /**
     * Decides which source answers a block reference. Performs no I/O: `latest` is resolved to a
     * height inside the storage read, never here.
     */
    public static resolve(
        blockId: BlockId,
        pendingData: PendingData | undefined,
    ): RpcResult<ResolutionPlan, ResolutionError> {
        if (blockId.type !== BlockIdType.PENDING) {
            return ok<ResolutionPlan>({ type: ResolutionType.PERSISTED, key: toLookupKey(blockId) });
        }

        if (!pendingData) {
            return err<ResolutionError>({ kind: RpcErrorKind.PendingNotSupported });
        }

        const block = pendingData.current().block;
        if (!block) {
            return err<ResolutionError>({ kind: RpcErrorKind.BlockNotFound });
        }

        return ok<ResolutionPlan>({ type: ResolutionType.PENDING, block });
    }
}
