import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { BlockReplyAssembler } from '../../../../data-converter/BlockReplyAssembler.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { BlockIdParams } from '../../../../json-rpc/types/interfaces/params/BlockIdParams.js';
import type { BlockWithTxHashesResult } from '../../../../json-rpc/types/interfaces/results/blocks/BlockWithTxHashesResult.js';
import { BlockIdResolver, ResolutionType } from '../../../../resolver/BlockIdResolver.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { BlockIdRoute } from './BlockIdRoute.js';

export const GetBlockWithTxHashesErrors = generateRpcErrorSubset('GetBlockWithTxHashesError', [
    RpcErrorKind.BlockNotFound,
    RpcErrorKind.PendingNotSupported,
]);

export type GetBlockWithTxHashesError = RpcErrorOf<typeof GetBlockWithTxHashesErrors>;

export class GetBlockWithTxHashes extends BlockIdRoute<
    JSONRpcMethods.GET_BLOCK_WITH_TX_HASHES,
    RpcErrorKind.BlockNotFound | RpcErrorKind.PendingNotSupported
> {
    public readonly logColor: string = '#4fc3f7';

    constructor() {
        super(JSONRpcMethods.GET_BLOCK_WITH_TX_HASHES, GetBlockWithTxHashesErrors);
    }

    /**
     * Block header, status and the ordered hashes of its transactions.
     */
    public async getData(
        context: RpcContext,
        params: BlockIdParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<BlockWithTxHashesResult, GetBlockWithTxHashesError>> {
        const plan = BlockIdResolver.resolve(params.block_id, context.pendingData);
        if (!plan.ok) {
            return plan;
        }

        const resolution = plan.value;
        if (resolution.type === ResolutionType.PENDING) {
            return ok(
                BlockReplyAssembler.assembleFromPending(resolution.block, (tx) => tx.hash),
            );
        }

        return await context.storage.run(
            { type: StorageTaskType.BLOCK_WITH_TX_HASHES, params: { key: resolution.key } },
            signal,
        );
    }
}
