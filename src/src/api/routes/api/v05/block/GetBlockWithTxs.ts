import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { BlockReplyAssembler } from '../../../../data-converter/BlockReplyAssembler.js';
import { TransactionConverterForAPI } from '../../../../data-converter/TransactionConverterForAPI.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { BlockIdParams } from '../../../../json-rpc/types/interfaces/params/BlockIdParams.js';
import type { BlockWithTxsResult } from '../../../../json-rpc/types/interfaces/results/blocks/BlockWithTxsResult.js';
import { BlockIdResolver, ResolutionType } from '../../../../resolver/BlockIdResolver.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { BlockIdRoute } from './BlockIdRoute.js';

export const GetBlockWithTxsErrors = generateRpcErrorSubset('GetBlockWithTxsError', [
    RpcErrorKind.BlockNotFound,
    RpcErrorKind.PendingNotSupported,
]);

export type GetBlockWithTxsError = RpcErrorOf<typeof GetBlockWithTxsErrors>;

export class GetBlockWithTxs extends BlockIdRoute<
    JSONRpcMethods.GET_BLOCK_WITH_TXS,
    RpcErrorKind.BlockNotFound | RpcErrorKind.PendingNotSupported
> {
    public readonly logColor: string = '#4fc3f7';

    constructor() {
        super(JSONRpcMethods.GET_BLOCK_WITH_TXS, GetBlockWithTxsErrors);
    }

    public async getData(
        context: RpcContext,
        params: BlockIdParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<BlockWithTxsResult, GetBlockWithTxsError>> {
        const plan = BlockIdResolver.resolve(params.block_id, context.pendingData);
        if (!plan.ok) {
            return plan;
        }

        const resolution = plan.value;
        if (resolution.type === ResolutionType.PENDING) {
            return ok(
                BlockReplyAssembler.assembleFromPending(resolution.block, (tx) =>
                    TransactionConverterForAPI.convertPendingTransactionToAPI(tx),
                ),
            );
        }

        return await context.storage.run(
            { type: StorageTaskType.BLOCK_WITH_TXS, params: { key: resolution.key } },
            signal,
        );
    }
}
