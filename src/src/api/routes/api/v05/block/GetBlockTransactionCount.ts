import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { BlockIdParams } from '../../../../json-rpc/types/interfaces/params/BlockIdParams.js';
import type { BlockTransactionCountResult } from '../../../../json-rpc/types/interfaces/results/blocks/BlockTransactionCountResult.js';
import { BlockIdResolver, ResolutionType } from '../../../../resolver/BlockIdResolver.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { BlockIdRoute } from './BlockIdRoute.js';

export const GetBlockTransactionCountErrors = generateRpcErrorSubset(
    'GetBlockTransactionCountError',
    [RpcErrorKind.BlockNotFound, RpcErrorKind.PendingNotSupported],
);

export type GetBlockTransactionCountError = RpcErrorOf<typeof GetBlockTransactionCountErrors>;

export class GetBlockTransactionCount extends BlockIdRoute<
    JSONRpcMethods.GET_BLOCK_TRANSACTION_COUNT,
    RpcErrorKind.BlockNotFound | RpcErrorKind.PendingNotSupported
> {
    public readonly logColor: string = '#4fc3f7';

    constructor() {
        super(JSONRpcMethods.GET_BLOCK_TRANSACTION_COUNT, GetBlockTransactionCountErrors);
    }

    public async getData(
        context: RpcContext,
        params: BlockIdParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<BlockTransactionCountResult, GetBlockTransactionCountError>> {
        const plan = BlockIdResolver.resolve(params.block_id, context.pendingData);
        if (!plan.ok) {
            return plan;
        }

        const resolution = plan.value;
        if (resolution.type === ResolutionType.PENDING) {
            return ok(resolution.block.transactions.length);
        }

        return await context.storage.run(
            { type: StorageTaskType.BLOCK_TRANSACTION_COUNT, params: { key: resolution.key } },
            signal,
        );
    }
}
