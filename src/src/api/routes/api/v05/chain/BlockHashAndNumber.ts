import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import type { RpcResult } from '../../../../../errors/RpcResult.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { EmptyParams } from '../../../../json-rpc/types/interfaces/params/EmptyParams.js';
import type { BlockHashAndNumberResult } from '../../../../json-rpc/types/interfaces/results/chain/BlockHashAndNumberResult.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { ChainRoute } from './ChainRoute.js';

export const BlockHashAndNumberErrors = generateRpcErrorSubset('BlockHashAndNumberError', [
    RpcErrorKind.NoBlocks,
]);

export type BlockHashAndNumberError = RpcErrorOf<typeof BlockHashAndNumberErrors>;

export class BlockHashAndNumber extends ChainRoute<
    JSONRpcMethods.BLOCK_HASH_AND_NUMBER,
    RpcErrorKind.NoBlocks
> {
    public readonly logColor: string = '#ba68c8';

    constructor() {
        super(JSONRpcMethods.BLOCK_HASH_AND_NUMBER, BlockHashAndNumberErrors);
    }

    public async getData(
        context: RpcContext,
        _params: EmptyParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<BlockHashAndNumberResult, BlockHashAndNumberError>> {
        return await context.storage.run(
            { type: StorageTaskType.LATEST_BLOCK_HASH_AND_NUMBER, params: {} },
            signal,
        );
    }
}
