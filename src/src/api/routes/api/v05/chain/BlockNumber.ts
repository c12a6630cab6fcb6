import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { EmptyParams } from '../../../../json-rpc/types/interfaces/params/EmptyParams.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { ChainRoute } from './ChainRoute.js';

export const BlockNumberErrors = generateRpcErrorSubset('BlockNumberError', [
    RpcErrorKind.NoBlocks,
]);

export type BlockNumberError = RpcErrorOf<typeof BlockNumberErrors>;

export class BlockNumber extends ChainRoute<JSONRpcMethods.BLOCK_NUMBER, RpcErrorKind.NoBlocks> {
    public readonly logColor: string = '#ba68c8';

    constructor() {
        super(JSONRpcMethods.BLOCK_NUMBER, BlockNumberErrors);
    }

    /** Height of the latest persisted block. The pending block has no height. */
    public async getData(
        context: RpcContext,
        _params: EmptyParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<number, BlockNumberError>> {
        const latest = await context.storage.run(
            { type: StorageTaskType.LATEST_BLOCK_HASH_AND_NUMBER, params: {} },
            signal,
        );

        if (!latest.ok) {
            return latest;
        }

        return ok(latest.value.block_number);
    }
}
