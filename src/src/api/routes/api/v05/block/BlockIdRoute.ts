import type { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import type { RpcErrorSubset } from '../../../../../errors/RpcErrorSubset.js';
import { ParamsParser } from '../../../../json-rpc/params/ParamsParser.js';
import type { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { JSONRpcParams } from '../../../../json-rpc/types/interfaces/JSONRpcParams.js';
import type { BlockIdParams } from '../../../../json-rpc/types/interfaces/params/BlockIdParams.js';
import { Route } from '../../../Route.js';

const BLOCK_ID_PARAMS = ['block_id'] as const;

/** Methods whose only parameter is a block reference. */
export abstract class BlockIdRoute<M extends JSONRpcMethods, K extends RpcErrorKind> extends Route<
    M,
    BlockIdParams,
    K
> {
    protected constructor(method: M, errors: RpcErrorSubset<K>) {
        super(method, errors);
    }

    public parseParams(params: JSONRpcParams | undefined): BlockIdParams {
        const values = ParamsParser.named(params, BLOCK_ID_PARAMS);

        return {
            block_id: ParamsParser.blockId(ParamsParser.required(values, 'block_id')),
        };
    }
}
