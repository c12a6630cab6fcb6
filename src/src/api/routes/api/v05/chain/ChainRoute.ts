import type { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import type { RpcErrorSubset } from '../../../../../errors/RpcErrorSubset.js';
import { ParamsParser } from '../../../../json-rpc/params/ParamsParser.js';
import type { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { JSONRpcParams } from '../../../../json-rpc/types/interfaces/JSONRpcParams.js';
import type { EmptyParams } from '../../../../json-rpc/types/interfaces/params/EmptyParams.js';
import { Route } from '../../../Route.js';

const NO_PARAMS: readonly never[] = [];

/** Parameterless methods. An empty array, an empty object or no params at all are accepted. */
export abstract class ChainRoute<M extends JSONRpcMethods, K extends RpcErrorKind> extends Route<
    M,
    EmptyParams,
    K
> {
    protected constructor(method: M, errors: RpcErrorSubset<K>) {
        super(method, errors);
    }

    public parseParams(params: JSONRpcParams | undefined): EmptyParams {
        ParamsParser.named(params, NO_PARAMS);

        return {};
    }
}
