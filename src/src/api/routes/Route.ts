import { InvalidParamsError } from '../../errors/InvalidParamsError.js';
import { isInternalError, type RpcError, type RpcErrorKind } from '../../errors/RpcErrorKind.js';
import type { RpcErrorSubset } from '../../errors/RpcErrorSubset.js';
import { err, type RpcResult } from '../../errors/RpcResult.js';
import { Logger } from '../../logger/Logger.js';
import { JSONRPCErrorCode } from '../json-rpc/types/enums/JSONRPCErrorCode.js';
import type { JSONRpcMethods } from '../json-rpc/types/enums/JSONRpcMethods.js';
import type { JSONRpc2ResultData } from '../json-rpc/types/interfaces/JSONRpc2ResultData.js';
import type { JSONRpcParams } from '../json-rpc/types/interfaces/JSONRpcParams.js';
import type { JSONRpcResultError } from '../json-rpc/types/interfaces/JSONRpcResultError.js';
import type { RpcContext } from './RpcContext.js';

export type JSONRpcRouteResponse<M extends JSONRpcMethods = JSONRpcMethods> =
    | { readonly result: JSONRpc2ResultData<M> }
    | { readonly error: JSONRpcResultError };

export interface IRpcRoute {
    readonly method: JSONRpcMethods;

    getDataRPC(
        context: RpcContext,
        params: JSONRpcParams | undefined,
        signal?: AbortSignal,
    ): Promise<JSONRpcRouteResponse>;
}

/**
 * One query method. `K` is the closed set of error kinds the method declares; anything else a
 * route runs into is reported as `Internal`.
 */
export abstract class Route<M extends JSONRpcMethods, P, K extends RpcErrorKind>
    extends Logger
    implements IRpcRoute
{
    protected constructor(
        public readonly method: M,
        protected readonly errors: RpcErrorSubset<K>,
    ) {
        super();
    }

    /** Throws `InvalidParamsError` when the parameters do not match the method's schema. */
    public abstract parseParams(params: JSONRpcParams | undefined): P;

    public abstract getData(
        context: RpcContext,
        params: P,
        signal?: AbortSignal,
    ): Promise<RpcResult<JSONRpc2ResultData<M>, RpcError<K>>>;

    public async getDataRPC(
        context: RpcContext,
        params: JSONRpcParams | undefined,
        signal?: AbortSignal,
    ): Promise<JSONRpcRouteResponse<M>> {
        let outcome: RpcResult<JSONRpc2ResultData<M>, RpcError<K>>;

        try {
            outcome = await this.getData(context, this.parseParams(params), signal);
        } catch (e: unknown) {
            if (e instanceof InvalidParamsError) {
                return {
                    error: {
                        code: JSONRPCErrorCode.INVALID_PARAMS,
                        message: 'Invalid params',
                        data: e.message,
                    },
                };
            }

            outcome = err(this.errors.internal(e, `Unhandled failure in ${this.method}`));
        }

        if (outcome.ok) {
            return { result: outcome.value };
        }

        if (isInternalError(outcome.error)) {
            this.error(`${this.method} failed: ${outcome.error.chain.join(': ')}`);
        }

        return { error: this.errors.toRpcError(outcome.error, context.exposeInternalErrors) };
    }
}
