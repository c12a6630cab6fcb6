import type { JSONRpcMethods } from '../enums/JSONRpcMethods.js';
import type { JSONRpcId } from './JSONRpc2Request.js';
import type { JSONRpc2ResultData } from './JSONRpc2ResultData.js';
import type { JSONRpcResultError } from './JSONRpcResultError.js';

interface JSONRpc2ResultBase {
    readonly jsonrpc: '2.0';
    readonly id: JSONRpcId;
}

export interface JSONRpc2ResponseResult<T extends JSONRpcMethods = JSONRpcMethods>
    extends JSONRpc2ResultBase {
    readonly result: JSONRpc2ResultData<T>;
}

export interface JSONRpc2ResponseError extends JSONRpc2ResultBase {
    readonly error: JSONRpcResultError;
}

export type JSONRpc2Result<T extends JSONRpcMethods = JSONRpcMethods> =
    | JSONRpc2ResponseResult<T>
    | JSONRpc2ResponseError;

/** A single reply, or one reply per element of a batch. */
export type JSONRpc2Response = JSONRpc2Result | JSONRpc2Result[];
