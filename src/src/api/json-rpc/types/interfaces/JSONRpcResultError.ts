import type { JSONRPCErrorCode } from '../enums/JSONRPCErrorCode.js';

export type JSONRpcErrorData = object | string;

export interface JSONRpcResultError {
    readonly code: JSONRPCErrorCode;
    readonly message: string;
    readonly data?: JSONRpcErrorData;
}
