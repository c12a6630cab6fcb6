import type { JSONRpcParams } from './JSONRpcParams.js';

export type JSONRpcId = number | string | null;

export interface JSONRpc2Request {
    readonly jsonrpc: '2.0';
    readonly id?: JSONRpcId;
    readonly method: string;
    readonly params?: JSONRpcParams;
}
