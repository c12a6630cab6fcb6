/** Raw parameters as received: positional (array) or named (object). */
export type JSONRpcParams = unknown[] | { [key: string]: unknown };
