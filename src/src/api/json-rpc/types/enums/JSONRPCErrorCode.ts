export enum JSONRPCErrorCode {
    /** JSON-RPC 2.0 */
    PARSE_ERROR = -32700,
    INVALID_REQUEST = -32600,
    METHOD_NOT_FOUND = -32601,
    INVALID_PARAMS = -32602,
    INTERNAL_ERROR = -32603,
    SERVER_ERROR = -32000,

    /** Application codes. Published codes never change. */
    BLOCK_NOT_FOUND = 24,
    INVALID_TXN_INDEX = 27,
    TXN_HASH_NOT_FOUND = 29,
    NO_BLOCKS = 32,
    PENDING_NOT_SUPPORTED = -32001,
}
