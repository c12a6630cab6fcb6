export { RpcNode, type RpcNodeOptions } from './RpcNode.js';

export { ConfigManager } from './config/ConfigManager.js';
export { RpcNodeConfig } from './config/RpcNodeConfig.js';
export type {
    APIConfig,
    IRpcNodeConfig,
    PendingConfig,
    StorageConfig,
} from './config/interfaces/IRpcNodeConfig.js';

export { Logger } from './logger/Logger.js';
export { DebugLevel } from './logger/enums/DebugLevel.js';
export { RequestScope, type RequestScopeData } from './logger/RequestScope.js';

export { Storage, type StorageOptions } from './db/Storage.js';
export { StorageWriter, type IBlockInput, type IBlockTransactionInput } from './db/StorageWriter.js';
export type { IBlockHeader } from './db/interfaces/IBlockHeader.js';

export { PendingData } from './pending/PendingData.js';
export type {
    IPendingBlock,
    IPendingSnapshot,
    IPendingTransaction,
} from './pending/interfaces/IPendingBlock.js';

export { RpcErrorKind, type RpcError, type InternalError } from './errors/RpcErrorKind.js';
export { RpcErrorCodes } from './errors/RpcErrorCodes.js';
export { generateRpcErrorSubset, type RpcErrorSubset } from './errors/RpcErrorSubset.js';

export { JSONRpc2Manager } from './api/json-rpc/JSONRpc2Manager.js';
export { JSONRpcRouter } from './api/json-rpc/JSONRpcRouter.js';
export { JSONRpcMethods } from './api/json-rpc/types/enums/JSONRpcMethods.js';
export { JSONRPCErrorCode } from './api/json-rpc/types/enums/JSONRPCErrorCode.js';
export type { JSONRpc2Response, JSONRpc2Result } from './api/json-rpc/types/interfaces/JSONRpc2Result.js';

export { BlockStatus } from './types/BlockStatus.js';
export { ExecutionStatus } from './types/ExecutionStatus.js';
export { TransactionFinalityStatus } from './types/TransactionFinalityStatus.js';
export type { Felt } from './types/Felt.js';
