import { JSONRpcMethods } from '../json-rpc/types/enums/JSONRpcMethods.js';
import { GetBlockTransactionCount } from './api/v05/block/GetBlockTransactionCount.js';
import { GetBlockWithTxHashes } from './api/v05/block/GetBlockWithTxHashes.js';
import { GetBlockWithTxs } from './api/v05/block/GetBlockWithTxs.js';
import { BlockHashAndNumber } from './api/v05/chain/BlockHashAndNumber.js';
import { BlockNumber } from './api/v05/chain/BlockNumber.js';
import { SpecVersion } from './api/v05/chain/SpecVersion.js';
import { GetTransactionByBlockIdAndIndex } from './api/v05/transaction/GetTransactionByBlockIdAndIndex.js';
import { GetTransactionByHash } from './api/v05/transaction/GetTransactionByHash.js';
import { GetTransactionStatus } from './api/v05/transaction/GetTransactionStatus.js';
import type { IRpcRoute } from './Route.js';

export const DefinedRoutes: { readonly [key in JSONRpcMethods]: IRpcRoute } = {
    /** Blocks */
    [JSONRpcMethods.GET_BLOCK_WITH_TX_HASHES]: new GetBlockWithTxHashes(),
    [JSONRpcMethods.GET_BLOCK_WITH_TXS]: new GetBlockWithTxs(),
    [JSONRpcMethods.GET_BLOCK_TRANSACTION_COUNT]: new GetBlockTransactionCount(),

    /** Transactions */
    [JSONRpcMethods.GET_TRANSACTION_BY_HASH]: new GetTransactionByHash(),
    [JSONRpcMethods.GET_TRANSACTION_BY_BLOCK_ID_AND_INDEX]: new GetTransactionByBlockIdAndIndex(),
    [JSONRpcMethods.GET_TRANSACTION_STATUS]: new GetTransactionStatus(),

    /** Chain */
    [JSONRpcMethods.BLOCK_NUMBER]: new BlockNumber(),
    [JSONRpcMethods.BLOCK_HASH_AND_NUMBER]: new BlockHashAndNumber(),
    [JSONRpcMethods.SPEC_VERSION]: new SpecVersion(),
};
