import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { TransactionConverterForAPI } from '../../../../data-converter/TransactionConverterForAPI.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { TransactionHashParams } from '../../../../json-rpc/types/interfaces/params/TransactionHashParams.js';
import type { TransactionResult } from '../../../../json-rpc/types/interfaces/results/transactions/TransactionResult.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { TransactionHashRoute } from './TransactionHashRoute.js';

export const GetTransactionByHashErrors = generateRpcErrorSubset('GetTransactionByHashError', [
    RpcErrorKind.TxnHashNotFound,
]);

export type GetTransactionByHashError = RpcErrorOf<typeof GetTransactionByHashErrors>;

export class GetTransactionByHash extends TransactionHashRoute<
    JSONRpcMethods.GET_TRANSACTION_BY_HASH,
    RpcErrorKind.TxnHashNotFound
> {
    public readonly logColor: string = '#81c784';

    constructor() {
        super(JSONRpcMethods.GET_TRANSACTION_BY_HASH, GetTransactionByHashErrors);
    }

    /**
     * The pending block is searched first, then the block store.
     */
    public async getData(
        context: RpcContext,
        params: TransactionHashParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<TransactionResult, GetTransactionByHashError>> {
        const pending = this.findPendingTransaction(context, params.transaction_hash);
        if (pending) {
            return ok(TransactionConverterForAPI.convertPendingTransactionToAPI(pending));
        }

        return await context.storage.run(
            { type: StorageTaskType.TRANSACTION_BY_HASH, params: { hash: params.transaction_hash } },
            signal,
        );
    }
}
