import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { TransactionFinalityStatus } from '../../../../../types/TransactionFinalityStatus.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { TransactionHashParams } from '../../../../json-rpc/types/interfaces/params/TransactionHashParams.js';
import type { TransactionStatusResult } from '../../../../json-rpc/types/interfaces/results/transactions/TransactionStatusResult.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import type { RpcContext } from '../../../RpcContext.js';
import { TransactionHashRoute } from './TransactionHashRoute.js';

export const GetTransactionStatusErrors = generateRpcErrorSubset('GetTransactionStatusError', [
    RpcErrorKind.TxnHashNotFound,
]);

export type GetTransactionStatusError = RpcErrorOf<typeof GetTransactionStatusErrors>;

export class GetTransactionStatus extends TransactionHashRoute<
    JSONRpcMethods.GET_TRANSACTION_STATUS,
    RpcErrorKind.TxnHashNotFound
> {
    public readonly logColor: string = '#81c784';

    constructor() {
        super(JSONRpcMethods.GET_TRANSACTION_STATUS, GetTransactionStatusErrors);
    }

    public async getData(
        context: RpcContext,
        params: TransactionHashParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<TransactionStatusResult, GetTransactionStatusError>> {
        // pending transactions are only sequenced, never final on L1
        const pending = this.findPendingTransaction(context, params.transaction_hash);
        if (pending) {
            return ok({
                finality_status: TransactionFinalityStatus.ACCEPTED_ON_L2,
                execution_status: pending.executionStatus,
            });
        }

        return await context.storage.run(
            { type: StorageTaskType.TRANSACTION_STATUS, params: { hash: params.transaction_hash } },
            signal,
        );
    }
}
