import type { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import type { RpcErrorSubset } from '../../../../../errors/RpcErrorSubset.js';
import type { IPendingTransaction } from '../../../../../pending/interfaces/IPendingBlock.js';
import type { Felt } from '../../../../../types/Felt.js';
import { ParamsParser } from '../../../../json-rpc/params/ParamsParser.js';
import type { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { JSONRpcParams } from '../../../../json-rpc/types/interfaces/JSONRpcParams.js';
import type { TransactionHashParams } from '../../../../json-rpc/types/interfaces/params/TransactionHashParams.js';
import { Route } from '../../../Route.js';
import type { RpcContext } from '../../../RpcContext.js';

const TRANSACTION_HASH_PARAMS = ['transaction_hash'] as const;

export abstract class TransactionHashRoute<
    M extends JSONRpcMethods,
    K extends RpcErrorKind,
> extends Route<M, TransactionHashParams, K> {
    protected constructor(method: M, errors: RpcErrorSubset<K>) {
        super(method, errors);
    }

    public parseParams(params: JSONRpcParams | undefined): TransactionHashParams {
        const values = ParamsParser.named(params, TRANSACTION_HASH_PARAMS);

        return {
            transaction_hash: ParamsParser.felt(
                ParamsParser.required(values, 'transaction_hash'),
                'transaction_hash',
            ),
        };
    }

    /** Hashes are canonical on both sides, so plain string equality is enough. */
    protected findPendingTransaction(
        context: RpcContext,
        hash: Felt,
    ): IPendingTransaction | undefined {
        const block = context.pendingData?.current().block;
        if (!block) {
            return undefined;
        }

        return block.transactions.find((transaction) => transaction.hash === hash);
    }
}
