import { RpcErrorKind } from '../../../../../errors/RpcErrorKind.js';
import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { err, ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { TransactionConverterForAPI } from '../../../../data-converter/TransactionConverterForAPI.js';
import { ParamsParser } from '../../../../json-rpc/params/ParamsParser.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { JSONRpcParams } from '../../../../json-rpc/types/interfaces/JSONRpcParams.js';
import type { TransactionByBlockIdAndIndexParams } from '../../../../json-rpc/types/interfaces/params/TransactionByBlockIdAndIndexParams.js';
import type { TransactionResult } from '../../../../json-rpc/types/interfaces/results/transactions/TransactionResult.js';
import { BlockIdResolver, ResolutionType } from '../../../../resolver/BlockIdResolver.js';
import { StorageTaskType } from '../../../../storage/StorageTaskType.js';
import { Route } from '../../../Route.js';
import type { RpcContext } from '../../../RpcContext.js';

const PARAMS = ['block_id', 'index'] as const;

type Kinds =
    | RpcErrorKind.BlockNotFound
    | RpcErrorKind.InvalidTxnIndex
    | RpcErrorKind.PendingNotSupported;

export const GetTransactionByBlockIdAndIndexErrors = generateRpcErrorSubset<Kinds>(
    'GetTransactionByBlockIdAndIndexError',
    [RpcErrorKind.BlockNotFound, RpcErrorKind.InvalidTxnIndex, RpcErrorKind.PendingNotSupported],
);

export type GetTransactionByBlockIdAndIndexError = RpcErrorOf<
    typeof GetTransactionByBlockIdAndIndexErrors
>;

export class GetTransactionByBlockIdAndIndex extends Route<
    JSONRpcMethods.GET_TRANSACTION_BY_BLOCK_ID_AND_INDEX,
    TransactionByBlockIdAndIndexParams,
    Kinds
> {
    public readonly logColor: string = '#81c784';

    constructor() {
        super(
            JSONRpcMethods.GET_TRANSACTION_BY_BLOCK_ID_AND_INDEX,
            GetTransactionByBlockIdAndIndexErrors,
        );
    }

    public parseParams(params: JSONRpcParams | undefined): TransactionByBlockIdAndIndexParams {
        const values = ParamsParser.named(params, PARAMS);

        return {
            block_id: ParamsParser.blockId(ParamsParser.required(values, 'block_id')),
            index: ParamsParser.index(ParamsParser.required(values, 'index')),
        };
    }

    public async getData(
        context: RpcContext,
        params: TransactionByBlockIdAndIndexParams,
        signal?: AbortSignal,
    ): Promise<RpcResult<TransactionResult, GetTransactionByBlockIdAndIndexError>> {
        const plan = BlockIdResolver.resolve(params.block_id, context.pendingData);
        if (!plan.ok) {
            return plan;
        }

        const resolution = plan.value;
        if (resolution.type === ResolutionType.PENDING) {
            const transaction = resolution.block.transactions[params.index];
            if (!transaction) {
                return err(this.errors.create(RpcErrorKind.InvalidTxnIndex));
            }

            return ok(TransactionConverterForAPI.convertPendingTransactionToAPI(transaction));
        }

        return await context.storage.run(
            {
                type: StorageTaskType.TRANSACTION_BY_BLOCK_AND_INDEX,
                params: { key: resolution.key, index: params.index },
            },
            signal,
        );
    }
}
