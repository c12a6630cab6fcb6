import { InternalFault } from '../../errors/InternalFault.js';
import type { IStoredTransaction } from '../../db/interfaces/IStoredTransaction.js';
import type { IPendingTransaction } from '../../pending/interfaces/IPendingBlock.js';
import type { Felt } from '../../types/Felt.js';
import { isJsonObject, type JsonObject } from '../../types/JsonValue.js';
import type { TransactionResult } from '../json-rpc/types/interfaces/results/transactions/TransactionResult.js';

export class TransactionConverterForAPI {
    public static convertStoredTransactionToAPI(transaction: IStoredTransaction): TransactionResult {
        return TransactionConverterForAPI.toResult(
            transaction.hash,
            TransactionConverterForAPI.decodeBody(transaction),
        );
    }

    public static convertPendingTransactionToAPI(
        transaction: IPendingTransaction,
    ): TransactionResult {
        return TransactionConverterForAPI.toResult(transaction.hash, transaction.body);
    }

    private static toResult(hash: Felt, body: JsonObject): TransactionResult {
        return {
            transaction_hash: hash,
            ...body,
        };
    }

    private static decodeBody(transaction: IStoredTransaction): JsonObject {
        let body: unknown;
        try {
            body = JSON.parse(transaction.body);
        } catch (e: unknown) {
            throw new InternalFault(`Malformed body for transaction ${transaction.hash}`, {
                cause: e,
            });
        }

        if (!isJsonObject(body) || typeof body.type !== 'string') {
            throw new InternalFault(`Malformed body for transaction ${transaction.hash}`);
        }

        if ('transaction_hash' in body) {
            throw new InternalFault(
                `Body of transaction ${transaction.hash} must not carry its own hash`,
            );
        }

        return body;
    }
}
