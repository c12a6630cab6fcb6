import type { Felt } from '../../../../../types/Felt.js';

export interface TransactionHashParams {
    readonly transaction_hash: Felt;
}
