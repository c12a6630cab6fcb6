import type { Felt } from '../../../../../../types/Felt.js';
import type { JsonObject } from '../../../../../../types/JsonValue.js';

/** Transaction body as submitted, prefixed with its hash. */
export type TransactionResult = { readonly transaction_hash: Felt } & JsonObject;
