import type { TransactionResult } from '../transactions/TransactionResult.js';
import type { BlockResult } from './BlockResult.js';

export type BlockWithTxsResult = BlockResult<TransactionResult>;
