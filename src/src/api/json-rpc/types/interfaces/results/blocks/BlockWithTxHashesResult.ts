import type { Felt } from '../../../../../../types/Felt.js';
import type { BlockResult } from './BlockResult.js';

export type BlockWithTxHashesResult = BlockResult<Felt>;
