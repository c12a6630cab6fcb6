import type { ExecutionStatus } from '../../../../../../types/ExecutionStatus.js';
import type { TransactionFinalityStatus } from '../../../../../../types/TransactionFinalityStatus.js';

export interface TransactionStatusResult {
    readonly finality_status: TransactionFinalityStatus;
    readonly execution_status: ExecutionStatus;
}
