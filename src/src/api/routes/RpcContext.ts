import type { PendingData } from '../../pending/PendingData.js';
import type { StorageExecutor } from '../../threading/StorageExecutor.js';

/** Per-node state every query method reads from. */
export interface RpcContext {
    readonly storage: StorageExecutor;

    /** Absent when this node is not configured to serve pending data. */
    readonly pendingData?: PendingData;
    readonly exposeInternalErrors: boolean;
}
