import type { StorageTask, StorageTaskOutcome } from '../api/storage/StorageTask.js';
import type { StorageTaskType } from '../api/storage/StorageTaskType.js';
import { InternalFault } from '../errors/InternalFault.js';
import type { InternalError } from '../errors/RpcErrorKind.js';

export const STORAGE_PANIC_MESSAGE = 'Database read panic or shutting down';

/**
 * Moves blocking storage work off the request-handling event loop.
 *
 * `run` never rejects: every fault, including cancellation and shutdown, resolves to an
 * `Internal` outcome. A task whose signal fires before it starts is dropped; once started it
 * always runs to completion.
 */
export interface StorageExecutor {
    run<T extends StorageTaskType>(
        task: StorageTask<T>,
        signal?: AbortSignal,
    ): Promise<StorageTaskOutcome<T>>;

    close(): Promise<void>;
}

export function cancelledBeforeStart(): InternalError {
    return InternalFault.internal('Request cancelled before the storage read started');
}
