import { setImmediate } from 'timers/promises';
import type { StorageTask, StorageTaskOutcome } from '../api/storage/StorageTask.js';
import type { StorageTaskType } from '../api/storage/StorageTaskType.js';
import { executeStorageTask } from '../api/storage/StorageTasks.js';
import type { Storage } from '../db/Storage.js';
import { InternalFault } from '../errors/InternalFault.js';
import { err } from '../errors/RpcResult.js';
import { Logger } from '../logger/Logger.js';
import { cancelledBeforeStart, STORAGE_PANIC_MESSAGE, type StorageExecutor } from './StorageExecutor.js';

/**
 * Runs storage tasks on the calling thread after yielding once to the event loop. Used when no
 * storage threads are configured and for in-memory databases, which cannot be shared with
 * workers.
 */
export class InlineStorageExecutor extends Logger implements StorageExecutor {
    public readonly logColor: string = '#20b2aa';

    private closed: boolean = false;

    /**
     * @param ownsStorage when false, `close` stops taking tasks but leaves the store open for
     * whoever passed it in.
     */
    constructor(
        private readonly storage: Storage,
        private readonly ownsStorage: boolean = true,
    ) {
        super();
    }

    public async run<T extends StorageTaskType>(
        task: StorageTask<T>,
        signal?: AbortSignal,
    ): Promise<StorageTaskOutcome<T>> {
        await setImmediate();

        if (this.closed) {
            return err(InternalFault.internal(STORAGE_PANIC_MESSAGE, 'Storage is closed'));
        }

        if (signal?.aborted) {
            return err(cancelledBeforeStart());
        }

        this.debugBright(`Running storage task ${task.type}`);

        return executeStorageTask(this.storage, task);
    }

    public close(): Promise<void> {
        if (!this.closed) {
            this.closed = true;

            if (this.ownsStorage) {
                this.storage.close();
            }
        }

        return Promise.resolve();
    }
}
