import { executeStorageTask } from '../../api/storage/StorageTasks.js';
import type { Storage } from '../../db/Storage.js';
import { Logger } from '../../logger/Logger.js';
import { RequestScope } from '../../logger/RequestScope.js';
import {
    type IRunTaskMessage,
    type StorageWorkerMessage,
    StorageWorkerMessageType,
    type StorageWorkerResponse,
    StorageWorkerResponseType,
} from './StorageWorkerMessages.js';

/**
 * Worker-side message handling, kept apart from the `parentPort` wiring.
 */
export class StorageWorkerHandler extends Logger {
    public readonly logColor: string = '#66cdaa';

    constructor(
        private readonly storage: Storage,
        private readonly workerId: number,
    ) {
        super();
    }

    public handleMessage(message: StorageWorkerMessage): StorageWorkerResponse {
        switch (message.type) {
            case StorageWorkerMessageType.RUN_TASK:
                return this.runTask(message);
            case StorageWorkerMessageType.SHUTDOWN:
                this.storage.close();
                this.debug(`Storage worker ${this.workerId} closed its connections`);

                return {
                    type: StorageWorkerResponseType.SHUTDOWN_COMPLETE,
                    requestId: message.requestId,
                };
        }
    }

    private runTask(message: IRunTaskMessage): StorageWorkerResponse {
        const execute = () => {
            this.debugBright(`Worker ${this.workerId} running ${message.task.type}`);

            return executeStorageTask(this.storage, message.task);
        };

        const outcome = message.scope ? RequestScope.run(message.scope, execute) : execute();

        return {
            type: StorageWorkerResponseType.TASK_RESULT,
            requestId: message.requestId,
            outcome,
        };
    }
}
