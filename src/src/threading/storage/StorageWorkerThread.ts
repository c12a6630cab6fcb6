import { parentPort, workerData } from 'worker_threads';
import { Storage } from '../../db/Storage.js';
import { toDebugLevel } from '../../logger/enums/DebugLevel.js';
import { Logger } from '../../logger/Logger.js';
import { StorageWorkerHandler } from './StorageWorkerHandler.js';
import {
    type IStorageWorkerData,
    type IWorkerReadyResponse,
    type StorageWorkerMessage,
    type StorageWorkerResponse,
    StorageWorkerResponseType,
} from './StorageWorkerMessages.js';

function readWorkerData(data: unknown): IStorageWorkerData {
    if (
        typeof data !== 'object' ||
        data === null ||
        !('workerId' in data) ||
        !('databasePath' in data) ||
        !('connections' in data) ||
        typeof data.workerId !== 'number' ||
        typeof data.databasePath !== 'string' ||
        typeof data.connections !== 'number'
    ) {
        throw new Error('Storage worker started with invalid worker data');
    }

    const debugLevel =
        'debugLevel' in data && typeof data.debugLevel === 'number'
            ? toDebugLevel(data.debugLevel)
            : undefined;

    return {
        workerId: data.workerId,
        databasePath: data.databasePath,
        connections: data.connections,
        debugLevel,
    };
}

const data = readWorkerData(workerData);
if (data.debugLevel !== undefined) {
    Logger.setDebugLevel(data.debugLevel);
}

const handler = new StorageWorkerHandler(
    Storage.open(data.databasePath, { connections: data.connections }),
    data.workerId,
);

function sendResponse(response: StorageWorkerResponse): void {
    parentPort?.postMessage(response);
}

parentPort?.on('message', (message: StorageWorkerMessage) => {
    const response = handler.handleMessage(message);
    sendResponse(response);

    if (response.type === StorageWorkerResponseType.SHUTDOWN_COMPLETE) {
        parentPort?.close();
    }
});

const readyResponse: IWorkerReadyResponse = {
    type: StorageWorkerResponseType.READY,
    requestId: '',
    workerId: data.workerId,
};
sendResponse(readyResponse);
