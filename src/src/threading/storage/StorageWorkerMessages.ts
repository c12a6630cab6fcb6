import type { StorageTask, UntypedStorageTaskOutcome } from '../../api/storage/StorageTask.js';
import type { DebugLevel } from '../../logger/enums/DebugLevel.js';
import type { RequestScopeData } from '../../logger/RequestScope.js';

/**
 * Message types from main thread to storage worker
 */
export enum StorageWorkerMessageType {
    RUN_TASK = 'run_task',
    SHUTDOWN = 'shutdown',
}

/**
 * Message types from storage worker to main thread
 */
export enum StorageWorkerResponseType {
    READY = 'ready',
    TASK_RESULT = 'task_result',
    SHUTDOWN_COMPLETE = 'shutdown_complete',
}

export interface IRunTaskMessage {
    readonly type: StorageWorkerMessageType.RUN_TASK;
    readonly requestId: string;
    readonly task: StorageTask;

    /** Request scope active when the task was submitted. */
    readonly scope?: RequestScopeData;
}

export interface IShutdownMessage {
    readonly type: StorageWorkerMessageType.SHUTDOWN;
    readonly requestId: string;
}

export type StorageWorkerMessage = IRunTaskMessage | IShutdownMessage;

export interface IWorkerReadyResponse {
    readonly type: StorageWorkerResponseType.READY;
    readonly requestId: string;
    readonly workerId: number;
}

export interface ITaskResultResponse {
    readonly type: StorageWorkerResponseType.TASK_RESULT;
    readonly requestId: string;
    readonly outcome: UntypedStorageTaskOutcome;
}

export interface IShutdownCompleteResponse {
    readonly type: StorageWorkerResponseType.SHUTDOWN_COMPLETE;
    readonly requestId: string;
}

export type StorageWorkerResponse =
    | IWorkerReadyResponse
    | ITaskResultResponse
    | IShutdownCompleteResponse;

export interface IStorageWorkerData {
    readonly workerId: number;
    readonly databasePath: string;
    readonly connections: number;
    readonly debugLevel?: DebugLevel;
}

export function generateRequestId(): string {
    return `${Date.now()}-${Math.random().toString(36).substring(2, 11)}`;
}
