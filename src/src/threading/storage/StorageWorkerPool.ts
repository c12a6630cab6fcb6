import { Worker } from 'worker_threads';
import * as path from 'path';
import { fileURLToPath } from 'url';
import type {
    StorageTask,
    StorageTaskOutcome,
    UntypedStorageTaskOutcome,
} from '../../api/storage/StorageTask.js';
import type { StorageTaskType } from '../../api/storage/StorageTaskType.js';
import { InternalFault } from '../../errors/InternalFault.js';
import { err } from '../../errors/RpcResult.js';
import { Logger } from '../../logger/Logger.js';
import { RequestScope } from '../../logger/RequestScope.js';
import {
    cancelledBeforeStart,
    STORAGE_PANIC_MESSAGE,
    type StorageExecutor,
} from '../StorageExecutor.js';
import {
    generateRequestId,
    type IRunTaskMessage,
    type IStorageWorkerData,
    StorageWorkerMessageType,
    type StorageWorkerResponse,
    StorageWorkerResponseType,
} from './StorageWorkerMessages.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

/**
 * Task waiting for, or running on, a worker
 */
interface IQueuedTask {
    readonly message: IRunTaskMessage;
    readonly settle: (outcome: UntypedStorageTaskOutcome) => void;
    readonly signal?: AbortSignal;
    onAbort?: () => void;
}

/**
 * Worker info
 */
interface IWorkerInfo {
    readonly worker: Worker;
    readonly id: number;
    ready: boolean;
    current?: IQueuedTask;
}

/**
 * Storage worker pool configuration
 */
export interface IStorageWorkerPoolConfig {
    readonly workerCount: number;
    readonly databasePath: string;
    readonly connectionsPerWorker: number;

    /** Tasks allowed to wait for a free worker. */
    readonly maximumQueuedTasks: number;

    /** Path to worker script */
    readonly workerScript?: string;
    readonly readyTimeoutMs?: number;
    readonly shutdownTimeoutMs?: number;
}

/**
 * Bounded pool of storage worker threads. Each worker runs one task at a time on its own
 * connections; tasks beyond the worker count wait in a bounded queue.
 */
export class StorageWorkerPool extends Logger implements StorageExecutor {
    public readonly logColor: string = '#2196F3';

    private readonly workers: Map<number, IWorkerInfo> = new Map();
    private readonly queue: IQueuedTask[] = [];
    private readonly config: Required<IStorageWorkerPoolConfig>;

    private nextWorkerId = 0;
    private startingWorkers = 0;
    private isShuttingDown = false;

    constructor(config: IStorageWorkerPoolConfig) {
        super();

        this.config = {
            workerCount: Math.max(1, config.workerCount),
            databasePath: config.databasePath,
            connectionsPerWorker: config.connectionsPerWorker,
            maximumQueuedTasks: config.maximumQueuedTasks,
            workerScript: config.workerScript ?? path.join(__dirname, 'StorageWorkerThread.js'),
            readyTimeoutMs: config.readyTimeoutMs ?? 30000,
            shutdownTimeoutMs: config.shutdownTimeoutMs ?? 5000,
        };
    }

    public get workerCount(): number {
        return this.workers.size;
    }

    public get queuedTasks(): number {
        return this.queue.length;
    }

    /**
     * Initialize the worker pool
     */
    public async initialize(): Promise<void> {
        this.info(`Initializing storage worker pool with ${this.config.workerCount} workers`);

        const workerPromises: Promise<void>[] = [];
        for (let i = 0; i < this.config.workerCount; i++) {
            workerPromises.push(this.createWorker());
        }

        await Promise.all(workerPromises);
        this.info('Storage worker pool initialized');
    }

    public run<T extends StorageTaskType>(
        task: StorageTask<T>,
        signal?: AbortSignal,
    ): Promise<StorageTaskOutcome<T>> {
        return new Promise<StorageTaskOutcome<T>>((resolve) => {
            if (this.isShuttingDown) {
                resolve(
                    err(
                        InternalFault.internal(
                            STORAGE_PANIC_MESSAGE,
                            'Storage worker pool is shutting down',
                        ),
                    ),
                );
                return;
            }

            if (signal?.aborted) {
                resolve(err(cancelledBeforeStart()));
                return;
            }

            // nothing left that could ever pick the task up
            if (this.workers.size === 0 && this.startingWorkers === 0) {
                resolve(
                    err(
                        InternalFault.internal(STORAGE_PANIC_MESSAGE, 'No storage worker available'),
                    ),
                );
                return;
            }

            if (this.queue.length >= this.config.maximumQueuedTasks) {
                this.warn(`Storage task queue is full (${this.queue.length} waiting)`);
                resolve(err(InternalFault.internal('Storage task queue is full')));
                return;
            }

            const queued: IQueuedTask = {
                message: {
                    type: StorageWorkerMessageType.RUN_TASK,
                    requestId: generateRequestId(),
                    task,
                    scope: RequestScope.current(),
                },
                // the worker answers with the outcome of exactly this task type
                settle: (outcome) => resolve(outcome as StorageTaskOutcome<T>),
                signal,
            };

            if (signal) {
                queued.onAbort = () => this.cancelQueued(queued);
                signal.addEventListener('abort', queued.onAbort, { once: true });
            }

            this.queue.push(queued);
            this.dispatch();
        });
    }

    public close(): Promise<void> {
        return this.shutdown();
    }

    /**
     * Shutdown the worker pool. Waiting tasks fail, running tasks finish first.
     */
    public async shutdown(): Promise<void> {
        if (this.isShuttingDown) {
            return;
        }

        this.isShuttingDown = true;
        this.info('Shutting down storage worker pool');

        this.failQueued('Storage worker pool is shutting down');

        const shutdownPromises: Promise<void>[] = [];
        for (const workerInfo of this.workers.values()) {
            shutdownPromises.push(this.shutdownWorker(workerInfo));
        }

        await Promise.all(shutdownPromises);
        this.workers.clear();
        this.info('Storage worker pool shutdown complete');
    }

    /**
     * Create a new worker
     */
    private async createWorker(): Promise<void> {
        const workerId = this.nextWorkerId++;

        return new Promise((resolve, reject) => {
            const data: IStorageWorkerData = {
                workerId,
                databasePath: this.config.databasePath,
                connections: this.config.connectionsPerWorker,
                debugLevel: Logger.getDebugLevel(),
            };

            const worker = new Worker(this.config.workerScript, { workerData: data });
            this.startingWorkers++;

            const workerInfo: IWorkerInfo = {
                worker,
                id: workerId,
                ready: false,
            };

            let starting = true;
            const failStart = (error: Error): void => {
                if (!starting) {
                    return;
                }

                starting = false;
                this.startingWorkers--;
                clearTimeout(readyTimeout);
                reject(error);
            };

            const readyTimeout = setTimeout(() => {
                failStart(new Error(`Storage worker ${workerId} failed to become ready`));

                worker.terminate().catch((e: unknown) => {
                    this.warn(`Failed to terminate storage worker ${workerId}: ${e}`);
                });
            }, this.config.readyTimeoutMs);

            worker.on('message', (response: StorageWorkerResponse) => {
                if (response.type === StorageWorkerResponseType.READY) {
                    if (!starting) {
                        return;
                    }

                    starting = false;
                    this.startingWorkers--;
                    clearTimeout(readyTimeout);

                    workerInfo.ready = true;
                    this.workers.set(workerId, workerInfo);
                    this.debug(`Storage worker ${workerId} ready`);

                    resolve();
                    this.dispatch();
                    return;
                }

                this.handleWorkerMessage(workerInfo, response);
            });

            worker.on('error', (error: Error) => {
                this.error(`Storage worker ${workerId} error: ${error.message}`);

                if (!workerInfo.ready) {
                    failStart(error);
                    return;
                }

                this.handleWorkerCrash(workerInfo, error);
            });

            worker.on('exit', (code: number) => {
                if (!workerInfo.ready) {
                    failStart(new Error(`Storage worker ${workerId} exited with code ${code}`));
                    return;
                }

                if (this.workers.get(workerId) !== workerInfo) {
                    return;
                }

                if (this.isShuttingDown) {
                    this.failCurrent(workerInfo, `Storage worker ${workerId} exited during shutdown`);
                    return;
                }

                this.error(`Storage worker ${workerId} exited with code ${code}`);
                this.handleWorkerCrash(workerInfo, new Error(`Worker exited with code ${code}`));
            });
        });
    }

    /**
     * Shutdown a worker
     */
    private async shutdownWorker(workerInfo: IWorkerInfo): Promise<void> {
        return new Promise((resolve) => {
            const timeout = setTimeout(() => {
                void workerInfo.worker.terminate();
                resolve();
            }, this.config.shutdownTimeoutMs);

            workerInfo.worker.once('exit', () => {
                clearTimeout(timeout);
                resolve();
            });

            workerInfo.worker.postMessage({
                type: StorageWorkerMessageType.SHUTDOWN,
                requestId: generateRequestId(),
            });
        });
    }

    private dispatch(): void {
        for (const workerInfo of this.workers.values()) {
            if (this.queue.length === 0) {
                return;
            }

            if (!workerInfo.ready || workerInfo.current) {
                continue;
            }

            const next = this.queue.shift();
            if (!next) {
                return;
            }

            this.detachAbort(next);
            workerInfo.current = next;
            workerInfo.worker.postMessage(next.message);
        }
    }

    /**
     * Handle a message from a worker
     */
    private handleWorkerMessage(workerInfo: IWorkerInfo, response: StorageWorkerResponse): void {
        if (response.type !== StorageWorkerResponseType.TASK_RESULT) {
            return;
        }

        const current = workerInfo.current;
        if (!current || current.message.requestId !== response.requestId) {
            this.warn(`Storage worker ${workerInfo.id} answered unknown request ${response.requestId}`);
            return;
        }

        workerInfo.current = undefined;
        current.settle(response.outcome);

        this.dispatch();
    }

    /**
     * Handle a worker crash
     */
    private handleWorkerCrash(workerInfo: IWorkerInfo, error: Error): void {
        if (this.workers.get(workerInfo.id) !== workerInfo) {
            return;
        }

        this.failCurrent(workerInfo, error.message);
        this.workers.delete(workerInfo.id);

        if (!this.isShuttingDown) {
            this.warn(`Recreating storage worker ${workerInfo.id} after crash`);
            this.createWorker().catch((e: unknown) => {
                this.error(`Failed to recreate storage worker: ${e}`);

                if (this.workers.size === 0 && this.startingWorkers === 0) {
                    this.failQueued('No storage worker available');
                }
            });
        }
    }

    private failCurrent(workerInfo: IWorkerInfo, reason: string): void {
        const current = workerInfo.current;
        if (!current) {
            return;
        }

        workerInfo.current = undefined;
        current.settle(err(InternalFault.internal(STORAGE_PANIC_MESSAGE, reason)));
    }

    private failQueued(reason: string): void {
        for (const queued of this.queue.splice(0)) {
            this.detachAbort(queued);
            queued.settle(err(InternalFault.internal(STORAGE_PANIC_MESSAGE, reason)));
        }
    }

    private cancelQueued(queued: IQueuedTask): void {
        const index = this.queue.indexOf(queued);
        if (index === -1) {
            return;
        }

        this.queue.splice(index, 1);
        queued.settle(err(cancelledBeforeStart()));
    }

    private detachAbort(queued: IQueuedTask): void {
        if (queued.signal && queued.onAbort) {
            queued.signal.removeEventListener('abort', queued.onAbort);
        }
    }
}
