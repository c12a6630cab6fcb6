import { EventEmitter } from 'events';
import { setImmediate } from 'timers/promises';
import { afterEach, beforeEach, describe, expect, it, type Mock, vi } from 'vitest';
import { StorageTaskType } from '../../src/src/api/storage/StorageTaskType.js';
import { err, ok } from '../../src/src/errors/RpcResult.js';
import { RequestScope } from '../../src/src/logger/RequestScope.js';
import {
    type IRunTaskMessage,
    type StorageWorkerMessage,
    StorageWorkerMessageType,
    StorageWorkerResponseType,
} from '../../src/src/threading/storage/StorageWorkerMessages.js';
import { StorageWorkerPool } from '../../src/src/threading/storage/StorageWorkerPool.js';

// Mock Worker class
class MockWorker extends EventEmitter {
    postMessage: Mock<(message: StorageWorkerMessage) => void>;
    terminate: Mock<() => Promise<number>>;

    constructor() {
        super();

        this.postMessage = vi.fn((message: StorageWorkerMessage) => {
            if (message.type === StorageWorkerMessageType.SHUTDOWN) {
                process.nextTick(() => this.emit('exit', 0));
            }
        });
        this.terminate = vi.fn(() => Promise.resolve(0));
    }

    simulateReady(workerId: number) {
        process.nextTick(() => {
            this.emit('message', {
                type: StorageWorkerResponseType.READY,
                requestId: '',
                workerId,
            });
        });
    }

    simulateExit(code: number) {
        process.nextTick(() => this.emit('exit', code));
    }

    runMessages(): IRunTaskMessage[] {
        const messages: IRunTaskMessage[] = [];
        for (const [message] of this.postMessage.mock.calls) {
            if (message.type === StorageWorkerMessageType.RUN_TASK) {
                messages.push(message);
            }
        }

        return messages;
    }

    answer(message: IRunTaskMessage, outcome: unknown) {
        this.emit('message', {
            type: StorageWorkerResponseType.TASK_RESULT,
            requestId: message.requestId,
            outcome,
        });
    }
}

const createdWorkers: MockWorker[] = [];

// How the next workers behave while starting
let workerStart: 'ready' | 'exit' | 'silent' = 'ready';

// Mock worker_threads module
vi.mock('worker_threads', () => ({
    Worker: vi.fn().mockImplementation(() => {
        const worker = new MockWorker();
        if (workerStart === 'ready') {
            worker.simulateReady(createdWorkers.length);
        } else if (workerStart === 'exit') {
            worker.simulateExit(1);
        }
        createdWorkers.push(worker);

        return worker;
    }),
}));

import { Worker } from 'worker_threads';

const COUNT_TASK = {
    type: StorageTaskType.LATEST_BLOCK_HASH_AND_NUMBER,
    params: {},
} as const;

const PANIC = 'Database read panic or shutting down';

function createPool(workerCount: number, maximumQueuedTasks: number = 10): StorageWorkerPool {
    return new StorageWorkerPool({
        workerCount,
        databasePath: './blocks-test.sqlite',
        connectionsPerWorker: 1,
        maximumQueuedTasks,
        workerScript: 'StorageWorkerThread.js',
        shutdownTimeoutMs: 100,
    });
}

describe('StorageWorkerPool', () => {
    let pool: StorageWorkerPool;

    beforeEach(() => {
        vi.clearAllMocks();
        createdWorkers.length = 0;
        workerStart = 'ready';
    });

    afterEach(async () => {
        await pool.shutdown();
    });

    describe('initialize', () => {
        it('should start every worker and wait until they are ready', async () => {
            pool = createPool(2);
            await pool.initialize();

            expect(Worker).toHaveBeenCalledTimes(2);
            expect(pool.workerCount).toBe(2);
        });

        it('should pass the database settings to each worker', async () => {
            pool = createPool(1);
            await pool.initialize();

            expect(Worker).toHaveBeenCalledWith('StorageWorkerThread.js', {
                workerData: {
                    workerId: 0,
                    databasePath: './blocks-test.sqlite',
                    connections: 1,
                    debugLevel: expect.any(Number),
                },
            });
        });

        it('should stop a worker that does not become ready in time', async () => {
            workerStart = 'silent';
            pool = new StorageWorkerPool({
                workerCount: 1,
                databasePath: './blocks-test.sqlite',
                connectionsPerWorker: 1,
                maximumQueuedTasks: 10,
                workerScript: 'StorageWorkerThread.js',
                readyTimeoutMs: 20,
                shutdownTimeoutMs: 100,
            });

            await expect(pool.initialize()).rejects.toThrow(
                'Storage worker 0 failed to become ready',
            );
            expect(createdWorkers[0].terminate).toHaveBeenCalledTimes(1);

            createdWorkers[0].simulateReady(0);
            await setImmediate();

            expect(pool.workerCount).toBe(0);
        });
    });

    describe('run', () => {
        it('should resolve with the outcome the worker answers', async () => {
            pool = createPool(1);
            await pool.initialize();

            const running = pool.run(COUNT_TASK);

            const [message] = createdWorkers[0].runMessages();
            expect(message.task).toEqual(COUNT_TASK);

            createdWorkers[0].answer(message, ok({ block_hash: '0xb1', block_number: 1 }));

            await expect(running).resolves.toEqual(ok({ block_hash: '0xb1', block_number: 1 }));
        });

        it('should carry the request scope to the worker', async () => {
            pool = createPool(1);
            await pool.initialize();

            const running = RequestScope.run({ requestId: 'client-1' }, () => pool.run(COUNT_TASK));

            const [message] = createdWorkers[0].runMessages();
            expect(message.scope).toEqual({ requestId: 'client-1' });

            createdWorkers[0].answer(message, ok({ block_hash: '0xb1', block_number: 1 }));
            await running;
        });

        it('should give each worker one task at a time', async () => {
            pool = createPool(1);
            await pool.initialize();

            const first = pool.run(COUNT_TASK);
            const second = pool.run(COUNT_TASK);

            const worker = createdWorkers[0];
            expect(worker.runMessages()).toHaveLength(1);
            expect(pool.queuedTasks).toBe(1);

            worker.answer(worker.runMessages()[0], ok({ block_hash: '0xb1', block_number: 1 }));
            await expect(first).resolves.toEqual(ok({ block_hash: '0xb1', block_number: 1 }));

            expect(worker.runMessages()).toHaveLength(2);
            expect(pool.queuedTasks).toBe(0);

            worker.answer(worker.runMessages()[1], ok({ block_hash: '0xb2', block_number: 2 }));
            await expect(second).resolves.toEqual(ok({ block_hash: '0xb2', block_number: 2 }));
        });

        it('should refuse work beyond the queue bound', async () => {
            pool = createPool(1, 1);
            await pool.initialize();

            const running = pool.run(COUNT_TASK);
            const queued = pool.run(COUNT_TASK);

            await expect(pool.run(COUNT_TASK)).resolves.toEqual(
                err({ kind: 'Internal', chain: ['Storage task queue is full'] }),
            );

            const worker = createdWorkers[0];
            worker.answer(worker.runMessages()[0], ok({ block_hash: '0xb1', block_number: 1 }));
            await running;

            worker.answer(worker.runMessages()[1], ok({ block_hash: '0xb1', block_number: 1 }));
            await queued;
        });

        it('should drop a queued task when its request is cancelled', async () => {
            pool = createPool(1);
            await pool.initialize();

            const running = pool.run(COUNT_TASK);

            const controller = new AbortController();
            const cancelled = pool.run(COUNT_TASK, controller.signal);
            controller.abort();

            await expect(cancelled).resolves.toEqual(
                err({
                    kind: 'Internal',
                    chain: ['Request cancelled before the storage read started'],
                }),
            );
            expect(pool.queuedTasks).toBe(0);

            const worker = createdWorkers[0];
            worker.answer(worker.runMessages()[0], ok({ block_hash: '0xb1', block_number: 1 }));
            await running;

            expect(worker.runMessages()).toHaveLength(1);
        });

        it('should not send an already cancelled task', async () => {
            pool = createPool(1);
            await pool.initialize();

            await expect(pool.run(COUNT_TASK, AbortSignal.abort())).resolves.toEqual(
                err({
                    kind: 'Internal',
                    chain: ['Request cancelled before the storage read started'],
                }),
            );
            expect(createdWorkers[0].runMessages()).toHaveLength(0);
        });
    });

    describe('worker crash', () => {
        it('should fail the running task and replace the worker', async () => {
            pool = createPool(1);
            await pool.initialize();

            const running = pool.run(COUNT_TASK);
            createdWorkers[0].emit('error', new Error('worker ran out of memory'));

            await expect(running).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'worker ran out of memory'] }),
            );
            expect(Worker).toHaveBeenCalledTimes(2);
        });

        it('should hand queued work to the replacement worker', async () => {
            pool = createPool(1);
            await pool.initialize();

            const crashed = pool.run(COUNT_TASK);
            const queued = pool.run(COUNT_TASK);

            createdWorkers[0].emit('exit', 1);
            await expect(crashed).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'Worker exited with code 1'] }),
            );

            await vi.waitFor(() => expect(createdWorkers[1].runMessages()).toHaveLength(1));

            const replacement = createdWorkers[1];
            replacement.answer(
                replacement.runMessages()[0],
                ok({ block_hash: '0xb1', block_number: 1 }),
            );
            await expect(queued).resolves.toEqual(ok({ block_hash: '0xb1', block_number: 1 }));
        });

        it('should fail new work once no worker can be started', async () => {
            pool = createPool(1);
            await pool.initialize();

            workerStart = 'exit';
            createdWorkers[0].emit('error', new Error('worker ran out of memory'));
            await setImmediate();

            expect(createdWorkers).toHaveLength(2);
            expect(pool.workerCount).toBe(0);

            await expect(pool.run(COUNT_TASK)).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'No storage worker available'] }),
            );
            expect(pool.queuedTasks).toBe(0);
        });

        it('should fail work queued while the replacement fails to start', async () => {
            pool = createPool(1);
            await pool.initialize();

            const running = pool.run(COUNT_TASK);
            const queued = pool.run(COUNT_TASK);

            workerStart = 'exit';
            createdWorkers[0].emit('error', new Error('worker ran out of memory'));

            await expect(running).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'worker ran out of memory'] }),
            );
            await expect(queued).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'No storage worker available'] }),
            );
        });
    });

    describe('shutdown', () => {
        it('should stop every worker', async () => {
            pool = createPool(2);
            await pool.initialize();

            await pool.shutdown();

            expect(pool.workerCount).toBe(0);
            for (const worker of createdWorkers) {
                expect(worker.postMessage).toHaveBeenCalledWith({
                    type: StorageWorkerMessageType.SHUTDOWN,
                    requestId: expect.any(String),
                });
            }
        });

        it('should fail queued tasks and refuse new ones', async () => {
            pool = createPool(1);
            await pool.initialize();

            const running = pool.run(COUNT_TASK);
            const queued = pool.run(COUNT_TASK);

            const stopping = pool.shutdown();

            await expect(queued).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'Storage worker pool is shutting down'] }),
            );
            await expect(pool.run(COUNT_TASK)).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'Storage worker pool is shutting down'] }),
            );

            await stopping;
            await expect(running).resolves.toEqual(
                err({ kind: 'Internal', chain: [PANIC, 'Storage worker 0 exited during shutdown'] }),
            );
        });
    });
});
