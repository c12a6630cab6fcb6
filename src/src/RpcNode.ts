import { JSONRpc2Manager } from './api/json-rpc/JSONRpc2Manager.js';
import { JSONRpcRouter } from './api/json-rpc/JSONRpcRouter.js';
import type { JSONRpc2Response } from './api/json-rpc/types/interfaces/JSONRpc2Result.js';
import { ConfigManager } from './config/ConfigManager.js';
import type { IRpcNodeConfig } from './config/interfaces/IRpcNodeConfig.js';
import { Storage } from './db/Storage.js';
import { Logger } from './logger/Logger.js';
import { PendingData } from './pending/PendingData.js';
import { InlineStorageExecutor } from './threading/InlineStorageExecutor.js';
import type { StorageExecutor } from './threading/StorageExecutor.js';
import { StorageWorkerPool } from './threading/storage/StorageWorkerPool.js';

export interface RpcNodeOptions {
    /**
     * Already open block store. Reads then run on the calling thread. The caller keeps
     * ownership: `stop` does not close it.
     */
    readonly storage?: Storage;
}

export class RpcNode extends Logger {
    public readonly logColor: string = '#9370db';

    /** Present when PENDING.ENABLED is set. The sync component feeds snapshots through it. */
    public readonly pendingData?: PendingData;

    private executor: StorageExecutor | undefined;
    private manager: JSONRpc2Manager | undefined;

    constructor(
        private readonly config: IRpcNodeConfig,
        private readonly options: RpcNodeOptions = {},
    ) {
        super();

        Logger.setDebugLevel(config.DEBUG_LEVEL);

        if (config.PENDING.ENABLED) {
            this.pendingData = new PendingData();
        }
    }

    public static fromConfigFile(configPath: string): RpcNode {
        return new RpcNode(new ConfigManager(configPath).getConfigs());
    }

    public get started(): boolean {
        return this.manager !== undefined;
    }

    public async start(): Promise<void> {
        if (this.manager) {
            return;
        }

        const executor = await this.createExecutor();
        const router = new JSONRpcRouter({
            storage: executor,
            pendingData: this.pendingData,
            exposeInternalErrors: this.config.API.EXPOSE_INTERNAL_ERRORS,
        });

        this.executor = executor;
        this.manager = new JSONRpc2Manager(router, this.config.API);

        this.success(`RPC node started (pending data ${this.pendingData ? 'enabled' : 'disabled'})`);
    }

    /** Handles one raw JSON-RPC body, single or batch. */
    public async request(body: string, signal?: AbortSignal): Promise<JSONRpc2Response> {
        if (!this.manager) {
            throw new Error('RPC node is not started');
        }

        return await this.manager.onRequest(body, signal);
    }

    public async stop(): Promise<void> {
        const executor = this.executor;

        this.manager = undefined;
        this.executor = undefined;

        if (executor) {
            await executor.close();
            this.info('RPC node stopped');
        }
    }

    private async createExecutor(): Promise<StorageExecutor> {
        const storageConfig = this.config.STORAGE;

        const inline =
            this.options.storage !== undefined ||
            storageConfig.DATABASE_PATH === ':memory:' ||
            storageConfig.THREADS === 0;

        if (inline) {
            const storage =
                this.options.storage ??
                Storage.open(storageConfig.DATABASE_PATH, {
                    connections: storageConfig.CONNECTIONS_PER_THREAD,
                });

            this.prepareSchema(storage);
            this.info('Serving storage reads on the main thread');

            return new InlineStorageExecutor(storage, this.options.storage === undefined);
        }

        const schemaStorage = Storage.open(storageConfig.DATABASE_PATH, { connections: 1 });
        try {
            this.prepareSchema(schemaStorage);
        } finally {
            schemaStorage.close();
        }

        const pool = new StorageWorkerPool({
            workerCount: storageConfig.THREADS,
            databasePath: storageConfig.DATABASE_PATH,
            connectionsPerWorker: storageConfig.CONNECTIONS_PER_THREAD,
            maximumQueuedTasks: storageConfig.MAXIMUM_QUEUED_TASKS,
        });

        try {
            await pool.initialize();
        } catch (e: unknown) {
            await pool.shutdown();
            throw e;
        }

        return pool;
    }

    private prepareSchema(storage: Storage): void {
        const connection = storage.connection();
        try {
            connection.writer().createSchema();
        } finally {
            connection.release();
        }
    }
}
