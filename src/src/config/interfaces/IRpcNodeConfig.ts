import type { DebugLevel } from '../../logger/enums/DebugLevel.js';

export interface StorageConfig {
    /** Path of the SQLite block store, or `:memory:`. */
    DATABASE_PATH: string;

    /** Storage worker threads. 0 runs storage reads on the calling thread. */
    THREADS: number;
    CONNECTIONS_PER_THREAD: number;
    MAXIMUM_QUEUED_TASKS: number;
}

export interface PendingConfig {
    ENABLED: boolean;
}

export interface APIConfig {
    MAXIMUM_PENDING_REQUESTS: number;
    MAXIMUM_REQUESTS_PER_BATCH: number;
    BATCH_PROCESSING_SIZE: number;
    EXPOSE_INTERNAL_ERRORS: boolean;
}

export interface IRpcNodeConfig {
    DEBUG_LEVEL: DebugLevel;

    STORAGE: StorageConfig;
    PENDING: PendingConfig;
    API: APIConfig;
}
