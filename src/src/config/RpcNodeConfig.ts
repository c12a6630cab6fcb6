import type { DebugLevel } from '../logger/enums/DebugLevel.js';
import type {
    APIConfig,
    IRpcNodeConfig,
    PendingConfig,
    StorageConfig,
} from './interfaces/IRpcNodeConfig.js';

export class RpcNodeConfig implements IRpcNodeConfig {
    public readonly DEBUG_LEVEL: DebugLevel;

    public readonly STORAGE: Readonly<StorageConfig>;
    public readonly PENDING: Readonly<PendingConfig>;
    public readonly API: Readonly<APIConfig>;

    constructor(config: IRpcNodeConfig) {
        this.DEBUG_LEVEL = config.DEBUG_LEVEL;

        this.STORAGE = Object.freeze({ ...config.STORAGE });
        this.PENDING = Object.freeze({ ...config.PENDING });
        this.API = Object.freeze({ ...config.API });

        Object.freeze(this);
    }
}
