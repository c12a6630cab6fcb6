import fs from 'fs';
import toml from 'toml';
import { DebugLevel, toDebugLevel } from '../logger/enums/DebugLevel.js';
import { Logger } from '../logger/Logger.js';
import type { IRpcNodeConfig } from './interfaces/IRpcNodeConfig.js';
import { RpcNodeConfig } from './RpcNodeConfig.js';

type ConfigTable = Record<string, unknown>;

function isTable(value: unknown): value is ConfigTable {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export class ConfigManager extends Logger {
    public readonly logColor: string = '#c71585';

    private readonly config: IRpcNodeConfig = {
        DEBUG_LEVEL: DebugLevel.INFO,

        STORAGE: {
            DATABASE_PATH: './data/blocks.sqlite',
            THREADS: 4,
            CONNECTIONS_PER_THREAD: 1,
            MAXIMUM_QUEUED_TASKS: 1000,
        },

        PENDING: {
            ENABLED: true,
        },

        API: {
            MAXIMUM_PENDING_REQUESTS: 10000,
            MAXIMUM_REQUESTS_PER_BATCH: 500,
            BATCH_PROCESSING_SIZE: 50,
            EXPOSE_INTERNAL_ERRORS: false,
        },
    };

    constructor(configPath?: string) {
        super();

        if (configPath) {
            this.loadConfig(configPath);
        }
    }

    public loadFromString(content: string): void {
        let parsedConfig: unknown;
        try {
            parsedConfig = toml.parse(content);
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            throw new Error(`Failed to parse config file. {Details: ${message}}`, { cause: e });
        }

        this.parsePartialConfig(parsedConfig);
    }

    public getConfigs(): RpcNodeConfig {
        return new RpcNodeConfig(this.config);
    }

    private loadConfig(configPath: string): void {
        const config: string = fs.readFileSync(configPath, 'utf-8');

        if (!config) {
            throw new Error(
                'Failed to load config file. Please ensure that the config file exists.',
            );
        }

        try {
            this.loadFromString(config);
        } catch (e: unknown) {
            const message = e instanceof Error ? e.message : String(e);
            this.error(`Failed to load config file ${configPath}. {Details: ${message}}`);

            throw e;
        }
    }

    private parsePartialConfig(parsedConfig: unknown): void {
        if (!isTable(parsedConfig)) {
            throw new Error(`Oops the configuration is not a table.`);
        }

        if (parsedConfig.DEBUG_LEVEL !== undefined) {
            if (typeof parsedConfig.DEBUG_LEVEL !== 'number') {
                throw new Error(`Oops the property DEBUG_LEVEL is not a number.`);
            }

            const level = toDebugLevel(parsedConfig.DEBUG_LEVEL);
            if (level === undefined) {
                throw new Error(`Oops the property DEBUG_LEVEL is not a valid DebugLevel value.`);
            }

            this.config.DEBUG_LEVEL = level;
        }

        const storage = this.readSection(parsedConfig, 'STORAGE');
        if (storage) {
            const current = this.config.STORAGE;

            this.config.STORAGE = {
                DATABASE_PATH: this.readString(
                    storage.DATABASE_PATH,
                    'STORAGE.DATABASE_PATH',
                    current.DATABASE_PATH,
                ),
                THREADS: this.readInteger(storage.THREADS, 'STORAGE.THREADS', current.THREADS, 0),
                CONNECTIONS_PER_THREAD: this.readInteger(
                    storage.CONNECTIONS_PER_THREAD,
                    'STORAGE.CONNECTIONS_PER_THREAD',
                    current.CONNECTIONS_PER_THREAD,
                    1,
                ),
                MAXIMUM_QUEUED_TASKS: this.readInteger(
                    storage.MAXIMUM_QUEUED_TASKS,
                    'STORAGE.MAXIMUM_QUEUED_TASKS',
                    current.MAXIMUM_QUEUED_TASKS,
                    1,
                ),
            };

            if (!this.config.STORAGE.DATABASE_PATH) {
                throw new Error(`Oops the property STORAGE.DATABASE_PATH is not valid.`);
            }
        }

        const pending = this.readSection(parsedConfig, 'PENDING');
        if (pending) {
            this.config.PENDING = {
                ENABLED:
                    pending.ENABLED === undefined
                        ? this.config.PENDING.ENABLED
                        : this.readBoolean(pending.ENABLED, 'PENDING.ENABLED'),
            };
        }

        const api = this.readSection(parsedConfig, 'API');
        if (api) {
            const current = this.config.API;

            this.config.API = {
                MAXIMUM_PENDING_REQUESTS: this.readInteger(
                    api.MAXIMUM_PENDING_REQUESTS,
                    'API.MAXIMUM_PENDING_REQUESTS',
                    current.MAXIMUM_PENDING_REQUESTS,
                    1,
                ),
                MAXIMUM_REQUESTS_PER_BATCH: this.readInteger(
                    api.MAXIMUM_REQUESTS_PER_BATCH,
                    'API.MAXIMUM_REQUESTS_PER_BATCH',
                    current.MAXIMUM_REQUESTS_PER_BATCH,
                    1,
                ),
                BATCH_PROCESSING_SIZE: this.readInteger(
                    api.BATCH_PROCESSING_SIZE,
                    'API.BATCH_PROCESSING_SIZE',
                    current.BATCH_PROCESSING_SIZE,
                    1,
                ),
                EXPOSE_INTERNAL_ERRORS:
                    api.EXPOSE_INTERNAL_ERRORS === undefined
                        ? current.EXPOSE_INTERNAL_ERRORS
                        : this.readBoolean(api.EXPOSE_INTERNAL_ERRORS, 'API.EXPOSE_INTERNAL_ERRORS'),
            };
        }
    }

    private readSection(parsedConfig: ConfigTable, name: string): ConfigTable | undefined {
        const section = parsedConfig[name];
        if (section === undefined) {
            return undefined;
        }

        if (!isTable(section)) {
            throw new Error(`Oops the property ${name} is not a table.`);
        }

        return section;
    }

    private readBoolean(value: unknown, property: string): boolean {
        if (typeof value !== 'boolean') {
            throw new Error(`Oops the property ${property} is not a boolean.`);
        }

        return value;
    }

    private readString(value: unknown, property: string, fallback: string): string {
        if (value === undefined) {
            return fallback;
        }

        if (typeof value !== 'string') {
            throw new Error(`Oops the property ${property} is not a string.`);
        }

        return value;
    }

    private readInteger(value: unknown, property: string, fallback: number, minimum: number): number {
        if (value === undefined) {
            return fallback;
        }

        if (typeof value !== 'number' || !Number.isInteger(value)) {
            throw new Error(`Oops the property ${property} is not a number.`);
        }

        if (value < minimum) {
            throw new Error(`Oops the property ${property} must be >= ${minimum}.`);
        }

        return value;
    }
}
