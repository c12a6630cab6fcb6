import Database from 'better-sqlite3';
import { Logger } from '../logger/Logger.js';
import { StorageConnection } from './StorageConnection.js';

export interface StorageOptions {
    /** Upper bound of concurrently open handles. */
    readonly connections: number;
    readonly readonly?: boolean;
}

/**
 * Pool of better-sqlite3 handles on one database file. Handles are opened lazily and reused.
 */
export class Storage extends Logger {
    public readonly logColor: string = '#7fffd4';

    private readonly idle: Database.Database[] = [];
    private readonly opened: Set<Database.Database> = new Set();
    private closed: boolean = false;

    private constructor(
        private readonly openHandle: () => Database.Database,
        private readonly maximumConnections: number,
    ) {
        super();
    }

    public static open(path: string, options: StorageOptions): Storage {
        if (path === ':memory:') {
            // every handle on :memory: is a separate database
            return Storage.fromDatabase(new Database(path));
        }

        return new Storage(() => {
            const db = new Database(path, {
                readonly: options.readonly ?? false,
                fileMustExist: options.readonly ?? false,
            });

            if (!options.readonly) {
                db.pragma('journal_mode = WAL');
            }

            return db;
        }, Math.max(1, options.connections));
    }

    /** Wraps an already open handle, which then becomes the only connection of the pool. */
    public static fromDatabase(db: Database.Database): Storage {
        return new Storage(() => db, 1);
    }

    public get openConnections(): number {
        return this.opened.size;
    }

    public connection(): StorageConnection {
        if (this.closed) {
            throw new Error('Storage is closed');
        }

        let db = this.idle.pop();
        if (!db) {
            if (this.opened.size >= this.maximumConnections) {
                throw new Error(
                    `No database connection available (${this.maximumConnections} in use)`,
                );
            }

            db = this.openHandle();
            this.opened.add(db);
        }

        return new StorageConnection(db, (handle) => this.releaseHandle(handle));
    }

    public close(): void {
        if (this.closed) {
            return;
        }

        this.closed = true;
        this.idle.length = 0;

        for (const db of this.opened) {
            db.close();
        }

        this.opened.clear();
    }

    private releaseHandle(db: Database.Database): void {
        if (this.closed) {
            return;
        }

        this.idle.push(db);
    }
}
