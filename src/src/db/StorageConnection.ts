import type Database from 'better-sqlite3';
import { ReadTransaction } from './ReadTransaction.js';
import { StorageWriter } from './StorageWriter.js';

/** A pooled database handle. Must be released exactly once. */
export class StorageConnection {
    private released: boolean = false;

    constructor(
        private readonly db: Database.Database,
        private readonly onRelease: (db: Database.Database) => void,
    ) {}

    /**
     * Runs `fn` inside a single read transaction. Every read `fn` issues observes the same
     * snapshot of the store; the transaction is rolled back if `fn` throws.
     */
    public read<T>(fn: (transaction: ReadTransaction) => T): T {
        if (this.released) {
            throw new Error('Connection was already released');
        }

        const transaction = this.db.transaction(() => fn(new ReadTransaction(this.db)));

        return transaction.deferred();
    }

    /** Write access for the sync side and for schema setup. */
    public writer(): StorageWriter {
        if (this.released) {
            throw new Error('Connection was already released');
        }

        return new StorageWriter(this.db);
    }

    public release(): void {
        if (this.released) {
            return;
        }

        this.released = true;
        this.onRelease(this.db);
    }
}
