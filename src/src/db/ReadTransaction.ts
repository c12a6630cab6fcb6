import type Database from 'better-sqlite3';
import { type BlockLookupKey, BlockLookupType } from '../types/BlockId.js';
import type { BlockNumber } from '../types/BlockNumber.js';
import { type ExecutionStatus, parseExecutionStatus } from '../types/ExecutionStatus.js';
import type { Felt } from '../types/Felt.js';
import type { IBlockHeader } from './interfaces/IBlockHeader.js';
import type { IStoredTransaction } from './interfaces/IStoredTransaction.js';

interface BlockHeaderRow {
    readonly number: number;
    readonly hash: string;
    readonly parent_hash: string;
    readonly state_root: string;
    readonly timestamp: number;
    readonly sequencer_address: string;
    readonly gas_price: string;
    readonly version: string;
}

interface TransactionRow {
    readonly hash: string;
    readonly block_number: number;
    readonly idx: number;
    readonly body: string;
    readonly execution_status: string;
}

const HEADER_COLUMNS =
    'number, hash, parent_hash, state_root, timestamp, sequencer_address, gas_price, version';

const TRANSACTION_COLUMNS = 'hash, block_number, idx, body, execution_status';

/**
 * Reads issued inside one SQLite transaction. Only valid for the duration of
 * `StorageConnection.read`.
 */
export class ReadTransaction {
    constructor(private readonly db: Database.Database) {}

    public blockHeader(key: BlockLookupKey): IBlockHeader | undefined {
        let row: BlockHeaderRow | undefined;

        switch (key.by) {
            case BlockLookupType.LATEST:
                row = this.db
                    .prepare<[], BlockHeaderRow>(
                        `SELECT ${HEADER_COLUMNS} FROM block_headers ORDER BY number DESC LIMIT 1`,
                    )
                    .get();
                break;
            case BlockLookupType.NUMBER:
                row = this.db
                    .prepare<[number], BlockHeaderRow>(
                        `SELECT ${HEADER_COLUMNS} FROM block_headers WHERE number = ?`,
                    )
                    .get(key.number);
                break;
            case BlockLookupType.HASH:
                row = this.db
                    .prepare<[string], BlockHeaderRow>(
                        `SELECT ${HEADER_COLUMNS} FROM block_headers WHERE hash = ?`,
                    )
                    .get(key.hash);
                break;
        }

        return row ? this.toBlockHeader(row) : undefined;
    }

    /** Highest block whose state has been confirmed on L1, if any. */
    public highestL1AcceptedHeight(): BlockNumber | undefined {
        const row = this.db
            .prepare<[], { block_number: number | null }>(
                'SELECT block_number FROM l1_state WHERE id = 1',
            )
            .get();

        if (!row || row.block_number === null) {
            return undefined;
        }

        return row.block_number;
    }

    public blockIsL1Accepted(blockNumber: BlockNumber): boolean {
        const highest = this.highestL1AcceptedHeight();

        return highest !== undefined && blockNumber <= highest;
    }

    /** Ordered hashes, or undefined when the block itself does not exist. */
    public transactionHashesForBlock(blockNumber: BlockNumber): Felt[] | undefined {
        if (!this.blockExists(blockNumber)) {
            return undefined;
        }

        return this.db
            .prepare<[number], { hash: string }>(
                'SELECT hash FROM transactions WHERE block_number = ? ORDER BY idx ASC',
            )
            .all(blockNumber)
            .map((row) => row.hash);
    }

    public transactionsForBlock(blockNumber: BlockNumber): IStoredTransaction[] | undefined {
        if (!this.blockExists(blockNumber)) {
            return undefined;
        }

        return this.db
            .prepare<[number], TransactionRow>(
                `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE block_number = ? ORDER BY idx ASC`,
            )
            .all(blockNumber)
            .map((row) => this.toStoredTransaction(row));
    }

    public transactionCountForBlock(blockNumber: BlockNumber): number | undefined {
        if (!this.blockExists(blockNumber)) {
            return undefined;
        }

        const row = this.db
            .prepare<[number], { count: number }>(
                'SELECT COUNT(*) AS count FROM transactions WHERE block_number = ?',
            )
            .get(blockNumber);

        return row ? row.count : 0;
    }

    public transactionAtIndex(blockNumber: BlockNumber, index: number): IStoredTransaction | undefined {
        const row = this.db
            .prepare<[number, number], TransactionRow>(
                `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE block_number = ? AND idx = ?`,
            )
            .get(blockNumber, index);

        return row ? this.toStoredTransaction(row) : undefined;
    }

    public transactionByHash(hash: Felt): IStoredTransaction | undefined {
        const row = this.db
            .prepare<[string], TransactionRow>(
                `SELECT ${TRANSACTION_COLUMNS} FROM transactions WHERE hash = ?`,
            )
            .get(hash);

        return row ? this.toStoredTransaction(row) : undefined;
    }

    private blockExists(blockNumber: BlockNumber): boolean {
        const row = this.db
            .prepare<[number], { found: number }>(
                'SELECT 1 AS found FROM block_headers WHERE number = ?',
            )
            .get(blockNumber);

        return row !== undefined;
    }

    private toBlockHeader(row: BlockHeaderRow): IBlockHeader {
        return {
            number: row.number,
            hash: row.hash,
            parentHash: row.parent_hash,
            stateRoot: row.state_root,
            timestamp: row.timestamp,
            sequencerAddress: row.sequencer_address,
            gasPrice: row.gas_price,
            version: row.version,
        };
    }

    private toStoredTransaction(row: TransactionRow): IStoredTransaction {
        return {
            hash: row.hash,
            blockNumber: row.block_number,
            index: row.idx,
            body: row.body,
            executionStatus: this.toExecutionStatus(row),
        };
    }

    private toExecutionStatus(row: TransactionRow): ExecutionStatus {
        const status = parseExecutionStatus(row.execution_status);
        if (status === undefined) {
            throw new Error(
                `Unknown execution status "${row.execution_status}" for transaction ${row.hash}`,
            );
        }

        return status;
    }
}
