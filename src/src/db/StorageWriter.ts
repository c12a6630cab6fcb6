import type Database from 'better-sqlite3';
import type { BlockNumber } from '../types/BlockNumber.js';
import type { ExecutionStatus } from '../types/ExecutionStatus.js';
import { type Felt, parseFelt } from '../types/Felt.js';
import type { JsonObject } from '../types/JsonValue.js';
import type { IBlockHeader } from './interfaces/IBlockHeader.js';
import { STORAGE_SCHEMA } from './StorageSchema.js';

export interface IBlockTransactionInput {
    readonly hash: Felt;
    readonly body: JsonObject;
    readonly executionStatus: ExecutionStatus;
}

export interface IBlockInput {
    readonly header: IBlockHeader;
    readonly transactions: readonly IBlockTransactionInput[];
}

function canonical(value: Felt, field: string): Felt {
    const felt = parseFelt(value);
    if (felt === undefined) {
        throw new Error(`Invalid felt for ${field}: ${value}`);
    }

    return felt;
}

/**
 * Write side of the block store, used by the sync component. Query handlers never write.
 */
export class StorageWriter {
    constructor(private readonly db: Database.Database) {}

    public createSchema(): void {
        this.db.exec(STORAGE_SCHEMA);
    }

    public insertBlock(block: IBlockInput): void {
        const insertHeader = this.db.prepare(
            `INSERT INTO block_headers
                (number, hash, parent_hash, state_root, timestamp, sequencer_address, gas_price, version)
             VALUES (?, ?, ?, ?, ?, ?, ?, ?)`,
        );

        const insertTransaction = this.db.prepare(
            `INSERT INTO transactions (hash, block_number, idx, body, execution_status)
             VALUES (?, ?, ?, ?, ?)`,
        );

        const write = this.db.transaction((input: IBlockInput) => {
            const header = input.header;

            insertHeader.run(
                header.number,
                canonical(header.hash, 'hash'),
                canonical(header.parentHash, 'parent hash'),
                canonical(header.stateRoot, 'state root'),
                header.timestamp,
                canonical(header.sequencerAddress, 'sequencer address'),
                canonical(header.gasPrice, 'gas price'),
                header.version,
            );

            input.transactions.forEach((transaction, index) => {
                insertTransaction.run(
                    canonical(transaction.hash, 'transaction hash'),
                    header.number,
                    index,
                    JSON.stringify(transaction.body),
                    transaction.executionStatus,
                );
            });
        });

        write(block);
    }

    /** Records the highest block confirmed on L1. `undefined` clears the marker. */
    public setL1AcceptedHeight(blockNumber: BlockNumber | undefined): void {
        this.db
            .prepare(
                `INSERT INTO l1_state (id, block_number) VALUES (1, ?)
                 ON CONFLICT (id) DO UPDATE SET block_number = excluded.block_number`,
            )
            .run(blockNumber ?? null);
    }
}
