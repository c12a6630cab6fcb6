import type { IBlockHeader } from '../../db/interfaces/IBlockHeader.js';
import type { IPendingBlock, IPendingTransaction } from '../../pending/interfaces/IPendingBlock.js';
import type { BlockNumber } from '../../types/BlockNumber.js';
import { BlockStatus } from '../../types/BlockStatus.js';
import type { Felt } from '../../types/Felt.js';
import type { BlockResult } from '../json-rpc/types/interfaces/results/blocks/BlockResult.js';

/** Source-independent intermediate form. Both sources are mapped here before serialization. */
interface BlockParts<T> {
    readonly hash?: Felt;
    readonly number?: BlockNumber;
    readonly stateRoot?: Felt;
    readonly parentHash: Felt;
    readonly timestamp: number;
    readonly sequencerAddress: Felt;
    readonly gasPrice: Felt;
    readonly version: string;
    readonly status: BlockStatus;
    readonly transactions: readonly T[];
}

export class BlockReplyAssembler {
    /**
     * A block is final on L1 once the highest L1-accepted height reaches it. The boundary is
     * inclusive.
     */
    public static statusFor(
        blockNumber: BlockNumber,
        highestL1AcceptedHeight: BlockNumber | undefined,
    ): BlockStatus {
        if (highestL1AcceptedHeight !== undefined && blockNumber <= highestL1AcceptedHeight) {
            return BlockStatus.ACCEPTED_ON_L1;
        }

        return BlockStatus.ACCEPTED_ON_L2;
    }

    public static assemble<T>(
        header: IBlockHeader,
        status: BlockStatus,
        transactions: readonly T[],
    ): BlockResult<T> {
        return BlockReplyAssembler.toResult({
            hash: header.hash,
            number: header.number,
            stateRoot: header.stateRoot,
            parentHash: header.parentHash,
            timestamp: header.timestamp,
            sequencerAddress: header.sequencerAddress,
            gasPrice: header.gasPrice,
            version: header.version,
            status,
            transactions,
        });
    }

    public static assembleFromPending<T>(
        block: IPendingBlock,
        select: (transaction: IPendingTransaction) => T,
    ): BlockResult<T> {
        return BlockReplyAssembler.toResult({
            parentHash: block.parentHash,
            timestamp: block.timestamp,
            sequencerAddress: block.sequencerAddress,
            gasPrice: block.gasPrice,
            version: block.version,
            status: BlockStatus.PENDING,
            transactions: block.transactions.map(select),
        });
    }

    private static toResult<T>(parts: BlockParts<T>): BlockResult<T> {
        return {
            ...(parts.hash !== undefined ? { block_hash: parts.hash } : {}),
            parent_hash: parts.parentHash,
            ...(parts.number !== undefined ? { block_number: parts.number } : {}),
            ...(parts.stateRoot !== undefined ? { new_root: parts.stateRoot } : {}),
            timestamp: parts.timestamp,
            sequencer_address: parts.sequencerAddress,
            l1_gas_price: { price_in_wei: parts.gasPrice },
            starknet_version: parts.version,
            status: parts.status,
            transactions: [...parts.transactions],
        };
    }
}
