import { InvalidParamsError } from '../../../errors/InvalidParamsError.js';
import { type BlockId, BlockIds } from '../../../types/BlockId.js';
import { isBlockNumber } from '../../../types/BlockNumber.js';
import { type Felt, parseFelt } from '../../../types/Felt.js';
import type { JSONRpcParams } from '../types/interfaces/JSONRpcParams.js';

export type NamedParams<N extends string> = { readonly [K in N]?: unknown };

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Strict parameter decoding. Parameters are accepted by position or by name; unknown names
 * and surplus positional entries are rejected.
 */
export class ParamsParser {
    public static named<N extends string>(
        params: JSONRpcParams | undefined,
        names: readonly N[],
    ): NamedParams<N> {
        const values: { [K in N]?: unknown } = {};
        if (params === undefined) {
            return values;
        }

        if (Array.isArray(params)) {
            if (params.length > names.length) {
                throw new InvalidParamsError(
                    `Expected at most ${names.length} parameters, got ${params.length}`,
                );
            }

            names.forEach((name, index) => {
                if (index < params.length) {
                    values[name] = params[index];
                }
            });

            return values;
        }

        const allowed: readonly string[] = names;
        for (const key of Object.keys(params)) {
            if (!allowed.includes(key)) {
                throw new InvalidParamsError(`Unknown field "${key}"`);
            }
        }

        for (const name of names) {
            if (Object.prototype.hasOwnProperty.call(params, name)) {
                values[name] = params[name];
            }
        }

        return values;
    }

    public static required<N extends string>(values: NamedParams<N>, name: N): unknown {
        const value = values[name];
        if (value === undefined || value === null) {
            throw new InvalidParamsError(`Missing field "${name}"`);
        }

        return value;
    }

    /** `"latest"`, `"pending"`, `{ "block_number": n }` or `{ "block_hash": "0x..." }`. */
    public static blockId(value: unknown, field: string = 'block_id'): BlockId {
        if (value === 'latest') {
            return BlockIds.latest();
        }

        if (value === 'pending') {
            return BlockIds.pending();
        }

        if (!isPlainObject(value)) {
            throw new InvalidParamsError(`Invalid ${field}: expected a block tag or an object`);
        }

        const keys = Object.keys(value);
        if (keys.length !== 1) {
            throw new InvalidParamsError(
                `Invalid ${field}: expected exactly one of "block_number" or "block_hash"`,
            );
        }

        if (keys[0] === 'block_number') {
            const blockNumber = value.block_number;
            if (!isBlockNumber(blockNumber)) {
                throw new InvalidParamsError(
                    `Invalid ${field}: block_number must be a non-negative integer`,
                );
            }

            return BlockIds.number(blockNumber);
        }

        if (keys[0] === 'block_hash') {
            return BlockIds.hash(ParamsParser.felt(value.block_hash, `${field}.block_hash`));
        }

        throw new InvalidParamsError(`Invalid ${field}: unknown field "${keys[0]}"`);
    }

    public static felt(value: unknown, field: string): Felt {
        const felt = parseFelt(value);
        if (felt === undefined) {
            throw new InvalidParamsError(`Invalid ${field}: expected a field element`);
        }

        return felt;
    }

    public static index(value: unknown, field: string = 'index'): number {
        if (typeof value !== 'number' || !Number.isSafeInteger(value) || value < 0) {
            throw new InvalidParamsError(`Invalid ${field}: expected a non-negative integer`);
        }

        return value;
    }
}
