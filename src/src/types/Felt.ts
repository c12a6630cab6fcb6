/**
 * A field element on the wire: `0x` followed by lowercase hex digits without leading zeros.
 */
export type Felt = string;

/** 2^251 + 17 * 2^192 + 1 */
export const FIELD_PRIME: bigint = 2n ** 251n + 17n * 2n ** 192n + 1n;

const FELT_INPUT_PATTERN = /^0x[0-9a-fA-F]{1,64}$/;

export function toFelt(value: bigint): Felt {
    if (value < 0n || value >= FIELD_PRIME) {
        throw new RangeError(`Value ${value} is outside of the field`);
    }

    return `0x${value.toString(16)}`;
}

/**
 * Parses a hex string into its canonical felt form. Returns undefined when the input is not a
 * `0x`-prefixed hex string of at most 64 digits or is not below the field prime.
 */
export function parseFelt(value: unknown): Felt | undefined {
    if (typeof value !== 'string' || !FELT_INPUT_PATTERN.test(value)) {
        return undefined;
    }

    const parsed = BigInt(value);
    if (parsed >= FIELD_PRIME) {
        return undefined;
    }

    return toFelt(parsed);
}
