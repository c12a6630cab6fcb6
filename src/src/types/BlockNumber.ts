export type BlockNumber = number;

/**
 * Highest height a request may name. 2^63 - 1 rounds up to 2^63 once parsed as a double, so the
 * bound is inclusive of that value. Heights past the safe integer range are well formed but
 * never stored.
 */
export const MAX_BLOCK_NUMBER: number = 2 ** 63;

export function isBlockNumber(value: unknown): value is BlockNumber {
    return (
        typeof value === 'number' &&
        Number.isInteger(value) &&
        value >= 0 &&
        value <= MAX_BLOCK_NUMBER
    );
}
