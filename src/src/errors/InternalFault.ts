import type { InternalError } from './RpcErrorKind.js';

/**
 * Marks the step that failed. The underlying failure is kept as `cause` so the whole chain
 * can be reported.
 */
export class InternalFault extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);

        this.name = 'InternalFault';
    }

    /** Runs `fn`, attaching `label` to anything it throws. */
    public static context<T>(label: string, fn: () => T): T {
        try {
            return fn();
        } catch (e: unknown) {
            throw new InternalFault(label, { cause: e });
        }
    }

    public static chainOf(error: unknown): string[] {
        const chain: string[] = [];
        const seen = new Set<unknown>();

        let current: unknown = error;
        while (current !== undefined && !seen.has(current)) {
            seen.add(current);

            if (current instanceof Error) {
                chain.push(current.message);
                current = current.cause;
            } else {
                chain.push(String(current));
                current = undefined;
            }
        }

        return chain;
    }

    public static toInternalError(error: unknown, context?: string): InternalError {
        const chain = InternalFault.chainOf(error);

        return {
            kind: 'Internal',
            chain: context === undefined ? chain : [context, ...chain],
        };
    }

    public static internal(...chain: string[]): InternalError {
        return { kind: 'Internal', chain };
    }
}
