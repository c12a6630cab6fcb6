import type { JSONRpcResultError } from '../api/json-rpc/types/interfaces/JSONRpcResultError.js';
import { InternalFault } from './InternalFault.js';
import { InternalErrorCode, RpcErrorCodes } from './RpcErrorCodes.js';
import {
    type ApplicationError,
    type InternalError,
    isInternalError,
    type RpcError,
    type RpcErrorKind,
} from './RpcErrorKind.js';

/**
 * The closed set of error kinds one method may return. `create` only accepts declared kinds,
 * every other fault goes through `internal`.
 */
export interface RpcErrorSubset<K extends RpcErrorKind> {
    readonly name: string;
    readonly kinds: readonly K[];

    create(kind: K): ApplicationError<K>;

    internal(cause: unknown, context?: string): InternalError;

    includes(kind: RpcErrorKind): kind is K;

    toRpcError(error: RpcError<K>, exposeInternal: boolean): JSONRpcResultError;
}

export type RpcErrorOf<S> = S extends RpcErrorSubset<infer K> ? RpcError<K> : never;

export function generateRpcErrorSubset<K extends RpcErrorKind>(
    name: string,
    kinds: readonly K[],
): RpcErrorSubset<K> {
    const declared: ReadonlySet<RpcErrorKind> = new Set<RpcErrorKind>(kinds);

    const includes = (kind: RpcErrorKind): kind is K => declared.has(kind);

    return Object.freeze({
        name,
        kinds: Object.freeze([...kinds]),

        create(kind: K): ApplicationError<K> {
            if (!declared.has(kind)) {
                throw new Error(`${name} does not declare ${kind}`);
            }

            return { kind };
        },

        internal(cause: unknown, context?: string): InternalError {
            return InternalFault.toInternalError(cause, context);
        },

        includes,

        toRpcError(error: RpcError<K>, exposeInternal: boolean): JSONRpcResultError {
            if (isInternalError(error)) {
                if (!exposeInternal || error.chain.length === 0) {
                    return { code: InternalErrorCode.code, message: InternalErrorCode.message };
                }

                return {
                    code: InternalErrorCode.code,
                    message: `${InternalErrorCode.message}: ${error.chain.join(': ')}`,
                };
            }

            if (!includes(error.kind)) {
                return {
                    code: InternalErrorCode.code,
                    message: exposeInternal
                        ? `${InternalErrorCode.message}: ${name} does not declare ${error.kind}`
                        : InternalErrorCode.message,
                };
            }

            const entry = RpcErrorCodes[error.kind];
            return { code: entry.code, message: entry.message };
        },
    });
}
