/**
 * Global error vocabulary shared by every query method. Append only: a kind, once published,
 * keeps its code forever.
 */
export enum RpcErrorKind {
    BlockNotFound = 'BlockNotFound',
    TxnHashNotFound = 'TxnHashNotFound',
    InvalidTxnIndex = 'InvalidTxnIndex',
    NoBlocks = 'NoBlocks',
    PendingNotSupported = 'PendingNotSupported',
}

export interface ApplicationError<K extends RpcErrorKind = RpcErrorKind> {
    readonly kind: K;
}

/** Catch-all for faults the client cannot act on. `chain` runs from outermost context to root cause. */
export interface InternalError {
    readonly kind: 'Internal';
    readonly chain: readonly string[];
}

export type RpcError<K extends RpcErrorKind = RpcErrorKind> = ApplicationError<K> | InternalError;

export function isInternalError(error: RpcError): error is InternalError {
    return error.kind === 'Internal';
}
