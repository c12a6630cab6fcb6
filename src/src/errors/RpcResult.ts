export interface RpcOk<T> {
    readonly ok: true;
    readonly value: T;
}

export interface RpcErr<E> {
    readonly ok: false;
    readonly error: E;
}

export type RpcResult<T, E> = RpcOk<T> | RpcErr<E>;

export function ok<T>(value: T): RpcOk<T> {
    return { ok: true, value };
}

export function err<E>(error: E): RpcErr<E> {
    return { ok: false, error };
}
