import { AsyncLocalStorage } from 'async_hooks';

export interface RequestScopeData {
    readonly requestId: string;
    readonly method?: string;
}

const scopeStorage = new AsyncLocalStorage<RequestScopeData>();

/**
 * Request correlation carried across awaits and, through the storage task message, into workers.
 */
export class RequestScope {
    public static run<T>(scope: RequestScopeData, fn: () => T): T {
        return scopeStorage.run(scope, fn);
    }

    public static current(): RequestScopeData | undefined {
        return scopeStorage.getStore();
    }
}
