import { Logger } from '../../logger/Logger.js';
import { DefinedRoutes } from '../routes/DefinedRoutes.js';
import type { IRpcRoute, JSONRpcRouteResponse } from '../routes/Route.js';
import type { RpcContext } from '../routes/RpcContext.js';
import type { JSONRpcMethods } from './types/enums/JSONRpcMethods.js';
import type { JSONRpcParams } from './types/interfaces/JSONRpcParams.js';

export type RouteTable = { readonly [key in JSONRpcMethods]: IRpcRoute };

export class JSONRpcRouter extends Logger {
    public readonly logColor: string = '#87cefa';

    constructor(
        private readonly context: RpcContext,
        private readonly routes: RouteTable = DefinedRoutes,
    ) {
        super();
    }

    public hasMethod(method: string): method is JSONRpcMethods {
        return Object.prototype.hasOwnProperty.call(this.routes, method);
    }

    public async requestResponse(
        method: JSONRpcMethods,
        params: JSONRpcParams | undefined,
        signal?: AbortSignal,
    ): Promise<JSONRpcRouteResponse> {
        const route = this.routes[method];

        const startTime = Date.now();
        const response = await route.getDataRPC(this.context, params, signal);

        this.debugBright(`Requesting response for method ${method}. Took ${Date.now() - startTime}ms`);

        return response;
    }
}
