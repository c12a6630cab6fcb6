import type { APIConfig } from '../../config/interfaces/IRpcNodeConfig.js';
import { Logger } from '../../logger/Logger.js';
import { RequestScope } from '../../logger/RequestScope.js';
import { generateRequestId } from '../../threading/storage/StorageWorkerMessages.js';
import type { JSONRpcRouter } from './JSONRpcRouter.js';
import { JSONRPCErrorCode } from './types/enums/JSONRPCErrorCode.js';
import type { JSONRpc2Request, JSONRpcId } from './types/interfaces/JSONRpc2Request.js';
import type {
    JSONRpc2Response,
    JSONRpc2ResponseError,
    JSONRpc2Result,
} from './types/interfaces/JSONRpc2Result.js';

function isPlainObject(value: unknown): value is { [key: string]: unknown } {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRequestId(value: unknown): value is JSONRpcId {
    return value === null || typeof value === 'number' || typeof value === 'string';
}

/**
 * JSON-RPC 2.0 envelope handling: parsing, batching, request validation and back-pressure.
 * Transport-agnostic; the caller hands over the raw body and serializes whatever comes back.
 */
export class JSONRpc2Manager extends Logger {
    public static readonly RPC_VERSION: '2.0' = '2.0';

    public readonly logColor: string = '#afeeee';

    private pendingRequests: number = 0;

    public constructor(
        private readonly router: JSONRpcRouter,
        private readonly config: Readonly<APIConfig>,
    ) {
        super();
    }

    public get pending(): number {
        return this.pendingRequests;
    }

    public async onRequest(body: string, signal?: AbortSignal): Promise<JSONRpc2Response> {
        let requestData: unknown;
        try {
            requestData = JSON.parse(body);
        } catch (e: unknown) {
            this.debug(`Unparsable request: ${e instanceof Error ? e.message : String(e)}`);

            return this.buildError(null, JSONRPCErrorCode.PARSE_ERROR, 'Parse error');
        }

        return await this.onPayload(requestData, signal);
    }

    /** Same as `onRequest` for a body that was already decoded by the transport. */
    public async onPayload(requestData: unknown, signal?: AbortSignal): Promise<JSONRpc2Response> {
        // Batch request
        if (Array.isArray(requestData)) {
            const length = requestData.length;
            if (length === 0) {
                return this.buildError(null, JSONRPCErrorCode.INVALID_REQUEST, 'Invalid Request');
            }

            if (length > this.config.MAXIMUM_REQUESTS_PER_BATCH) {
                return this.buildError(
                    null,
                    JSONRPCErrorCode.INVALID_REQUEST,
                    'Too many requests in batch.',
                );
            }

            return await this.withPendingSlots(length, () =>
                this.requestInBatchOf(requestData, this.config.BATCH_PROCESSING_SIZE, signal),
            );
        }

        return await this.withPendingSlots(1, () => this.processSingleRequest(requestData, signal));
    }

    private async withPendingSlots(
        requestSize: number,
        process: () => Promise<JSONRpc2Response>,
    ): Promise<JSONRpc2Response> {
        if (this.pendingRequests + requestSize > this.config.MAXIMUM_PENDING_REQUESTS) {
            this.warn(`Rejecting ${requestSize} request(s), ${this.pendingRequests} already pending`);

            return this.buildError(null, JSONRPCErrorCode.SERVER_ERROR, 'Too many pending requests');
        }

        this.pendingRequests += requestSize;
        try {
            return await process();
        } finally {
            this.pendingRequests -= requestSize;
        }
    }

    private async requestInBatchOf(
        requests: readonly unknown[],
        batchSize: number,
        signal?: AbortSignal,
    ): Promise<JSONRpc2Result[]> {
        const responses: JSONRpc2Result[] = [];

        for (let i = 0; i < requests.length; i += batchSize) {
            const batch = requests.slice(i, i + batchSize);
            const settled = await Promise.allSettled(
                batch.map((request) => this.processSingleRequest(request, signal)),
            );

            for (const outcome of settled) {
                if (outcome.status === 'fulfilled') {
                    responses.push(outcome.value);
                    continue;
                }

                this.error(`Batch entry failed: ${String(outcome.reason)}`);
                responses.push(
                    this.buildError(null, JSONRPCErrorCode.INTERNAL_ERROR, 'Internal error'),
                );
            }
        }

        return responses;
    }

    private async processSingleRequest(
        requestData: unknown,
        signal?: AbortSignal,
    ): Promise<JSONRpc2Result> {
        if (!this.verifyRequest(requestData)) {
            const id =
                isPlainObject(requestData) && isRequestId(requestData.id) ? requestData.id : null;

            return this.buildError(id, JSONRPCErrorCode.INVALID_REQUEST, 'Invalid Request');
        }

        const id = requestData.id ?? null;
        const method = requestData.method;
        if (!this.router.hasMethod(method)) {
            this.debug(`Unknown method requested: ${method}`);

            return this.buildError(id, JSONRPCErrorCode.METHOD_NOT_FOUND, 'Method not found');
        }

        const params = requestData.params;
        return await RequestScope.run(
            { requestId: generateRequestId(), method },
            async (): Promise<JSONRpc2Result> => {
                const response = await this.router.requestResponse(method, params, signal);
                if ('error' in response) {
                    return { jsonrpc: JSONRpc2Manager.RPC_VERSION, id, error: response.error };
                }

                return { jsonrpc: JSONRpc2Manager.RPC_VERSION, id, result: response.result };
            },
        );
    }

    private verifyRequest(requestData: unknown): requestData is JSONRpc2Request {
        if (!isPlainObject(requestData)) {
            return false;
        }

        if (requestData.jsonrpc !== JSONRpc2Manager.RPC_VERSION) {
            return false;
        }

        if (requestData.id !== undefined && !isRequestId(requestData.id)) {
            return false;
        }

        if (typeof requestData.method !== 'string' || !requestData.method) {
            return false;
        }

        const params = requestData.params;
        return params === undefined || Array.isArray(params) || isPlainObject(params);
    }

    private buildError(id: JSONRpcId, code: JSONRPCErrorCode, message: string): JSONRpc2ResponseError {
        return {
            jsonrpc: JSONRpc2Manager.RPC_VERSION,
            id,
            error: { code, message },
        };
    }
}
