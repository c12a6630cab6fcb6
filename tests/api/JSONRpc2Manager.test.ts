import { describe, expect, it } from 'vitest';
import { JSONRpc2Manager } from '../../src/src/api/json-rpc/JSONRpc2Manager.js';
import { JSONRpcRouter } from '../../src/src/api/json-rpc/JSONRpcRouter.js';
import type { APIConfig } from '../../src/src/config/interfaces/IRpcNodeConfig.js';
import { createContext, createFixtureStorage } from '../mocks/fixtures.js';

const API_CONFIG: APIConfig = {
    MAXIMUM_PENDING_REQUESTS: 100,
    MAXIMUM_REQUESTS_PER_BATCH: 3,
    BATCH_PROCESSING_SIZE: 2,
    EXPOSE_INTERNAL_ERRORS: false,
};

function createManager(config: Partial<APIConfig> = {}): JSONRpc2Manager {
    const router = new JSONRpcRouter(createContext(createFixtureStorage()));

    return new JSONRpc2Manager(router, { ...API_CONFIG, ...config });
}

function call(id: number | string, method: string, params?: unknown): Record<string, unknown> {
    return params === undefined
        ? { jsonrpc: '2.0', id, method }
        : { jsonrpc: '2.0', id, method, params };
}

describe('JSONRpc2Manager', () => {
    it('should answer a single request', async () => {
        const manager = createManager();

        await expect(
            manager.onRequest(JSON.stringify(call(1, 'starknet_blockNumber'))),
        ).resolves.toEqual({ jsonrpc: '2.0', id: 1, result: 1 });
    });

    it('should keep the id of an application error', async () => {
        const manager = createManager();

        await expect(
            manager.onRequest(
                JSON.stringify(
                    call('q-7', 'starknet_getBlockWithTxHashes', [{ block_hash: '0xdead' }]),
                ),
            ),
        ).resolves.toEqual({
            jsonrpc: '2.0',
            id: 'q-7',
            error: { code: 24, message: 'Block not found' },
        });
    });

    it('should answer unparsable bodies with a parse error', async () => {
        const manager = createManager();

        await expect(manager.onRequest('{"jsonrpc": "2.0",')).resolves.toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32700, message: 'Parse error' },
        });
    });

    it('should reject malformed envelopes', async () => {
        const manager = createManager();

        await expect(
            manager.onPayload({ id: 4, method: 'starknet_blockNumber' }),
        ).resolves.toEqual({
            jsonrpc: '2.0',
            id: 4,
            error: { code: -32600, message: 'Invalid Request' },
        });

        await expect(
            manager.onPayload({ jsonrpc: '2.0', id: 5, method: 'starknet_blockNumber', params: 'x' }),
        ).resolves.toEqual({
            jsonrpc: '2.0',
            id: 5,
            error: { code: -32600, message: 'Invalid Request' },
        });

        await expect(manager.onPayload(42)).resolves.toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32600, message: 'Invalid Request' },
        });
    });

    it('should answer unknown methods with method not found', async () => {
        const manager = createManager();

        await expect(manager.onPayload(call('abc', 'starknet_call', []))).resolves.toEqual({
            jsonrpc: '2.0',
            id: 'abc',
            error: { code: -32601, message: 'Method not found' },
        });
    });

    it('should reply with a null id when the request has none', async () => {
        const manager = createManager();

        await expect(
            manager.onPayload({ jsonrpc: '2.0', method: 'starknet_specVersion' }),
        ).resolves.toEqual({ jsonrpc: '2.0', id: null, result: '0.5.1' });
    });

    it('should answer a batch in request order across processing chunks', async () => {
        const manager = createManager();

        await expect(
            manager.onPayload([
                call(1, 'starknet_blockHashAndNumber'),
                call(2, 'starknet_getTransactionStatus', ['0x99']),
                call(3, 'starknet_getBlockTransactionCount', ['latest']),
            ]),
        ).resolves.toEqual([
            { jsonrpc: '2.0', id: 1, result: { block_hash: '0xb1', block_number: 1 } },
            {
                jsonrpc: '2.0',
                id: 2,
                error: { code: 29, message: 'Transaction hash not found' },
            },
            { jsonrpc: '2.0', id: 3, result: 2 },
        ]);
    });

    it('should reject empty and oversized batches', async () => {
        const manager = createManager();

        await expect(manager.onPayload([])).resolves.toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32600, message: 'Invalid Request' },
        });

        const calls = [1, 2, 3, 4].map((id) => call(id, 'starknet_blockNumber'));
        await expect(manager.onPayload(calls)).resolves.toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32600, message: 'Too many requests in batch.' },
        });
    });

    it('should shed load beyond the pending request limit', async () => {
        const manager = createManager({ MAXIMUM_PENDING_REQUESTS: 1 });

        const first = manager.onPayload(call(1, 'starknet_blockNumber'));
        expect(manager.pending).toBe(1);

        await expect(manager.onPayload(call(2, 'starknet_blockNumber'))).resolves.toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32000, message: 'Too many pending requests' },
        });

        await expect(first).resolves.toEqual({ jsonrpc: '2.0', id: 1, result: 1 });
        expect(manager.pending).toBe(0);
    });
});
