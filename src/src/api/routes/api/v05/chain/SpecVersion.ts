import { generateRpcErrorSubset, type RpcErrorOf } from '../../../../../errors/RpcErrorSubset.js';
import { ok, type RpcResult } from '../../../../../errors/RpcResult.js';
import { JSONRpcMethods } from '../../../../json-rpc/types/enums/JSONRpcMethods.js';
import type { SpecVersionResult } from '../../../../json-rpc/types/interfaces/results/chain/SpecVersionResult.js';
import { ChainRoute } from './ChainRoute.js';

export const API_SPEC_VERSION: SpecVersionResult = '0.5.1';

export const SpecVersionErrors = generateRpcErrorSubset<never>('SpecVersionError', []);

export type SpecVersionError = RpcErrorOf<typeof SpecVersionErrors>;

export class SpecVersion extends ChainRoute<JSONRpcMethods.SPEC_VERSION, never> {
    public readonly logColor: string = '#ba68c8';

    constructor() {
        super(JSONRpcMethods.SPEC_VERSION, SpecVersionErrors);
    }

    public getData(): Promise<RpcResult<SpecVersionResult, SpecVersionError>> {
        return Promise.resolve(ok(API_SPEC_VERSION));
    }
}
