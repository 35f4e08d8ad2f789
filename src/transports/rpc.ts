/**
 * transports/rpc.ts
 *
 * JSON-RPC 2.0 method table over the engine, shared by the stdio transport
 * and the HTTP `/rpc` endpoint.
 *
 *   initialize      → server info
 *   ping            → liveness
 *   tweaks/list     → TweakStatus[]
 *   tweaks/apply    → ApplyReport     params: { ids: string[] } | { all: true }
 *   tweaks/restore  → RestoreReport
 *   tweaks/plan     → RestorePlan
 *   state/status    → EngineStatus
 *
 * Per-tweak failures are part of a successful result. Only a failure of the
 * whole call (the record became unreadable, say) is a JSON-RPC error.
 */

import { TweakEngine } from '../core/engine';
import { TweakBaseError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/rpc');

export const SERVER_NAME = 'perf-tweaks';
export const SERVER_VERSION = '1.0.0';

export const RPC_PARSE_ERROR = -32700;
export const RPC_INVALID_REQUEST = -32600;
export const RPC_METHOD_NOT_FOUND = -32601;
export const RPC_INVALID_PARAMS = -32602;
export const RPC_INTERNAL_ERROR = -32603;
export const RPC_APPLICATION_ERROR = -32000;

export type RpcId = number | string | null;

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: RpcId;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

interface JsonRpcRequest {
  id?: RpcId;
  method: string;
  params?: unknown;
}

class InvalidParamsError extends Error {}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRpcId(value: unknown): value is RpcId {
  return value === null || typeof value === 'number' || typeof value === 'string';
}

export function rpcError(id: RpcId, code: number, message: string, data?: unknown): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: data === undefined ? { code, message } : { code, message, data } };
}

/** Ids to apply from `{ ids }` or `{ all: true }`. */
function selectionFrom(engine: TweakEngine, params: unknown): string[] {
  if (isRecord(params) && params.all === true) {
    return engine.catalog.list().map(t => t.id);
  }
  if (isRecord(params) && Array.isArray(params.ids)) {
    const ids: unknown[] = params.ids;
    if (ids.length > 0 && ids.every((id): id is string => typeof id === 'string')) {
      return ids;
    }
  }
  throw new InvalidParamsError('tweaks/apply expects { "ids": [non-empty list of strings] } or { "all": true }');
}

export class RpcDispatcher {
  constructor(private readonly engine: TweakEngine) {}

  /**
   * Handle one decoded message. Returns undefined for notifications
   * (requests without an id), which get no response.
   */
  async handle(message: unknown): Promise<JsonRpcResponse | undefined> {
    if (!isRecord(message) || message.jsonrpc !== '2.0' || typeof message.method !== 'string' ||
        ('id' in message && !isRpcId(message.id))) {
      return rpcError(null, RPC_INVALID_REQUEST, 'Invalid JSON-RPC 2.0 request');
    }

    const request: JsonRpcRequest = {
      method: message.method,
      params: message.params,
      ...(isRpcId(message.id) ? { id: message.id } : {})
    };
    const id = request.id ?? null;

    try {
      const result = await this.dispatch(request);
      if (request.id === undefined) return undefined;
      return result === undefined
        ? rpcError(id, RPC_METHOD_NOT_FOUND, `Unknown method: "${request.method}"`)
        : { jsonrpc: '2.0', id, result };
    } catch (e) {
      if (e instanceof InvalidParamsError) {
        return rpcError(id, RPC_INVALID_PARAMS, e.message);
      }
      log.error({ method: request.method, error: errorMessage(e) }, 'RPC handler error');
      if (e instanceof TweakBaseError) {
        return rpcError(id, RPC_APPLICATION_ERROR, e.message, { errorCode: e.code, details: e.details });
      }
      return rpcError(id, RPC_INTERNAL_ERROR, errorMessage(e));
    }
  }

  /** undefined ⇒ unknown method */
  private async dispatch(request: JsonRpcRequest): Promise<unknown> {
    log.debug({ method: request.method, id: request.id }, 'RPC request');

    switch (request.method) {
      case 'initialize':
        return {
          serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
          capabilities: { tweaks: { apply: true, restore: true, plan: true } }
        };

      case 'ping':
        return { pong: true, tweaks: this.engine.catalog.size };

      case 'tweaks/list':
        return { tweaks: this.engine.describe() };

      case 'tweaks/apply':
        return this.engine.apply(selectionFrom(this.engine, request.params));

      case 'tweaks/restore':
        return this.engine.restore();

      case 'tweaks/plan':
        return this.engine.planRestore();

      case 'state/status':
        return this.engine.status();

      default:
        return undefined;
    }
  }
}
