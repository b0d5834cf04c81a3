/**
 * JSON-RPC 2.0 Framing
 *
 * Decodes one raw frame into an {@link InboundMessage} and builds the
 * outbound response and notification envelopes. Transports call
 * {@link decodeFrame} once per line, HTTP body or socket message.
 *
 * @module
 */
import { describeError, invalidRequest, parseError, type ProtocolError } from './errors.js';

export const JSONRPC_VERSION = '2.0';

// ── Wire Types ───────────────────────────────────────────

/** `null` is legal on the wire and echoed back unchanged. */
export type RequestId = string | number | null;

export interface JsonRpcErrorObject {
    readonly code: number;
    readonly message: string;
    readonly data?: unknown;
}

export interface JsonRpcSuccessResponse {
    readonly jsonrpc: typeof JSONRPC_VERSION;
    readonly id: RequestId;
    readonly result: unknown;
}

export interface JsonRpcErrorResponse {
    readonly jsonrpc: typeof JSONRPC_VERSION;
    readonly id: RequestId;
    readonly error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccessResponse | JsonRpcErrorResponse;

export interface JsonRpcNotification {
    readonly jsonrpc: typeof JSONRPC_VERSION;
    readonly method: string;
    readonly params?: Record<string, unknown>;
}

// ── Decoded Messages ─────────────────────────────────────

export interface InboundRequest {
    readonly kind: 'request';
    readonly id: RequestId;
    readonly method: string;
    readonly params: unknown;
}

export interface InboundNotification {
    readonly kind: 'notification';
    readonly method: string;
    readonly params: unknown;
}

/** A response sent by the peer. The server issues no requests, so these are ignored. */
export interface InboundResponse {
    readonly kind: 'response';
    readonly id: RequestId;
}

export type InboundMessage = InboundRequest | InboundNotification | InboundResponse;

export type DecodedFrame =
    | { readonly ok: true; readonly message: InboundMessage }
    | { readonly ok: false; readonly error: ProtocolError; readonly id: RequestId };

// ── Decoding ─────────────────────────────────────────────

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isRequestId(value: unknown): value is RequestId {
    return value === null || typeof value === 'string' || typeof value === 'number';
}

/** Parse a raw text frame. JSON syntax errors map to -32700. */
export function decodeFrame(text: string): DecodedFrame {
    let raw: unknown;
    try {
        raw = JSON.parse(text);
    } catch (err) {
        return { ok: false, error: parseError(describeError(err)), id: null };
    }
    return decodeMessage(raw);
}

/** Classify an already-parsed JSON value. Shape errors map to -32600. */
export function decodeMessage(raw: unknown): DecodedFrame {
    if (Array.isArray(raw)) {
        return { ok: false, error: invalidRequest('Batch requests are not supported'), id: null };
    }
    if (!isRecord(raw)) {
        return { ok: false, error: invalidRequest('Message must be a JSON object'), id: null };
    }

    const hasId = 'id' in raw;
    const rawId = raw['id'];
    if (hasId && !isRequestId(rawId)) {
        return { ok: false, error: invalidRequest('id must be a string, a number or null'), id: null };
    }
    const id: RequestId = isRequestId(rawId) ? rawId : null;

    if (raw['jsonrpc'] !== JSONRPC_VERSION) {
        return { ok: false, error: invalidRequest('jsonrpc must be exactly "2.0"'), id };
    }

    const method = raw['method'];
    if (typeof method !== 'string' || method.length === 0) {
        if (hasId && ('result' in raw || 'error' in raw)) {
            return { ok: true, message: { kind: 'response', id } };
        }
        return { ok: false, error: invalidRequest('method must be a non-empty string'), id };
    }
    if (method.startsWith('rpc.')) {
        return { ok: false, error: invalidRequest(`Method names starting with "rpc." are reserved: ${method}`), id };
    }

    const params = raw['params'];
    return hasId
        ? { ok: true, message: { kind: 'request', id, method, params } }
        : { ok: true, message: { kind: 'notification', method, params } };
}

// ── Envelopes ────────────────────────────────────────────

export function resultResponse(id: RequestId, result: unknown): JsonRpcSuccessResponse {
    return { jsonrpc: JSONRPC_VERSION, id, result };
}

export function errorResponse(id: RequestId, error: ProtocolError): JsonRpcErrorResponse {
    return { jsonrpc: JSONRPC_VERSION, id, error: error.toErrorObject() };
}

export function notification(method: string, params?: Record<string, unknown>): JsonRpcNotification {
    return params === undefined
        ? { jsonrpc: JSONRPC_VERSION, method }
        : { jsonrpc: JSONRPC_VERSION, method, params };
}
