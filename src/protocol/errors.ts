/**
 * Protocol Errors — JSON-RPC Error Taxonomy
 *
 * Every error a peer can observe on the wire is a {@link ProtocolError}:
 * the five JSON-RPC 2.0 codes plus the three domain "not found" codes.
 *
 * Handlers may throw a `ProtocolError` deliberately (for example to reject
 * arguments with `invalidParams()`); the dispatcher answers it with its own
 * code. Any other thrown value is an internal error.
 *
 * @module
 */
import { type JsonRpcErrorObject } from './jsonrpc.js';

// ── Codes ────────────────────────────────────────────────

export const ErrorCode = {
    ParseError: -32700,
    InvalidRequest: -32600,
    MethodNotFound: -32601,
    InvalidParams: -32602,
    InternalError: -32603,
    ToolNotFound: -32000,
    ResourceNotFound: -32001,
    PromptNotFound: -32002,
} as const;

export type ErrorCode = typeof ErrorCode[keyof typeof ErrorCode];

// ── Error Class ──────────────────────────────────────────

export class ProtocolError extends Error {
    readonly code: ErrorCode;
    readonly data: unknown;

    constructor(code: ErrorCode, message: string, data?: unknown) {
        super(message);
        this.name = 'ProtocolError';
        this.code = code;
        this.data = data;
    }

    /** Wire shape of this error, `data` omitted when absent. */
    toErrorObject(): JsonRpcErrorObject {
        return this.data === undefined
            ? { code: this.code, message: this.message }
            : { code: this.code, message: this.message, data: this.data };
    }
}

// ── Factories ────────────────────────────────────────────

export function parseError(detail?: string): ProtocolError {
    return new ProtocolError(ErrorCode.ParseError, detail ? `Parse error: ${detail}` : 'Parse error');
}

export function invalidRequest(message: string): ProtocolError {
    return new ProtocolError(ErrorCode.InvalidRequest, message);
}

export function methodNotFound(method: string): ProtocolError {
    return new ProtocolError(ErrorCode.MethodNotFound, `Method not found: ${method}`);
}

export function invalidParams(message: string, data?: unknown): ProtocolError {
    return new ProtocolError(ErrorCode.InvalidParams, message, data);
}

/** Never carries the underlying cause: that goes to the debug observer. */
export function internalError(): ProtocolError {
    return new ProtocolError(ErrorCode.InternalError, 'Internal error');
}

export function toolNotFound(name: string): ProtocolError {
    return new ProtocolError(ErrorCode.ToolNotFound, `Tool not found: ${name}`);
}

export function resourceNotFound(uri: string): ProtocolError {
    return new ProtocolError(ErrorCode.ResourceNotFound, `Resource not found: ${uri}`);
}

export function promptNotFound(name: string): ProtocolError {
    return new ProtocolError(ErrorCode.PromptNotFound, `Prompt not found: ${name}`);
}

/** Best-effort message extraction for diagnostics. */
export function describeError(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
