/**
 * Tracing — OpenTelemetry-compatible span interfaces
 *
 * `ServerTracer` and `ServerSpan` are structural subsets of OpenTelemetry's
 * `Tracer` and `Span`, so `trace.getTracer('mcp-switchboard')` from
 * `@opentelemetry/api` is accepted as the `tracing` option directly.
 *
 * One span is opened per JSON-RPC request, named `mcp.<method>`.
 *
 * @example
 * ```typescript
 * import { trace } from '@opentelemetry/api';
 *
 * const server = new McpServer({
 *     name: 'files',
 *     version: '1.0.0',
 *     tracing: trace.getTracer('mcp-switchboard'),
 * });
 * ```
 *
 * @module
 */

/**
 * Matches OpenTelemetry's `SpanStatusCode`.
 *
 * - `UNSET`: protocol errors caused by the caller (bad params, unknown tool)
 * - `OK`: answered with a result
 * - `ERROR`: a handler threw (answered with -32603)
 */
export const SpanStatusCode = { UNSET: 0, OK: 1, ERROR: 2 } as const;

/** Matches OpenTelemetry's `AttributeValue` primitives. */
export type AttributeValue =
    | string
    | number
    | boolean
    | Array<null | undefined | string>
    | Array<null | undefined | number>
    | Array<null | undefined | boolean>;

export interface ServerSpan {
    setAttribute(key: string, value: AttributeValue): void;
    setStatus(status: { code: number; message?: string }): void;
    /** Called exactly once, from a `finally` block. */
    end(): void;
    recordException(exception: Error | string): void;
}

export interface ServerTracer {
    startSpan(name: string, options?: {
        attributes?: Record<string, AttributeValue>;
    }): ServerSpan;
}

/** Attribute keys set on every request span. */
export const SpanAttribute = {
    Method: 'mcp.method',
    ConnectionId: 'mcp.connection_id',
    Transport: 'mcp.transport',
    RequestId: 'mcp.request_id',
    ErrorCode: 'mcp.error_code',
    Tool: 'mcp.tool',
} as const;
