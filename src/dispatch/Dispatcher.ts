/**
 * Dispatcher — routes one decoded message to its operation
 *
 * ```
 * message ─► lifecycle gate ─► method table ─► decode ─► validate ─► operation
 *               │                 │              │          │           │
 *          invalid-request   not-found     invalid-params     result / error
 * ```
 *
 * Requests always produce exactly one response. Notifications never do:
 * whatever stops one is reported to the debug observer as a `drop`.
 *
 * A `ProtocolError` thrown by an operation or handler is answered with its
 * own code. Anything else is an unexpected defect: it is answered with
 * -32603 and its detail only reaches the observer and the span.
 *
 * @module
 */
import {
    ProtocolError,
    describeError,
    internalError,
    invalidRequest,
    methodNotFound,
} from '../protocol/errors.js';
import {
    errorResponse,
    resultResponse,
    type InboundNotification,
    type InboundRequest,
    type JsonRpcResponse,
} from '../protocol/jsonrpc.js';
import { Method } from '../protocol/methods.js';
import { type LifecycleState } from '../lifecycle/Lifecycle.js';
import { SpanAttribute, SpanStatusCode, type AttributeValue, type ServerSpan } from '../observability/Tracing.js';
import { type ServerContext } from '../server/ServerContext.js';
import { type DispatchSession, type MethodDefinition, type Operation } from './MethodTable.js';
import { buildMethodTable } from './operations.js';

export class Dispatcher {
    private readonly _server: ServerContext;
    private readonly _table: ReadonlyMap<string, MethodDefinition>;

    constructor(server: ServerContext) {
        this._server = server;
        this._table = buildMethodTable(server);
    }

    /** Methods this dispatcher routes. */
    get methods(): string[] {
        return [...this._table.keys()];
    }

    dispatch(message: InboundRequest, session: DispatchSession): Promise<JsonRpcResponse>;
    dispatch(message: InboundNotification, session: DispatchSession): Promise<undefined>;
    dispatch(message: InboundRequest | InboundNotification, session: DispatchSession): Promise<JsonRpcResponse | undefined>;
    async dispatch(
        message: InboundRequest | InboundNotification,
        session: DispatchSession,
    ): Promise<JsonRpcResponse | undefined> {
        this._server.debug?.({
            type: 'route',
            connectionId: session.id,
            method: message.method,
            id: message.kind === 'request' ? message.id : undefined,
            timestamp: Date.now(),
        });

        return message.kind === 'request'
            ? this._request(message, session)
            : this._notification(message, session);
    }

    // ── Requests ─────────────────────────────────────────

    private async _request(message: InboundRequest, session: DispatchSession): Promise<JsonRpcResponse> {
        const started = performance.now();
        const definition = this._table.get(message.method);

        // 1. lifecycle gate; unknown methods need Ready too
        const gate = definition?.gate ?? 'ready';
        if (!session.lifecycle.admits(gate)) {
            return this._finish(message, session, started, errorResponse(
                message.id,
                invalidRequest(notAdmittedMessage(message.method, session.lifecycle.state)),
            ));
        }

        // 2. method table
        if (!definition || definition.kind !== 'request') {
            return this._finish(message, session, started, errorResponse(message.id, methodNotFound(message.method)));
        }

        // 3 + 4. decode and validate
        const prepared = definition.prepare(message.params);
        if (!prepared.ok) {
            return this._finish(message, session, started, errorResponse(message.id, prepared.error));
        }

        // 5. route
        const span = this._startSpan(message, session);
        try {
            const response = await this._run(prepared.value, message, session, span);
            return this._finish(message, session, started, response);
        } finally {
            span?.end();
        }
    }

    private async _run(
        operation: Operation,
        message: InboundRequest,
        session: DispatchSession,
        span: ServerSpan | undefined,
    ): Promise<JsonRpcResponse> {
        try {
            const result = await operation({ server: this._server, session, requestId: message.id, span });
            span?.setStatus({ code: SpanStatusCode.OK });
            return resultResponse(message.id, result ?? {});
        } catch (err) {
            if (err instanceof ProtocolError) {
                span?.setAttribute(SpanAttribute.ErrorCode, err.code);
                return errorResponse(message.id, err);
            }
            const detail = describeError(err);
            span?.recordException(err instanceof Error ? err : detail);
            span?.setStatus({ code: SpanStatusCode.ERROR, message: detail });
            this._server.debug?.({
                type: 'error',
                connectionId: session.id,
                method: message.method,
                step: 'handler',
                error: detail,
                timestamp: Date.now(),
            });
            return errorResponse(message.id, internalError());
        }
    }

    private _finish(
        message: InboundRequest,
        session: DispatchSession,
        started: number,
        response: JsonRpcResponse,
    ): JsonRpcResponse {
        const error = 'error' in response ? response.error : undefined;
        this._server.debug?.({
            type: 'dispatch',
            connectionId: session.id,
            method: message.method,
            outcome: error ? 'error' : 'result',
            errorCode: error?.code,
            durationMs: performance.now() - started,
            timestamp: Date.now(),
        });
        return response;
    }

    private _startSpan(message: InboundRequest, session: DispatchSession): ServerSpan | undefined {
        const tracer = this._server.options.tracing;
        if (!tracer) return undefined;
        const attributes: Record<string, AttributeValue> = {
            [SpanAttribute.Method]: message.method,
            [SpanAttribute.ConnectionId]: session.id,
            [SpanAttribute.Transport]: session.transportKind,
        };
        if (message.id !== null) attributes[SpanAttribute.RequestId] = message.id;
        return tracer.startSpan(`mcp.${message.method}`, { attributes });
    }

    // ── Notifications ────────────────────────────────────

    private async _notification(message: InboundNotification, session: DispatchSession): Promise<undefined> {
        const definition = this._table.get(message.method);

        const gate = definition?.gate ?? 'ready';
        if (!session.lifecycle.admits(gate)) {
            return this._drop(message, session, `not admitted in state ${session.lifecycle.state}`);
        }
        if (!definition || definition.kind !== 'notification') {
            return this._drop(message, session, 'unknown notification');
        }

        const prepared = definition.prepare(message.params);
        if (!prepared.ok) return this._drop(message, session, prepared.error.message);

        try {
            await prepared.value({ server: this._server, session });
        } catch (err) {
            this._server.debug?.({
                type: 'error',
                connectionId: session.id,
                method: message.method,
                step: 'handler',
                error: describeError(err),
                timestamp: Date.now(),
            });
        }
        return undefined;
    }

    private _drop(message: InboundNotification, session: DispatchSession, reason: string): undefined {
        this._server.debug?.({
            type: 'drop',
            connectionId: session.id,
            method: message.method,
            reason,
            timestamp: Date.now(),
        });
        return undefined;
    }
}

function notAdmittedMessage(method: string, state: LifecycleState): string {
    switch (state) {
        case 'uninitialized':
        case 'initializing':
            return `Connection is not initialized: ${method} requires a completed initialize handshake`;
        case 'ready':
            return method === Method.Initialize
                ? 'Connection is already initialized'
                : `${method} is not allowed in state ready`;
        case 'shutting_down':
            return 'Connection is shutting down';
        case 'closed':
            return 'Connection is closed';
    }
}
