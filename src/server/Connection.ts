/**
 * Connection — one client, one receive loop
 *
 * Drives a {@link Transport}: every decoded frame becomes its own unit of
 * work, so a slow handler never holds up the frames behind it. Output goes
 * back through the transport's single serialized writer.
 *
 * The connection is the subscription endpoint of its client; shutdown
 * prunes every subscription it holds before the transport is released.
 *
 * @module
 */
import { describeError, internalError, invalidRequest } from '../protocol/errors.js';
import {
    errorResponse,
    type InboundNotification,
    type InboundRequest,
    type JsonRpcNotification,
    type JsonRpcResponse,
    type RequestId,
} from '../protocol/jsonrpc.js';
import { type LoggingLevel } from '../protocol/schemas.js';
import { Lifecycle, type LifecycleState } from '../lifecycle/Lifecycle.js';
import { type Dispatcher } from '../dispatch/Dispatcher.js';
import { type DispatchSession, type Handshake } from '../dispatch/MethodTable.js';
import { type PushEndpoint } from '../subscriptions/SubscriptionManager.js';
import { type Transport, type TransportKind } from '../transport/Transport.js';
import { type ServerContext } from './ServerContext.js';

export const DEFAULT_LOG_LEVEL: LoggingLevel = 'info';

function correlationKey(id: RequestId): string {
    return `${typeof id}:${String(id)}`;
}

export class Connection implements DispatchSession, PushEndpoint {
    readonly id: string;
    readonly transportKind: TransportKind;
    readonly lifecycle: Lifecycle;

    private readonly _transport: Transport;
    private readonly _dispatcher: Dispatcher;
    private readonly _server: ServerContext;
    private readonly _inFlight = new Set<Promise<void>>();
    /** Correlation entries: ids of requests not yet answered. */
    private readonly _pending = new Set<string>();
    private _logLevel: LoggingLevel = DEFAULT_LOG_LEVEL;
    private _handshake?: Handshake;
    private _closing?: Promise<void>;

    constructor(transport: Transport, dispatcher: Dispatcher, server: ServerContext) {
        this.id = transport.id;
        this.transportKind = transport.kind;
        this._transport = transport;
        this._dispatcher = dispatcher;
        this._server = server;
        this.lifecycle = new Lifecycle((from, to) => this._onTransition(from, to));
        server.subscriptions.attach(this);
    }

    // ── Session State ────────────────────────────────────

    get logLevel(): LoggingLevel {
        return this._logLevel;
    }

    get handshake(): Handshake | undefined {
        return this._handshake;
    }

    /** Calls currently executing on this connection. */
    get inFlight(): number {
        return this._inFlight.size;
    }

    setLogLevel(level: LoggingLevel): void {
        this._logLevel = level;
    }

    completeHandshake(handshake: Handshake): void {
        this._handshake = handshake;
    }

    isReady(): boolean {
        return this.lifecycle.isReady();
    }

    push(message: JsonRpcNotification): boolean {
        return this._transport.push(message);
    }

    // ── Receive Loop ─────────────────────────────────────

    /** Consume the transport until it ends, then shut down. */
    async run(): Promise<void> {
        this._server.debug?.({
            type: 'connection',
            connectionId: this.id,
            transport: this.transportKind,
            phase: 'open',
            timestamp: Date.now(),
        });

        try {
            for await (const frame of this._transport.receive()) {
                if (this.lifecycle.isClosed()) break;

                if (frame.kind === 'malformed') {
                    this._transport.send(errorResponse(frame.id, frame.error));
                    if (frame.fatal) {
                        this._reportError('decode', frame.error.message);
                        break;
                    }
                } else if (frame.kind === 'response') {
                    this._server.debug?.({
                        type: 'drop',
                        connectionId: this.id,
                        reason: 'unexpected response from peer',
                        timestamp: Date.now(),
                    });
                } else {
                    this._spawn(frame);
                }
            }
        } catch (err) {
            this._reportError('transport', describeError(err));
        }

        await this.shutdown();
    }

    private _spawn(message: InboundRequest | InboundNotification): void {
        let key: string | undefined;
        if (message.kind === 'request') {
            key = correlationKey(message.id);
            if (this._pending.has(key)) {
                this._transport.send(errorResponse(
                    message.id,
                    invalidRequest(`Duplicate request id: ${String(message.id)}`),
                ));
                return;
            }
            this._pending.add(key);
        }

        const task: Promise<void> = this._handle(message).finally(() => {
            this._inFlight.delete(task);
            if (key !== undefined) this._pending.delete(key);
        });
        this._inFlight.add(task);
    }

    private async _handle(message: InboundRequest | InboundNotification): Promise<void> {
        try {
            const response = await this._dispatcher.dispatch(message, this);
            if (response && !this._reply(response, message.method)) {
                this._server.debug?.({
                    type: 'drop',
                    connectionId: this.id,
                    method: message.method,
                    reason: 'response undeliverable: transport closed',
                    timestamp: Date.now(),
                });
            }
        } catch (err) {
            this._reportError('handler', describeError(err), message.method);
        }
    }

    /** A result the transport cannot serialize is answered with -32603 instead. */
    private _reply(response: JsonRpcResponse, method: string): boolean {
        try {
            return this._transport.send(response);
        } catch (err) {
            this._reportError('handler', `unserializable response: ${describeError(err)}`, method);
            return this._transport.send(errorResponse(response.id, internalError()));
        }
    }

    // ── Shutdown ─────────────────────────────────────────

    /**
     * Stop admitting work, wait up to `graceMs` for in-flight calls, purge
     * subscriptions and release the transport. Idempotent.
     */
    shutdown(graceMs: number = this._server.options.shutdownGraceMs): Promise<void> {
        this._closing ??= this._shutdown(graceMs);
        return this._closing;
    }

    private async _shutdown(graceMs: number): Promise<void> {
        this.lifecycle.advance('shutting_down');

        if (this._inFlight.size > 0) {
            let timer: ReturnType<typeof setTimeout> | undefined;
            await Promise.race([
                Promise.allSettled([...this._inFlight]),
                new Promise<void>(resolve => { timer = setTimeout(resolve, graceMs); }),
            ]);
            clearTimeout(timer);
        }

        this._server.subscriptions.removeConnection(this.id);
        try {
            await this._transport.close();
        } catch (err) {
            this._reportError('transport', describeError(err));
        }
        this.lifecycle.advance('closed');

        this._server.debug?.({
            type: 'connection',
            connectionId: this.id,
            transport: this.transportKind,
            phase: 'close',
            timestamp: Date.now(),
        });
    }

    // ── Diagnostics ──────────────────────────────────────

    private _onTransition(from: LifecycleState, to: LifecycleState): void {
        this._server.debug?.({ type: 'lifecycle', connectionId: this.id, from, to, timestamp: Date.now() });
    }

    private _reportError(step: 'decode' | 'handler' | 'transport', error: string, method?: string): void {
        this._server.debug?.({ type: 'error', connectionId: this.id, method, step, error, timestamp: Date.now() });
    }
}
