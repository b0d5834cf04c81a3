/**
 * HttpSessionTransport — one HTTP client session
 *
 * Requests arrive as separate POST exchanges and are answered on the
 * exchange that carried them: `send()` resolves the pending exchange with
 * the same id. Pushes go only to the session's event stream; without an
 * open stream `push()` is refused.
 *
 * Created and fed by {@link HttpServerTransport}; never constructed
 * directly by applications.
 *
 * @module
 */
import { randomUUID } from 'node:crypto';
import { type ServerResponse } from 'node:http';
import { ErrorCode, ProtocolError } from '../protocol/errors.js';
import {
    errorResponse,
    type InboundNotification,
    type InboundRequest,
    type JsonRpcNotification,
    type JsonRpcResponse,
    type RequestId,
} from '../protocol/jsonrpc.js';
import { AsyncQueue } from './AsyncQueue.js';
import { OutboundQueue } from './OutboundQueue.js';
import { encodeSseComment, encodeSseEvent } from './sse.js';
import { type InboundFrame, type Transport } from './Transport.js';

export interface HttpSessionOptions {
    maxQueue?: number;
    /** Interval of keep-alive comments on the event stream. 0 disables. */
    keepAliveMs?: number;
    /** Called once the session is closed. */
    onClose?: (sessionId: string) => void;
}

interface Exchange {
    readonly id: RequestId;
    /** Receives the serialized response body. */
    readonly resolve: (body: string) => void;
}

interface EventStream {
    readonly res: ServerResponse;
    readonly queue: OutboundQueue;
    readonly keepAlive?: ReturnType<typeof setInterval>;
}

function exchangeKey(id: RequestId): string {
    return `${typeof id}:${String(id)}`;
}

function writeChunk(res: ServerResponse, chunk: string): Promise<void> {
    return new Promise((resolve, reject) => {
        if (res.destroyed || res.writableEnded) {
            reject(new Error('event stream closed'));
            return;
        }
        res.write(chunk, (err) => {
            if (err) reject(err);
            else resolve();
        });
    });
}

export class HttpSessionTransport implements Transport {
    readonly kind = 'http' as const;
    readonly id: string;

    private readonly _inbound = new AsyncQueue<InboundFrame>();
    private readonly _exchanges = new Map<string, Exchange>();
    private readonly _options: HttpSessionOptions;
    private _stream?: EventStream;
    private _lastActivity = Date.now();
    private _closePromise?: Promise<void>;

    constructor(options?: HttpSessionOptions) {
        this.id = randomUUID();
        this._options = options ?? {};
    }

    // ── Transport ────────────────────────────────────────

    receive(): AsyncIterable<InboundFrame> {
        return this._inbound;
    }

    send(response: JsonRpcResponse): boolean {
        const key = exchangeKey(response.id);
        const exchange = this._exchanges.get(key);
        if (!exchange) return false;
        const body = JSON.stringify(response);
        this._exchanges.delete(key);
        exchange.resolve(body);
        return true;
    }

    push(notification: JsonRpcNotification): boolean {
        return this._stream?.queue.enqueue(encodeSseEvent(JSON.stringify(notification)), true) ?? false;
    }

    close(): Promise<void> {
        this._closePromise ??= this._close();
        return this._closePromise;
    }

    private async _close(): Promise<void> {
        this._inbound.end();
        for (const exchange of this._exchanges.values()) {
            exchange.resolve(JSON.stringify(errorResponse(
                exchange.id,
                new ProtocolError(ErrorCode.InternalError, 'Session closed before the request was answered'),
            )));
        }
        this._exchanges.clear();

        const stream = this._stream;
        this._stream = undefined;
        if (stream) {
            clearInterval(stream.keepAlive);
            await stream.queue.close();
            stream.res.end();
        }
        this._options.onClose?.(this.id);
    }

    // ── HTTP Side ────────────────────────────────────────

    get lastActivity(): number {
        return this._lastActivity;
    }

    get hasStream(): boolean {
        return this._stream !== undefined;
    }

    /** Requests waiting for their response. */
    get pendingExchanges(): number {
        return this._exchanges.size;
    }

    get ended(): boolean {
        return this._inbound.ended;
    }

    touch(): void {
        this._lastActivity = Date.now();
    }

    /**
     * Queue a request and wait for its serialized response. Returns undefined
     * when a request with the same id is still pending or the session has ended.
     */
    submitRequest(message: InboundRequest): Promise<string> | undefined {
        const key = exchangeKey(message.id);
        if (this._exchanges.has(key) || this._inbound.ended) return undefined;

        return new Promise((resolve) => {
            this._exchanges.set(key, { id: message.id, resolve });
            this._inbound.push(message);
        });
    }

    submitNotification(message: InboundNotification): boolean {
        return this._inbound.push(message);
    }

    /**
     * Make `res` (already answered with SSE headers) the push destination.
     * The first event announces where requests for this session go.
     * Closing the stream ends the session.
     */
    attachStream(res: ServerResponse, endpoint: string): boolean {
        if (this._stream || this._inbound.ended) return false;

        const queue = new OutboundQueue(chunk => writeChunk(res, chunk), {
            maxQueue: this._options.maxQueue,
            onError: () => { this.end(); },
        });
        const keepAliveMs = this._options.keepAliveMs ?? 0;
        const keepAlive = keepAliveMs > 0
            ? setInterval(() => { queue.enqueue(encodeSseComment('keepalive'), true); }, keepAliveMs)
            : undefined;
        keepAlive?.unref();

        this._stream = { res, queue, keepAlive };
        queue.enqueue(encodeSseEvent(endpoint, 'endpoint'), false);
        res.once('close', () => {
            if (this._stream?.res === res) {
                clearInterval(keepAlive);
                this.end();
            }
        });
        return true;
    }

    /** The client went away: stop receiving. The connection then shuts down and closes this transport. */
    end(): void {
        this._inbound.end();
    }
}
