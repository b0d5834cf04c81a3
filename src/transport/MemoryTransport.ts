/**
 * MemoryTransport — in-process transport
 *
 * Connects a {@link MemoryClient} to the engine without any I/O. Used to
 * embed a server inside the same process and throughout the test suite.
 *
 * @example
 * ```typescript
 * const transport = new MemoryTransport();
 * server.connect(transport);
 *
 * const client = new MemoryClient(transport);
 * await client.initialize();
 * const tools = await client.request('tools/list');
 * ```
 *
 * @module
 */
import { randomUUID } from 'node:crypto';
import { LATEST_PROTOCOL_VERSION } from '@modelcontextprotocol/sdk/types.js';
import {
    JSONRPC_VERSION,
    decodeFrame,
    type JsonRpcNotification,
    type JsonRpcResponse,
    type RequestId,
} from '../protocol/jsonrpc.js';
import { Method } from '../protocol/methods.js';
import { AsyncQueue } from './AsyncQueue.js';
import { OutboundQueue } from './OutboundQueue.js';
import { type InboundFrame, type Transport } from './Transport.js';

export type OutboundFrame = JsonRpcResponse | JsonRpcNotification;

export interface MemoryTransportOptions {
    id?: string;
    maxQueue?: number;
}

// ── Server Side ──────────────────────────────────────────

export class MemoryTransport implements Transport {
    readonly kind = 'memory' as const;
    readonly id: string;
    private readonly _inbound = new AsyncQueue<InboundFrame>();
    private readonly _outbound: OutboundQueue;
    private readonly _listeners = new Set<(frame: OutboundFrame) => void>();

    constructor(options?: MemoryTransportOptions) {
        this.id = options?.id ?? randomUUID();
        this._outbound = new OutboundQueue(async (frame) => {
            const decoded: OutboundFrame = JSON.parse(frame);
            for (const listener of this._listeners) listener(decoded);
        }, { maxQueue: options?.maxQueue });
    }

    get closed(): boolean {
        return this._outbound.closed;
    }

    receive(): AsyncIterable<InboundFrame> {
        return this._inbound;
    }

    send(response: JsonRpcResponse): boolean {
        return this._outbound.enqueue(JSON.stringify(response), false);
    }

    push(notification: JsonRpcNotification): boolean {
        return this._outbound.enqueue(JSON.stringify(notification), true);
    }

    async close(): Promise<void> {
        this._inbound.end();
        await this._outbound.close();
    }

    // ── Client Side Hooks ────────────────────────────────

    /** Feed one raw text frame, decoded the same way the stream transports do. */
    deliverText(text: string): boolean {
        const decoded = decodeFrame(text);
        return this._inbound.push(decoded.ok
            ? decoded.message
            : { kind: 'malformed', error: decoded.error, id: decoded.id, fatal: false });
    }

    /** The peer hung up. */
    disconnect(): void {
        this._inbound.end();
    }

    onOutbound(listener: (frame: OutboundFrame) => void): () => void {
        this._listeners.add(listener);
        return () => { this._listeners.delete(listener); };
    }
}

// ── Client ───────────────────────────────────────────────

export class MemoryClient {
    readonly notifications: JsonRpcNotification[] = [];
    private readonly _transport: MemoryTransport;
    private readonly _pending = new Map<RequestId, (response: JsonRpcResponse) => void>();
    private _nextId = 1;

    constructor(transport: MemoryTransport) {
        this._transport = transport;
        transport.onOutbound((frame) => {
            if ('method' in frame) {
                this.notifications.push(frame);
                return;
            }
            const resolve = this._pending.get(frame.id);
            if (resolve) {
                this._pending.delete(frame.id);
                resolve(frame);
            }
        });
    }

    request(method: string, params?: Record<string, unknown>, id?: RequestId): Promise<JsonRpcResponse> {
        const requestId = id ?? this._nextId++;
        return new Promise((resolve) => {
            this._pending.set(requestId, resolve);
            this._transport.deliverText(JSON.stringify(
                params === undefined
                    ? { jsonrpc: JSONRPC_VERSION, id: requestId, method }
                    : { jsonrpc: JSONRPC_VERSION, id: requestId, method, params },
            ));
        });
    }

    notify(method: string, params?: Record<string, unknown>): void {
        this._transport.deliverText(JSON.stringify(
            params === undefined
                ? { jsonrpc: JSONRPC_VERSION, method }
                : { jsonrpc: JSONRPC_VERSION, method, params },
        ));
    }

    /** Send `initialize` with a default client identity. */
    initialize(protocolVersion: string = LATEST_PROTOCOL_VERSION): Promise<JsonRpcResponse> {
        return this.request(Method.Initialize, {
            protocolVersion,
            capabilities: {},
            clientInfo: { name: 'memory-client', version: '1.0.0' },
        });
    }

    /** Notifications received so far with the given method. */
    received(method: string): JsonRpcNotification[] {
        return this.notifications.filter(n => n.method === method);
    }
}
