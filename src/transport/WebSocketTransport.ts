/**
 * WebSocketTransport — one full-duplex socket
 *
 * Each text message is one JSON-RPC frame. Requests may overlap: every
 * response is sent as soon as its call completes, correlated by id only,
 * and pushes travel on the same socket. All outbound frames share one
 * {@link OutboundQueue}.
 *
 * A malformed message is answered with a parse error; the socket stays
 * open.
 *
 * @module
 */
import { randomUUID } from 'node:crypto';
import { WebSocket, type RawData } from 'ws';
import { decodeFrame, type JsonRpcNotification, type JsonRpcResponse } from '../protocol/jsonrpc.js';
import { AsyncQueue } from './AsyncQueue.js';
import { OutboundQueue } from './OutboundQueue.js';
import { type InboundFrame, type Transport } from './Transport.js';

export interface WebSocketTransportOptions {
    maxQueue?: number;
    id?: string;
}

function toText(data: RawData): string {
    if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
    if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
    return data.toString('utf8');
}

export class WebSocketTransport implements Transport {
    readonly kind = 'websocket' as const;
    readonly id: string;

    private readonly _socket: WebSocket;
    private readonly _inbound = new AsyncQueue<InboundFrame>();
    private readonly _outbound: OutboundQueue;
    private _closePromise?: Promise<void>;

    constructor(socket: WebSocket, options?: WebSocketTransportOptions) {
        this.id = options?.id ?? randomUUID();
        this._socket = socket;
        this._outbound = new OutboundQueue(frame => this._write(frame), {
            maxQueue: options?.maxQueue,
            onError: () => { this._inbound.end(); },
        });

        socket.on('message', (data: RawData, isBinary: boolean) => {
            if (isBinary) return;
            const decoded = decodeFrame(toText(data));
            this._inbound.push(decoded.ok
                ? decoded.message
                : { kind: 'malformed', error: decoded.error, id: decoded.id, fatal: false });
        });
        socket.once('close', () => { this._inbound.end(); });
        socket.once('error', () => { this._inbound.end(); });
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

    close(): Promise<void> {
        this._closePromise ??= this._close();
        return this._closePromise;
    }

    private async _close(): Promise<void> {
        this._inbound.end();
        await this._outbound.close();
        if (this._socket.readyState === WebSocket.OPEN || this._socket.readyState === WebSocket.CONNECTING) {
            this._socket.close(1000, 'server closing');
        }
    }

    private _write(frame: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this._socket.readyState !== WebSocket.OPEN) {
                reject(new Error('socket is not open'));
                return;
            }
            this._socket.send(frame, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }
}
