/**
 * Transport — uniform contract between a channel and the engine
 *
 * A `Transport` is one client connection. The engine consumes
 * {@link Transport.receive} exactly once, answers requests with `send()`
 * and emits uncorrelated notifications with `push()`.
 *
 * A `TransportListener` accepts clients (HTTP sessions, WebSocket sockets)
 * and hands one `Transport` per client to the server.
 *
 * @module
 */
import { type ProtocolError } from '../protocol/errors.js';
import {
    type InboundMessage,
    type JsonRpcNotification,
    type JsonRpcResponse,
    type RequestId,
} from '../protocol/jsonrpc.js';
import { type TransportKind } from '../registry/types.js';

export type { TransportKind };

/** A frame that could not be decoded. */
export interface MalformedFrame {
    readonly kind: 'malformed';
    readonly error: ProtocolError;
    readonly id: RequestId;
    /** Framing is lost: answer the error, then close the connection. */
    readonly fatal: boolean;
}

export type InboundFrame = InboundMessage | MalformedFrame;

export interface Transport {
    readonly kind: TransportKind;
    readonly id: string;
    /** Decoded frames until the peer goes away. Single consumer. */
    receive(): AsyncIterable<InboundFrame>;
    /** Deliver a response. False when the channel is closed. */
    send(response: JsonRpcResponse): boolean;
    /** Deliver a notification. False when closed, full, or without a push destination. */
    push(notification: JsonRpcNotification): boolean;
    /** Flush accepted frames, then release the channel. Idempotent. */
    close(): Promise<void>;
}

export type TransportHandler = (transport: Transport) => void;

/** Receives failures of a listening server after `listen` resolved. */
export type ListenerErrorHandler = (error: Error) => void;

export interface TransportListener {
    /** Start accepting clients. Resolves once listening. */
    listen(onTransport: TransportHandler, onError?: ListenerErrorHandler): Promise<void>;
    /** Stop accepting and close every client transport. */
    close(): Promise<void>;
}
