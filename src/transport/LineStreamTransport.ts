/**
 * LineStreamTransport — newline-delimited JSON over a byte stream
 *
 * One JSON-RPC message per line, by default on stdin/stdout. Responses and
 * pushes share one {@link OutboundQueue}, so frames never interleave.
 *
 * A line that is not valid JSON is answered with a parse error and the
 * connection continues. Buffered input that exceeds `maxFrameBytes` without
 * a newline means the framing is lost: the transport reports a fatal parse
 * error and the connection closes.
 *
 * @example
 * ```typescript
 * const server = new McpServer({ name: 'files', version: '1.0.0' });
 * server.connect(new LineStreamTransport());
 * ```
 *
 * @module
 */
import { randomUUID } from 'node:crypto';
import { type Readable, type Writable } from 'node:stream';
import { StringDecoder } from 'node:string_decoder';
import { parseError } from '../protocol/errors.js';
import { decodeFrame, type JsonRpcNotification, type JsonRpcResponse } from '../protocol/jsonrpc.js';
import { AsyncQueue } from './AsyncQueue.js';
import { OutboundQueue } from './OutboundQueue.js';
import { type InboundFrame, type Transport } from './Transport.js';

export interface LineStreamTransportOptions {
    /** Default `process.stdin`. */
    input?: Readable;
    /** Default `process.stdout`. */
    output?: Writable;
    /** Longest accepted line in bytes. Default 4 MiB. */
    maxFrameBytes?: number;
    /** Pushes queued before new ones are refused. Default 1024. */
    maxQueue?: number;
    id?: string;
}

export const DEFAULT_MAX_FRAME_BYTES = 4 * 1024 * 1024;

export class LineStreamTransport implements Transport {
    readonly kind = 'line-stream' as const;
    readonly id: string;

    private readonly _input: Readable;
    private readonly _output: Writable;
    private readonly _maxFrameBytes: number;
    private readonly _inbound = new AsyncQueue<InboundFrame>();
    private readonly _outbound: OutboundQueue;
    /** Holds back a multi-byte character split across chunks. */
    private readonly _decoder = new StringDecoder('utf8');
    private _buffer = '';
    private _closePromise?: Promise<void>;

    private readonly _onData = (chunk: Buffer | string): void => {
        this._buffer += typeof chunk === 'string' ? chunk : this._decoder.write(chunk);
        this._drainLines();
    };
    private readonly _onEnd = (): void => {
        const rest = (this._buffer + this._decoder.end()).trim();
        this._buffer = '';
        if (rest.length > 0) this._deliver(rest);
        this._inbound.end();
    };
    private readonly _onError = (): void => {
        this._inbound.end();
    };

    constructor(options?: LineStreamTransportOptions) {
        this.id = options?.id ?? randomUUID();
        this._input = options?.input ?? process.stdin;
        this._output = options?.output ?? process.stdout;
        this._maxFrameBytes = Math.max(1, options?.maxFrameBytes ?? DEFAULT_MAX_FRAME_BYTES);
        this._outbound = new OutboundQueue(frame => this._write(frame), {
            maxQueue: options?.maxQueue,
            onError: () => { this._inbound.end(); },
        });

        this._input.on('data', this._onData);
        this._input.once('end', this._onEnd);
        this._input.once('close', this._onEnd);
        // error listeners stay attached after close
        this._input.on('error', this._onError);
        this._output.on('error', this._onError);
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

    /** Stops reading and flushes output. The streams themselves are left open. */
    close(): Promise<void> {
        this._closePromise ??= this._close();
        return this._closePromise;
    }

    private async _close(): Promise<void> {
        this._detach();
        this._inbound.end();
        await this._outbound.close();
    }

    // ── Framing ──────────────────────────────────────────

    private _drainLines(): void {
        let newline = this._buffer.indexOf('\n');
        while (newline >= 0) {
            const line = this._buffer.slice(0, newline).replace(/\r$/, '');
            this._buffer = this._buffer.slice(newline + 1);
            if (line.trim().length > 0) this._deliver(line);
            newline = this._buffer.indexOf('\n');
        }

        if (Buffer.byteLength(this._buffer, 'utf8') > this._maxFrameBytes) {
            this._buffer = '';
            this._detach();
            this._inbound.push({
                kind: 'malformed',
                error: parseError(`frame exceeds ${this._maxFrameBytes} bytes without a newline`),
                id: null,
                fatal: true,
            });
            this._inbound.end();
        }
    }

    private _deliver(line: string): void {
        const decoded = decodeFrame(line);
        this._inbound.push(decoded.ok
            ? decoded.message
            : { kind: 'malformed', error: decoded.error, id: decoded.id, fatal: false });
    }

    private _detach(): void {
        this._input.off('data', this._onData);
        this._input.off('end', this._onEnd);
        this._input.off('close', this._onEnd);
        this._input.pause();
    }

    private _write(frame: string): Promise<void> {
        return new Promise((resolve, reject) => {
            if (this._output.destroyed || this._output.writableEnded) {
                reject(new Error('output stream closed'));
                return;
            }
            this._output.write(`${frame}\n`, (err) => {
                if (err) reject(err);
                else resolve();
            });
        });
    }
}
