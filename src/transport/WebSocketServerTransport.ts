/**
 * WebSocketServerTransport — accepts WebSocket clients
 *
 * Every accepted socket becomes one {@link WebSocketTransport}, and so one
 * connection with its own lifecycle and subscriptions.
 *
 * @example
 * ```typescript
 * const server = new McpServer({ name: 'files', version: '1.0.0' });
 * await server.listen(new WebSocketServerTransport({ port: 8081 }));
 * ```
 *
 * @module
 */
import { type Server } from 'node:http';
import { type AddressInfo } from 'node:net';
import { WebSocketServer } from 'ws';
import { WebSocketTransport } from './WebSocketTransport.js';
import { type ListenerErrorHandler, type TransportHandler, type TransportListener } from './Transport.js';

export interface WebSocketServerTransportOptions {
    /** Default `127.0.0.1`. */
    host?: string;
    /** Default 3001. Use 0 for an ephemeral port. */
    port?: number;
    /** Share an existing HTTP server instead of listening. */
    server?: Server;
    /** Only accept upgrades on this path. */
    path?: string;
    /** Largest accepted message in bytes. Default 4 MiB. */
    maxPayload?: number;
    /** Pushes queued per socket. Default 1024. */
    maxQueue?: number;
}

export class WebSocketServerTransport implements TransportListener {
    private readonly _options: WebSocketServerTransportOptions;
    private readonly _transports = new Set<WebSocketTransport>();
    private _wss?: WebSocketServer;

    constructor(options?: WebSocketServerTransportOptions) {
        this._options = options ?? {};
    }

    get address(): AddressInfo | undefined {
        if (!this._wss) return undefined;
        const address = this._options.server ? this._options.server.address() : this._wss.address();
        return address && typeof address === 'object' ? address : undefined;
    }

    get url(): string | undefined {
        const address = this.address;
        if (!address) return undefined;
        const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
        return `ws://${host}:${address.port}${this._options.path ?? ''}`;
    }

    get clientCount(): number {
        return this._transports.size;
    }

    async listen(onTransport: TransportHandler, onError?: ListenerErrorHandler): Promise<void> {
        const maxPayload = this._options.maxPayload ?? 4 * 1024 * 1024;
        const wss = this._options.server
            ? new WebSocketServer({ server: this._options.server, path: this._options.path, maxPayload })
            : new WebSocketServer({
                host: this._options.host ?? '127.0.0.1',
                port: this._options.port ?? 3001,
                path: this._options.path,
                maxPayload,
            });
        this._wss = wss;

        wss.on('connection', (socket) => {
            const transport = new WebSocketTransport(socket, { maxQueue: this._options.maxQueue });
            this._transports.add(transport);
            socket.once('close', () => { this._transports.delete(transport); });
            onTransport(transport);
        });

        if (!this._options.server) {
            await new Promise<void>((resolve, reject) => {
                wss.once('error', reject);
                wss.once('listening', () => {
                    wss.off('error', reject);
                    resolve();
                });
            });
        }
        // errors of the underlying server are re-emitted here
        wss.on('error', (err) => { onError?.(err); });
    }

    async close(): Promise<void> {
        await Promise.all([...this._transports].map(transport => transport.close()));
        this._transports.clear();

        const wss = this._wss;
        this._wss = undefined;
        if (!wss) return;
        for (const client of wss.clients) client.terminate();
        await new Promise<void>((resolve) => { wss.close(() => resolve()); });
    }
}
