/**
 * HttpServerTransport — HTTP exchanges plus a server-sent event stream
 *
 * Endpoints (paths configurable):
 *
 * | Route              | Purpose                                               |
 * |--------------------|-------------------------------------------------------|
 * | `POST /mcp`        | one JSON-RPC message; a request is answered in place  |
 * | `POST /mcp/notify` | fire-and-forget notifications (202)                   |
 * | `GET /mcp/events`  | event stream: the session's only push destination     |
 * | `DELETE /mcp`      | end the session                                       |
 * | `GET /health`      | liveness, outside the protocol                        |
 *
 * Sessions are named by the `Mcp-Session-Id` header or the `sessionId`
 * query parameter. `initialize` without a session, or opening an event
 * stream without one, creates a session; each session is one
 * {@link HttpSessionTransport} handed to the server as its own connection.
 *
 * A malformed body fails that exchange only (400); the session lives on.
 *
 * @example
 * ```typescript
 * const server = new McpServer({ name: 'files', version: '1.0.0' });
 * const http = new HttpServerTransport({ port: 8080 });
 * await server.listen(http);
 * ```
 *
 * @module
 */
import { createServer, type IncomingMessage, type Server, type ServerResponse } from 'node:http';
import { type AddressInfo } from 'node:net';
import { internalError, invalidRequest, type ProtocolError } from '../protocol/errors.js';
import { decodeFrame, errorResponse, type InboundMessage } from '../protocol/jsonrpc.js';
import { Method } from '../protocol/methods.js';
import { HttpSessionTransport } from './HttpSessionTransport.js';
import { type ListenerErrorHandler, type TransportHandler, type TransportListener } from './Transport.js';

// ── Configuration ────────────────────────────────────────

export interface HttpPaths {
    readonly request: string;
    readonly notify: string;
    readonly events: string;
    readonly health: string;
}

export const DEFAULT_HTTP_PATHS: HttpPaths = {
    request: '/mcp',
    notify: '/mcp/notify',
    events: '/mcp/events',
    health: '/health',
};

export const SESSION_HEADER = 'mcp-session-id';

export interface HttpServerTransportOptions {
    /** Default `127.0.0.1`. */
    host?: string;
    /** Default 3000. Use 0 for an ephemeral port. */
    port?: number;
    /** Serve on an existing server instead of creating one. */
    server?: Server;
    paths?: Partial<HttpPaths>;
    /** Largest accepted body. Default 4 MiB. */
    maxBodyBytes?: number;
    /** Idle time after which a session without an event stream is dropped. Default 30 min. */
    sessionTtlMs?: number;
    /** Keep-alive comment interval on event streams. Default 15 s. */
    keepAliveMs?: number;
    /** Pushes queued per event stream. Default 1024. */
    maxQueue?: number;
}

const DEFAULT_MAX_BODY_BYTES = 4 * 1024 * 1024;
const DEFAULT_SESSION_TTL_MS = 30 * 60_000;
const DEFAULT_KEEP_ALIVE_MS = 15_000;

// ── Helpers ──────────────────────────────────────────────

function writeJson(res: ServerResponse, status: number, body: unknown): void {
    writeText(res, status, JSON.stringify(body));
}

function writeText(res: ServerResponse, status: number, text: string): void {
    res.writeHead(status, {
        'Content-Type': 'application/json',
        'Content-Length': Buffer.byteLength(text),
    });
    res.end(text);
}

function writeRpcError(res: ServerResponse, status: number, message: InboundMessage | undefined, error: ProtocolError): void {
    const id = message && message.kind !== 'notification' ? message.id : null;
    writeJson(res, status, errorResponse(id, error));
}

/** Resolves undefined when the body exceeds `limit`. */
function readBody(req: IncomingMessage, limit: number): Promise<string | undefined> {
    return new Promise((resolve, reject) => {
        const chunks: Buffer[] = [];
        let size = 0;
        let settled = false;
        req.on('data', (chunk: Buffer) => {
            if (settled) return;
            size += chunk.length;
            if (size > limit) {
                settled = true;
                resolve(undefined);
                return;
            }
            chunks.push(chunk);
        });
        req.once('end', () => {
            if (settled) return;
            settled = true;
            resolve(Buffer.concat(chunks).toString('utf8'));
        });
        req.once('error', (err) => {
            if (settled) return;
            settled = true;
            reject(err);
        });
    });
}

// ── Listener ─────────────────────────────────────────────

export class HttpServerTransport implements TransportListener {
    readonly paths: HttpPaths;

    private readonly _options: HttpServerTransportOptions;
    private readonly _sessions = new Map<string, HttpSessionTransport>();
    private readonly _maxBodyBytes: number;
    private readonly _sessionTtlMs: number;
    private _server?: Server;
    private _onTransport?: TransportHandler;
    private _onError?: ListenerErrorHandler;

    constructor(options?: HttpServerTransportOptions) {
        this._options = options ?? {};
        this.paths = { ...DEFAULT_HTTP_PATHS, ...options?.paths };
        this._maxBodyBytes = Math.max(1, options?.maxBodyBytes ?? DEFAULT_MAX_BODY_BYTES);
        this._sessionTtlMs = Math.max(0, options?.sessionTtlMs ?? DEFAULT_SESSION_TTL_MS);
    }

    get sessionCount(): number {
        return this._sessions.size;
    }

    /** Bound address once listening. */
    get address(): AddressInfo | undefined {
        const address = this._server?.address();
        return address && typeof address === 'object' ? address : undefined;
    }

    /** The `node:http` server requests arrive on, once listening. */
    get server(): Server | undefined {
        return this._server;
    }

    /** Base URL once listening, e.g. `http://127.0.0.1:3000`. */
    get url(): string | undefined {
        const address = this.address;
        if (!address) return undefined;
        const host = address.family === 'IPv6' ? `[${address.address}]` : address.address;
        return `http://${host}:${address.port}`;
    }

    async listen(onTransport: TransportHandler, onError?: ListenerErrorHandler): Promise<void> {
        this._onTransport = onTransport;
        this._onError = onError;

        if (this._options.server) {
            this._server = this._options.server;
            this._server.on('request', this.handle);
            return;
        }

        const server = createServer(this.handle);
        this._server = server;
        await new Promise<void>((resolve, reject) => {
            server.once('error', reject);
            server.listen(this._options.port ?? 3000, this._options.host ?? '127.0.0.1', () => {
                server.off('error', reject);
                resolve();
            });
        });
        server.on('error', this._serverError);
    }

    async close(): Promise<void> {
        await Promise.all([...this._sessions.values()].map(session => session.close()));
        this._sessions.clear();

        const server = this._server;
        this._server = undefined;
        if (!server) return;

        if (this._options.server) {
            server.off('request', this.handle);
            return;
        }
        await new Promise<void>((resolve) => {
            server.close(() => resolve());
            server.closeAllConnections();
        });
    }

    private readonly _serverError = (err: Error): void => {
        this._onError?.(err);
    };

    /** Request listener; usable with any `node:http` server. */
    readonly handle = (req: IncomingMessage, res: ServerResponse): void => {
        this._route(req, res).catch(() => {
            if (!res.headersSent) writeRpcError(res, 500, undefined, internalError());
            else res.destroy();
        });
    };

    // ── Routing ──────────────────────────────────────────

    private async _route(req: IncomingMessage, res: ServerResponse): Promise<void> {
        this._pruneIdleSessions();
        const url = new URL(req.url ?? '/', 'http://localhost');
        const method = (req.method ?? 'GET').toUpperCase();

        switch (url.pathname) {
            case this.paths.health:
                if (method !== 'GET') return this._notAllowed(res, 'GET');
                return writeJson(res, 200, { status: 'ok', sessions: this._sessions.size });

            case this.paths.events:
                if (method !== 'GET') return this._notAllowed(res, 'GET');
                return this._openStream(req, res, url);

            case this.paths.notify:
                if (method !== 'POST') return this._notAllowed(res, 'POST');
                return this._post(req, res, url, 'notify');

            case this.paths.request:
                if (method === 'POST') return this._post(req, res, url, 'request');
                if (method === 'DELETE') return this._delete(req, res, url);
                return this._notAllowed(res, 'POST, DELETE');

            default:
                return writeJson(res, 404, { error: 'Not found' });
        }
    }

    private async _post(
        req: IncomingMessage,
        res: ServerResponse,
        url: URL,
        endpoint: 'request' | 'notify',
    ): Promise<void> {
        const body = await readBody(req, this._maxBodyBytes);
        if (body === undefined) {
            return writeRpcError(res, 413, undefined, invalidRequest(`Request body exceeds ${this._maxBodyBytes} bytes`));
        }

        const decoded = decodeFrame(body);
        if (!decoded.ok) {
            return writeJson(res, 400, errorResponse(decoded.id, decoded.error));
        }
        const message = decoded.message;

        const sessionId = this._sessionIdOf(req, url);
        let session: HttpSessionTransport | undefined;
        if (sessionId !== undefined) {
            session = this._sessions.get(sessionId);
            if (!session) {
                return writeRpcError(res, 404, message, invalidRequest(`Unknown session: ${sessionId}`));
            }
        } else if (endpoint === 'request' && message.kind === 'request' && message.method === Method.Initialize) {
            session = this._createSession();
        } else {
            return writeRpcError(res, 400, message, invalidRequest(
                `Missing ${SESSION_HEADER} header: send initialize first`,
            ));
        }

        session.touch();
        res.setHeader(SESSION_HEADER, session.id);

        if (message.kind === 'response') {
            res.writeHead(202).end();
            return;
        }
        if (message.kind === 'notification') {
            session.submitNotification(message);
            res.writeHead(202).end();
            return;
        }
        if (endpoint === 'notify') {
            return writeRpcError(res, 400, message, invalidRequest(
                `Requests must be sent to ${this.paths.request}`,
            ));
        }

        const pending = session.submitRequest(message);
        if (!pending) {
            return writeRpcError(res, 400, message, invalidRequest(
                `Duplicate request id or ended session: ${String(message.id)}`,
            ));
        }
        const responseBody = await pending;
        session.touch();
        writeText(res, 200, responseBody);
    }

    private _openStream(req: IncomingMessage, res: ServerResponse, url: URL): void {
        const sessionId = this._sessionIdOf(req, url);
        let session: HttpSessionTransport | undefined;
        if (sessionId !== undefined) {
            session = this._sessions.get(sessionId);
            if (!session) return writeJson(res, 404, { error: `Unknown session: ${sessionId}` });
            if (session.hasStream) return writeJson(res, 409, { error: 'Session already has an event stream' });
        } else {
            session = this._createSession();
        }

        res.writeHead(200, {
            'Content-Type': 'text/event-stream',
            'Cache-Control': 'no-cache, no-transform',
            'Connection': 'keep-alive',
            [SESSION_HEADER]: session.id,
        });
        res.flushHeaders();
        session.touch();
        session.attachStream(res, `${this.paths.request}?sessionId=${encodeURIComponent(session.id)}`);
    }

    private async _delete(req: IncomingMessage, res: ServerResponse, url: URL): Promise<void> {
        const sessionId = this._sessionIdOf(req, url);
        const session = sessionId === undefined ? undefined : this._sessions.get(sessionId);
        if (!session) return writeJson(res, 404, { error: 'Unknown session' });

        this._sessions.delete(session.id);
        session.end();
        res.writeHead(204).end();
    }

    // ── Sessions ─────────────────────────────────────────

    private _sessionIdOf(req: IncomingMessage, url: URL): string | undefined {
        const header = req.headers[SESSION_HEADER];
        const value = Array.isArray(header) ? header[0] : header;
        return value ?? url.searchParams.get('sessionId') ?? undefined;
    }

    private _createSession(): HttpSessionTransport {
        const session = new HttpSessionTransport({
            maxQueue: this._options.maxQueue,
            keepAliveMs: this._options.keepAliveMs ?? DEFAULT_KEEP_ALIVE_MS,
            onClose: (id) => { this._sessions.delete(id); },
        });
        this._sessions.set(session.id, session);
        this._onTransport?.(session);
        return session;
    }

    private _pruneIdleSessions(): void {
        if (this._sessionTtlMs === 0) return;
        const cutoff = Date.now() - this._sessionTtlMs;
        for (const session of this._sessions.values()) {
            if (!session.hasStream && session.pendingExchanges === 0 && session.lastActivity < cutoff) {
                this._sessions.delete(session.id);
                session.end();
            }
        }
    }

    private _notAllowed(res: ServerResponse, allow: string): void {
        res.setHeader('Allow', allow);
        writeJson(res, 405, { error: 'Method not allowed' });
    }
}
