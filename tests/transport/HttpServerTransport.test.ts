/**
 * HttpServerTransport.test.ts — sessions, exchanges and event streams on a loopback port
 */
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { get, type IncomingMessage } from 'node:http';
import { HttpServerTransport, SESSION_HEADER } from '../../src/transport/HttpServerTransport.js';
import { type McpServer } from '../../src/server/McpServer.js';
import { success } from '../../src/response.js';
import { type DebugEvent } from '../../src/observability/DebugObserver.js';
import { createServer, PROTOCOL_VERSION } from '../harness.js';

// ============================================================================
// Helpers
// ============================================================================

interface Reply {
    readonly status: number;
    readonly headers: Headers;
    readonly body: unknown;
}

const INITIALIZE = {
    jsonrpc: '2.0',
    id: 1,
    method: 'initialize',
    params: { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: { name: 'http-client', version: '1.0.0' } },
};

class SseReader {
    private _buffer = '';
    private _ended = false;
    private _wake?: () => void;

    constructor(private readonly _res: IncomingMessage) {
        _res.setEncoding('utf8');
        _res.on('data', (chunk: string) => {
            this._buffer += chunk;
            this._wake?.();
        });
        _res.once('end', () => {
            this._ended = true;
            this._wake?.();
        });
    }

    /** Next complete event block, comments included. */
    async next(): Promise<string> {
        let end = this._buffer.indexOf('\n\n');
        while (end < 0) {
            if (this._ended) throw new Error('event stream ended');
            await new Promise<void>((resolve) => { this._wake = resolve; });
            end = this._buffer.indexOf('\n\n');
        }
        const block = this._buffer.slice(0, end);
        this._buffer = this._buffer.slice(end + 2);
        return block;
    }

    close(): void {
        this._res.destroy();
    }
}

/** Open `GET /mcp/events` for a session. */
function openEvents(session: string): Promise<IncomingMessage> {
    return new Promise((resolve, reject) => {
        const req = get(`${base}/mcp/events`, { headers: { [SESSION_HEADER]: session } }, resolve);
        req.once('error', reject);
    });
}

let server: McpServer;
let http: HttpServerTransport;
let base: string;

async function send(body: unknown, options?: { session?: string; path?: string; method?: string }): Promise<Reply> {
    const headers: Record<string, string> = { 'content-type': 'application/json' };
    if (options?.session !== undefined) headers[SESSION_HEADER] = options.session;
    const res = await fetch(`${base}${options?.path ?? '/mcp'}`, {
        method: options?.method ?? 'POST',
        headers,
        body: typeof body === 'string' ? body : JSON.stringify(body),
    });
    const text = await res.text();
    const parsed: unknown = text.length > 0 ? JSON.parse(text) : undefined;
    return { status: res.status, headers: res.headers, body: parsed };
}

async function openSession(): Promise<string> {
    const reply = await send(INITIALIZE);
    const session = reply.headers.get(SESSION_HEADER);
    if (!session) throw new Error('initialize did not create a session');
    await send({ jsonrpc: '2.0', method: 'notifications/initialized' }, { session });
    return session;
}

beforeEach(async () => {
    server = createServer();
    server.addTool({ name: 'greet', inputSchema: { type: 'object' } }, () => success('hello'));
    server.addTool({ name: 'huge', inputSchema: { type: 'object' } }, () => ({ content: [], _meta: { total: 10n } }));
    server.addResource({ uri: 'file:///notes.txt', name: 'notes' }, () => []);
    http = new HttpServerTransport({ port: 0, keepAliveMs: 0 });
    await server.listen(http);
    base = http.url ?? '';
});

afterEach(async () => {
    await server.close();
});

// ============================================================================
// Exchanges
// ============================================================================

describe('HttpServerTransport: exchanges', () => {
    it('should report health outside the protocol', async () => {
        const res = await fetch(`${base}/health`);
        expect(res.status).toBe(200);
        expect(await res.json()).toEqual({ status: 'ok', sessions: 0 });
    });

    it('should create a session on initialize and answer requests in place', async () => {
        const init = await send(INITIALIZE);
        const session = init.headers.get(SESSION_HEADER) ?? '';

        expect(init.status).toBe(200);
        expect(session).not.toBe('');
        expect(init.body).toMatchObject({ jsonrpc: '2.0', id: 1, result: { protocolVersion: PROTOCOL_VERSION } });

        const call = await send({ jsonrpc: '2.0', id: 2, method: 'tools/call', params: { name: 'greet' } }, { session });
        expect(call.status).toBe(200);
        expect(call.body).toEqual({ jsonrpc: '2.0', id: 2, result: { content: [{ type: 'text', text: 'hello' }] } });
        expect(http.sessionCount).toBe(1);
    });

    it('should answer an unserializable result with -32603 in the same exchange', async () => {
        const session = await openSession();
        const reply = await send({ jsonrpc: '2.0', id: 3, method: 'tools/call', params: { name: 'huge' } }, { session });
        expect(reply.status).toBe(200);
        expect(reply.body).toEqual({ jsonrpc: '2.0', id: 3, error: { code: -32603, message: 'Internal error' } });

        const ping = await send({ jsonrpc: '2.0', id: 4, method: 'ping' }, { session });
        expect(ping.body).toEqual({ jsonrpc: '2.0', id: 4, result: {} });
    });

    it('should accept the session id as a query parameter', async () => {
        const session = await openSession();
        const reply = await send({ jsonrpc: '2.0', id: 5, method: 'ping' }, { path: `/mcp?sessionId=${session}` });
        expect(reply.body).toEqual({ jsonrpc: '2.0', id: 5, result: {} });
    });

    it('should require a session for anything but initialize', async () => {
        const reply = await send({ jsonrpc: '2.0', id: 3, method: 'tools/list' });
        expect(reply.status).toBe(400);
        expect(reply.body).toEqual({
            jsonrpc: '2.0',
            id: 3,
            error: { code: -32600, message: 'Missing mcp-session-id header: send initialize first' },
        });
    });

    it('should answer unknown sessions with 404', async () => {
        const reply = await send({ jsonrpc: '2.0', id: 4, method: 'ping' }, { session: 'nope' });
        expect(reply.status).toBe(404);
        expect(reply.body).toEqual({
            jsonrpc: '2.0',
            id: 4,
            error: { code: -32600, message: 'Unknown session: nope' },
        });
    });

    it('should fail only the exchange that carried a malformed body', async () => {
        const session = await openSession();
        const bad = await send('{"jsonrpc":', { session });
        expect(bad.status).toBe(400);
        expect(bad.body).toMatchObject({ jsonrpc: '2.0', id: null, error: { code: -32700 } });

        const ping = await send({ jsonrpc: '2.0', id: 6, method: 'ping' }, { session });
        expect(ping.body).toEqual({ jsonrpc: '2.0', id: 6, result: {} });
    });

    it('should accept notifications with 202', async () => {
        const session = await openSession();
        const reply = await send({ jsonrpc: '2.0', method: 'notifications/initialized' }, { session, path: '/mcp/notify' });
        expect(reply.status).toBe(202);
        expect(reply.body).toBeUndefined();
    });

    it('should refuse requests on the notify endpoint', async () => {
        const session = await openSession();
        const reply = await send({ jsonrpc: '2.0', id: 7, method: 'ping' }, { session, path: '/mcp/notify' });
        expect(reply.status).toBe(400);
        expect(reply.body).toEqual({
            jsonrpc: '2.0',
            id: 7,
            error: { code: -32600, message: 'Requests must be sent to /mcp' },
        });
    });

    it('should reject bodies over the size limit with 413', async () => {
        await server.close();
        server = createServer();
        http = new HttpServerTransport({ port: 0, maxBodyBytes: 64 });
        await server.listen(http);
        base = http.url ?? '';

        const reply = await send({ ...INITIALIZE, padding: 'x'.repeat(32) });
        expect(reply.status).toBe(413);
        expect(reply.body).toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32600, message: 'Request body exceeds 64 bytes' },
        });
    });

    it('should answer unsupported verbs with 405 and unknown paths with 404', async () => {
        const put = await send({}, { method: 'PUT' });
        expect(put.status).toBe(405);
        expect(put.headers.get('allow')).toBe('POST, DELETE');

        const missing = await send({}, { path: '/elsewhere' });
        expect(missing.status).toBe(404);
    });

    it('should end a session on DELETE', async () => {
        const session = await openSession();
        const res = await fetch(`${base}/mcp`, { method: 'DELETE', headers: { [SESSION_HEADER]: session } });
        expect(res.status).toBe(204);

        const after = await send({ jsonrpc: '2.0', id: 8, method: 'ping' }, { session });
        expect(after.status).toBe(404);
    });
});

// ============================================================================
// Server errors
// ============================================================================

describe('HttpServerTransport: server errors', () => {
    it('should report errors raised after listening and keep serving', async () => {
        await server.close();
        const events: DebugEvent[] = [];
        server = createServer({ debug: e => events.push(e) });
        http = new HttpServerTransport({ port: 0 });
        await server.listen(http);
        base = http.url ?? '';

        http.server?.emit('error', new Error('accept EMFILE'));

        expect(events.filter(e => e.type === 'error')).toEqual([
            expect.objectContaining({ type: 'error', step: 'listener', error: 'accept EMFILE' }),
        ]);
        const res = await fetch(`${base}/health`);
        expect(res.status).toBe(200);
    });
});

// ============================================================================
// Event Streams
// ============================================================================

describe('HttpServerTransport: event stream', () => {
    it('should announce the endpoint and deliver pushes for the session', async () => {
        const session = await openSession();
        const res = await openEvents(session);
        expect(res.statusCode).toBe(200);
        expect(res.headers['content-type']).toBe('text/event-stream');
        const events = new SseReader(res);

        expect(await events.next()).toBe(`event: endpoint\ndata: /mcp?sessionId=${session}`);

        const subscribed = await send(
            { jsonrpc: '2.0', id: 9, method: 'resources/subscribe', params: { uri: 'file:///notes.txt' } },
            { session },
        );
        expect(subscribed.body).toEqual({ jsonrpc: '2.0', id: 9, result: {} });
        expect(server.notifyResourceUpdated('file:///notes.txt')).toBe(1);

        expect(await events.next()).toBe(
            'data: {"jsonrpc":"2.0","method":"resources/updated","params":{"uri":"file:///notes.txt"}}',
        );
        events.close();
    });

    it('should refuse a second stream for the same session', async () => {
        const session = await openSession();
        const first = await openEvents(session);
        const second = await fetch(`${base}/mcp/events`, { headers: { [SESSION_HEADER]: session } });

        expect(first.statusCode).toBe(200);
        expect(second.status).toBe(409);
        expect(await second.json()).toEqual({ error: 'Session already has an event stream' });
        first.destroy();
    });

    it('should refuse pushes to sessions without a stream', async () => {
        await openSession();
        const [connection] = server.connections;
        expect(connection?.push({ jsonrpc: '2.0', method: 'tools/list_changed' })).toBe(false);
    });
});
