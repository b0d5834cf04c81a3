/**
 * LineStreamTransport.test.ts — newline-delimited framing over PassThrough streams
 */
import { describe, it, expect } from 'vitest';
import { PassThrough, Writable } from 'node:stream';
import { LineStreamTransport } from '../../src/transport/LineStreamTransport.js';
import { type InboundFrame } from '../../src/transport/Transport.js';
import { success } from '../../src/response.js';
import { createServer, PROTOCOL_VERSION } from '../harness.js';

function streams() {
    const input = new PassThrough();
    const output = new PassThrough();
    const lines: string[] = [];
    let partial = '';
    output.on('data', (chunk: Buffer) => {
        partial += chunk.toString('utf8');
        let newline = partial.indexOf('\n');
        while (newline >= 0) {
            lines.push(partial.slice(0, newline));
            partial = partial.slice(newline + 1);
            newline = partial.indexOf('\n');
        }
    });
    return { input, output, lines };
}

async function collect(transport: LineStreamTransport): Promise<InboundFrame[]> {
    const frames: InboundFrame[] = [];
    for await (const frame of transport.receive()) frames.push(frame);
    return frames;
}

const until = async (predicate: () => boolean): Promise<void> => {
    for (let i = 0; i < 200 && !predicate(); i++) {
        await new Promise(resolve => setTimeout(resolve, 5));
    }
};

// ============================================================================
// Framing
// ============================================================================

describe('LineStreamTransport: framing', () => {
    it('should split frames on newlines across chunk boundaries', async () => {
        const { input, output } = streams();
        const transport = new LineStreamTransport({ input, output });
        const frames = collect(transport);

        input.write('{"jsonrpc":"2.0","id":1,"meth');
        input.write('od":"ping"}\r\n\n{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
        input.end();

        expect(await frames).toEqual([
            { kind: 'request', id: 1, method: 'ping', params: undefined },
            { kind: 'notification', method: 'notifications/initialized', params: undefined },
        ]);
    });

    it('should decode a multi-byte character split across chunks', async () => {
        const { input, output } = streams();
        const transport = new LineStreamTransport({ input, output });
        const frames = collect(transport);

        const bytes = Buffer.from('{"jsonrpc":"2.0","id":1,"method":"ping","params":{"s":"é"}}\n', 'utf8');
        const cut = bytes.indexOf(0xc3) + 1;
        input.write(bytes.subarray(0, cut));
        input.write(bytes.subarray(cut));
        input.end();

        expect(await frames).toEqual([{ kind: 'request', id: 1, method: 'ping', params: { s: 'é' } }]);
    });

    it('should deliver a final line without a trailing newline at end of input', async () => {
        const { input, output } = streams();
        const transport = new LineStreamTransport({ input, output });
        const frames = collect(transport);

        input.end('{"jsonrpc":"2.0","id":"last","method":"ping"}');

        expect(await frames).toEqual([{ kind: 'request', id: 'last', method: 'ping', params: undefined }]);
    });

    it('should report a malformed line without ending the stream', async () => {
        const { input, output } = streams();
        const transport = new LineStreamTransport({ input, output });
        const frames = collect(transport);

        input.write('not json\n{"jsonrpc":"2.0","id":2,"method":"ping"}\n');
        input.end();

        const [bad, good] = await frames;
        expect(bad).toMatchObject({ kind: 'malformed', id: null, fatal: false, error: { code: -32700 } });
        expect(good).toEqual({ kind: 'request', id: 2, method: 'ping', params: undefined });
    });

    it('should end with a fatal parse error when a line exceeds the frame limit', async () => {
        const { input, output } = streams();
        const transport = new LineStreamTransport({ input, output, maxFrameBytes: 16 });
        const frames = collect(transport);

        input.write('{"jsonrpc":"2.0","id":1,"method":"ping"');

        const [only, ...rest] = await frames;
        expect(rest).toEqual([]);
        expect(only).toMatchObject({
            kind: 'malformed',
            fatal: true,
            error: { code: -32700, message: 'Parse error: frame exceeds 16 bytes without a newline' },
        });
    });

    it('should write one JSON document per line', async () => {
        const { input, output, lines } = streams();
        const transport = new LineStreamTransport({ input, output });

        transport.send({ jsonrpc: '2.0', id: 1, result: {} });
        transport.push({ jsonrpc: '2.0', method: 'tools/list_changed' });
        await transport.close();

        expect(lines).toEqual([
            '{"jsonrpc":"2.0","id":1,"result":{}}',
            '{"jsonrpc":"2.0","method":"tools/list_changed"}',
        ]);
        expect(transport.send({ jsonrpc: '2.0', id: 2, result: {} })).toBe(false);
    });
});

// ============================================================================
// Stream errors
// ============================================================================

describe('LineStreamTransport: stream errors', () => {
    it('should end the inbound stream when a write fails', async () => {
        const input = new PassThrough();
        const output = new Writable({
            write(_chunk, _encoding, callback) {
                callback(new Error('write EPIPE'));
            },
        });
        const transport = new LineStreamTransport({ input, output });
        const frames = collect(transport);

        expect(transport.send({ jsonrpc: '2.0', id: 1, result: {} })).toBe(true);

        expect(await frames).toEqual([]);
        expect(transport.send({ jsonrpc: '2.0', id: 2, result: {} })).toBe(false);
    });

    it('should absorb input errors raised after close', async () => {
        const { input, output } = streams();
        const transport = new LineStreamTransport({ input, output });
        await transport.close();

        input.destroy(new Error('read ECONNRESET'));
        await new Promise(resolve => setImmediate(resolve));

        expect(input.destroyed).toBe(true);
    });

    it('should close the connection when its output fails', async () => {
        const server = createServer();
        const input = new PassThrough();
        const output = new Writable({
            write(_chunk, _encoding, callback) {
                callback(new Error('write EPIPE'));
            },
        });
        const connection = server.connect(new LineStreamTransport({ input, output }));

        input.write('{"jsonrpc":"2.0","id":1,"method":"ping"}\n');
        await until(() => connection.lifecycle.isClosed());

        expect(connection.lifecycle.state).toBe('closed');
        await server.close();
    });
});

// ============================================================================
// With a server
// ============================================================================

describe('LineStreamTransport: server session', () => {
    it('should run a full handshake and tool call over the streams', async () => {
        const server = createServer();
        server.addTool({ name: 'greet', inputSchema: { type: 'object' } }, () => success('hello'));
        const { input, output, lines } = streams();
        server.connect(new LineStreamTransport({ input, output }));

        input.write(`${JSON.stringify({
            jsonrpc: '2.0',
            id: 1,
            method: 'initialize',
            params: { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: { name: 'cli', version: '0.1.0' } },
        })}\n`);
        await until(() => lines.length >= 1);
        input.write('{"jsonrpc":"2.0","method":"notifications/initialized"}\n');
        input.write('{"jsonrpc":"2.0","id":2,"method":"tools/call","params":{"name":"greet"}}\n');
        await until(() => lines.length >= 2);

        const handshake: unknown = JSON.parse(lines[0] ?? '');
        expect(handshake).toMatchObject({ id: 1, result: { protocolVersion: PROTOCOL_VERSION } });
        expect(JSON.parse(lines[1] ?? '')).toEqual({
            jsonrpc: '2.0',
            id: 2,
            result: { content: [{ type: 'text', text: 'hello' }] },
        });
        await server.close();
    });

    it('should answer the oversize error and then close the connection', async () => {
        const server = createServer();
        const { input, output, lines } = streams();
        const connection = server.connect(new LineStreamTransport({ input, output, maxFrameBytes: 32 }));

        input.write('x'.repeat(64));
        await until(() => connection.lifecycle.isClosed());

        expect(connection.lifecycle.state).toBe('closed');
        expect(JSON.parse(lines[0] ?? '')).toEqual({
            jsonrpc: '2.0',
            id: null,
            error: { code: -32700, message: 'Parse error: frame exceeds 32 bytes without a newline' },
        });
        await server.close();
    });
});
