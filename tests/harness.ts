/**
 * Shared fixtures: an McpServer wired to in-process MemoryClients.
 */
import { isRecord, type JsonRpcErrorObject, type JsonRpcResponse } from '../src/protocol/jsonrpc.js';
import { McpServer } from '../src/server/McpServer.js';
import { type McpServerOptions } from '../src/server/config.js';
import { type Connection } from '../src/server/Connection.js';
import { MemoryClient, MemoryTransport } from '../src/transport/MemoryTransport.js';

export const PROTOCOL_VERSION = '2024-11-05';
export const NEWER_PROTOCOL_VERSION = '2025-03-26';

export function createServer(options?: Partial<McpServerOptions>): McpServer {
    return new McpServer({
        name: 'test-server',
        version: '1.0.0',
        protocolVersions: [PROTOCOL_VERSION, NEWER_PROTOCOL_VERSION],
        ...options,
    });
}

export interface ClientFixture {
    readonly client: MemoryClient;
    readonly transport: MemoryTransport;
    readonly connection: Connection;
}

/** Connect a client; by default the handshake is completed. */
export async function connectClient(server: McpServer, options?: { initialize?: boolean }): Promise<ClientFixture> {
    const transport = new MemoryTransport();
    const connection = server.connect(transport);
    const client = new MemoryClient(transport);
    if (options?.initialize ?? true) {
        resultOf(await client.initialize(PROTOCOL_VERSION));
        client.notify('notifications/initialized');
    }
    return { client, transport, connection };
}

export function resultOf(response: JsonRpcResponse): Record<string, unknown> {
    if ('error' in response) {
        throw new Error(`expected a result, got ${response.error.code} ${response.error.message}`);
    }
    if (!isRecord(response.result)) throw new Error('result is not an object');
    return response.result;
}

export function errorOf(response: JsonRpcResponse): JsonRpcErrorObject {
    if (!('error' in response)) throw new Error('expected an error response');
    return response.error;
}

/** Names of the items in a `tools` / `prompts` list result. */
export function namesOf(result: Record<string, unknown>, key: string): string[] {
    const items = result[key];
    if (!Array.isArray(items)) throw new Error(`${key} is not an array`);
    return items.map((item: unknown) => isRecord(item) && typeof item['name'] === 'string' ? item['name'] : '?');
}

/** Text of the first content block of a tool result. */
export function textOf(result: Record<string, unknown>): string {
    const content = result['content'];
    const first: unknown = Array.isArray(content) ? content[0] : undefined;
    return isRecord(first) && typeof first['text'] === 'string' ? first['text'] : '';
}

export function deferred<T = void>(): { promise: Promise<T>; resolve: (value: T) => void } {
    let resolve: (value: T) => void = () => undefined;
    const promise = new Promise<T>((r) => { resolve = r; });
    return { promise, resolve };
}

export const sleep = (ms: number): Promise<void> => new Promise(resolve => setTimeout(resolve, ms));

/** The value `fn` throws, or undefined. */
export function thrown(fn: () => unknown): unknown {
    try {
        fn();
    } catch (err) {
        return err;
    }
    return undefined;
}
