/**
 * Operations — the method table of the engine
 *
 * Each entry names its lifecycle gate, its params schema, its semantic
 * validator and the operation that runs once all three pass. Registry reads
 * take one snapshot per call; handlers run with no lock held.
 *
 * @module
 */
import {
    ProtocolError,
    ErrorCode,
    promptNotFound,
    resourceNotFound,
    toolNotFound,
} from '../protocol/errors.js';
import { notification } from '../protocol/jsonrpc.js';
import { Method } from '../protocol/methods.js';
import {
    CallToolParamsSchema,
    CreateMessageParamsSchema,
    EmptyParamsSchema,
    GetPromptParamsSchema,
    InitializeParamsSchema,
    PaginatedParamsSchema,
    ProgressParamsSchema,
    ResourceUriParamsSchema,
    SetLevelParamsSchema,
    levelRank,
    type ProgressToken,
} from '../protocol/schemas.js';
import {
    validateCallTool,
    validateCreateMessage,
    validateGetPrompt,
    validateInitialize,
    validateProgress,
    validateResourceUri,
} from '../protocol/validation.js';
import { type HandlerRegistry } from '../registry/HandlerRegistry.js';
import { type HandlerContext, type HandlerKind, type Registration } from '../registry/types.js';
import { SpanAttribute } from '../observability/Tracing.js';
import { type ServerContext } from '../server/ServerContext.js';
import { defineMethod, type MethodDefinition, type OperationContext } from './MethodTable.js';

// ── Handler Context ──────────────────────────────────────

export function createHandlerContext(op: OperationContext, progressToken?: ProgressToken): HandlerContext {
    const { session } = op;
    return {
        connectionId: session.id,
        transport: session.transportKind,
        progressToken,
        reportProgress(progress, total, message) {
            if (progressToken === undefined) return false;
            const params: Record<string, unknown> = { progressToken, progress };
            if (total !== undefined) params['total'] = total;
            if (message !== undefined) params['message'] = message;
            return session.push(notification(Method.Progress, params));
        },
        log(level, data, logger) {
            if (levelRank(level) < levelRank(session.logLevel)) return false;
            const params: Record<string, unknown> = logger === undefined ? { level, data } : { level, logger, data };
            return session.push(notification(Method.LoggingMessage, params));
        },
    };
}

// ── Helpers ──────────────────────────────────────────────

/** Query parameters of a uri, which may be relative. */
export function queryParams(uri: string): Record<string, string> {
    const start = uri.indexOf('?');
    if (start < 0) return {};
    const end = uri.indexOf('#', start);
    const search = uri.slice(start + 1, end < 0 ? undefined : end);
    return Object.fromEntries(new URLSearchParams(search));
}

/**
 * Expand each registration of one snapshot into the items it lists,
 * falling back to its own metadata.
 */
async function expand<K extends HandlerKind, T>(
    registry: HandlerRegistry<K>,
    pick: (registration: Registration<K>) => Promise<T[]>,
): Promise<T[]> {
    const { entries } = registry.snapshot();
    const lists = await Promise.all(entries.map(pick));
    return lists.flat();
}

function page<T>(key: string, items: T[], nextCursor: string | undefined): Record<string, unknown> {
    return nextCursor === undefined ? { [key]: items } : { [key]: items, nextCursor };
}

async function listOrSelf<T>(handler: { list?(): Promise<T[]> | T[] }, self: T): Promise<T[]> {
    return handler.list ? await handler.list() : [self];
}

// ── Table ────────────────────────────────────────────────

export function buildMethodTable(server: ServerContext): ReadonlyMap<string, MethodDefinition> {
    const { options } = server;
    const definitions: MethodDefinition[] = [
        // ── Lifecycle ────────────────────────────────────
        defineMethod(Method.Initialize, {
            kind: 'request',
            gate: 'uninitialized',
            params: InitializeParamsSchema,
            validate: validateInitialize,
            run(params, { session }) {
                session.lifecycle.advance('initializing');
                if (!options.protocolVersions.includes(params.protocolVersion)) {
                    session.lifecycle.rejectHandshake();
                    throw new ProtocolError(
                        ErrorCode.InvalidParams,
                        `Unsupported protocol version: ${params.protocolVersion}`,
                        { supported: options.protocolVersions, requested: params.protocolVersion },
                    );
                }
                session.completeHandshake({
                    protocolVersion: params.protocolVersion,
                    clientInfo: params.clientInfo,
                    capabilities: params.capabilities,
                });
                session.lifecycle.advance('ready');

                const result: Record<string, unknown> = {
                    protocolVersion: params.protocolVersion,
                    capabilities: options.capabilities,
                    serverInfo: options.serverInfo,
                };
                if (options.instructions !== undefined) result['instructions'] = options.instructions;
                return result;
            },
        }),
        defineMethod(Method.Initialized, {
            kind: 'notification',
            gate: 'ready',
            params: EmptyParamsSchema,
            run: () => undefined,
        }),
        defineMethod(Method.Ping, {
            kind: 'request',
            gate: 'open',
            params: EmptyParamsSchema,
            run: () => ({}),
        }),

        // ── Tools ────────────────────────────────────────
        defineMethod(Method.ToolsList, {
            kind: 'request',
            gate: 'ready',
            params: PaginatedParamsSchema,
            run(params) {
                const { items, nextCursor } = server.tools.list(options.pageSize, params.cursor);
                return page('tools', items.map(entry => entry.metadata), nextCursor);
            },
        }),
        defineMethod(Method.ToolsCall, {
            kind: 'request',
            gate: 'ready',
            params: CallToolParamsSchema,
            validate: validateCallTool,
            async run(params, op) {
                const registration = server.tools.get(params.name);
                if (!registration) throw toolNotFound(params.name);
                op.span?.setAttribute(SpanAttribute.Tool, params.name);
                return registration.handler.call(
                    params.arguments ?? {},
                    createHandlerContext(op, params._meta?.progressToken),
                );
            },
        }),

        // ── Resources ────────────────────────────────────
        defineMethod(Method.ResourcesList, {
            kind: 'request',
            gate: 'ready',
            params: PaginatedParamsSchema,
            async run(params) {
                const all = await expand(server.resources, entry => listOrSelf(entry.handler, entry.metadata));
                const { items, nextCursor } = server.resources.paginate(all, options.pageSize, params.cursor);
                return page('resources', items, nextCursor);
            },
        }),
        defineMethod(Method.ResourcesRead, {
            kind: 'request',
            gate: 'ready',
            params: ResourceUriParamsSchema,
            validate: validateResourceUri,
            async run({ uri }, op) {
                const registration = server.resources.resolve(uri);
                if (!registration) throw resourceNotFound(uri);
                const contents = await registration.handler.read(uri, queryParams(uri), createHandlerContext(op));
                return { contents };
            },
        }),
        defineMethod(Method.ResourcesSubscribe, {
            kind: 'request',
            gate: 'ready',
            params: ResourceUriParamsSchema,
            validate: validateResourceUri,
            async run({ uri }, { session }) {
                const registration = server.resources.resolve(uri);
                if (!registration) throw resourceNotFound(uri);
                if (server.subscriptions.subscribe(session.id, uri) !== 'added') return {};
                try {
                    await registration.handler.subscribe?.(uri);
                } catch (err) {
                    server.subscriptions.unsubscribe(session.id, uri);
                    throw err;
                }
                return {};
            },
        }),
        defineMethod(Method.ResourcesUnsubscribe, {
            kind: 'request',
            gate: 'ready',
            params: ResourceUriParamsSchema,
            validate: validateResourceUri,
            async run({ uri }, { session }) {
                const existed = server.subscriptions.unsubscribe(session.id, uri);
                const registration = existed ? server.resources.resolve(uri) : undefined;
                await registration?.handler.unsubscribe?.(uri);
                return {};
            },
        }),

        // ── Prompts ──────────────────────────────────────
        defineMethod(Method.PromptsList, {
            kind: 'request',
            gate: 'ready',
            params: PaginatedParamsSchema,
            async run(params) {
                const all = await expand(server.prompts, entry => listOrSelf(entry.handler, entry.metadata));
                const { items, nextCursor } = server.prompts.paginate(all, options.pageSize, params.cursor);
                return page('prompts', items, nextCursor);
            },
        }),
        defineMethod(Method.PromptsGet, {
            kind: 'request',
            gate: 'ready',
            params: GetPromptParamsSchema,
            validate: validateGetPrompt,
            async run(params, op) {
                const registration = server.prompts.get(params.name);
                if (!registration) throw promptNotFound(params.name);
                return registration.handler.get(params.arguments ?? {}, createHandlerContext(op));
            },
        }),

        // ── Logging / Progress ───────────────────────────
        defineMethod(Method.LoggingSetLevel, {
            kind: 'request',
            gate: 'ready',
            params: SetLevelParamsSchema,
            run({ level }, { session }) {
                session.setLogLevel(level);
                return {};
            },
        }),
        defineMethod(Method.Progress, {
            kind: 'notification',
            gate: 'ready',
            params: ProgressParamsSchema,
            validate: validateProgress,
            run(params, { session }) {
                options.onProgress?.(params, session.id);
            },
        }),
    ];

    const { sampling } = options;
    if (sampling) {
        definitions.push(defineMethod(Method.SamplingCreateMessage, {
            kind: 'request',
            gate: 'ready',
            params: CreateMessageParamsSchema,
            validate: validateCreateMessage,
            run: (params, op) => sampling(params, createHandlerContext(op)),
        }));
    }

    return new Map(definitions.map(definition => [definition.method, definition]));
}
