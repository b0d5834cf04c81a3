/**
 * McpServer — facade over registries, subscriptions and connections
 *
 * Owns the state every connection shares (the three registries and the
 * subscription manager) and wires one Lifecycle and receive loop per
 * accepted transport. Registry mutations broadcast the matching
 * `*\/list_changed` notification on their own; registering code never has
 * to.
 *
 * @example
 * ```typescript
 * import { z } from 'zod';
 * import { McpServer, LineStreamTransport, success, error } from 'mcp-switchboard';
 *
 * const server = new McpServer({ name: 'calculator', version: '1.0.0' });
 *
 * server.tool('divide', {
 *     description: 'Divide a by b',
 *     schema: z.object({ a: z.number(), b: z.number() }),
 * }, ({ a, b }) => b === 0 ? error('Division by zero') : success(String(a / b)));
 *
 * server.connect(new LineStreamTransport());
 * ```
 *
 * @module
 */
import { type LoggingLevel } from '../protocol/schemas.js';
import { describeError } from '../protocol/errors.js';
import { CursorCodec } from '../registry/CursorCodec.js';
import { type HandlerRegistry } from '../registry/HandlerRegistry.js';
import { ToolRegistry } from '../registry/ToolRegistry.js';
import { ResourceRegistry } from '../registry/ResourceRegistry.js';
import { PromptRegistry } from '../registry/PromptRegistry.js';
import { zodTool, type ZodToolConfig, type ZodToolFn } from '../registry/zodTool.js';
import {
    type HandlerKind,
    type McpPrompt,
    type McpResource,
    type McpTool,
    type PromptHandler,
    type ResourceHandler,
    type ToolHandler,
} from '../registry/types.js';
import { SubscriptionManager } from '../subscriptions/SubscriptionManager.js';
import { Dispatcher } from '../dispatch/Dispatcher.js';
import { guardObserver } from '../observability/DebugObserver.js';
import { type Transport, type TransportListener } from '../transport/Transport.js';
import { resolveServerOptions, type McpServerOptions, type ResolvedServerOptions } from './config.js';
import { Connection } from './Connection.js';
import { type ServerContext } from './ServerContext.js';

export class McpServer {
    readonly tools: ToolRegistry;
    readonly resources: ResourceRegistry;
    readonly prompts: PromptRegistry;
    readonly subscriptions: SubscriptionManager;
    readonly options: ResolvedServerOptions;

    private readonly _context: ServerContext;
    private readonly _dispatcher: Dispatcher;
    private readonly _connections = new Map<string, Connection>();
    private readonly _runs = new Set<Promise<void>>();
    private readonly _listeners: TransportListener[] = [];
    private _closed = false;

    constructor(options: McpServerOptions) {
        this.options = resolveServerOptions(options);
        const debug = guardObserver(this.options.debug);
        const cursor = new CursorCodec({ secret: this.options.cursorSecret });

        this.tools = new ToolRegistry({ cursor });
        this.resources = new ResourceRegistry({ cursor });
        this.prompts = new PromptRegistry({ cursor });
        this.subscriptions = new SubscriptionManager({
            listChangedDebounceMs: this.options.listChangedDebounceMs,
            onRelease: (uri, connectionId) => { this._releaseSubscription(uri, connectionId); },
            debug,
        });

        this._announceChanges(this.tools);
        this._announceChanges(this.resources);
        this._announceChanges(this.prompts);

        this._context = {
            tools: this.tools,
            resources: this.resources,
            prompts: this.prompts,
            subscriptions: this.subscriptions,
            options: this.options,
            debug,
        };
        this._dispatcher = new Dispatcher(this._context);
    }

    private _announceChanges<K extends HandlerKind>(registry: HandlerRegistry<K>): void {
        registry.onChange(change => { this.subscriptions.emitListChanged(change.kind); });
    }

    /** Balance the handler's subscribe hook for an entry dropped without `resources/unsubscribe`. */
    private _releaseSubscription(uri: string, connectionId: string): void {
        const handler = this.resources.resolve(uri)?.handler;
        if (!handler?.unsubscribe) return;
        void Promise.resolve()
            .then(() => handler.unsubscribe?.(uri))
            .catch((err: unknown) => {
                this._context.debug?.({
                    type: 'error',
                    connectionId,
                    method: 'resources/unsubscribe',
                    step: 'handler',
                    error: describeError(err),
                    timestamp: Date.now(),
                });
            });
    }

    // ── Registration ─────────────────────────────────────

    addTool(tool: McpTool, handler: ToolHandler | ToolHandler['call']): this {
        this.tools.register(tool, typeof handler === 'function' ? { call: handler } : handler);
        return this;
    }

    /** Register a tool whose arguments are described and parsed by a zod schema. */
    tool<TArgs>(name: string, config: ZodToolConfig<TArgs>, fn: ZodToolFn<TArgs>): this {
        const { tool, handler } = zodTool(name, config, fn);
        this.tools.register(tool, handler);
        return this;
    }

    removeTool(name: string): boolean {
        return this.tools.remove(name);
    }

    addResource(resource: McpResource, handler: ResourceHandler | ResourceHandler['read']): this {
        this.resources.register(resource, typeof handler === 'function' ? { read: handler } : handler);
        return this;
    }

    removeResource(uri: string): boolean {
        return this.resources.remove(uri);
    }

    addPrompt(prompt: McpPrompt, handler: PromptHandler | PromptHandler['get']): this {
        this.prompts.register(prompt, typeof handler === 'function' ? { get: handler } : handler);
        return this;
    }

    removePrompt(name: string): boolean {
        return this.prompts.remove(name);
    }

    // ── Pushes ───────────────────────────────────────────

    /** Push `resources/updated` to the subscribers of `uri`. Returns the delivered count. */
    notifyResourceUpdated(uri: string): number {
        return this.subscriptions.emitUpdated(uri);
    }

    /** Push `logging/message` to every Ready connection whose level admits it. */
    sendLog(level: LoggingLevel, data: unknown, logger?: string): number {
        return this.subscriptions.emitLog(level, data, logger);
    }

    // ── Connections ──────────────────────────────────────

    get connections(): Connection[] {
        return [...this._connections.values()];
    }

    /** Serve one transport. The connection runs until the transport ends or the server closes. */
    connect(transport: Transport): Connection {
        if (this._closed) throw new Error('McpServer is closed');

        const connection = new Connection(transport, this._dispatcher, this._context);
        this._connections.set(connection.id, connection);

        const run: Promise<void> = connection.run()
            .catch((err: unknown) => {
                this._context.debug?.({
                    type: 'error',
                    connectionId: connection.id,
                    step: 'transport',
                    error: describeError(err),
                    timestamp: Date.now(),
                });
            })
            .finally(() => {
                this._connections.delete(connection.id);
                this._runs.delete(run);
            });
        this._runs.add(run);
        return connection;
    }

    /** Accept every client of `listener`. Resolves once it is listening. */
    async listen(listener: TransportListener): Promise<void> {
        if (this._closed) throw new Error('McpServer is closed');
        this._listeners.push(listener);
        await listener.listen(
            transport => { this.connect(transport); },
            err => {
                this._context.debug?.({ type: 'error', step: 'listener', error: describeError(err), timestamp: Date.now() });
            },
        );
    }

    /** Shut down every connection (with the grace period), then every listener. */
    async close(): Promise<void> {
        if (this._closed) return;
        this._closed = true;

        await Promise.all(this.connections.map(connection => connection.shutdown()));
        await Promise.all(this._listeners.map(listener => listener.close()));
        await Promise.allSettled([...this._runs]);
        this.subscriptions.close();
    }
}
