/**
 * SubscriptionManager — resource interest and server pushes
 *
 * Shared by every connection of a server. Tracks which connections follow
 * which resource uris and fans notifications out to them:
 *
 * - `resources/updated` to the subscribers of one uri
 * - `*\/list_changed` to every Ready connection
 * - `logging/message` to every Ready connection at or below the level
 *
 * All bookkeeping is synchronous. Pushes only enqueue onto each
 * connection's bounded outbound queue; a refused push (connection closed or
 * queue full) prunes that subscriber instead of blocking the producer.
 *
 * @module
 */
import { LIST_CHANGED_METHOD, Method } from '../protocol/methods.js';
import { notification, type JsonRpcNotification } from '../protocol/jsonrpc.js';
import { levelRank, type LoggingLevel } from '../protocol/schemas.js';
import { type HandlerKind } from '../registry/types.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';

/** What the manager needs from a connection. */
export interface PushEndpoint {
    readonly id: string;
    /** Minimum level for `logging/message`. */
    readonly logLevel: LoggingLevel;
    isReady(): boolean;
    push(message: JsonRpcNotification): boolean;
}

/**
 * Result of {@link SubscriptionManager.subscribe}: `added` for a new entry,
 * `existing` when the connection already followed the uri, `detached` when
 * the connection is not attached.
 */
export type SubscribeOutcome = 'added' | 'existing' | 'detached';

export interface SubscriptionManagerOptions {
    /** Coalesce list-changed broadcasts per kind within this window. 0 sends immediately. */
    listChangedDebounceMs?: number;
    /**
     * Called for each entry the manager drops on its own: when its connection
     * is removed or a push to it is refused. Not called for `unsubscribe`.
     */
    onRelease?: (uri: string, connectionId: string) => void;
    debug?: DebugObserverFn;
}

export class SubscriptionManager {
    private readonly _endpoints = new Map<string, PushEndpoint>();
    /** uri → connection ids */
    private readonly _subscribers = new Map<string, Set<string>>();
    /** connection id → uris */
    private readonly _interests = new Map<string, Set<string>>();
    private readonly _timers = new Map<HandlerKind, ReturnType<typeof setTimeout>>();
    private readonly _debounceMs: number;
    private readonly _onRelease?: (uri: string, connectionId: string) => void;
    private readonly _debug?: DebugObserverFn;

    constructor(options?: SubscriptionManagerOptions) {
        this._debounceMs = Math.max(0, options?.listChangedDebounceMs ?? 0);
        this._onRelease = options?.onRelease;
        this._debug = options?.debug;
    }

    // ── Endpoints ────────────────────────────────────────

    attach(endpoint: PushEndpoint): void {
        this._endpoints.set(endpoint.id, endpoint);
    }

    /** Forget a connection and every subscription it holds. */
    removeConnection(connectionId: string): void {
        this._endpoints.delete(connectionId);
        const uris = this._interests.get(connectionId);
        if (!uris) return;
        this._interests.delete(connectionId);
        for (const uri of uris) {
            this._dropMember(uri, connectionId);
            this._onRelease?.(uri, connectionId);
        }
    }

    get connectionCount(): number {
        return this._endpoints.size;
    }

    // ── Membership ───────────────────────────────────────

    /** Record interest. Idempotent; a detached connection gets no entry. */
    subscribe(connectionId: string, uri: string): SubscribeOutcome {
        if (!this._endpoints.has(connectionId)) return 'detached';

        let members = this._subscribers.get(uri);
        if (!members) {
            members = new Set();
            this._subscribers.set(uri, members);
        }
        if (members.has(connectionId)) return 'existing';
        members.add(connectionId);

        let uris = this._interests.get(connectionId);
        if (!uris) {
            uris = new Set();
            this._interests.set(connectionId, uris);
        }
        uris.add(uri);
        return 'added';
    }

    /** Returns whether an entry existed. */
    unsubscribe(connectionId: string, uri: string): boolean {
        const existed = this._subscribers.get(uri)?.has(connectionId) ?? false;
        this._dropMember(uri, connectionId);
        const uris = this._interests.get(connectionId);
        uris?.delete(uri);
        if (uris?.size === 0) this._interests.delete(connectionId);
        return existed;
    }

    isSubscribed(connectionId: string, uri: string): boolean {
        return this._subscribers.get(uri)?.has(connectionId) ?? false;
    }

    subscribersOf(uri: string): string[] {
        return [...(this._subscribers.get(uri) ?? [])];
    }

    subscriptionsOf(connectionId: string): string[] {
        return [...(this._interests.get(connectionId) ?? [])];
    }

    // ── Emission ─────────────────────────────────────────

    /** Push `resources/updated` to every Ready subscriber of `uri`. Returns the delivered count. */
    emitUpdated(uri: string): number {
        const members = this._subscribers.get(uri);
        if (!members || members.size === 0) return 0;

        const message = notification(Method.ResourcesUpdated, { uri });
        let delivered = 0;
        let pruned = 0;
        for (const connectionId of [...members]) {
            const endpoint = this._endpoints.get(connectionId);
            if (endpoint && !endpoint.isReady()) continue;
            if (endpoint?.push(message)) {
                delivered++;
            } else {
                this.unsubscribe(connectionId, uri);
                this._onRelease?.(uri, connectionId);
                pruned++;
            }
        }
        this._emitPush(Method.ResourcesUpdated, delivered, pruned);
        return delivered;
    }

    /**
     * Broadcast the list-changed notification of `kind` to every Ready
     * connection. With a debounce window, returns 0 and sends once the
     * window closes.
     */
    emitListChanged(kind: HandlerKind): number {
        if (this._debounceMs === 0) return this._broadcast(notification(LIST_CHANGED_METHOD[kind]));

        const pending = this._timers.get(kind);
        if (pending) clearTimeout(pending);
        const timer = setTimeout(() => {
            this._timers.delete(kind);
            this._broadcast(notification(LIST_CHANGED_METHOD[kind]));
        }, this._debounceMs);
        timer.unref();
        this._timers.set(kind, timer);
        return 0;
    }

    /** Push `logging/message` to every Ready connection whose threshold admits `level`. */
    emitLog(level: LoggingLevel, data: unknown, logger?: string): number {
        const params: Record<string, unknown> = logger === undefined ? { level, data } : { level, logger, data };
        const message = notification(Method.LoggingMessage, params);
        return this._broadcast(message, endpoint => levelRank(level) >= levelRank(endpoint.logLevel));
    }

    /** Cancel pending debounced broadcasts. */
    close(): void {
        for (const timer of this._timers.values()) clearTimeout(timer);
        this._timers.clear();
    }

    // ── Internals ────────────────────────────────────────

    private _broadcast(message: JsonRpcNotification, admit?: (endpoint: PushEndpoint) => boolean): number {
        let delivered = 0;
        for (const endpoint of this._endpoints.values()) {
            if (!endpoint.isReady() || (admit && !admit(endpoint))) continue;
            if (endpoint.push(message)) delivered++;
        }
        this._emitPush(message.method, delivered, 0);
        return delivered;
    }

    private _dropMember(uri: string, connectionId: string): void {
        const members = this._subscribers.get(uri);
        if (!members) return;
        members.delete(connectionId);
        if (members.size === 0) this._subscribers.delete(uri);
    }

    private _emitPush(method: string, delivered: number, pruned: number): void {
        this._debug?.({ type: 'push', method, delivered, pruned, timestamp: Date.now() });
    }
}
