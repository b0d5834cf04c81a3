/**
 * DebugObserver — structured diagnostics for the server engine
 *
 * Typed events emitted at each stage of a connection's life. Nothing is
 * emitted unless a `debug` observer is passed to the server.
 *
 * The default writer prints to **stderr**: stdout carries protocol frames
 * when the line-stream transport runs over stdio.
 *
 * @example
 * ```typescript
 * import { McpServer, createDebugObserver } from 'mcp-switchboard';
 *
 * // Compact lines on stderr (NDJSON with SWITCHBOARD_LOG_FORMAT=json)
 * const server = new McpServer({ name: 'files', version: '1.0.0', debug: createDebugObserver() });
 *
 * // Forward elsewhere
 * const debug = createDebugObserver((event) => metrics.increment(event.type));
 * ```
 *
 * @module
 */
import { type LifecycleState } from '../lifecycle/Lifecycle.js';

// ============================================================================
// Event Types
// ============================================================================

export interface ConnectionEvent {
    readonly type: 'connection';
    readonly connectionId: string;
    readonly transport: string;
    readonly phase: 'open' | 'close';
    readonly timestamp: number;
}

export interface LifecycleEvent {
    readonly type: 'lifecycle';
    readonly connectionId: string;
    readonly from: LifecycleState;
    readonly to: LifecycleState;
    readonly timestamp: number;
}

/** First event of every routed message, before any gate. */
export interface RouteEvent {
    readonly type: 'route';
    readonly connectionId: string;
    readonly method: string;
    readonly id?: string | number | null;
    readonly timestamp: number;
}

/** Emitted once a request has been answered. */
export interface DispatchEvent {
    readonly type: 'dispatch';
    readonly connectionId: string;
    readonly method: string;
    readonly outcome: 'result' | 'error';
    readonly errorCode?: number;
    readonly durationMs: number;
    readonly timestamp: number;
}

/** An unexpected failure: a handler threw, or a write failed. */
export interface ErrorEvent {
    readonly type: 'error';
    readonly connectionId?: string;
    readonly method?: string;
    readonly step: 'decode' | 'handler' | 'transport' | 'listener';
    readonly error: string;
    readonly timestamp: number;
}

export interface PushEvent {
    readonly type: 'push';
    readonly method: string;
    /** Connections that accepted the push. */
    readonly delivered: number;
    /** Subscribers pruned because their push was refused. */
    readonly pruned: number;
    readonly timestamp: number;
}

/** A message discarded without a response. */
export interface DropEvent {
    readonly type: 'drop';
    readonly connectionId: string;
    readonly method?: string;
    readonly reason: string;
    readonly timestamp: number;
}

export type DebugEvent =
    | ConnectionEvent
    | LifecycleEvent
    | RouteEvent
    | DispatchEvent
    | ErrorEvent
    | PushEvent
    | DropEvent;

export type DebugObserverFn = (event: DebugEvent) => void;

// ============================================================================
// Formatting
// ============================================================================

const PREFIX = '[mcp-switchboard]';

/** One human-readable line per event. */
export function formatDebugEvent(event: DebugEvent): string {
    switch (event.type) {
        case 'connection':
            return `${PREFIX} conn      ${event.connectionId} ${event.phase} (${event.transport})`;
        case 'lifecycle':
            return `${PREFIX} state     ${event.connectionId} ${event.from} → ${event.to}`;
        case 'route':
            return `${PREFIX} route     ${event.method}${event.id === undefined ? '' : ` #${String(event.id)}`}`;
        case 'dispatch': {
            const status = event.outcome === 'result' ? '✓' : `✗ ${event.errorCode ?? ''}`;
            return `${PREFIX} dispatch  ${event.method} ${status} ${event.durationMs.toFixed(1)}ms`;
        }
        case 'error':
            return `${PREFIX} ERROR     ${event.method ?? '-'} [${event.step}] ${event.error}`;
        case 'push':
            return `${PREFIX} push      ${event.method} → ${event.delivered}${event.pruned > 0 ? ` (pruned ${event.pruned})` : ''}`;
        case 'drop':
            return `${PREFIX} drop      ${event.method ?? '-'} ${event.reason}`;
    }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Create a debug observer.
 *
 * With a handler, events are forwarded to it. Without one, each event is
 * written to stderr, as text or (with `SWITCHBOARD_LOG_FORMAT=json`) as NDJSON.
 */
export function createDebugObserver(handler?: DebugObserverFn): DebugObserverFn {
    if (handler) return handler;

    const json = process.env['SWITCHBOARD_LOG_FORMAT'] === 'json';
    return (event: DebugEvent): void => {
        process.stderr.write(`${json ? JSON.stringify(event) : formatDebugEvent(event)}\n`);
    };
}

/**
 * Wrap an observer so a throwing observer cannot break dispatch.
 * Returns undefined when no observer is configured.
 */
export function guardObserver(observer: DebugObserverFn | undefined): DebugObserverFn | undefined {
    if (!observer) return undefined;
    return (event: DebugEvent): void => {
        try {
            observer(event);
        } catch {
            // observer failures are ignored
        }
    };
}
