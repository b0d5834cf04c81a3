/**
 * Server Configuration — options, defaults and resolution
 *
 * @module
 */
import {
    type CreateMessageResult,
    type Implementation,
    type ServerCapabilities,
} from '@modelcontextprotocol/sdk/types.js';
import { DEFAULT_PROTOCOL_VERSIONS } from '../protocol/methods.js';
import { type CreateMessageParams, type ProgressParams } from '../protocol/schemas.js';
import { type HandlerContext } from '../registry/types.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type ServerTracer } from '../observability/Tracing.js';

// ── Collaborator Hooks ───────────────────────────────────

/** Receives validated `sampling/createMessage` requests. */
export type SamplingHandler = (
    params: CreateMessageParams,
    ctx: HandlerContext,
) => Promise<CreateMessageResult> | CreateMessageResult;

/** Receives validated inbound `progress` notifications. */
export type ProgressHandler = (params: ProgressParams, connectionId: string) => void;

/** Server capabilities plus the sampling group the MCP SDK models on the client side. */
export type AdvertisedCapabilities = ServerCapabilities & {
    sampling?: Record<string, unknown>;
};

// ── Options ──────────────────────────────────────────────

export interface McpServerOptions {
    /** Server identity returned by `initialize`. */
    name: string;
    version: string;
    /** Free-text usage hints returned by `initialize`. */
    instructions?: string;
    /** Accepted protocol versions. Default: every version the MCP SDK supports. */
    protocolVersions?: readonly string[];
    /** Replaces the advertised capabilities. */
    capabilities?: AdvertisedCapabilities;
    /** Items per `*\/list` page. Default 50. */
    pageSize?: number;
    /** How long shutdown waits for in-flight calls. Default 5000 ms. */
    shutdownGraceMs?: number;
    /** Coalescing window for list-changed broadcasts. Default 0 (immediate). */
    listChangedDebounceMs?: number;
    /** Key for pagination cursors. Default: random per server. */
    cursorSecret?: string;
    debug?: DebugObserverFn;
    tracing?: ServerTracer;
    /** Enables `sampling/createMessage`. Without it the method is unknown. */
    sampling?: SamplingHandler;
    onProgress?: ProgressHandler;
}

export interface ResolvedServerOptions {
    readonly serverInfo: Implementation;
    readonly instructions?: string;
    readonly protocolVersions: readonly string[];
    readonly capabilities: AdvertisedCapabilities;
    readonly pageSize: number;
    readonly shutdownGraceMs: number;
    readonly listChangedDebounceMs: number;
    readonly cursorSecret?: string;
    readonly debug?: DebugObserverFn;
    readonly tracing?: ServerTracer;
    readonly sampling?: SamplingHandler;
    readonly onProgress?: ProgressHandler;
}

export const DEFAULTS = {
    pageSize: 50,
    shutdownGraceMs: 5_000,
    listChangedDebounceMs: 0,
} as const;

// ── Resolution ───────────────────────────────────────────

function clamp(value: number | undefined, min: number, fallback: number): number {
    if (value === undefined || !Number.isFinite(value)) return fallback;
    return Math.max(min, Math.floor(value));
}

function defaultCapabilities(withSampling: boolean): AdvertisedCapabilities {
    const capabilities: AdvertisedCapabilities = {
        tools: { listChanged: true },
        resources: { subscribe: true, listChanged: true },
        prompts: { listChanged: true },
        logging: {},
    };
    return withSampling ? { ...capabilities, sampling: {} } : capabilities;
}

/**
 * Apply defaults and clamp numeric options.
 *
 * @throws Error when the server identity is empty
 */
export function resolveServerOptions(options: McpServerOptions): ResolvedServerOptions {
    if (options.name.length === 0 || options.version.length === 0) {
        throw new Error('McpServer requires a non-empty name and version');
    }
    const protocolVersions = options.protocolVersions ?? DEFAULT_PROTOCOL_VERSIONS;
    if (protocolVersions.length === 0) {
        throw new Error('McpServer requires at least one protocol version');
    }

    return {
        serverInfo: { name: options.name, version: options.version },
        instructions: options.instructions,
        protocolVersions,
        capabilities: options.capabilities ?? defaultCapabilities(options.sampling !== undefined),
        pageSize: clamp(options.pageSize, 1, DEFAULTS.pageSize),
        shutdownGraceMs: clamp(options.shutdownGraceMs, 0, DEFAULTS.shutdownGraceMs),
        listChangedDebounceMs: clamp(options.listChangedDebounceMs, 0, DEFAULTS.listChangedDebounceMs),
        cursorSecret: options.cursorSecret,
        debug: options.debug,
        tracing: options.tracing,
        sampling: options.sampling,
        onProgress: options.onProgress,
    };
}
