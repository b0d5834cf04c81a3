/**
 * Handler Capabilities — the three closed variants a registry stores
 *
 * The engine never inspects a handler; it only invokes the capability
 * matching the registration's `kind`.
 *
 * @module
 */
import {
    type CallToolResult,
    type GetPromptResult,
    type Prompt as McpPrompt,
    type ReadResourceResult,
    type Resource as McpResource,
    type Tool as McpTool,
} from '@modelcontextprotocol/sdk/types.js';
import { type LoggingLevel, type ProgressToken } from '../protocol/schemas.js';

export type { CallToolResult, GetPromptResult, McpPrompt, McpResource, McpTool };

export type ResourceContents = ReadResourceResult['contents'][number];

export type TransportKind = 'line-stream' | 'http' | 'websocket' | 'memory';

// ── Invocation Context ───────────────────────────────────

/** Per-call view of the issuing connection. */
export interface HandlerContext {
    readonly connectionId: string;
    readonly transport: TransportKind;
    /** Present when the request carried `_meta.progressToken`. */
    readonly progressToken?: ProgressToken;
    /** Push a `progress` notification. Returns false when no token was given or the push was refused. */
    reportProgress(progress: number, total?: number, message?: string): boolean;
    /** Push `logging/message` to this connection, honouring its threshold. */
    log(level: LoggingLevel, data: unknown, logger?: string): boolean;
}

// ── Capability Sets ──────────────────────────────────────

export interface ToolHandler {
    call(args: Record<string, unknown>, ctx: HandlerContext): Promise<CallToolResult> | CallToolResult;
}

export interface ResourceHandler {
    /** `params` holds the query parameters of `uri`. */
    read(
        uri: string,
        params: Readonly<Record<string, string>>,
        ctx: HandlerContext,
    ): Promise<ResourceContents[]> | ResourceContents[];
    /** Concrete resources behind this registration; defaults to the registration metadata. */
    list?(): Promise<McpResource[]> | McpResource[];
    subscribe?(uri: string): Promise<void> | void;
    unsubscribe?(uri: string): Promise<void> | void;
}

export interface PromptHandler {
    get(args: Readonly<Record<string, string>>, ctx: HandlerContext): Promise<GetPromptResult> | GetPromptResult;
    /** Concrete prompts behind this registration; defaults to the registration metadata. */
    list?(): Promise<McpPrompt[]> | McpPrompt[];
}

// ── Registrations ────────────────────────────────────────

interface CapabilityMap {
    tool: { metadata: McpTool; handler: ToolHandler };
    resource: { metadata: McpResource; handler: ResourceHandler };
    prompt: { metadata: McpPrompt; handler: PromptHandler };
}

export type HandlerKind = keyof CapabilityMap;

export type MetadataOf<K extends HandlerKind> = CapabilityMap[K]['metadata'];
export type HandlerOf<K extends HandlerKind> = CapabilityMap[K]['handler'];

/** Immutable registry entry, shared by reference with in-flight dispatches. */
export interface Registration<K extends HandlerKind> {
    readonly kind: K;
    readonly key: string;
    readonly metadata: MetadataOf<K>;
    readonly handler: HandlerOf<K>;
}
