/**
 * mcp-switchboard — server engine for the Model Context Protocol
 *
 * @module
 */

// ── Server ───────────────────────────────────────────────
export { McpServer } from './server/McpServer.js';
export { Connection, DEFAULT_LOG_LEVEL } from './server/Connection.js';
export {
    DEFAULTS,
    resolveServerOptions,
    type AdvertisedCapabilities,
    type McpServerOptions,
    type ProgressHandler,
    type ResolvedServerOptions,
    type SamplingHandler,
} from './server/config.js';
export type { ServerContext } from './server/ServerContext.js';

// ── Protocol ─────────────────────────────────────────────
export {
    ErrorCode,
    ProtocolError,
    internalError,
    invalidParams,
    invalidRequest,
    methodNotFound,
    parseError,
    promptNotFound,
    resourceNotFound,
    toolNotFound,
} from './protocol/errors.js';
export {
    JSONRPC_VERSION,
    decodeFrame,
    decodeMessage,
    errorResponse,
    notification,
    resultResponse,
    type DecodedFrame,
    type InboundMessage,
    type InboundNotification,
    type InboundRequest,
    type JsonRpcErrorObject,
    type JsonRpcNotification,
    type JsonRpcResponse,
    type RequestId,
} from './protocol/jsonrpc.js';
export { DEFAULT_PROTOCOL_VERSIONS, Method } from './protocol/methods.js';
export {
    LOGGING_LEVELS,
    type CreateMessageParams,
    type LoggingLevel,
    type ProgressParams,
    type ProgressToken,
} from './protocol/schemas.js';
export { formatZodIssues, isValidUri } from './protocol/validation.js';

// ── Registries ───────────────────────────────────────────
export {
    HandlerRegistry,
    type Page,
    type RegistryChange,
    type RegistryOptions,
    type RegistrySnapshot,
} from './registry/HandlerRegistry.js';
export { ToolRegistry } from './registry/ToolRegistry.js';
export { ResourceRegistry } from './registry/ResourceRegistry.js';
export { PromptRegistry } from './registry/PromptRegistry.js';
export { CursorCodec, type CursorCodecOptions, type CursorMode } from './registry/CursorCodec.js';
export { zodTool, toInputSchema, type ZodToolConfig, type ZodToolFn } from './registry/zodTool.js';
export type {
    CallToolResult,
    GetPromptResult,
    HandlerContext,
    HandlerKind,
    McpPrompt,
    McpResource,
    McpTool,
    PromptHandler,
    Registration,
    ResourceContents,
    ResourceHandler,
    ToolHandler,
    TransportKind,
} from './registry/types.js';

// ── Lifecycle / Subscriptions / Dispatch ─────────────────
export { Lifecycle, type LifecycleGate, type LifecycleState } from './lifecycle/Lifecycle.js';
export {
    SubscriptionManager,
    type PushEndpoint,
    type SubscribeOutcome,
    type SubscriptionManagerOptions,
} from './subscriptions/SubscriptionManager.js';
export { Dispatcher } from './dispatch/Dispatcher.js';
export type { DispatchSession, Handshake } from './dispatch/MethodTable.js';

// ── Transports ───────────────────────────────────────────
export type {
    InboundFrame,
    ListenerErrorHandler,
    MalformedFrame,
    Transport,
    TransportHandler,
    TransportListener,
} from './transport/Transport.js';
export { LineStreamTransport, type LineStreamTransportOptions } from './transport/LineStreamTransport.js';
export {
    DEFAULT_HTTP_PATHS,
    HttpServerTransport,
    SESSION_HEADER,
    type HttpPaths,
    type HttpServerTransportOptions,
} from './transport/HttpServerTransport.js';
export { HttpSessionTransport } from './transport/HttpSessionTransport.js';
export { WebSocketTransport } from './transport/WebSocketTransport.js';
export {
    WebSocketServerTransport,
    type WebSocketServerTransportOptions,
} from './transport/WebSocketServerTransport.js';
export { MemoryClient, MemoryTransport } from './transport/MemoryTransport.js';

// ── Observability ────────────────────────────────────────
export {
    createDebugObserver,
    formatDebugEvent,
    type DebugEvent,
    type DebugObserverFn,
} from './observability/DebugObserver.js';
export {
    SpanAttribute,
    SpanStatusCode,
    type AttributeValue,
    type ServerSpan,
    type ServerTracer,
} from './observability/Tracing.js';

// ── Helpers ──────────────────────────────────────────────
export { fail, succeed, type Failure, type Result, type Success } from './result.js';
export {
    assistantMessage,
    blobResource,
    error,
    promptResult,
    success,
    textResource,
    userMessage,
    type PromptMessage,
} from './response.js';
