/**
 * MethodTable — typed method definitions with erased parameter types
 *
 * `defineMethod()` binds a zod schema, an optional semantic validator and
 * an operation into a {@link MethodDefinition}. Preparing a definition runs
 * dispatch steps 3 and 4 (decode, validate) and yields a ready-to-run thunk,
 * so the heterogeneous table needs no casts.
 *
 * @module
 */
import { type z } from 'zod';
import { invalidParams } from '../protocol/errors.js';
import { type JsonRpcNotification, type RequestId } from '../protocol/jsonrpc.js';
import { type ClientCapabilities, type ClientInfo, type LoggingLevel } from '../protocol/schemas.js';
import { formatZodIssues } from '../protocol/validation.js';
import { fail, succeed, type Result } from '../result.js';
import { type Lifecycle, type LifecycleGate } from '../lifecycle/Lifecycle.js';
import { type TransportKind } from '../registry/types.js';
import { type ServerSpan } from '../observability/Tracing.js';
import { type ServerContext } from '../server/ServerContext.js';

// ── Session ──────────────────────────────────────────────

export interface Handshake {
    readonly protocolVersion: string;
    readonly clientInfo: ClientInfo;
    readonly capabilities: ClientCapabilities;
}

/** The connection as seen by the dispatcher. */
export interface DispatchSession {
    readonly id: string;
    readonly transportKind: TransportKind;
    readonly lifecycle: Lifecycle;
    readonly logLevel: LoggingLevel;
    readonly handshake?: Handshake;
    setLogLevel(level: LoggingLevel): void;
    completeHandshake(handshake: Handshake): void;
    push(message: JsonRpcNotification): boolean;
}

// ── Definitions ──────────────────────────────────────────

export type MethodKind = 'request' | 'notification';

export interface OperationContext {
    readonly server: ServerContext;
    readonly session: DispatchSession;
    /** Absent for notifications. */
    readonly requestId?: RequestId;
    readonly span?: ServerSpan;
}

export type Operation = (op: OperationContext) => Promise<unknown>;

export interface MethodDefinition {
    readonly method: string;
    readonly kind: MethodKind;
    readonly gate: LifecycleGate;
    /** Decode and validate raw params. */
    prepare(rawParams: unknown): Result<Operation>;
}

export interface MethodShape<TParams> {
    readonly kind: MethodKind;
    readonly gate: LifecycleGate;
    readonly params: z.ZodType<TParams, z.ZodTypeDef, unknown>;
    readonly validate?: (params: TParams) => Result<TParams>;
    readonly run: (params: TParams, op: OperationContext) => Promise<unknown> | unknown;
}

export function defineMethod<TParams>(method: string, shape: MethodShape<TParams>): MethodDefinition {
    return {
        method,
        kind: shape.kind,
        gate: shape.gate,
        prepare(rawParams: unknown): Result<Operation> {
            // absent and null params both mean "no params"
            const decoded = shape.params.safeParse(rawParams ?? {});
            if (!decoded.success) {
                return fail(invalidParams(`Invalid params for ${method}: ${formatZodIssues(decoded.error.issues)}`));
            }
            const validated = shape.validate ? shape.validate(decoded.data) : succeed(decoded.data);
            if (!validated.ok) return validated;

            const params = validated.value;
            return succeed(async (op: OperationContext) => shape.run(params, op));
        },
    };
}
