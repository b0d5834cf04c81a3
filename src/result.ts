/**
 * Result\<T\> — Success/Failure Pipelines
 *
 * A discriminated union used by the decode and validation steps of the
 * dispatcher, so each step can short-circuit without throwing.
 *
 * @example
 * ```typescript
 * import { succeed, fail, invalidParams, type Result } from 'mcp-switchboard';
 *
 * function parsePage(input: unknown): Result<number> {
 *     return typeof input === 'number' && input > 0
 *         ? succeed(input)
 *         : fail(invalidParams('page must be a positive number'));
 * }
 *
 * const page = parsePage(params.page);
 * if (!page.ok) throw page.error;
 * ```
 *
 * @module
 */
import { type ProtocolError } from './protocol/errors.js';

// ── Discriminated Union ──────────────────────────────────

export interface Success<T> {
    readonly ok: true;
    readonly value: T;
}

/** Failed result carrying the protocol error to answer with. */
export interface Failure {
    readonly ok: false;
    readonly error: ProtocolError;
}

export type Result<T> = Success<T> | Failure;

// ── Constructors ─────────────────────────────────────────

export function succeed<T>(value: T): Success<T> {
    return { ok: true, value };
}

export function fail(error: ProtocolError): Failure {
    return { ok: false, error };
}
