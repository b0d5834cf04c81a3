/**
 * Structural Validation — semantic checks after schema decoding
 *
 * Pure functions: each returns the params unchanged on success or an
 * invalid-params failure naming the offending field.
 *
 * @module
 */
import { type ZodIssue } from 'zod';
import { invalidParams } from './errors.js';
import { fail, succeed, type Result } from '../result.js';
import {
    type CallToolParams,
    type CreateMessageParams,
    type GetPromptParams,
    type InitializeParams,
    type ProgressParams,
    type ResourceUriParams,
} from './schemas.js';

// ── Zod Issue Formatting ─────────────────────────────────

/**
 * Render zod issues as `path: message` pairs joined by `; `.
 *
 * @example
 * ```
 * name: Required; arguments.count: Expected number, received string
 * ```
 */
export function formatZodIssues(issues: readonly ZodIssue[]): string {
    return issues
        .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
        .join('; ');
}

// ── Field Rules ──────────────────────────────────────────

function invalid<T>(message: string): Result<T> {
    return fail(invalidParams(message));
}

/** A uri is accepted when it has a scheme separator, is absolute, or uses `file:`. */
export function isValidUri(uri: string): boolean {
    return uri.includes('://') || uri.startsWith('/') || uri.startsWith('file:');
}

function checkUri<T>(uri: string, value: T): Result<T> {
    if (uri.length === 0) return invalid('uri must not be empty');
    if (!isValidUri(uri)) return invalid(`Invalid resource uri: ${uri}`);
    return succeed(value);
}

// ── Per-Method Validators ────────────────────────────────

export function validateInitialize(params: InitializeParams): Result<InitializeParams> {
    if (params.protocolVersion.length === 0) return invalid('protocolVersion must not be empty');
    if (params.clientInfo.name.length === 0) return invalid('clientInfo.name must not be empty');
    if (params.clientInfo.version.length === 0) return invalid('clientInfo.version must not be empty');
    return succeed(params);
}

export function validateCallTool(params: CallToolParams): Result<CallToolParams> {
    return params.name.length === 0 ? invalid('Tool name must not be empty') : succeed(params);
}

export function validateResourceUri(params: ResourceUriParams): Result<ResourceUriParams> {
    return checkUri(params.uri, params);
}

export function validateGetPrompt(params: GetPromptParams): Result<GetPromptParams> {
    return params.name.length === 0 ? invalid('Prompt name must not be empty') : succeed(params);
}

export function validateCreateMessage(params: CreateMessageParams): Result<CreateMessageParams> {
    if (params.messages.length === 0) return invalid('messages must not be empty');
    const { temperature, topP, maxTokens } = params;
    if (temperature !== undefined && (temperature < 0 || temperature > 2)) {
        return invalid('temperature must be between 0 and 2');
    }
    if (topP !== undefined && (topP < 0 || topP > 1)) {
        return invalid('topP must be between 0 and 1');
    }
    if (maxTokens <= 0) return invalid('maxTokens must be greater than 0');
    return succeed(params);
}

export function validateProgress(params: ProgressParams): Result<ProgressParams> {
    if (params.progressToken === '') return invalid('progressToken must not be empty');
    const ceiling = params.total ?? 1;
    if (params.progress < 0 || params.progress > ceiling) {
        return invalid(`progress must be between 0 and ${ceiling}`);
    }
    return succeed(params);
}
