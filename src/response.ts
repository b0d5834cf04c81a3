/**
 * Response Helpers
 *
 * Builders for the payloads handlers return. Purely structural: no server
 * or transport coupling.
 *
 * @example
 * ```typescript
 * import { success, error } from 'mcp-switchboard';
 *
 * // Text
 * return success('Project created');
 *
 * // Object (pretty-printed JSON)
 * return success({ id: '123', name: 'My Project' });
 *
 * // Domain failure: a successful RPC result with isError set
 * return error('Division by zero');
 * ```
 *
 * @module
 */
import { type GetPromptResult } from '@modelcontextprotocol/sdk/types.js';
import { type CallToolResult, type ResourceContents } from './registry/types.js';

// ============================================================================
// Tool Results
// ============================================================================

/**
 * Successful tool result. Strings are returned verbatim (empty becomes
 * `"OK"`); anything else is serialized with `JSON.stringify(data, null, 2)`.
 */
export function success(data: string | object): CallToolResult {
    const text = typeof data === 'string'
        ? (data || 'OK')
        : JSON.stringify(data, null, 2);
    return { content: [{ type: 'text', text }] };
}

/** Tool-level failure reported in-band: the call itself succeeded. */
export function error(message: string): CallToolResult {
    return { content: [{ type: 'text', text: message }], isError: true };
}

// ============================================================================
// Resource Contents
// ============================================================================

export function textResource(uri: string, text: string, mimeType?: string): ResourceContents {
    return mimeType === undefined ? { uri, text } : { uri, mimeType, text };
}

/** `data` is base64-encoded unless given as raw bytes. */
export function blobResource(uri: string, data: string | Uint8Array, mimeType?: string): ResourceContents {
    const blob = typeof data === 'string' ? data : Buffer.from(data).toString('base64');
    return mimeType === undefined ? { uri, blob } : { uri, mimeType, blob };
}

// ============================================================================
// Prompt Results
// ============================================================================

export type PromptMessage = GetPromptResult['messages'][number];

export function userMessage(text: string): PromptMessage {
    return { role: 'user', content: { type: 'text', text } };
}

export function assistantMessage(text: string): PromptMessage {
    return { role: 'assistant', content: { type: 'text', text } };
}

export function promptResult(messages: PromptMessage[], description?: string): GetPromptResult {
    return description === undefined ? { messages } : { description, messages };
}
