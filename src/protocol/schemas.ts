/**
 * Parameter Schemas — zod shapes for every routed method
 *
 * Step 3 of dispatch decodes raw `params` with these schemas. Objects are
 * `passthrough()` so fields added by newer protocol revisions survive.
 * Semantic rules (non-empty names, numeric ranges) live in `validation.ts`.
 *
 * @module
 */
import { z } from 'zod';

// ── Shared Pieces ────────────────────────────────────────

export const ProgressTokenSchema = z.union([z.string(), z.number()]);

const MetaSchema = z.object({
    progressToken: ProgressTokenSchema.optional(),
}).passthrough();

export const LOGGING_LEVELS = [
    'debug', 'info', 'notice', 'warning', 'error', 'critical', 'alert', 'emergency',
] as const;

export const LoggingLevelSchema = z.enum(LOGGING_LEVELS);

export const ImplementationSchema = z.object({
    name: z.string(),
    version: z.string(),
}).passthrough();

export const ClientCapabilitiesSchema = z.object({
    experimental: z.record(z.unknown()).optional(),
    roots: z.object({ listChanged: z.boolean().optional() }).passthrough().optional(),
    sampling: z.object({}).passthrough().optional(),
}).passthrough();

// ── Lifecycle ────────────────────────────────────────────

export const InitializeParamsSchema = z.object({
    protocolVersion: z.string(),
    capabilities: ClientCapabilitiesSchema,
    clientInfo: ImplementationSchema,
}).passthrough();

export const EmptyParamsSchema = z.object({}).passthrough();

// ── Listing ──────────────────────────────────────────────

export const PaginatedParamsSchema = z.object({
    cursor: z.string().optional(),
}).passthrough();

// ── Tools / Resources / Prompts ──────────────────────────

export const CallToolParamsSchema = z.object({
    name: z.string(),
    arguments: z.record(z.unknown()).optional(),
    _meta: MetaSchema.optional(),
}).passthrough();

export const ResourceUriParamsSchema = z.object({
    uri: z.string(),
}).passthrough();

export const GetPromptParamsSchema = z.object({
    name: z.string(),
    arguments: z.record(z.string()).optional(),
}).passthrough();

// ── Sampling ─────────────────────────────────────────────

const SamplingContentSchema = z.discriminatedUnion('type', [
    z.object({ type: z.literal('text'), text: z.string() }).passthrough(),
    z.object({ type: z.literal('image'), data: z.string(), mimeType: z.string() }).passthrough(),
]);

export const SamplingMessageSchema = z.object({
    role: z.enum(['user', 'assistant']),
    content: SamplingContentSchema,
}).passthrough();

export const CreateMessageParamsSchema = z.object({
    messages: z.array(SamplingMessageSchema),
    modelPreferences: z.object({
        hints: z.array(z.object({ name: z.string().optional() }).passthrough()).optional(),
        costPriority: z.number().optional(),
        speedPriority: z.number().optional(),
        intelligencePriority: z.number().optional(),
    }).passthrough().optional(),
    systemPrompt: z.string().optional(),
    includeContext: z.enum(['none', 'thisServer', 'allServers']).optional(),
    temperature: z.number().optional(),
    topP: z.number().optional(),
    maxTokens: z.number(),
    stopSequences: z.array(z.string()).optional(),
    metadata: z.record(z.unknown()).optional(),
}).passthrough();

// ── Logging / Progress ───────────────────────────────────

export const SetLevelParamsSchema = z.object({
    level: LoggingLevelSchema,
}).passthrough();

export const ProgressParamsSchema = z.object({
    progressToken: ProgressTokenSchema,
    progress: z.number(),
    total: z.number().optional(),
    message: z.string().optional(),
}).passthrough();

// ── Inferred Types ───────────────────────────────────────

export type LoggingLevel = z.infer<typeof LoggingLevelSchema>;
export type ProgressToken = z.infer<typeof ProgressTokenSchema>;
export type InitializeParams = z.infer<typeof InitializeParamsSchema>;
export type ClientCapabilities = z.infer<typeof ClientCapabilitiesSchema>;
export type ClientInfo = z.infer<typeof ImplementationSchema>;
export type PaginatedParams = z.infer<typeof PaginatedParamsSchema>;
export type CallToolParams = z.infer<typeof CallToolParamsSchema>;
export type ResourceUriParams = z.infer<typeof ResourceUriParamsSchema>;
export type GetPromptParams = z.infer<typeof GetPromptParamsSchema>;
export type CreateMessageParams = z.infer<typeof CreateMessageParamsSchema>;
export type SetLevelParams = z.infer<typeof SetLevelParamsSchema>;
export type ProgressParams = z.infer<typeof ProgressParamsSchema>;

/** Numeric severity, `debug` lowest. */
export function levelRank(level: LoggingLevel): number {
    return LOGGING_LEVELS.indexOf(level);
}
