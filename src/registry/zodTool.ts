/**
 * zodTool — tools declared with a zod argument schema
 *
 * The tool's `inputSchema` is generated from the zod schema, and arguments
 * are parsed with it before the function runs. Parse failures reach the
 * client as invalid-params.
 *
 * @example
 * ```typescript
 * const { tool, handler } = zodTool('add', {
 *     description: 'Add two numbers',
 *     schema: z.object({ a: z.number(), b: z.number() }),
 * }, ({ a, b }) => success(String(a + b)));
 *
 * registry.register(tool, handler);
 * ```
 *
 * @module
 */
import { type z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { invalidParams } from '../protocol/errors.js';
import { isRecord } from '../protocol/jsonrpc.js';
import { formatZodIssues } from '../protocol/validation.js';
import {
    type CallToolResult,
    type HandlerContext,
    type McpTool,
    type ToolHandler,
} from './types.js';

export interface ZodToolConfig<TArgs> {
    description?: string;
    schema: z.ZodType<TArgs, z.ZodTypeDef, unknown>;
    annotations?: McpTool['annotations'];
}

export type ZodToolFn<TArgs> = (args: TArgs, ctx: HandlerContext) => Promise<CallToolResult> | CallToolResult;

export interface ZodToolDefinition {
    readonly tool: McpTool;
    readonly handler: ToolHandler;
}

/** Object-level JSON Schema of `schema`, reduced to what `inputSchema` carries. */
export function toInputSchema(schema: z.ZodTypeAny): McpTool['inputSchema'] {
    const json: unknown = zodToJsonSchema(schema, { target: 'jsonSchema7', $refStrategy: 'none' });
    const inputSchema: McpTool['inputSchema'] = { type: 'object' };
    if (!isRecord(json)) return inputSchema;

    const properties = json['properties'];
    if (isRecord(properties)) {
        const fields: Record<string, object> = {};
        for (const [key, value] of Object.entries(properties)) {
            if (isRecord(value)) fields[key] = value;
        }
        inputSchema.properties = fields;
    }

    const required = json['required'];
    if (Array.isArray(required)) {
        inputSchema.required = required.filter((field): field is string => typeof field === 'string');
    }
    return inputSchema;
}

export function zodTool<TArgs>(
    name: string,
    config: ZodToolConfig<TArgs>,
    fn: ZodToolFn<TArgs>,
): ZodToolDefinition {
    const tool: McpTool = { name, inputSchema: toInputSchema(config.schema) };
    if (config.description !== undefined) tool.description = config.description;
    if (config.annotations !== undefined) tool.annotations = config.annotations;

    const handler: ToolHandler = {
        call(args, ctx) {
            const parsed = config.schema.safeParse(args);
            if (!parsed.success) {
                throw invalidParams(`Invalid arguments for tool ${name}: ${formatZodIssues(parsed.error.issues)}`);
            }
            return fn(parsed.data, ctx);
        },
    };
    return { tool, handler };
}
