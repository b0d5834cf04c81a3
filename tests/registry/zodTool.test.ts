import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import { zodTool, toInputSchema } from '../../src/registry/zodTool.js';
import { ErrorCode } from '../../src/protocol/errors.js';
import { success } from '../../src/response.js';
import { type HandlerContext } from '../../src/registry/types.js';
import { thrown } from '../harness.js';

const ctx: HandlerContext = {
    connectionId: 'conn-1',
    transport: 'memory',
    reportProgress: () => false,
    log: () => false,
};

describe('toInputSchema', () => {
    it('should keep properties and required fields', () => {
        const schema = toInputSchema(z.object({
            a: z.number().describe('left operand'),
            b: z.number().optional(),
        }));
        expect(schema).toEqual({
            type: 'object',
            properties: {
                a: { type: 'number', description: 'left operand' },
                b: { type: 'number' },
            },
            required: ['a'],
        });
    });

    it('should fall back to a bare object schema', () => {
        expect(toInputSchema(z.string())).toEqual({ type: 'object' });
    });
});

describe('zodTool', () => {
    const { tool, handler } = zodTool('add', {
        description: 'Add two numbers',
        schema: z.object({ a: z.number(), b: z.number() }),
        annotations: { readOnlyHint: true },
    }, ({ a, b }) => success(String(a + b)));

    it('should describe the tool from the schema', () => {
        expect(tool.name).toBe('add');
        expect(tool.description).toBe('Add two numbers');
        expect(tool.annotations).toEqual({ readOnlyHint: true });
        expect(tool.inputSchema.required).toEqual(['a', 'b']);
    });

    it('should pass parsed arguments to the function', async () => {
        expect(await handler.call({ a: 2, b: 3 }, ctx)).toEqual({ content: [{ type: 'text', text: '5' }] });
    });

    it('should reject arguments the schema refuses with invalid-params', () => {
        expect(thrown(() => handler.call({ a: 2, b: 'x' }, ctx))).toMatchObject({
            code: ErrorCode.InvalidParams,
            message: 'Invalid arguments for tool add: b: Expected number, received string',
        });
    });
});
