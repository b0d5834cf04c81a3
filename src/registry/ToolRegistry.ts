/**
 * ToolRegistry — tools keyed by name
 *
 * @module
 */
import { HandlerRegistry, type RegistryOptions } from './HandlerRegistry.js';
import { type McpTool, type Registration, type ToolHandler } from './types.js';

export class ToolRegistry extends HandlerRegistry<'tool'> {
    constructor(options?: RegistryOptions) {
        super('tool', options);
    }

    register(tool: McpTool, handler: ToolHandler): Registration<'tool'> {
        return this.add(tool.name, tool, handler);
    }
}
