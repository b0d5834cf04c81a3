/**
 * PromptRegistry — prompts keyed by name
 *
 * @module
 */
import { HandlerRegistry, type RegistryOptions } from './HandlerRegistry.js';
import { type McpPrompt, type PromptHandler, type Registration } from './types.js';

export class PromptRegistry extends HandlerRegistry<'prompt'> {
    constructor(options?: RegistryOptions) {
        super('prompt', options);
    }

    register(prompt: McpPrompt, handler: PromptHandler): Registration<'prompt'> {
        return this.add(prompt.name, prompt, handler);
    }
}
