/**
 * ServerContext — state shared by every connection of one server
 *
 * Passed explicitly into each dispatcher; the engine keeps no module-level
 * state.
 *
 * @module
 */
import { type ToolRegistry } from '../registry/ToolRegistry.js';
import { type ResourceRegistry } from '../registry/ResourceRegistry.js';
import { type PromptRegistry } from '../registry/PromptRegistry.js';
import { type SubscriptionManager } from '../subscriptions/SubscriptionManager.js';
import { type DebugObserverFn } from '../observability/DebugObserver.js';
import { type ResolvedServerOptions } from './config.js';

export interface ServerContext {
    readonly tools: ToolRegistry;
    readonly resources: ResourceRegistry;
    readonly prompts: PromptRegistry;
    readonly subscriptions: SubscriptionManager;
    readonly options: ResolvedServerOptions;
    /** Guarded observer: never throws. */
    readonly debug?: DebugObserverFn;
}
