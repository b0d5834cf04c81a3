/**
 * Method Catalog
 *
 * Wire names of every method and notification the engine routes or emits.
 *
 * @module
 */
import { SUPPORTED_PROTOCOL_VERSIONS } from '@modelcontextprotocol/sdk/types.js';

export const Method = {
    Initialize: 'initialize',
    Initialized: 'notifications/initialized',
    Ping: 'ping',

    ToolsList: 'tools/list',
    ToolsCall: 'tools/call',
    ToolsListChanged: 'tools/list_changed',

    ResourcesList: 'resources/list',
    ResourcesRead: 'resources/read',
    ResourcesSubscribe: 'resources/subscribe',
    ResourcesUnsubscribe: 'resources/unsubscribe',
    ResourcesUpdated: 'resources/updated',
    ResourcesListChanged: 'resources/list_changed',

    PromptsList: 'prompts/list',
    PromptsGet: 'prompts/get',
    PromptsListChanged: 'prompts/list_changed',

    SamplingCreateMessage: 'sampling/createMessage',

    LoggingSetLevel: 'logging/setLevel',
    LoggingMessage: 'logging/message',

    Progress: 'progress',
} as const;

export type Method = typeof Method[keyof typeof Method];

/** Protocol versions accepted by `initialize` unless the server overrides them. */
export const DEFAULT_PROTOCOL_VERSIONS: readonly string[] = SUPPORTED_PROTOCOL_VERSIONS;

/** Registry kinds and the notification each one broadcasts on change. */
export const LIST_CHANGED_METHOD = {
    tool: Method.ToolsListChanged,
    resource: Method.ResourcesListChanged,
    prompt: Method.PromptsListChanged,
} as const;
