/**
 * ResourceRegistry — resources keyed by uri
 *
 * A registration may stand for a whole uri space: `resolve()` falls back to
 * the longest registered uri that prefixes the requested one, so a handler
 * registered at `http://server/` serves `http://server/files/a.txt`. A prefix
 * only matches at a segment boundary: `res://a` serves `res://a/x` and
 * `res://a?q=1`, never `res://ab`.
 *
 * @module
 */
import { isValidUri } from '../protocol/validation.js';
import { HandlerRegistry, type RegistryOptions } from './HandlerRegistry.js';
import { type McpResource, type Registration, type ResourceHandler } from './types.js';

const SEGMENT_BOUNDARIES = new Set(['/', '?', '#']);

function coversUri(prefix: string, uri: string): boolean {
    if (!uri.startsWith(prefix)) return false;
    if (prefix.endsWith('/')) return true;
    return SEGMENT_BOUNDARIES.has(uri.charAt(prefix.length));
}

export class ResourceRegistry extends HandlerRegistry<'resource'> {
    constructor(options?: RegistryOptions) {
        super('resource', options);
    }

    register(resource: McpResource, handler: ResourceHandler): Registration<'resource'> {
        if (!isValidUri(resource.uri)) {
            throw new Error(`Invalid resource uri: "${resource.uri}"`);
        }
        return this.add(resource.uri, resource, handler);
    }

    /** Exact match first, then the longest prefix match. */
    resolve(uri: string): Registration<'resource'> | undefined {
        const snapshot = this.snapshot();
        const exact = snapshot.index.get(uri);
        if (exact) return exact;

        let best: Registration<'resource'> | undefined;
        for (const entry of snapshot.entries) {
            if (coversUri(entry.key, uri) && (!best || entry.key.length > best.key.length)) {
                best = entry;
            }
        }
        return best;
    }
}
