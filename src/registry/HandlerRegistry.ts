/**
 * HandlerRegistry — copy-on-write store of registrations
 *
 * Readers always see one frozen {@link RegistrySnapshot}; writers build the
 * next snapshot and swap it in with a single assignment. A dispatch that
 * captured a snapshot (or a registration from it) keeps using it while a
 * handler runs, so no mutation is ever observed half-applied and no lock is
 * held across handler execution.
 *
 * Listing order is registration order. Re-adding an existing key replaces the
 * entry in place (last write wins) and keeps its position.
 *
 * @module
 */
import { invalidParams } from '../protocol/errors.js';
import { CursorCodec, type CursorCodecOptions } from './CursorCodec.js';
import {
    type HandlerKind,
    type HandlerOf,
    type MetadataOf,
    type Registration,
} from './types.js';

// ── Types ────────────────────────────────────────────────

export interface RegistrySnapshot<K extends HandlerKind> {
    /** Increments on every mutation. */
    readonly version: number;
    readonly entries: readonly Registration<K>[];
    readonly index: ReadonlyMap<string, Registration<K>>;
}

export interface RegistryChange<K extends HandlerKind> {
    readonly kind: K;
    readonly type: 'added' | 'replaced' | 'removed';
    readonly key: string;
    readonly version: number;
}

export type RegistryListener<K extends HandlerKind> = (change: RegistryChange<K>) => void;

export interface Page<T> {
    readonly items: T[];
    /** Absent on the final page. */
    readonly nextCursor?: string;
}

export interface RegistryOptions {
    /** A shared codec, or options for a private one. */
    cursor?: CursorCodec | CursorCodecOptions;
}

// ── Registry ─────────────────────────────────────────────

export class HandlerRegistry<K extends HandlerKind> {
    readonly kind: K;
    private _snapshot: RegistrySnapshot<K>;
    private readonly _codec: CursorCodec;
    private readonly _listeners = new Set<RegistryListener<K>>();

    constructor(kind: K, options?: RegistryOptions) {
        this.kind = kind;
        this._codec = options?.cursor instanceof CursorCodec
            ? options.cursor
            : new CursorCodec(options?.cursor);
        this._snapshot = freezeSnapshot(0, []);
    }

    // ── Mutation ─────────────────────────────────────────

    add(key: string, metadata: MetadataOf<K>, handler: HandlerOf<K>): Registration<K> {
        if (key.length === 0) {
            throw new Error(`${this.kind} registration key must not be empty`);
        }
        const registration: Registration<K> = Object.freeze({ kind: this.kind, key, metadata, handler });
        const current = this._snapshot;
        const replaced = current.index.has(key);

        const entries = replaced
            ? current.entries.map(entry => entry.key === key ? registration : entry)
            : [...current.entries, registration];

        this._snapshot = freezeSnapshot(current.version + 1, entries);
        this._emit(replaced ? 'replaced' : 'added', key);
        return registration;
    }

    remove(key: string): boolean {
        const current = this._snapshot;
        if (!current.index.has(key)) return false;

        this._snapshot = freezeSnapshot(
            current.version + 1,
            current.entries.filter(entry => entry.key !== key),
        );
        this._emit('removed', key);
        return true;
    }

    // ── Reads ────────────────────────────────────────────

    get(key: string): Registration<K> | undefined {
        return this._snapshot.index.get(key);
    }

    has(key: string): boolean {
        return this._snapshot.index.has(key);
    }

    get size(): number {
        return this._snapshot.entries.length;
    }

    snapshot(): RegistrySnapshot<K> {
        return this._snapshot;
    }

    /** One page of registrations, taken from a single snapshot. */
    list(pageSize: number, cursor?: string): Page<Registration<K>> {
        return this.paginate(this._snapshot.entries, pageSize, cursor);
    }

    /**
     * Slice `items` at the position encoded in `cursor`.
     *
     * @throws ProtocolError invalid-params when the cursor does not decode
     */
    paginate<T>(items: readonly T[], pageSize: number, cursor?: string): Page<T> {
        let offset = 0;
        if (cursor !== undefined) {
            const decoded = this._codec.decode(cursor);
            if (!decoded) throw invalidParams('Invalid pagination cursor');
            offset = decoded.offset;
        }

        const size = Math.max(1, Math.floor(pageSize));
        const end = offset + size;
        const page = items.slice(offset, end);
        return end < items.length
            ? { items: page, nextCursor: this._codec.encode({ offset: end }) }
            : { items: page };
    }

    // ── Change Events ────────────────────────────────────

    onChange(listener: RegistryListener<K>): () => void {
        this._listeners.add(listener);
        return () => { this._listeners.delete(listener); };
    }

    private _emit(type: RegistryChange<K>['type'], key: string): void {
        const change: RegistryChange<K> = { kind: this.kind, type, key, version: this._snapshot.version };
        for (const listener of this._listeners) listener(change);
    }
}

function freezeSnapshot<K extends HandlerKind>(
    version: number,
    entries: readonly Registration<K>[],
): RegistrySnapshot<K> {
    const index = new Map<string, Registration<K>>();
    for (const entry of entries) index.set(entry.key, entry);
    return Object.freeze({ version, entries: Object.freeze([...entries]), index });
}
