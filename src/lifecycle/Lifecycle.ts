/**
 * Lifecycle — per-connection handshake state machine
 *
 * ```
 * uninitialized → initializing → ready → shutting_down → closed
 * ```
 *
 * States only move forward. The single exception is a rejected handshake:
 * `initializing` returns to `uninitialized` so the client can retry with a
 * supported protocol version.
 *
 * @module
 */

export type LifecycleState = 'uninitialized' | 'initializing' | 'ready' | 'shutting_down' | 'closed';

const ORDER: Readonly<Record<LifecycleState, number>> = {
    uninitialized: 0,
    initializing: 1,
    ready: 2,
    shutting_down: 3,
    closed: 4,
};

/** Which states admit a method. */
export type LifecycleGate = 'open' | 'uninitialized' | 'ready';

export type TransitionListener = (from: LifecycleState, to: LifecycleState) => void;

export class Lifecycle {
    private _state: LifecycleState = 'uninitialized';
    private readonly _onTransition?: TransitionListener;

    constructor(onTransition?: TransitionListener) {
        this._onTransition = onTransition;
    }

    get state(): LifecycleState {
        return this._state;
    }

    isReady(): boolean {
        return this._state === 'ready';
    }

    isClosed(): boolean {
        return this._state === 'closed';
    }

    /** True once shutdown has begun. */
    isTerminating(): boolean {
        return ORDER[this._state] >= ORDER.shutting_down;
    }

    admits(gate: LifecycleGate): boolean {
        switch (gate) {
            case 'open': return this._state !== 'closed';
            case 'uninitialized': return this._state === 'uninitialized';
            case 'ready': return this._state === 'ready';
        }
    }

    /**
     * Move forward to `next`. Returns false (and stays put) for a backwards
     * or same-state move.
     */
    advance(next: LifecycleState): boolean {
        if (ORDER[next] <= ORDER[this._state]) return false;
        this._set(next);
        return true;
    }

    /** Abandon a handshake that failed version negotiation. */
    rejectHandshake(): void {
        if (this._state === 'initializing') this._set('uninitialized');
    }

    private _set(next: LifecycleState): void {
        const from = this._state;
        this._state = next;
        this._onTransition?.(from, next);
    }
}
