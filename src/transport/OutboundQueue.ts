/**
 * OutboundQueue — single serialized writer per connection
 *
 * Every outbound frame of a connection, response or push, is appended to
 * one promise chain, so a frame is always written whole before the next one
 * starts. The chain is the connection's only writer.
 *
 * Pushes are bounded: once `maxQueue` frames are waiting, a droppable frame
 * is refused and the caller prunes the subscriber. Responses are never
 * refused while the queue is open.
 *
 * A failed write closes the queue; later frames are refused.
 *
 * @module
 * @internal
 */

/** Writes one complete frame. Rejects when the underlying channel is gone. */
export type FrameWriter = (frame: string) => Promise<void>;

export interface OutboundQueueOptions {
    /** Waiting frames above which pushes are refused. Default 1024. */
    maxQueue?: number;
    onError?: (err: unknown) => void;
}

export const DEFAULT_MAX_QUEUE = 1024;

type QueueState = 'open' | 'draining' | 'closed';

export class OutboundQueue {
    private readonly _write: FrameWriter;
    private readonly _maxQueue: number;
    private readonly _onError?: (err: unknown) => void;
    private _tail: Promise<void> = Promise.resolve();
    private _pending = 0;
    private _state: QueueState = 'open';

    constructor(write: FrameWriter, options?: OutboundQueueOptions) {
        this._write = write;
        this._maxQueue = Math.max(1, options?.maxQueue ?? DEFAULT_MAX_QUEUE);
        this._onError = options?.onError;
    }

    /** Frames accepted but not yet written. */
    get pending(): number {
        return this._pending;
    }

    /** True once the queue refuses new frames. */
    get closed(): boolean {
        return this._state !== 'open';
    }

    /**
     * Append a frame. Returns false when the queue is closed, or when
     * `droppable` is set and the queue is full.
     */
    enqueue(frame: string, droppable: boolean): boolean {
        if (this._state !== 'open') return false;
        if (droppable && this._pending >= this._maxQueue) return false;

        this._pending++;
        this._tail = this._tail.then(async () => {
            try {
                if (this._state !== 'closed') await this._write(frame);
            } catch (err) {
                this._state = 'closed';
                this._onError?.(err);
            } finally {
                this._pending--;
            }
        });
        return true;
    }

    /** Resolves once every accepted frame has been handled. */
    drain(): Promise<void> {
        return this._tail;
    }

    /** Stop accepting frames, then flush the ones already accepted. */
    async close(): Promise<void> {
        if (this._state === 'open') this._state = 'draining';
        await this._tail;
        this._state = 'closed';
    }
}
