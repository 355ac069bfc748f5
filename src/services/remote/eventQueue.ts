/**
 * Non-blocking FIFO event sources.
 *
 * Producers push from callbacks; the driver polls each source once per tick
 * and sleeps on a shared signal only when no source made progress.
 */

export type Poll<T> = { ready: true; value: T } | { ready: false };

export interface EventSource<T> {
    /** Returns the next item without waiting. Throws once a failure is reached. */
    poll(): Poll<T>;
    /** Called whenever the source may have become ready. */
    setListener(listener: (() => void) | null): void;
}

const NOT_READY = { ready: false } as const;

export class EventQueue<T extends object> implements EventSource<T> {
    private readonly items: T[] = [];
    private failure: { error: unknown } | null = null;
    private closed = false;
    private listener: (() => void) | null = null;

    get size(): number {
        return this.items.length;
    }

    get isClosed(): boolean {
        return this.closed;
    }

    push(item: T): void {
        if (this.closed || this.failure) return;
        this.items.push(item);
        this.signal();
    }

    /** Terminates the source; items queued before the failure are still delivered. */
    fail(error: unknown): void {
        if (this.closed || this.failure) return;
        this.failure = { error };
        this.signal();
    }

    close(): void {
        this.closed = true;
        this.items.length = 0;
        this.listener = null;
    }

    poll(): Poll<T> {
        const next = this.items.shift();
        if (next !== undefined) {
            return { ready: true, value: next };
        }
        if (this.failure && !this.closed) {
            throw this.failure.error;
        }
        return NOT_READY;
    }

    setListener(listener: (() => void) | null): void {
        this.listener = listener;
        if (listener && (this.items.length > 0 || this.failure)) {
            listener();
        }
    }

    private signal(): void {
        this.listener?.();
    }
}

/** Single-waiter wakeup; a notify with nobody waiting is remembered once. */
export class Signal {
    private notified = false;
    private waiter: (() => void) | null = null;

    notify(): void {
        const waiter = this.waiter;
        if (waiter) {
            this.waiter = null;
            waiter();
            return;
        }
        this.notified = true;
    }

    wait(): Promise<void> {
        if (this.notified) {
            this.notified = false;
            return Promise.resolve();
        }
        return new Promise<void>((resolve) => {
            this.waiter = resolve;
        });
    }
}
