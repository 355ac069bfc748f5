import type { Logger } from "../../../utils/logger";
import type {
    ConnectionEvent,
    MessageChannel,
    Player,
    PlayerEvent,
    Publisher,
    Session,
    Subscription,
} from "../collaborators";
import { EventQueue, type Poll } from "../eventQueue";
import type { TrackId } from "../trackId";

export class FakeSubscription implements Subscription {
    readonly queue = new EventQueue<Buffer>();
    released = false;

    constructor(readonly topic: string) {}

    poll(): Poll<Buffer> {
        return this.queue.poll();
    }

    setListener(listener: (() => void) | null): void {
        this.queue.setListener(listener);
    }

    async close(): Promise<void> {
        this.released = true;
        this.queue.close();
    }
}

export class FakePublisher implements Publisher {
    readonly published: Buffer[] = [];
    released = false;

    constructor(
        readonly topic: string,
        private readonly failures: unknown[] = [],
    ) {}

    async publish(payload: Buffer): Promise<void> {
        if (this.failures.length > 0) {
            throw this.failures.shift();
        }
        this.published.push(payload);
    }

    async close(): Promise<void> {
        this.released = true;
    }
}

export class FakeChannel implements MessageChannel {
    readonly subscriptions: FakeSubscription[] = [];
    readonly publishers: FakePublisher[] = [];
    /** Errors thrown, in order, by the next publishes of any publisher. */
    readonly publishFailures: unknown[] = [];

    subscribe(topic: string): FakeSubscription {
        const subscription = new FakeSubscription(topic);
        this.subscriptions.push(subscription);
        return subscription;
    }

    publisher(topic: string): FakePublisher {
        const publisher = new FakePublisher(topic, this.publishFailures);
        this.publishers.push(publisher);
        return publisher;
    }
}

export type PlayerCall = { type: "load"; trackId: TrackId } | { type: "stop" };

export class FakePlayer implements Player {
    readonly events = new EventQueue<PlayerEvent>();
    readonly calls: PlayerCall[] = [];

    load(trackId: TrackId): void {
        this.calls.push({ type: "load", trackId });
    }

    stop(): void {
        this.calls.push({ type: "stop" });
    }
}

export class FakeSession implements Session {
    readonly connections = new EventQueue<ConnectionEvent>();
    clock = 1_000;

    constructor(readonly deviceId: string) {}

    time(): number {
        return this.clock;
    }
}

export function createTestLogger(): jest.Mocked<Logger> {
    const log: jest.Mocked<Logger> = {
        trace: jest.fn(),
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    };
    log.child.mockReturnValue(log);
    return log;
}

/** 16-byte gid whose last byte is `n`. */
export function gid(n: number): Buffer {
    const bytes = Buffer.alloc(16);
    bytes[15] = n;
    return bytes;
}

export function trackId(n: number): TrackId {
    return gid(n).toString("hex");
}

export function flushPromises(): Promise<void> {
    return new Promise((resolve) => setImmediate(resolve));
}
