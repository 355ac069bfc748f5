/**
 * Redis pub/sub transport for the remote protocol.
 *
 * One publisher connection is shared by every handle; each subscription
 * gets its own duplicated connection, since a subscribed ioredis client
 * cannot issue other commands.
 */

import type Redis from "ioredis";
import { createIORedisClient } from "../utils/ioredis";
import { logger } from "../utils/logger";
import { ErrorCategory, ErrorCode, toAppError } from "../utils/errors";
import type {
    ConnectionEvent,
    MessageChannel,
    Publisher,
    Subscription,
} from "./remote/collaborators";
import { EventQueue, type Poll } from "./remote/eventQueue";

const log = logger.child("Remote/Redis");

class RedisSubscription implements Subscription {
    private readonly queue = new EventQueue<Buffer>();
    /** Settles once SUBSCRIBE has been answered; a failure fails the queue instead. */
    readonly subscribed: Promise<void>;

    constructor(
        private readonly client: Redis,
        private readonly topic: string,
    ) {
        client.on("messageBuffer", (channel: Buffer, message: Buffer) => {
            if (channel.toString() !== topic) return;
            this.queue.push(message);
        });

        client.on("error", (err: Error) => {
            log.warn(`Subscriber connection error on "${topic}": ${err.message}`);
        });

        // ioredis keeps reconnecting on its own; "end" means it has given up.
        client.on("end", () => {
            this.queue.fail(
                toAppError(
                    new Error("connection ended"),
                    ErrorCode.TRANSPORT_FAILED,
                    ErrorCategory.FATAL,
                    `Subscription to ${topic} lost`,
                ),
            );
        });

        this.subscribed = client.subscribe(topic).then(
            () => log.debug(`Subscribed to "${topic}"`),
            (err: unknown) =>
                this.queue.fail(
                    toAppError(
                        err,
                        ErrorCode.TRANSPORT_FAILED,
                        ErrorCategory.FATAL,
                        `Failed to subscribe to ${topic}`,
                    ),
                ),
        );
    }

    poll(): Poll<Buffer> {
        return this.queue.poll();
    }

    setListener(listener: (() => void) | null): void {
        this.queue.setListener(listener);
    }

    async close(): Promise<void> {
        this.queue.close();
        try {
            await this.client.unsubscribe(this.topic);
        } catch (err) {
            log.warn(`Failed to unsubscribe from "${this.topic}"`, err);
        }
        this.client.disconnect();
    }
}

class RedisPublisher implements Publisher {
    private closed = false;

    /**
     * `subscribed` resolves once the subscription for the same topic is live,
     * so replies to what we publish cannot arrive before we listen.
     */
    constructor(
        private readonly client: Redis,
        private readonly topic: string,
        private readonly subscribed: () => Promise<void>,
    ) {}

    async publish(payload: Buffer): Promise<void> {
        if (this.closed) {
            throw new Error(`Publisher for ${this.topic} is closed`);
        }
        await this.subscribed();
        try {
            await this.client.publish(this.topic, payload);
        } catch (err) {
            throw toAppError(
                err,
                ErrorCode.SEND_FAILED,
                ErrorCategory.TRANSIENT,
                `Publish to ${this.topic} failed`,
            );
        }
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export class RedisMessageChannel implements MessageChannel {
    private pubClient: Redis | null = null;
    private readonly subscriptions = new Map<string, RedisSubscription>();

    constructor(private readonly redisUrl: string) {}

    private ensureClient(): Redis {
        if (!this.pubClient) {
            this.pubClient = createIORedisClient(this.redisUrl, "remote-pub");
        }
        return this.pubClient;
    }

    subscribe(topic: string): Subscription {
        const subscription = new RedisSubscription(this.ensureClient().duplicate(), topic);
        this.subscriptions.set(topic, subscription);
        return subscription;
    }

    publisher(topic: string): Publisher {
        return new RedisPublisher(this.ensureClient(), topic, async () => {
            await this.subscriptions.get(topic)?.subscribed;
        });
    }

    /**
     * Connection lifecycle for `username`: Connected on every "ready" of the
     * shared connection, which covers the first connect and each reconnect.
     */
    connectionEvents(username: string): EventQueue<ConnectionEvent> {
        const client = this.ensureClient();
        const events = new EventQueue<ConnectionEvent>();
        const connected = () => events.push({ type: "connected", username });

        client.on("ready", connected);
        client.on("end", () => {
            events.fail(
                toAppError(
                    new Error("connection ended"),
                    ErrorCode.TRANSPORT_FAILED,
                    ErrorCategory.FATAL,
                    "Redis connection lost",
                ),
            );
        });
        if (client.status === "ready") {
            connected();
        }

        return events;
    }

    close(): void {
        if (!this.pubClient) return;
        this.pubClient.disconnect();
        this.pubClient = null;
        this.subscriptions.clear();
    }
}
