import type { EventSource } from "./eventQueue";
import type { TrackId } from "./trackId";

// ---------------------------------------------------------------------------
// Message channel
// ---------------------------------------------------------------------------

export interface Subscription extends EventSource<Buffer> {
    close(): Promise<void>;
}

export interface Publisher {
    publish(payload: Buffer): Promise<void>;
    close(): Promise<void>;
}

/** Publish/subscribe transport. A transport failure fails the subscription source. */
export interface MessageChannel {
    subscribe(topic: string): Subscription;
    publisher(topic: string): Publisher;
}

/** One shared topic per user; every device of that user subscribes and publishes on it. */
export function remoteTopic(prefix: string, username: string): string {
    return `${prefix}${username}`;
}

// ---------------------------------------------------------------------------
// Player
// ---------------------------------------------------------------------------

export type PlayerEvent =
    | { type: "track-ended" }
    | { type: "position"; positionMs: number };

/**
 * Audio output. `load` is fire-and-forget; progress and end-of-track come back
 * through `events`, and a playback failure fails that source.
 */
export interface Player {
    load(trackId: TrackId): void;
    stop(): void;
    readonly events: EventSource<PlayerEvent>;
}

// ---------------------------------------------------------------------------
// Session
// ---------------------------------------------------------------------------

export type ConnectionEvent = { type: "connected"; username: string };

export interface Session {
    /** Stable identity of this endpoint on the shared topic. */
    readonly deviceId: string;
    /** Session clock, ms since epoch. */
    time(): number;
    /** Emits on the initial connect and on every reconnect. */
    readonly connections: EventSource<ConnectionEvent>;
}
