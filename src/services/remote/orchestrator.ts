/**
 * Remote session orchestrator.
 *
 * Owns the playback state, the channel handles and the player. A driver loop
 * polls four sources per tick in fixed priority (connection, inbound,
 * outbound, player) and feeds each ready item through `transition`.
 */

import { decodeEnvelope, encodeEnvelope } from "../../protocol/codec";
import type { Envelope } from "../../protocol/types";
import { ErrorCategory, ErrorCode, toAppError } from "../../utils/errors";
import { createLogger, logErrorWithContext, type Logger } from "../../utils/logger";
import {
    remoteTopic,
    type MessageChannel,
    type Player,
    type Publisher,
    type Session,
    type Subscription,
} from "./collaborators";
import { isAddressedTo } from "./envelopes";
import { Signal, type EventSource, type Poll } from "./eventQueue";
import { Outbox } from "./outbox";
import { livePositionMs, SOFTWARE_VERSION, type PlaybackState } from "./playbackState";
import { boundedRetry, type SendFailurePolicy } from "./sendPolicy";
import {
    createRemoteState,
    handlesKind,
    transition,
    type RemoteAction,
    type RemoteEvent,
    type RemoteState,
} from "./transition";

export const DEFAULT_TOPIC_PREFIX = "remote:user:";

export interface RemoteOrchestratorOptions {
    session: Session;
    /** Display name advertised in the device descriptor. */
    name: string;
    channel: MessageChannel;
    player: Player;
    topicPrefix?: string;
    sendFailurePolicy?: SendFailurePolicy;
    softwareVersion?: string;
    logger?: Logger;
}

export class RemoteOrchestrator {
    private readonly identity: string;
    private readonly session: Session;
    private readonly channel: MessageChannel;
    private readonly player: Player;
    private readonly topicPrefix: string;
    private readonly softwareVersion: string;
    private readonly log: Logger;
    private readonly outbox: Outbox;
    private readonly wakeup = new Signal();

    private state: RemoteState;
    private subscription: Subscription | null = null;
    private publisher: Publisher | null = null;
    private running = false;
    private stopRequested = false;

    constructor(options: RemoteOrchestratorOptions) {
        this.session = options.session;
        this.identity = options.session.deviceId;
        this.channel = options.channel;
        this.player = options.player;
        this.topicPrefix = options.topicPrefix ?? DEFAULT_TOPIC_PREFIX;
        this.softwareVersion = options.softwareVersion ?? SOFTWARE_VERSION;
        this.log = options.logger ?? createLogger("Remote");
        this.outbox = new Outbox(
            options.sendFailurePolicy ?? boundedRetry({ maxAttempts: 3 }),
            this.log.child("Outbox"),
            () => this.session.time(),
        );
        this.state = createRemoteState(options.name);
    }

    get deviceId(): string {
        return this.identity;
    }

    get playbackState(): PlaybackState {
        return this.state.playback;
    }

    /** Last sequence number stamped on an outbound envelope. */
    get sequenceNumber(): number {
        return this.state.seqNr;
    }

    get connected(): boolean {
        return this.publisher !== null;
    }

    // -----------------------------------------------------------------------
    // Driver
    // -----------------------------------------------------------------------

    /**
     * Runs until `stop()` or a fatal error. Handles are released either way;
     * a fatal error rejects.
     */
    async run(): Promise<void> {
        if (this.running) {
            throw new Error("Remote orchestrator is already running");
        }
        this.running = true;
        this.attachListeners();

        try {
            while (!this.stopRequested) {
                if (!this.tick()) {
                    await this.wakeup.wait();
                }
            }
        } catch (error) {
            logErrorWithContext(this.log, "Remote session failed", error, {
                deviceId: this.identity,
            });
            throw error;
        } finally {
            this.running = false;
            await this.teardown();
        }
    }

    async stop(): Promise<void> {
        this.stopRequested = true;
        this.wakeup.notify();
        if (!this.running) {
            await this.teardown();
        }
    }

    /** One scheduling tick. Returns whether any source made progress. */
    tick(): boolean {
        let progress = false;

        const connection = this.pollSource(
            this.session.connections,
            ErrorCode.TRANSPORT_FAILED,
            "Connection lifecycle source failed",
        );
        if (connection.ready) {
            this.dispatch(connection.value);
            progress = true;
        }

        if (this.subscription) {
            const payload = this.pollSource(
                this.subscription,
                ErrorCode.TRANSPORT_FAILED,
                "Subscription failed",
            );
            if (payload.ready) {
                const envelope = this.acceptFrame(payload.value);
                if (envelope) {
                    this.dispatch({ type: "envelope", envelope });
                }
                progress = true;
            }
        }

        if (this.outbox.flush(this.publisher)) {
            progress = true;
        }

        const playerEvent = this.pollSource(
            this.player.events,
            ErrorCode.PLAYER_FAILED,
            "Player failed",
        );
        if (playerEvent.ready) {
            this.dispatch({ type: "player", event: playerEvent.value });
            progress = true;
        }

        return progress;
    }

    // -----------------------------------------------------------------------
    // Transitions and effects
    // -----------------------------------------------------------------------

    private dispatch(event: RemoteEvent): void {
        const next = transition(this.state, event, {
            identity: this.identity,
            now: this.session.time(),
            softwareVersion: this.softwareVersion,
        });
        this.state = next.state;

        for (const action of next.actions) {
            this.execute(action);
        }
    }

    private execute(action: RemoteAction): void {
        switch (action.type) {
            case "open-channel":
                this.handleConnection(action.username);
                break;
            case "send":
                this.sendFrame(action.envelope);
                break;
            case "player-load":
                this.player.load(action.trackId);
                break;
            case "player-stop":
                this.player.stop();
                break;
        }
    }

    /** Replaces any previous subscription and publisher; nothing carries over. */
    private handleConnection(username: string): void {
        this.log.debug(`connected(username=${username})`);
        const topic = remoteTopic(this.topicPrefix, username);

        this.releaseHandles();
        this.outbox.reset();

        const subscription = this.channel.subscribe(topic);
        subscription.setListener(() => this.wakeup.notify());
        this.subscription = subscription;
        this.publisher = this.channel.publisher(topic);
    }

    private sendFrame(envelope: Envelope): void {
        if (!this.publisher) {
            this.log.warn("Not connected, dropping envelope", {
                kind: envelope.kind,
                sequenceNumber: envelope.sequenceNumber,
            });
            return;
        }
        this.outbox.enqueue(envelope, encodeEnvelope(envelope));
    }

    /** Decodes and filters one inbound payload; decode failures are fatal. */
    private acceptFrame(payload: Buffer): Envelope | null {
        const envelope = decodeEnvelope(payload);
        if (!isAddressedTo(envelope, this.identity)) {
            return null;
        }

        this.log.trace(`${envelope.kind} from ${envelope.device?.name ?? "unknown"}`, {
            senderId: envelope.senderId,
            sequenceNumber: envelope.sequenceNumber,
            stateUpdateId: envelope.stateUpdateId,
            recipients: envelope.recipients,
            ...(envelope.state && {
                peerPositionMs: livePositionMs(envelope.state, this.session.time()),
            }),
        });
        if (!handlesKind(envelope.kind)) {
            this.log.debug(`No handler for ${envelope.kind}, ignoring`);
        }
        return envelope;
    }

    // -----------------------------------------------------------------------
    // Plumbing
    // -----------------------------------------------------------------------

    private pollSource<T>(
        source: EventSource<T>,
        code: ErrorCode,
        context: string,
    ): Poll<T> {
        try {
            return source.poll();
        } catch (error) {
            throw toAppError(error, code, ErrorCategory.FATAL, context);
        }
    }

    private attachListeners(): void {
        const wake = () => this.wakeup.notify();
        this.session.connections.setListener(wake);
        this.player.events.setListener(wake);
        this.outbox.setListener(wake);
        this.subscription?.setListener(wake);
    }

    private releaseHandles(): void {
        const subscription = this.subscription;
        const publisher = this.publisher;
        this.subscription = null;
        this.publisher = null;

        void this.closeHandles(subscription, publisher);
    }

    private async closeHandles(
        subscription: Subscription | null,
        publisher: Publisher | null,
    ): Promise<void> {
        subscription?.setListener(null);
        const results = await Promise.allSettled([
            subscription?.close(),
            publisher?.close(),
        ]);
        for (const result of results) {
            if (result.status === "rejected") {
                this.log.warn("Failed to release channel handle", result.reason);
            }
        }
    }

    private async teardown(): Promise<void> {
        const subscription = this.subscription;
        const publisher = this.publisher;
        this.subscription = null;
        this.publisher = null;

        this.outbox.reset();
        this.outbox.setListener(null);
        this.session.connections.setListener(null);
        this.player.events.setListener(null);

        await this.closeHandles(subscription, publisher);
    }
}
