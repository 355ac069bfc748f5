/**
 * Pure state machine for the remote session.
 *
 * Every input (connection change, inbound envelope, player event) goes
 * through `transition`, which returns the next state plus the side effects
 * the orchestrator must carry out, in order.
 */

import type { Envelope, MessageKind } from "../../protocol/types";
import type { ConnectionEvent, PlayerEvent } from "./collaborators";
import { buildEnvelope, recipientsFor } from "./envelopes";
import {
    clampVolume,
    createPlaybackState,
    currentTrack,
    deviceDescriptor,
    playbackStateSnapshot,
    type PlaybackState,
} from "./playbackState";
import { trackIdFromGid, type TrackId } from "./trackId";

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface RemoteState {
    /** Last sequence number handed out; the first envelope carries 1. */
    readonly seqNr: number;
    readonly playback: PlaybackState;
}

export type RemoteEvent =
    | ConnectionEvent
    | { type: "envelope"; envelope: Envelope }
    | { type: "player"; event: PlayerEvent };

export type RemoteAction =
    | { type: "open-channel"; username: string }
    | { type: "send"; envelope: Envelope }
    | { type: "player-load"; trackId: TrackId }
    | { type: "player-stop" };

export interface TransitionContext {
    identity: string;
    /** Session clock at the time the event is applied. */
    now: number;
    softwareVersion?: string;
}

export interface Transition {
    state: RemoteState;
    actions: RemoteAction[];
}

const HANDLED_KINDS: ReadonlySet<MessageKind> = new Set(["HELLO", "VOLUME_SET", "LOAD"]);

/** Whether `kind` has handling beyond the clock merge and handoff check. */
export function handlesKind(kind: MessageKind): boolean {
    return HANDLED_KINDS.has(kind);
}

export function createRemoteState(name: string): RemoteState {
    return { seqNr: 0, playback: createPlaybackState(name) };
}

// ---------------------------------------------------------------------------
// Draft
// ---------------------------------------------------------------------------

class Draft {
    private seqNr: number;
    private current: PlaybackState;
    readonly actions: RemoteAction[] = [];

    constructor(state: RemoteState, private readonly ctx: TransitionContext) {
        this.seqNr = state.seqNr;
        this.current = state.playback;
    }

    get playback(): PlaybackState {
        return this.current;
    }

    update(patch: Partial<PlaybackState>): void {
        this.current = { ...this.current, ...patch };
    }

    act(action: RemoteAction): void {
        this.actions.push(action);
    }

    /** Advances to `now` without ever moving the logical clock backwards. */
    touch(): void {
        this.update({ updateId: Math.max(this.current.updateId, this.ctx.now) });
    }

    nextSeq(): number {
        this.seqNr += 1;
        return this.seqNr;
    }

    send(kind: MessageKind, options: { recipient?: string | null; withState?: boolean } = {}): void {
        const playback = this.current;
        this.act({
            type: "send",
            envelope: buildEnvelope({
                kind,
                senderId: this.ctx.identity,
                sequenceNumber: this.nextSeq(),
                device: deviceDescriptor(playback, this.ctx.softwareVersion),
                recipients: recipientsFor(options.recipient ?? null),
                ...(options.withState && {
                    state: playbackStateSnapshot(playback),
                    stateUpdateId: playback.updateId,
                }),
            }),
        });
    }

    /** Full-state Notify; `null` broadcasts. */
    notify(recipient: string | null): void {
        this.send("NOTIFY", { recipient, withState: true });
    }

    finish(): Transition {
        return {
            state: { seqNr: this.seqNr, playback: this.current },
            actions: this.actions,
        };
    }
}

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

function handleConnected(draft: Draft, username: string): void {
    draft.act({ type: "open-channel", username });
    draft.send("HELLO");
}

function handleLoad(draft: Draft, envelope: Envelope, now: number): void {
    draft.touch();

    if (!draft.playback.isActive) {
        draft.update({ isActive: true, becameActiveAt: now });
    }

    const attached = envelope.state;
    const tracks = (attached?.tracks ?? [])
        .map((track) => trackIdFromGid(track.gid))
        .filter((trackId): trackId is TrackId => trackId !== null);
    draft.update({ tracks, trackIndex: attached?.playingTrackIndex ?? 0 });

    const trackId = currentTrack(draft.playback);
    if (trackId !== null) {
        draft.act({ type: "player-load", trackId });
        draft.update({ status: "PLAYING", positionMs: 0, positionMeasuredAt: now });
    } else if (draft.playback.status !== "STOPPED") {
        draft.act({ type: "player-stop" });
        draft.update({ status: "STOPPED" });
    }

    draft.notify(null);
}

function processFrame(draft: Draft, envelope: Envelope, now: number): void {
    if (envelope.stateUpdateId > draft.playback.updateId) {
        draft.update({ updateId: envelope.stateUpdateId });
    }

    const peer = envelope.device;
    if (
        peer?.isActive &&
        draft.playback.isActive &&
        peer.becameActiveAt > draft.playback.becameActiveAt
    ) {
        draft.update({ isActive: false, status: "STOPPED" });
        draft.act({ type: "player-stop" });
        draft.notify(null);
    }

    switch (envelope.kind) {
        case "HELLO":
            draft.notify(envelope.senderId);
            break;

        case "VOLUME_SET":
            if (envelope.volume === undefined) break;
            draft.update({ volume: clampVolume(envelope.volume) });
            draft.notify(null);
            break;

        case "LOAD":
            handleLoad(draft, envelope, now);
            break;

        default:
            break;
    }
}

function handlePlayerEvent(draft: Draft, event: PlayerEvent, now: number): void {
    switch (event.type) {
        case "track-ended": {
            const { tracks, trackIndex } = draft.playback;
            draft.touch();
            draft.update({ positionMs: 0, positionMeasuredAt: now });

            if (tracks.length === 0) {
                draft.update({ status: "STOPPED", trackIndex: 0 });
            } else {
                const nextIndex = (trackIndex + 1) % tracks.length;
                draft.update({ trackIndex: nextIndex });
                draft.act({ type: "player-load", trackId: tracks[nextIndex] });
            }

            draft.notify(null);
            break;
        }

        case "position":
            draft.update({ positionMs: event.positionMs, positionMeasuredAt: now });
            break;
    }
}

// ---------------------------------------------------------------------------
// Entry point
// ---------------------------------------------------------------------------

export function transition(
    state: RemoteState,
    event: RemoteEvent,
    ctx: TransitionContext,
): Transition {
    const draft = new Draft(state, ctx);

    switch (event.type) {
        case "connected":
            handleConnected(draft, event.username);
            break;
        case "envelope":
            processFrame(draft, event.envelope, ctx.now);
            break;
        case "player":
            handlePlayerEvent(draft, event.event, ctx.now);
            break;
    }

    return draft.finish();
}
