/**
 * Local view of the shared playback session, and its wire projections.
 *
 * The state is owned by a single orchestrator. Transitions replace it
 * wholesale rather than mutating it.
 */

import type {
    Capability,
    DeviceDescriptor,
    PlaybackSnapshot,
    PlayStatus,
} from "../../protocol/types";
import { gidFromTrackId, type TrackId } from "./trackId";

export const SOFTWARE_VERSION = "remote-sync-0.1.0";

export const MAX_VOLUME = 0xffff;

export interface PlaybackState {
    readonly name: string;
    readonly volume: number;
    readonly isActive: boolean;
    /** Ms timestamp of the last time this endpoint became active. */
    readonly becameActiveAt: number;
    readonly status: PlayStatus;
    readonly trackIndex: number;
    readonly tracks: readonly TrackId[];
    /** Logical clock: ms timestamp of the last authoritative change. */
    readonly updateId: number;
    readonly positionMs: number;
    readonly positionMeasuredAt: number;
}

export function createPlaybackState(name: string): PlaybackState {
    return {
        name,
        volume: MAX_VOLUME,
        isActive: false,
        becameActiveAt: 0,
        status: "STOPPED",
        trackIndex: 0,
        tracks: [],
        updateId: 0,
        positionMs: 0,
        positionMeasuredAt: 0,
    };
}

export function clampVolume(volume: number): number {
    return Math.min(Math.max(Math.round(volume), 0), MAX_VOLUME);
}

export function currentTrack(state: PlaybackState): TrackId | null {
    if (state.trackIndex >= state.tracks.length) return null;
    return state.tracks[state.trackIndex];
}

export function playbackStateSnapshot(state: PlaybackState): PlaybackSnapshot {
    return {
        status: state.status,
        positionMs: state.positionMs,
        positionMeasuredAt: state.positionMeasuredAt,
        playingTrackIndex: state.trackIndex,
        tracks: state.tracks.map((trackId) => ({ gid: gidFromTrackId(trackId) })),
        playingFromFallback: true,
    };
}

const SUPPORTED_TYPES = ["audio/local", "audio/track", "local", "track"];

function intCapability(type: Capability["type"], value: number): Capability {
    return { type, intValue: [value], stringValue: [] };
}

function stringCapability(type: Capability["type"], values: string[]): Capability {
    return { type, intValue: [], stringValue: values };
}

export function deviceDescriptor(
    state: PlaybackState,
    softwareVersion: string = SOFTWARE_VERSION,
): DeviceDescriptor {
    return {
        softwareVersion,
        name: state.name,
        isActive: state.isActive,
        becameActiveAt: state.becameActiveAt,
        canPlay: true,
        volume: state.volume,
        errorCode: 0,
        capabilities: [
            intCapability("CAN_BE_PLAYER", 0),
            intCapability("DEVICE_TYPE", 1),
            intCapability("EQ_CONNECT", 1),
            intCapability("SUPPORTS_LOGOUT", 1),
            intCapability("SUPPORTS_RENAME", 1),
            intCapability("IS_OBSERVABLE", 1),
            intCapability("VOLUME_STEPS", 10),
            stringCapability("SUPPORTED_CONTEXTS", []),
            stringCapability("SUPPORTED_TYPES", [...SUPPORTED_TYPES]),
        ],
    };
}

/** Compute the "live" position in ms, accounting for elapsed time. */
export function livePositionMs(snapshot: PlaybackSnapshot, now: number): number {
    if (snapshot.status !== "PLAYING") return snapshot.positionMs;
    const elapsed = now - snapshot.positionMeasuredAt;
    return snapshot.positionMs + Math.max(elapsed, 0);
}
