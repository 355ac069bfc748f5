/**
 * Wire-level types for the remote-control protocol.
 *
 * Field names follow the camelCase form protobufjs gives the fields of
 * `proto/remote.proto`; enum values are carried by name.
 */

export const PROTOCOL_VERSION = 1;

export const MESSAGE_KINDS = [
    "HELLO",
    "GOODBYE",
    "PROBE",
    "NOTIFY",
    "LOAD",
    "PLAY",
    "PAUSE",
    "PLAY_PAUSE",
    "SEEK",
    "PREVIOUS",
    "NEXT",
    "VOLUME_SET",
    "SHUFFLE",
    "REPEAT",
    "VOLUME_DOWN",
    "VOLUME_UP",
    "REPLACE_QUEUE",
    "LOGOUT",
] as const;

export type MessageKind = (typeof MESSAGE_KINDS)[number];

export const PLAY_STATUSES = ["STOPPED", "PLAYING", "PAUSED"] as const;

export type PlayStatus = (typeof PLAY_STATUSES)[number];

export const CAPABILITY_TYPES = [
    "CAN_BE_PLAYER",
    "DEVICE_TYPE",
    "EQ_CONNECT",
    "SUPPORTED_CONTEXTS",
    "SUPPORTS_LOGOUT",
    "IS_OBSERVABLE",
    "VOLUME_STEPS",
    "SUPPORTED_TYPES",
    "SUPPORTS_RENAME",
] as const;

export type CapabilityType = (typeof CAPABILITY_TYPES)[number];

export interface Capability {
    type: CapabilityType;
    intValue: number[];
    stringValue: string[];
}

/** A sender's self-description, attached to every outbound envelope. */
export interface DeviceDescriptor {
    softwareVersion: string;
    name: string;
    isActive: boolean;
    /** Meaningful only while `isActive`. */
    becameActiveAt: number;
    canPlay: boolean;
    volume: number;
    errorCode: number;
    capabilities: Capability[];
}

export interface TrackRef {
    gid?: Uint8Array;
    uri?: string;
}

export interface PlaybackSnapshot {
    status: PlayStatus;
    positionMs: number;
    /** Wall-clock ms at which `positionMs` was sampled. */
    positionMeasuredAt: number;
    playingTrackIndex: number;
    tracks: TrackRef[];
    playingFromFallback: boolean;
}

export interface Envelope {
    readonly version: number;
    readonly kind: MessageKind;
    readonly senderId: string;
    readonly sequenceNumber: number;
    /** Empty means broadcast. */
    readonly recipients: readonly string[];
    readonly stateUpdateId: number;
    readonly device?: DeviceDescriptor;
    readonly state?: PlaybackSnapshot;
    readonly volume?: number;
    readonly positionMs?: number;
}
