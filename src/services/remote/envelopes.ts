import {
    PROTOCOL_VERSION,
    type DeviceDescriptor,
    type Envelope,
    type MessageKind,
    type PlaybackSnapshot,
} from "../../protocol/types";

export interface EnvelopeFields {
    kind: MessageKind;
    senderId: string;
    sequenceNumber: number;
    device: DeviceDescriptor;
    /** Omitted or empty: broadcast. */
    recipients?: readonly string[];
    state?: PlaybackSnapshot;
    stateUpdateId?: number;
    volume?: number;
    positionMs?: number;
}

/**
 * Builds a complete outbound envelope. Every stamped field is passed in; the
 * result is frozen.
 */
export function buildEnvelope(fields: EnvelopeFields): Envelope {
    return Object.freeze({
        version: PROTOCOL_VERSION,
        kind: fields.kind,
        senderId: fields.senderId,
        sequenceNumber: fields.sequenceNumber,
        recipients: Object.freeze([...(fields.recipients ?? [])]),
        stateUpdateId: fields.stateUpdateId ?? 0,
        device: fields.device,
        ...(fields.state !== undefined && { state: fields.state }),
        ...(fields.volume !== undefined && { volume: fields.volume }),
        ...(fields.positionMs !== undefined && { positionMs: fields.positionMs }),
    });
}

export function recipientsFor(recipient: string | null): string[] {
    return recipient === null ? [] : [recipient];
}

/**
 * Inbound filter: never our own envelopes, and targeted envelopes only when
 * we are among the recipients.
 */
export function isAddressedTo(envelope: Envelope, identity: string): boolean {
    if (envelope.senderId === identity) return false;
    return envelope.recipients.length === 0 || envelope.recipients.includes(identity);
}
