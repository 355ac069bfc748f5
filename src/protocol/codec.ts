import * as path from "path";
import { loadSync, type Type } from "protobufjs";
import { z } from "zod";
import { AppError, ErrorCategory, ErrorCode, toAppError } from "../utils/errors";
import {
    CAPABILITY_TYPES,
    MESSAGE_KINDS,
    PLAY_STATUSES,
    type Envelope,
} from "./types";

// Resolves from both src/protocol and dist/protocol.
const PROTO_PATH = path.resolve(__dirname, "../../proto/remote.proto");

let envelopeType: Type | null = null;

function getEnvelopeType(): Type {
    if (!envelopeType) {
        envelopeType = loadSync(PROTO_PATH).lookupType("remote.Envelope");
    }
    return envelopeType;
}

// ---------------------------------------------------------------------------
// Decoded-value validation
// ---------------------------------------------------------------------------

const capabilitySchema = z.object({
    type: z.enum(CAPABILITY_TYPES),
    intValue: z.array(z.number()).default([]),
    stringValue: z.array(z.string()).default([]),
});

const deviceDescriptorSchema = z.object({
    softwareVersion: z.string().default(""),
    name: z.string(),
    isActive: z.boolean(),
    becameActiveAt: z.number().default(0),
    canPlay: z.boolean().default(false),
    volume: z.number().int().min(0).default(0),
    errorCode: z.number().default(0),
    capabilities: z.array(capabilitySchema).default([]),
});

const trackRefSchema = z.object({
    gid: z.instanceof(Uint8Array).optional(),
    uri: z.string().optional(),
});

const playbackSnapshotSchema = z.object({
    status: z.enum(PLAY_STATUSES),
    positionMs: z.number().default(0),
    positionMeasuredAt: z.number().default(0),
    playingTrackIndex: z.number().int().min(0).default(0),
    tracks: z.array(trackRefSchema).default([]),
    playingFromFallback: z.boolean().default(false),
});

const envelopeSchema = z.object({
    version: z.number().int(),
    kind: z.enum(MESSAGE_KINDS),
    senderId: z.string(),
    sequenceNumber: z.number().int().min(0),
    recipients: z.array(z.string()).default([]),
    stateUpdateId: z.number().default(0),
    device: deviceDescriptorSchema.optional(),
    state: playbackSnapshotSchema.optional(),
    volume: z.number().int().min(0).optional(),
    positionMs: z.number().int().min(0).optional(),
});

// ---------------------------------------------------------------------------
// Codec
// ---------------------------------------------------------------------------

export function encodeEnvelope(envelope: Envelope): Buffer {
    const type = getEnvelopeType();
    const wire: Record<string, unknown> = {
        ...envelope,
        recipients: [...envelope.recipients],
    };

    try {
        const bytes = type.encode(type.fromObject(wire)).finish();
        return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength);
    } catch (err) {
        throw toAppError(
            err,
            ErrorCode.ENVELOPE_ENCODE_FAILED,
            ErrorCategory.FATAL,
            `Failed to encode ${envelope.kind} envelope`
        );
    }
}

/**
 * Decodes one payload. Unknown fields are skipped; a missing required field,
 * truncated input or an out-of-range value fails the whole envelope.
 */
export function decodeEnvelope(payload: Uint8Array): Envelope {
    const type = getEnvelopeType();
    let raw: Record<string, unknown>;

    try {
        raw = type.toObject(type.decode(payload), {
            longs: Number,
            enums: String,
            arrays: true,
        });
    } catch (err) {
        throw toAppError(
            err,
            ErrorCode.ENVELOPE_DECODE_FAILED,
            ErrorCategory.FATAL,
            "Failed to decode envelope"
        );
    }

    const parsed = envelopeSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (issue) => `${issue.path.join(".")}: ${issue.message}`
        );
        throw new AppError(
            ErrorCode.ENVELOPE_DECODE_FAILED,
            ErrorCategory.FATAL,
            `Invalid envelope: ${issues.join("; ")}`,
            { issues }
        );
    }

    return Object.freeze(parsed.data);
}
