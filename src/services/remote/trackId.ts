/** Lowercase hex form of a 16-byte track gid. */
export type TrackId = string;

export const GID_LENGTH = 16;

const TRACK_ID_PATTERN = /^[0-9a-f]{32}$/;

/** Returns null for references that do not carry a valid identifier. */
export function trackIdFromGid(gid: Uint8Array | undefined): TrackId | null {
    if (!gid || gid.length !== GID_LENGTH) {
        return null;
    }
    return Buffer.from(gid).toString("hex");
}

export function gidFromTrackId(trackId: TrackId): Buffer {
    if (!TRACK_ID_PATTERN.test(trackId)) {
        throw new Error(`Invalid track id: ${trackId}`);
    }
    return Buffer.from(trackId, "hex");
}
