import { logger } from "../utils/logger";
import type { Player, PlayerEvent } from "./remote/collaborators";
import { EventQueue } from "./remote/eventQueue";
import type { TrackId } from "./remote/trackId";

export interface SimulatedPlayerOptions {
    /** Every track "plays" for this long. */
    trackDurationMs: number;
    positionIntervalMs: number;
}

const log = logger.child("Player");

/**
 * Stand-in audio output: no decoding, just a clock that reports position
 * while a track is loaded and signals the end of each track.
 */
export class SimulatedPlayer implements Player {
    readonly events = new EventQueue<PlayerEvent>();
    private current: { trackId: TrackId; startedAt: number } | null = null;
    private ticker: NodeJS.Timeout | null = null;

    constructor(
        private readonly options: SimulatedPlayerOptions,
        private readonly now: () => number = Date.now,
    ) {}

    get currentTrack(): TrackId | null {
        return this.current?.trackId ?? null;
    }

    load(trackId: TrackId): void {
        this.clearTicker();
        log.info(`Loading track ${trackId}`);
        this.current = { trackId, startedAt: this.now() };
        this.ticker = setInterval(() => this.advance(), this.options.positionIntervalMs);
    }

    stop(): void {
        if (this.current) {
            log.info(`Stopping track ${this.current.trackId}`);
        }
        this.clearTicker();
        this.current = null;
    }

    dispose(): void {
        this.stop();
        this.events.close();
    }

    private advance(): void {
        if (!this.current) return;

        const elapsed = this.now() - this.current.startedAt;
        if (elapsed >= this.options.trackDurationMs) {
            this.clearTicker();
            this.current = null;
            this.events.push({ type: "track-ended" });
            return;
        }

        this.events.push({ type: "position", positionMs: elapsed });
    }

    private clearTicker(): void {
        if (!this.ticker) return;
        clearInterval(this.ticker);
        this.ticker = null;
    }
}
