import type { Envelope } from "../../protocol/types";
import type { Logger } from "../../utils/logger";
import type { Publisher } from "./collaborators";
import { EventQueue } from "./eventQueue";
import type { SendFailurePolicy } from "./sendPolicy";

export interface PendingSend {
    envelope: Envelope;
    payload: Buffer;
    /** Publishes already tried. */
    attempt: number;
    notBefore: number;
}

export type SendCompletion =
    | { type: "send-completion"; send: PendingSend; ok: true }
    | { type: "send-completion"; send: PendingSend; ok: false; error: unknown };

/**
 * Outbound path with a single in-flight slot. Completions come back as
 * events and are applied on the next flush, where the failure policy decides
 * between retry and drop.
 */
export class Outbox {
    private readonly pending: PendingSend[] = [];
    private readonly completions = new EventQueue<SendCompletion>();
    private inFlight: PendingSend | null = null;
    private retryTimer: NodeJS.Timeout | null = null;
    private listener: (() => void) | null = null;

    constructor(
        private readonly policy: SendFailurePolicy,
        private readonly log: Logger,
        private readonly now: () => number = Date.now,
    ) {}

    get queued(): number {
        return this.pending.length;
    }

    get busy(): boolean {
        return this.inFlight !== null;
    }

    setListener(listener: (() => void) | null): void {
        this.listener = listener;
        this.completions.setListener(listener);
    }

    enqueue(envelope: Envelope, payload: Buffer): void {
        this.pending.push({ envelope, payload, attempt: 0, notBefore: 0 });
        this.listener?.();
    }

    /** Forgets queued and in-flight envelopes; a late completion is ignored. */
    reset(): void {
        if (this.pending.length > 0) {
            this.log.warn(`Discarding ${this.pending.length} queued envelope(s)`);
        }
        this.pending.length = 0;
        this.inFlight = null;
        this.clearRetryTimer();
    }

    /** One outbound step: apply a completion, then start the next publish. */
    flush(publisher: Publisher | null): boolean {
        let progress = false;

        const completion = this.completions.poll();
        if (completion.ready) {
            this.complete(completion.value);
            progress = true;
        }

        if (!publisher || this.inFlight) {
            return progress;
        }

        const head = this.pending[0];
        if (!head) {
            return progress;
        }

        const waitMs = head.notBefore - this.now();
        if (waitMs > 0) {
            this.scheduleRetry(waitMs);
            return progress;
        }

        this.pending.shift();
        this.start(publisher, head);
        return true;
    }

    private start(publisher: Publisher, send: PendingSend): void {
        this.inFlight = send;
        send.attempt += 1;
        void publisher.publish(send.payload).then(
            () => this.completions.push({ type: "send-completion", send, ok: true }),
            (error: unknown) =>
                this.completions.push({ type: "send-completion", send, ok: false, error }),
        );
    }

    private complete(completion: SendCompletion): void {
        if (completion.send !== this.inFlight) {
            return;
        }
        this.inFlight = null;

        const { envelope, attempt } = completion.send;
        if (completion.ok) {
            this.log.trace(`Sent ${envelope.kind} seq=${envelope.sequenceNumber}`);
            return;
        }

        const decision = this.policy.decide(attempt, completion.error);
        if (decision.action === "drop") {
            this.log.warn(
                `Dropping ${envelope.kind} seq=${envelope.sequenceNumber} after ${attempt} attempt(s)`,
                { policy: this.policy.name, error: completion.error },
            );
            return;
        }

        this.log.warn(
            `Publish of ${envelope.kind} seq=${envelope.sequenceNumber} failed, retrying in ${decision.delayMs}ms`,
            { attempt, error: completion.error },
        );
        this.pending.unshift({
            ...completion.send,
            notBefore: this.now() + decision.delayMs,
        });
    }

    private scheduleRetry(delayMs: number): void {
        if (this.retryTimer) return;
        this.retryTimer = setTimeout(() => {
            this.retryTimer = null;
            this.listener?.();
        }, delayMs);
    }

    private clearRetryTimer(): void {
        if (!this.retryTimer) return;
        clearTimeout(this.retryTimer);
        this.retryTimer = null;
    }
}
