import { retryDelayMs } from "../../utils/ioredis";

export type SendFailureDecision =
    | { action: "drop" }
    | { action: "retry"; delayMs: number };

/** Decides what happens to an envelope whose publish failed. */
export interface SendFailurePolicy {
    readonly name: string;
    /** `attempt` is the number of publishes already tried for this envelope. */
    decide(attempt: number, error: unknown): SendFailureDecision;
}

export function dropWithLog(): SendFailurePolicy {
    return {
        name: "drop",
        decide: () => ({ action: "drop" }),
    };
}

export function boundedRetry(options: {
    maxAttempts: number;
    delayMs?: (attempt: number) => number;
}): SendFailurePolicy {
    const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
    const delayFor = options.delayMs ?? retryDelayMs;

    return {
        name: `retry(max=${maxAttempts})`,
        decide: (attempt) =>
            attempt >= maxAttempts
                ? { action: "drop" }
                : { action: "retry", delayMs: delayFor(attempt) },
    };
}

export function sendFailurePolicyFor(
    name: "drop" | "retry",
    maxAttempts: number,
): SendFailurePolicy {
    return name === "drop" ? dropWithLog() : boundedRetry({ maxAttempts });
}
