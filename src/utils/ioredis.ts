/**
 * Shared ioredis connection factory
 *
 * Every pub/sub connection the service opens goes through here so retry
 * behaviour and lifecycle logging stay consistent.
 *
 * Usage:
 *   import { createIORedisClient } from "../utils/ioredis";
 *   const redis = createIORedisClient(config.redisUrl, "remote-pub");
 */

import Redis, { RedisOptions } from "ioredis";
import { logger } from "./logger";

const MAX_RETRY_DELAY_MS = 30_000; // 30 seconds
const BASE_RETRY_DELAY_MS = 250;   // Start at 250ms

/** Exponential backoff: 250ms → 500ms → 1s → 2s → … capped at 30s */
export function retryDelayMs(attempt: number): number {
    return Math.min(
        BASE_RETRY_DELAY_MS * Math.pow(2, Math.max(attempt, 1) - 1),
        MAX_RETRY_DELAY_MS,
    );
}

/**
 * Create an ioredis client with built-in retry logic.
 *
 * @param label  - Human-readable label used in log messages (e.g. "remote-pub")
 * @param overrides - Any per-instance ioredis option overrides
 */
export function createIORedisClient(
    redisUrl: string,
    label: string,
    overrides: Partial<RedisOptions> = {},
): Redis {
    const client = new Redis(redisUrl, {
        retryStrategy(times: number) {
            const delay = retryDelayMs(times);
            logger.debug(
                `[ioredis:${label}] Reconnect attempt ${times} – retrying in ${delay}ms`,
            );
            return delay;
        },

        maxRetriesPerRequest: 3,       // Fail individual commands after 3 retries
        connectTimeout: 10_000,        // 10s connect timeout
        enableReadyCheck: true,        // Wait for Redis INFO before emitting "ready"
        lazyConnect: false,            // Connect immediately

        ...overrides,
    });

    client.on("error", (err: Error) => {
        logger.error(`[ioredis:${label}] Error: ${err.message}`);
    });

    client.on("close", () => {
        logger.debug(`[ioredis:${label}] Connection closed`);
    });

    client.on("reconnecting", (ms: number) => {
        logger.debug(`[ioredis:${label}] Reconnecting in ${ms}ms...`);
    });

    client.on("ready", () => {
        logger.debug(`[ioredis:${label}] Ready`);
    });

    return client;
}
