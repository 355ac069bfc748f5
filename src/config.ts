import dotenv from "dotenv";
import { createHash } from "crypto";
import { z } from "zod";
import { logger } from "./utils/logger";
import { AppError, ErrorCategory, ErrorCode } from "./utils/errors";
import { parseEnvInt, parseEnvString } from "./utils/envParsers";

dotenv.config();

const DEFAULT_DEVICE_NAME = "remote-sync";
const DEFAULT_TOPIC_PREFIX = "remote:user:";
const DEFAULT_SEND_MAX_ATTEMPTS = 3;
const DEFAULT_TRACK_DURATION_MS = 180_000;
const DEFAULT_POSITION_INTERVAL_MS = 1_000;

// Validate critical environment variables on startup
const envSchema = z.object({
    REDIS_URL: z.string().min(1, "REDIS_URL is required"),
    REMOTE_USERNAME: z.string().min(1, "REMOTE_USERNAME is required"),
    DEVICE_NAME: z.string().optional(),
    DEVICE_ID: z
        .string()
        .regex(/^[0-9a-f]{8,64}$/i, "DEVICE_ID must be 8-64 hex characters")
        .optional(),
    REMOTE_TOPIC_PREFIX: z.string().optional(),
    SEND_FAILURE_POLICY: z.enum(["drop", "retry"]).optional(),
    NODE_ENV: z.enum(["development", "production", "test"]).optional(),
});

const positiveInt = (name: string) =>
    z
        .number({ invalid_type_error: `${name} must be a number` })
        .int(`${name} must be an integer`)
        .positive(`${name} must be positive`);

const numericSchema = z.object({
    SEND_MAX_ATTEMPTS: positiveInt("SEND_MAX_ATTEMPTS"),
    PLAYER_TRACK_DURATION_MS: positiveInt("PLAYER_TRACK_DURATION_MS"),
    PLAYER_POSITION_INTERVAL_MS: positiveInt("PLAYER_POSITION_INTERVAL_MS"),
});

export type SendFailurePolicyName = "drop" | "retry";

export interface RemoteSyncConfig {
    nodeEnv: string;
    redisUrl: string;
    username: string;
    deviceName: string;
    deviceId: string;
    topicPrefix: string;
    sendFailurePolicy: SendFailurePolicyName;
    sendMaxAttempts: number;
    player: {
        trackDurationMs: number;
        positionIntervalMs: number;
    };
}

/** Stable device identity: sha1 over the device name and the user it plays for. */
export function deriveDeviceId(deviceName: string, username: string): string {
    return createHash("sha1").update(`${deviceName}:${username}`).digest("hex");
}

function reportInvalidEnvironment(error: z.ZodError): never {
    logger.error("Environment validation failed:");
    error.errors.forEach((err) => {
        logger.error(`   - ${err.path.join(".")}: ${err.message}`);
    });
    throw new AppError(
        ErrorCode.INVALID_CONFIG,
        ErrorCategory.FATAL,
        "Invalid environment configuration",
        { issues: error.errors.map((err) => `${err.path.join(".")}: ${err.message}`) }
    );
}

/** Reads and validates runtime configuration from the environment. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RemoteSyncConfig {
    const parsedEnv = envSchema.safeParse(env);
    if (!parsedEnv.success) {
        reportInvalidEnvironment(parsedEnv.error);
    }

    const numeric = numericSchema.safeParse({
        SEND_MAX_ATTEMPTS: parseEnvInt(env.SEND_MAX_ATTEMPTS, DEFAULT_SEND_MAX_ATTEMPTS),
        PLAYER_TRACK_DURATION_MS: parseEnvInt(
            env.PLAYER_TRACK_DURATION_MS,
            DEFAULT_TRACK_DURATION_MS
        ),
        PLAYER_POSITION_INTERVAL_MS: parseEnvInt(
            env.PLAYER_POSITION_INTERVAL_MS,
            DEFAULT_POSITION_INTERVAL_MS
        ),
    });
    if (!numeric.success) {
        reportInvalidEnvironment(numeric.error);
    }

    const vars = parsedEnv.data;
    const username = vars.REMOTE_USERNAME.trim();
    const deviceName = parseEnvString(vars.DEVICE_NAME, DEFAULT_DEVICE_NAME);

    logger.debug("Environment variables validated");

    return {
        nodeEnv: vars.NODE_ENV || "development",
        redisUrl: vars.REDIS_URL,
        username,
        deviceName,
        deviceId: vars.DEVICE_ID?.toLowerCase() ?? deriveDeviceId(deviceName, username),
        topicPrefix: parseEnvString(vars.REMOTE_TOPIC_PREFIX, DEFAULT_TOPIC_PREFIX),
        sendFailurePolicy: vars.SEND_FAILURE_POLICY ?? "retry",
        sendMaxAttempts: numeric.data.SEND_MAX_ATTEMPTS,
        player: {
            trackDurationMs: numeric.data.PLAYER_TRACK_DURATION_MS,
            positionIntervalMs: numeric.data.PLAYER_POSITION_INTERVAL_MS,
        },
    };
}
