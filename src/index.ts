import { loadConfig } from "./config";
import { logger } from "./utils/logger";
import { isFatal } from "./utils/errors";
import { RedisMessageChannel } from "./services/redisRemoteChannel";
import { SimulatedPlayer } from "./services/simulatedPlayer";
import { RemoteOrchestrator } from "./services/remote/orchestrator";
import { sendFailurePolicyFor } from "./services/remote/sendPolicy";

export async function main(): Promise<void> {
    const config = loadConfig();

    const channel = new RedisMessageChannel(config.redisUrl);
    const player = new SimulatedPlayer(config.player);
    const orchestrator = new RemoteOrchestrator({
        session: {
            deviceId: config.deviceId,
            time: () => Date.now(),
            connections: channel.connectionEvents(config.username),
        },
        name: config.deviceName,
        channel,
        player,
        topicPrefix: config.topicPrefix,
        sendFailurePolicy: sendFailurePolicyFor(
            config.sendFailurePolicy,
            config.sendMaxAttempts,
        ),
    });

    let isShuttingDown = false;
    const gracefulShutdown = (signal: string) => {
        if (isShuttingDown) return;
        isShuttingDown = true;
        logger.info(`Received ${signal}. Stopping remote session...`);
        orchestrator.stop().catch((error: unknown) => {
            logger.error("Error during shutdown:", error);
        });
    };

    process.on("SIGTERM", () => gracefulShutdown("SIGTERM"));
    process.on("SIGINT", () => gracefulShutdown("SIGINT"));

    logger.info(
        `Remote device "${config.deviceName}" (${config.deviceId}) starting for user ${config.username}`,
    );

    try {
        await orchestrator.run();
        logger.info("Remote session stopped");
    } finally {
        player.dispose();
        channel.close();
    }
}

if (require.main === module) {
    main()
        .then(() => process.exit(0))
        .catch((error: unknown) => {
            logger.error(
                isFatal(error) ? "Remote session terminated:" : "Unexpected error:",
                error,
            );
            process.exit(1);
        });
}
