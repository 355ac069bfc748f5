const originalEnv = { ...process.env };

describe("logger", () => {
    afterEach(() => {
        process.env = originalEnv;
        jest.resetModules();
        jest.restoreAllMocks();
    });

    function loadLoggerModule(options?: { logLevel?: string; nodeEnv?: string }) {
        jest.resetModules();
        jest.restoreAllMocks();
        process.env = { ...originalEnv };

        if (options?.logLevel === undefined) {
            delete process.env.LOG_LEVEL;
        } else {
            process.env.LOG_LEVEL = options.logLevel;
        }

        if (options?.nodeEnv === undefined) {
            delete process.env.NODE_ENV;
        } else {
            process.env.NODE_ENV = options.nodeEnv;
        }

        const consoleDebug = jest.spyOn(console, "debug").mockImplementation(() => {});
        const consoleInfo = jest.spyOn(console, "info").mockImplementation(() => {});
        const consoleWarn = jest.spyOn(console, "warn").mockImplementation(() => {});
        const consoleError = jest.spyOn(console, "error").mockImplementation(() => {});

        // eslint-disable-next-line @typescript-eslint/no-var-requires
        const loggerModule = require("../logger") as typeof import("../logger");

        return {
            logger: loggerModule.logger,
            createLogger: loggerModule.createLogger,
            logErrorWithContext: loggerModule.logErrorWithContext,
            consoleDebug,
            consoleInfo,
            consoleWarn,
            consoleError,
        };
    }

    it("gates logs based on LOG_LEVEL ordering", () => {
        const cases = [
            { level: "trace", expected: { debug: 2, info: 1, warn: 1, error: 1 } },
            { level: "debug", expected: { debug: 1, info: 1, warn: 1, error: 1 } },
            { level: "info", expected: { debug: 0, info: 1, warn: 1, error: 1 } },
            { level: "warn", expected: { debug: 0, info: 0, warn: 1, error: 1 } },
            { level: "error", expected: { debug: 0, info: 0, warn: 0, error: 1 } },
            { level: "silent", expected: { debug: 0, info: 0, warn: 0, error: 0 } },
        ] as const;

        for (const scenario of cases) {
            const { logger, consoleDebug, consoleInfo, consoleWarn, consoleError } =
                loadLoggerModule({ logLevel: scenario.level });

            logger.trace("trace call");
            logger.debug("debug call");
            logger.info("info call");
            logger.warn("warn call");
            logger.error("error call");

            expect(consoleDebug.mock.calls.length).toBe(scenario.expected.debug);
            expect(consoleInfo.mock.calls.length).toBe(scenario.expected.info);
            expect(consoleWarn.mock.calls.length).toBe(scenario.expected.warn);
            expect(consoleError.mock.calls.length).toBe(scenario.expected.error);
        }
    });

    it("writes trace output through console.debug with its own tag", () => {
        const { logger, consoleDebug } = loadLoggerModule({ logLevel: "trace" });

        logger.trace("NOTIFY from Phone");

        expect(consoleDebug).toHaveBeenCalledWith("[TRACE] NOTIFY from Phone");
    });

    it("uses production defaults when LOG_LEVEL is unset and NODE_ENV is production", () => {
        const { logger, consoleDebug, consoleInfo } = loadLoggerModule({
            nodeEnv: "production",
        });

        logger.debug("debug call");
        logger.info("info call");

        expect(consoleDebug).not.toHaveBeenCalled();
        expect(consoleInfo).toHaveBeenCalledWith("[INFO] info call");
    });

    it("uses development defaults when LOG_LEVEL is unset and NODE_ENV is not production", () => {
        const { logger, consoleDebug } = loadLoggerModule({ nodeEnv: "development" });

        logger.trace("trace call");
        logger.debug("debug call");

        expect(consoleDebug).toHaveBeenCalledTimes(1);
        expect(consoleDebug).toHaveBeenCalledWith("[DEBUG] debug call");
    });

    it("silences all levels when LOG_LEVEL is unknown", () => {
        const { logger, consoleDebug, consoleInfo, consoleWarn, consoleError } =
            loadLoggerModule({ logLevel: "noisy" });

        logger.debug("debug call");
        logger.info("info call");
        logger.warn("warn call");
        logger.error("error call");

        expect(consoleDebug).not.toHaveBeenCalled();
        expect(consoleInfo).not.toHaveBeenCalled();
        expect(consoleWarn).not.toHaveBeenCalled();
        expect(consoleError).not.toHaveBeenCalled();
    });

    it("normalizes errors in context and passthrough arguments", () => {
        const { logger, consoleWarn, consoleError } = loadLoggerModule({ logLevel: "debug" });
        const failure = Object.assign(new Error("nope"), { code: "ECONNRESET" });

        logger.warn("publish failed", { attempt: 2, error: failure });
        logger.error("failed", new Error("boom"));

        expect(consoleWarn).toHaveBeenCalledWith("[WARN] publish failed", {
            attempt: 2,
            error: {
                name: "Error",
                message: "nope",
                stack: expect.any(String),
                code: "ECONNRESET",
            },
        });
        expect(consoleError).toHaveBeenCalledWith("[ERROR] failed", {
            name: "Error",
            message: "boom",
            stack: expect.any(String),
        });
    });

    it("does not treat buffers as context", () => {
        const { logger, consoleDebug } = loadLoggerModule({ logLevel: "debug" });
        const payload = Buffer.from([1, 2]);

        logger.debug("raw payload", payload);

        expect(consoleDebug).toHaveBeenCalledWith("[DEBUG] raw payload", payload);
    });

    it("creates scoped child loggers with dotted scope names", () => {
        const { createLogger, consoleInfo } = loadLoggerModule({ logLevel: "info" });

        const child = createLogger("Remote").child("Outbox");
        child.info("started", { topic: "remote:user:alice" });

        expect(consoleInfo).toHaveBeenCalledWith("[INFO] [Remote.Outbox] started", {
            topic: "remote:user:alice",
        });
    });

    it("logErrorWithContext attaches the error to the context", () => {
        const { logger, logErrorWithContext, consoleError } = loadLoggerModule({
            logLevel: "error",
        });

        logErrorWithContext(logger, "Remote session failed", "socket closed", {
            deviceId: "device-a",
        });

        expect(consoleError).toHaveBeenCalledWith("[ERROR] Remote session failed", {
            deviceId: "device-a",
            error: "socket closed",
        });
    });
});
