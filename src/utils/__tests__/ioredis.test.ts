import { createIORedisClient, retryDelayMs } from "../ioredis";

const mockRedisConstructor = jest.fn();
const mockLoggerDebug = jest.fn();
const mockLoggerError = jest.fn();

jest.mock("ioredis", () => ({
    __esModule: true,
    default: function MockRedis(...args: unknown[]) {
        return mockRedisConstructor(...args);
    },
}));

jest.mock("../logger", () => ({
    logger: {
        debug: (...args: unknown[]) => mockLoggerDebug(...args),
        error: (...args: unknown[]) => mockLoggerError(...args),
    },
}));

type Handler = (...args: unknown[]) => void;

describe("retryDelayMs", () => {
    it("doubles from 250ms and caps at 30s", () => {
        expect([0, 1, 2, 3, 4].map(retryDelayMs)).toEqual([250, 250, 500, 1000, 2000]);
        expect(retryDelayMs(9)).toBe(30000);
    });
});

describe("createIORedisClient", () => {
    let handlers: Record<string, Handler>;
    let client: { on: jest.Mock };

    beforeEach(() => {
        jest.clearAllMocks();

        handlers = {};
        client = {
            on: jest.fn((event: string, handler: Handler) => {
                handlers[event] = handler;
                return client;
            }),
        };
        mockRedisConstructor.mockReturnValue(client);
    });

    it("creates a Redis client with defaults, overrides, and retry backoff", () => {
        const instance = createIORedisClient("redis://mock:6379", "remote-pub", {
            maxRetriesPerRequest: 7,
        });

        expect(instance).toBe(client);
        expect(mockRedisConstructor).toHaveBeenCalledTimes(1);

        const [url, options] = mockRedisConstructor.mock.calls[0];
        expect(url).toBe("redis://mock:6379");
        expect(options).toEqual(
            expect.objectContaining({
                maxRetriesPerRequest: 7,
                connectTimeout: 10000,
                enableReadyCheck: true,
                lazyConnect: false,
            }),
        );

        expect(options.retryStrategy(2)).toBe(500);
        expect(mockLoggerDebug).toHaveBeenCalledWith(
            "[ioredis:remote-pub] Reconnect attempt 2 – retrying in 500ms",
        );
    });

    it("registers event handlers that log redis lifecycle events", () => {
        createIORedisClient("redis://mock:6379", "events");

        handlers.error(new Error("boom"));
        handlers.close();
        handlers.reconnecting(1500);
        handlers.ready();

        expect(mockLoggerError).toHaveBeenCalledWith("[ioredis:events] Error: boom");
        expect(mockLoggerDebug).toHaveBeenCalledWith("[ioredis:events] Connection closed");
        expect(mockLoggerDebug).toHaveBeenCalledWith("[ioredis:events] Reconnecting in 1500ms...");
        expect(mockLoggerDebug).toHaveBeenCalledWith("[ioredis:events] Ready");
    });
});
