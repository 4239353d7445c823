const originalEnv = { ...process.env };
const NOW = "2026-03-01T12:00:00.000Z";

describe("logger", () => {
    afterEach(() => {
        process.env = originalEnv;
        jest.useRealTimers();
        jest.resetModules();
        jest.restoreAllMocks();
    });

    async function loadLoggerModule(options?: {
        logLevel?: string;
        nodeEnv?: string;
    }) {
        jest.resetModules();
        jest.restoreAllMocks();
        jest.useFakeTimers({ now: new Date(NOW) });
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

        const loggerModule = await import("../logger");

        return {
            logger: loggerModule.logger,
            createLogger: loggerModule.createLogger,
            withLogTiming: loggerModule.withLogTiming,
            consoleDebug,
            consoleInfo,
            consoleWarn,
            consoleError,
        };
    }

    it("gates logs based on LOG_LEVEL ordering", async () => {
        const cases = [
            {
                level: "debug",
                expected: { debug: true, info: true, warn: true, error: true },
            },
            {
                level: "info",
                expected: { debug: false, info: true, warn: true, error: true },
            },
            {
                level: "warn",
                expected: { debug: false, info: false, warn: true, error: true },
            },
            {
                level: "error",
                expected: { debug: false, info: false, warn: false, error: true },
            },
            {
                level: "silent",
                expected: { debug: false, info: false, warn: false, error: false },
            },
        ] as const;

        for (const scenario of cases) {
            const { logger, consoleDebug, consoleInfo, consoleWarn, consoleError } =
                await loadLoggerModule({ logLevel: scenario.level });

            logger.debug("debug call");
            logger.info("info call");
            logger.warn("warn call");
            logger.error("error call");

            expect(consoleDebug.mock.calls.length).toBe(scenario.expected.debug ? 1 : 0);
            expect(consoleInfo.mock.calls.length).toBe(scenario.expected.info ? 1 : 0);
            expect(consoleWarn.mock.calls.length).toBe(scenario.expected.warn ? 1 : 0);
            expect(consoleError.mock.calls.length).toBe(scenario.expected.error ? 1 : 0);
        }
    });

    it("uses production defaults when LOG_LEVEL is unset and NODE_ENV is production", async () => {
        const { logger, consoleDebug, consoleInfo, consoleWarn } = await loadLoggerModule({
            nodeEnv: "production",
        });

        logger.debug("debug call");
        logger.info("info call");
        logger.warn("warn call");

        expect(consoleDebug).not.toHaveBeenCalled();
        expect(consoleInfo).toHaveBeenCalledWith(`${NOW} [INFO] info call`);
        expect(consoleWarn).toHaveBeenCalledWith(`${NOW} [WARN] warn call`);
    });

    it("uses development defaults when LOG_LEVEL is unset and NODE_ENV is not production", async () => {
        const { logger, consoleDebug } = await loadLoggerModule({ nodeEnv: "development" });

        logger.debug("debug call");

        expect(consoleDebug).toHaveBeenCalledWith(`${NOW} [DEBUG] debug call`);
    });

    it("silences all levels when LOG_LEVEL is unknown", async () => {
        const { logger, consoleDebug, consoleInfo, consoleWarn, consoleError } =
            await loadLoggerModule({ logLevel: "noisy" });

        logger.debug("debug call");
        logger.info("info call");
        logger.warn("warn call");
        logger.error("error call");

        expect(consoleDebug).not.toHaveBeenCalled();
        expect(consoleInfo).not.toHaveBeenCalled();
        expect(consoleWarn).not.toHaveBeenCalled();
        expect(consoleError).not.toHaveBeenCalled();
    });

    it("forwards message and variadic arguments, normalizing errors", async () => {
        const { logger, consoleDebug, consoleInfo, consoleError } = await loadLoggerModule({
            logLevel: "debug",
        });

        const context = { trace: "abc" };
        const payload = ["x", 7];

        logger.debug("starting", context, payload);
        logger.info("running", 1, "two", context);
        logger.error("failed", new Error("nope"));

        expect(consoleDebug).toHaveBeenCalledWith(`${NOW} [DEBUG] starting`, context, payload);
        expect(consoleInfo).toHaveBeenCalledWith(`${NOW} [INFO] running`, 1, "two", context);
        expect(consoleError).toHaveBeenCalledWith(`${NOW} [ERROR] failed`, {
            name: "Error",
            message: "nope",
            stack: expect.any(String),
        });
    });

    it("creates scoped child loggers with dotted scope names", async () => {
        const { createLogger, consoleInfo } = await loadLoggerModule({ logLevel: "info" });

        createLogger("orchestrator").child("session").info("started", { tenantId: "t1" });

        expect(consoleInfo).toHaveBeenCalledWith(
            `${NOW} [INFO] [orchestrator.session] started`,
            { tenantId: "t1" }
        );
    });

    it("binds context with withContext and merges explicit context over it", async () => {
        const { createLogger, consoleInfo, consoleWarn } = await loadLoggerModule({
            logLevel: "info",
        });
        const log = createLogger("session").withContext({ tenantId: "t1", attempt: 1 });

        log.info("plain");
        log.warn("failed", {
            attempt: 2,
            error: Object.assign(new Error("gone"), { code: "ECONNRESET" }),
        });

        expect(consoleInfo).toHaveBeenCalledWith(`${NOW} [INFO] [session] plain`, {
            tenantId: "t1",
            attempt: 1,
        });
        expect(consoleWarn).toHaveBeenCalledWith(`${NOW} [WARN] [session] failed`, {
            tenantId: "t1",
            attempt: 2,
            error: {
                name: "Error",
                message: "gone",
                stack: expect.any(String),
                code: "ECONNRESET",
            },
        });
    });

    it("withLogTiming records start and completion duration", async () => {
        const { logger, withLogTiming, consoleDebug } = await loadLoggerModule({
            logLevel: "debug",
        });

        const result = await withLogTiming(logger, "resolve", async () => "ok", {
            query: "abc",
        });

        expect(result).toBe("ok");
        expect(consoleDebug).toHaveBeenCalledTimes(2);
        expect(consoleDebug).toHaveBeenNthCalledWith(1, `${NOW} [DEBUG] resolve started`, {
            query: "abc",
        });
        expect(consoleDebug).toHaveBeenNthCalledWith(2, `${NOW} [DEBUG] resolve completed`, {
            query: "abc",
            durationMs: 0,
        });
    });

    it("withLogTiming logs a warning with the failure and rethrows", async () => {
        const { logger, withLogTiming, consoleWarn } = await loadLoggerModule({
            logLevel: "debug",
        });

        await expect(
            withLogTiming(
                logger,
                "resolve",
                async () => {
                    throw new Error("boom");
                },
                { query: "abc" }
            )
        ).rejects.toThrow("boom");

        expect(consoleWarn).toHaveBeenCalledWith(`${NOW} [WARN] resolve failed`, {
            query: "abc",
            durationMs: 0,
            error: { name: "Error", message: "boom", stack: expect.any(String) },
        });
    });
});
