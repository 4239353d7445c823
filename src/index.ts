import { createServer } from "http";
import { config, loadPlaylistAliases } from "./config";
import { logger } from "./utils/logger";
import { createApp } from "./app";
import { SidecarMediaExtractor } from "./services/mediaExtractor";
import { TrackResolver } from "./services/trackResolver";
import { PlaybackOrchestrator } from "./services/playbackOrchestrator";
import { createAudioGatewayDriverFactory } from "./services/audioGatewayDriver";
import { StatusTicker } from "./services/statusTicker";
import {
    createStatusSocketPublisher,
    setupStatusSocket,
    shutdownStatusSocket,
} from "./services/statusSocket";

const HTTP_SERVER_CLOSE_TIMEOUT_MS = 10_000;

const extractor = new SidecarMediaExtractor({ baseUrl: config.extractor.url });
const resolver = new TrackResolver(extractor, {
    maxAttempts: config.resolver.maxAttempts,
    backoffMs: config.resolver.backoffMs,
    playlistMaxItems: config.resolver.playlistMaxItems,
    playlistAliases: loadPlaylistAliases(config.resolver.playlistAliasesPath),
});
const publisher = createStatusSocketPublisher();

const orchestrator = new PlaybackOrchestrator({
    resolver,
    driverFactory: createAudioGatewayDriverFactory({
        baseUrl: config.audioGateway.url,
        timeoutMs: config.audioGateway.timeoutMs,
    }),
    publisher,
    searchResultLimit: config.resolver.searchResultLimit,
    queuePreviewSize: config.status.queuePreviewSize,
});

const app = createApp({
    orchestrator,
    extractor,
    allowedOrigins: config.allowedOrigins,
    callbackToken: config.audioGateway.callbackToken,
});
const httpServer = createServer(app);
setupStatusSocket(httpServer, orchestrator, config.allowedOrigins);

const ticker = new StatusTicker(orchestrator.registry, publisher, {
    intervalMs: config.status.tickMs,
    previewSize: config.status.queuePreviewSize,
});

httpServer.listen(config.port, "0.0.0.0", () => {
    logger.info(`Playback orchestrator listening on port ${config.port} (${config.nodeEnv})`);
    ticker.start();
    extractor
        .isAvailable()
        .then((available) => {
            if (!available) {
                logger.warn(
                    `[Startup] Extraction sidecar at ${config.extractor.url} is not reachable yet`
                );
            }
        })
        .catch((err: unknown) => logger.error("[Startup] Sidecar probe failed:", err));
});

// Graceful shutdown handling
let isShuttingDown = false;

function closeHttpServerWithTimeout(timeoutMs: number): Promise<void> {
    return new Promise<void>((resolve) => {
        const timeoutId = setTimeout(() => {
            logger.warn(`[Shutdown] HTTP server close timed out after ${timeoutMs}ms`);
            httpServer.closeAllConnections();
            resolve();
        }, timeoutMs);
        timeoutId.unref();

        httpServer.close(() => {
            clearTimeout(timeoutId);
            resolve();
        });
        httpServer.closeIdleConnections();
    });
}

async function gracefulShutdown(signal: string) {
    if (isShuttingDown) {
        logger.debug("Shutdown already in progress...");
        return;
    }

    isShuttingDown = true;
    logger.info(`Received ${signal}. Starting graceful shutdown...`);

    try {
        ticker.stop();
        await orchestrator.shutdown();
        shutdownStatusSocket();

        logger.debug("Closing HTTP server...");
        await closeHttpServerWithTimeout(HTTP_SERVER_CLOSE_TIMEOUT_MS);

        logger.debug("Graceful shutdown complete");
        process.exit(0);
    } catch (error) {
        logger.error("Error during shutdown:", error);
        process.exit(1);
    }
}

process.on("SIGTERM", () => void gracefulShutdown("SIGTERM"));
process.on("SIGINT", () => void gracefulShutdown("SIGINT"));

process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled Promise Rejection:", {
        reason: reason instanceof Error ? reason.message : String(reason),
        stack: reason instanceof Error ? reason.stack : undefined,
    });
});

process.on("uncaughtException", (error) => {
    logger.error("Uncaught Exception - initiating graceful shutdown:", {
        message: error.message,
        stack: error.stack,
    });
    gracefulShutdown("uncaughtException").catch(() => {
        process.exit(1);
    });
});
