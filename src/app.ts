import express from "express";
import helmet from "helmet";
import cors from "cors";
import compression from "compression";
import swaggerUi from "swagger-ui-express";
import { logger } from "./utils/logger";
import { errorHandler } from "./middleware/errorHandler";
import { swaggerSpec } from "./config/swagger";
import { createPlaybackRouter } from "./routes/playback";
import { createDriverCallbackRouter } from "./routes/driverCallbacks";
import type { PlaybackOrchestrator } from "./services/playbackOrchestrator";
import type { MediaExtractor } from "./services/mediaExtractor";

export interface AppDependencies {
    orchestrator: PlaybackOrchestrator;
    extractor: Pick<MediaExtractor, "isAvailable">;
    allowedOrigins: string[] | true;
    callbackToken?: string;
}

export function createApp(deps: AppDependencies): express.Express {
    const app = express();

    app.use(
        helmet({
            crossOriginResourcePolicy: { policy: "cross-origin" },
        })
    );
    app.use(
        cors({
            origin: (origin, callback) => {
                if (!origin || deps.allowedOrigins === true) {
                    callback(null, true);
                    return;
                }
                const allowed = deps.allowedOrigins.includes(origin);
                if (!allowed) {
                    logger.debug(`[CORS] Origin ${origin} not in allowlist`);
                }
                callback(null, allowed);
            },
            credentials: true,
        })
    );
    app.use(compression({ threshold: 1024 }));
    app.use(express.json({ limit: "100kb" }));

    app.get("/health", async (_req, res) => {
        const extractorAvailable = await deps.extractor.isAvailable();
        res.status(extractorAvailable ? 200 : 503).json({
            status: extractorAvailable ? "ok" : "degraded",
            extractor: extractorAvailable,
            tenants: deps.orchestrator.registry.size,
        });
    });

    app.use("/api", createPlaybackRouter(deps.orchestrator));
    app.use(
        "/api/driver",
        createDriverCallbackRouter(deps.orchestrator, { callbackToken: deps.callbackToken })
    );

    // API documentation
    app.use(
        "/api/docs",
        swaggerUi.serve,
        swaggerUi.setup(swaggerSpec, {
            customCss: ".swagger-ui .topbar { display: none }",
            customSiteTitle: "Playback Orchestrator API",
        })
    );
    app.get("/api/docs.json", (_req, res) => {
        res.json(swaggerSpec);
    });

    app.use(errorHandler);

    return app;
}
