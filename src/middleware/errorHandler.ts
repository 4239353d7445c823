import type { Request, Response, NextFunction } from "express";
import { logger } from "../utils/logger";
import { AppError, ErrorCategory } from "../utils/errors";
import { config } from "../config";

function statusForCategory(category: ErrorCategory): number {
    switch (category) {
        case ErrorCategory.RECOVERABLE:
            return 400;
        case ErrorCategory.TRANSIENT:
            return 503;
        case ErrorCategory.FATAL:
            return 500;
    }
}

export function errorHandler(
    err: Error,
    _req: Request,
    res: Response,
    _next: NextFunction
): void {
    if (err instanceof AppError) {
        logger.error(`[AppError] ${err.code}: ${err.message}`, err.details);

        res.status(statusForCategory(err.category)).json({
            error: err.message,
            code: err.code,
            category: err.category,
            ...(config.nodeEnv === "development" && { details: err.details }),
        });
        return;
    }

    logger.error("Unhandled error:", err.stack);

    // Hide internals in production
    if (config.nodeEnv === "production") {
        res.status(500).json({ error: "Internal server error" });
        return;
    }

    res.status(500).json({
        error: err.message || "Internal server error",
        stack: err.stack,
    });
}
