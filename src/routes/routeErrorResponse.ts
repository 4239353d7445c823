import type { Response } from "express";
import { z } from "zod";
import { logger } from "../utils/logger";
import { AppError, ErrorCode, isRecoverable, isTransient } from "../utils/errors";

export type RouteErrorExtras = Record<string, unknown>;

export const sendRouteError = (
    res: Response,
    statusCode: number,
    message: string,
    extras?: RouteErrorExtras
): Response => {
    if (extras && Object.keys(extras).length > 0) {
        return res.status(statusCode).json({
            error: message,
            ...extras,
        });
    }

    return res.status(statusCode).json({ error: message });
};

export const sendInternalRouteError = (
    res: Response,
    message: string,
    extras?: RouteErrorExtras
): Response => sendRouteError(res, 500, message, extras);

const STATUS_BY_CODE: Partial<Record<ErrorCode, number>> = {
    [ErrorCode.INVALID_REQUEST]: 400,
    [ErrorCode.PLAYLIST_NOT_FOUND]: 404,
    [ErrorCode.SESSION_DISPOSED]: 409,
    [ErrorCode.RESOLUTION_CANCELLED]: 409,
    [ErrorCode.CLOCK_STATE]: 409,
    [ErrorCode.RESOLUTION_FAILED]: 422,
};

/** Codes without a fixed status fall back on their category. */
function statusForAppError(error: AppError): number {
    const mapped = STATUS_BY_CODE[error.code];
    if (mapped !== undefined) return mapped;
    if (isTransient(error)) return 502;
    if (isRecoverable(error)) return 400;
    return 500;
}

/** Maps validation and domain errors to a JSON error response. */
export function handleRouteError(label: string, error: unknown, res: Response): Response {
    if (error instanceof z.ZodError) {
        return sendRouteError(res, 400, "Invalid request", { details: error.errors });
    }
    if (error instanceof AppError) {
        const status = statusForAppError(error);
        if (status >= 500) {
            logger.warn(`[Routes] ${label} failed: ${error.message}`);
        }
        return sendRouteError(res, status, error.message, { code: error.code });
    }
    logger.error(`[Routes] ${label} failed:`, error);
    return sendInternalRouteError(res, "Internal server error");
}
