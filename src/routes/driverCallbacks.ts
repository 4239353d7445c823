/**
 * Webhook the audio gateway calls when a playback it started has ended.
 */

import { Router } from "express";
import { z } from "zod";
import type { PlaybackOrchestrator } from "../services/playbackOrchestrator";
import { handleRouteError, sendRouteError } from "./routeErrorResponse";

export const GATEWAY_TOKEN_HEADER = "x-gateway-token";

const finishedParamsSchema = z.object({
    tenantId: z.string().trim().min(1).max(128),
});

const finishedBodySchema = z.object({
    playbackId: z.string().min(1).max(128),
    error: z.string().max(2000).nullish(),
});

export interface DriverCallbackOptions {
    /** When set, requests must carry it in the `x-gateway-token` header. */
    callbackToken?: string;
}

export function createDriverCallbackRouter(
    orchestrator: Pick<PlaybackOrchestrator, "notifyFinished">,
    options: DriverCallbackOptions = {}
): Router {
    const router = Router();

    /**
     * @openapi
     * /driver/{tenantId}/finished:
     *   post:
     *     summary: Report that a playback started by the gateway has ended
     *     tags: [Driver]
     *     security:
     *       - gatewayToken: []
     *     responses:
     *       200:
     *         description: Whether the tenant's queue advanced
     *       401:
     *         description: Missing or wrong gateway token
     */
    router.post("/:tenantId/finished", async (req, res) => {
        if (options.callbackToken && req.get(GATEWAY_TOKEN_HEADER) !== options.callbackToken) {
            return sendRouteError(res, 401, "Invalid gateway token");
        }
        try {
            const { tenantId } = finishedParamsSchema.parse(req.params);
            const payload = finishedBodySchema.parse(req.body ?? {});
            const advanced = await orchestrator.notifyFinished(
                tenantId,
                payload.playbackId,
                payload.error ?? undefined
            );
            return res.json({ advanced });
        } catch (error) {
            return handleRouteError("driver callback", error, res);
        }
    });

    return router;
}
