/**
 * REST routes for tenant playback.
 *
 * Every command is forwarded to the orchestrator; live progress goes out
 * over Socket.IO (statusSocket.ts), `GET .../status` is the polling fallback.
 */

import { Router, type Response } from "express";
import { z } from "zod";
import { formatClock } from "../services/statusSnapshot";
import type { PlaybackOrchestrator } from "../services/playbackOrchestrator";
import type { ResolvedTrack } from "../services/playbackTypes";
import { handleRouteError } from "./routeErrorResponse";

// ---------------------------------------------------------------------------
// Validation schemas
// ---------------------------------------------------------------------------

const tenantParamsSchema = z.object({
    tenantId: z.string().trim().min(1).max(128),
});

const enqueueSchema = z.object({
    query: z.string().trim().min(1).max(2048),
    title: z.string().trim().min(1).max(300).optional(),
});

const playlistSchema = z.object({
    source: z.string().trim().min(1).max(2048),
});

const searchQuerySchema = z.object({
    q: z.string().trim().min(1).max(300),
    limit: z.coerce.number().int().min(1).max(25).optional(),
});

function toSearchResult(track: ResolvedTrack) {
    return {
        title: track.title,
        reference: track.pageUrl,
        durationSeconds: track.durationSeconds,
        durationLabel: track.durationSeconds > 0 ? formatClock(track.durationSeconds) : null,
        thumbnailUrl: track.thumbnailUrl,
        uploader: track.uploader,
    };
}

/** Fires when the client goes away before the response is written. */
function abortOnClose(res: Response): AbortSignal {
    const controller = new AbortController();
    res.on("close", () => {
        if (!res.writableEnded) controller.abort();
    });
    return controller.signal;
}

// ---------------------------------------------------------------------------
// Routes
// ---------------------------------------------------------------------------

export function createPlaybackRouter(orchestrator: PlaybackOrchestrator): Router {
    const router = Router();

    /**
     * @openapi
     * /tenants/{tenantId}/queue:
     *   post:
     *     summary: Queue a URL or search phrase
     *     tags: [Playback]
     *     responses:
     *       202:
     *         description: Queued; body carries the queue position
     */
    router.post("/tenants/:tenantId/queue", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            const payload = enqueueSchema.parse(req.body ?? {});
            const position = await orchestrator.enqueue(tenantId, payload.query, {
                title: payload.title,
            });
            return res.status(202).json({ position });
        } catch (error) {
            return handleRouteError("enqueue", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/playlist:
     *   post:
     *     summary: Queue every entry of a playlist URL or alias
     *     tags: [Playback]
     *     responses:
     *       202:
     *         description: Number of tracks added
     */
    router.post("/tenants/:tenantId/playlist", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            const payload = playlistSchema.parse(req.body ?? {});
            const result = await orchestrator.enqueuePlaylist(tenantId, payload.source, {
                signal: abortOnClose(res),
            });
            return res.status(202).json(result);
        } catch (error) {
            return handleRouteError("playlist", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/skip:
     *   post:
     *     summary: Skip the playing item, or the item being resolved
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: Whether anything was skipped
     */
    router.post("/tenants/:tenantId/skip", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            return res.json({ skipped: await orchestrator.skip(tenantId) });
        } catch (error) {
            return handleRouteError("skip", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/pause:
     *   post:
     *     summary: Pause playback
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: Whether playback was paused
     */
    router.post("/tenants/:tenantId/pause", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            return res.json({ paused: await orchestrator.pause(tenantId) });
        } catch (error) {
            return handleRouteError("pause", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/resume:
     *   post:
     *     summary: Resume paused playback
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: Whether playback resumed
     */
    router.post("/tenants/:tenantId/resume", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            return res.json({ resumed: await orchestrator.resume(tenantId) });
        } catch (error) {
            return handleRouteError("resume", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/shuffle:
     *   post:
     *     summary: Shuffle the pending queue
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: False with fewer than two pending items
     */
    router.post("/tenants/:tenantId/shuffle", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            return res.json({ shuffled: await orchestrator.shuffle(tenantId) });
        } catch (error) {
            return handleRouteError("shuffle", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/stop:
     *   post:
     *     summary: Clear the queue and stop playback
     *     tags: [Playback]
     *     responses:
     *       204:
     *         description: Stopped
     */
    router.post("/tenants/:tenantId/stop", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            await orchestrator.clearAndStop(tenantId);
            return res.status(204).end();
        } catch (error) {
            return handleRouteError("stop", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}/status:
     *   get:
     *     summary: Current status snapshot
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: Status snapshot; idle for unknown tenants
     */
    router.get("/tenants/:tenantId/status", (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            return res.json(orchestrator.status(tenantId));
        } catch (error) {
            return handleRouteError("status", error, res);
        }
    });

    /**
     * @openapi
     * /tenants/{tenantId}:
     *   delete:
     *     summary: End the tenant's session
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: Whether a session existed
     */
    router.delete("/tenants/:tenantId", async (req, res) => {
        try {
            const { tenantId } = tenantParamsSchema.parse(req.params);
            return res.json({ ended: await orchestrator.endTenant(tenantId) });
        } catch (error) {
            return handleRouteError("end", error, res);
        }
    });

    /**
     * @openapi
     * /search:
     *   get:
     *     summary: Ordered candidates for a search phrase; nothing is queued
     *     tags: [Playback]
     *     responses:
     *       200:
     *         description: Search candidates
     */
    router.get("/search", async (req, res) => {
        try {
            const query = searchQuerySchema.parse(req.query);
            const results = await orchestrator.search(query.q, query.limit, {
                signal: abortOnClose(res),
            });
            return res.json({ query: query.q, results: results.map(toSearchResult) });
        } catch (error) {
            return handleRouteError("search", error, res);
        }
    });

    return router;
}
