import request from "supertest";

jest.mock("../../utils/logger", () => {
    const log = {
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: () => log,
        withContext: () => log,
    };
    return { logger: log };
});

import { ResolutionError } from "../../utils/errors";
import { PlaybackOrchestrator } from "../../services/playbackOrchestrator";
import { FakeDriver, createFakeCatalog } from "../../services/__tests__/helpers/fixtures";
import { createTestLogger } from "../../services/__tests__/helpers/testLogger";
import { createPlaybackRouter } from "../playback";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

const T0 = 1_700_000_000_000;

function setup() {
    const catalog = createFakeCatalog({ playlists: { focus: ["u1", "u2"] } });
    const orchestrator = new PlaybackOrchestrator({
        resolver: catalog,
        driverFactory: () => new FakeDriver(),
        now: () => T0,
        logger: createTestLogger(),
    });
    const app = createRouteTestApp({ "/api": createPlaybackRouter(orchestrator) });

    const settle = async (tenantId: string) => {
        await orchestrator.registry.get(tenantId)?.settled();
    };
    return { app, orchestrator, catalog, settle };
}

describe("playback routes", () => {
    describe("POST /api/tenants/:tenantId/queue", () => {
        it("queues references and reports the queue position", async () => {
            const { app } = setup();

            const first = await request(app)
                .post("/api/tenants/guild-1/queue")
                .send({ query: "a" });
            const second = await request(app)
                .post("/api/tenants/guild-1/queue")
                .send({ query: "b" });
            const third = await request(app)
                .post("/api/tenants/guild-1/queue")
                .send({ query: "c", title: "Song C" });

            expect(first.status).toBe(202);
            expect(first.body).toEqual({ position: 1 });
            expect(second.body).toEqual({ position: 1 });
            expect(third.body).toEqual({ position: 2 });
        });

        it("rejects a missing query", async () => {
            const { app, orchestrator } = setup();

            const res = await request(app).post("/api/tenants/guild-1/queue").send({});

            expect(res.status).toBe(400);
            expect(res.body).toEqual({
                error: "Invalid request",
                details: expect.any(Array),
            });
            expect(orchestrator.registry.size).toBe(0);
        });

        it("rejects a blank tenant id", async () => {
            const { app } = setup();

            const res = await request(app).post("/api/tenants/%20/queue").send({ query: "a" });

            expect(res.status).toBe(400);
            expect(res.body.error).toBe("Invalid request");
        });
    });

    describe("POST /api/tenants/:tenantId/playlist", () => {
        it("queues every playlist entry", async () => {
            const { app, orchestrator, settle } = setup();

            const res = await request(app)
                .post("/api/tenants/guild-1/playlist")
                .send({ source: "focus" });
            await settle("guild-1");

            expect(res.status).toBe(202);
            expect(res.body).toEqual({ added: 2 });
            expect(orchestrator.status("guild-1")).toMatchObject({ title: "u1", queueLength: 1 });
        });

        it("answers 404 for an unknown playlist", async () => {
            const { app } = setup();

            const res = await request(app)
                .post("/api/tenants/guild-1/playlist")
                .send({ source: "nope" });

            expect(res.status).toBe(404);
            expect(res.body).toEqual({
                error: 'Unknown playlist "nope"',
                code: "PLAYLIST_NOT_FOUND",
            });
        });
    });

    describe("playback control", () => {
        it("answers false for a tenant with nothing to control", async () => {
            const { app } = setup();

            const skip = await request(app).post("/api/tenants/guild-1/skip");
            const pause = await request(app).post("/api/tenants/guild-1/pause");
            const shuffle = await request(app).post("/api/tenants/guild-1/shuffle");

            expect(skip.body).toEqual({ skipped: false });
            expect(pause.body).toEqual({ paused: false });
            expect(shuffle.body).toEqual({ shuffled: false });
        });

        it("pauses, resumes, skips and stops a playing tenant", async () => {
            const { app, orchestrator, settle } = setup();
            await orchestrator.enqueue("guild-1", "a");
            await settle("guild-1");

            const pause = await request(app).post("/api/tenants/guild-1/pause");
            expect(pause.body).toEqual({ paused: true });
            expect(orchestrator.status("guild-1").state).toBe("paused");

            const resume = await request(app).post("/api/tenants/guild-1/resume");
            expect(resume.body).toEqual({ resumed: true });

            const skip = await request(app).post("/api/tenants/guild-1/skip");
            expect(skip.body).toEqual({ skipped: true });

            const stop = await request(app).post("/api/tenants/guild-1/stop");
            expect(stop.status).toBe(204);
            expect(orchestrator.status("guild-1").state).toBe("idle");
        });
    });

    describe("GET /api/tenants/:tenantId/status", () => {
        it("returns the snapshot of a playing tenant", async () => {
            const { app, orchestrator, settle } = setup();
            await orchestrator.enqueue("guild-1", "a");
            await settle("guild-1");

            const res = await request(app).get("/api/tenants/guild-1/status");

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({
                tenantId: "guild-1",
                state: "playing",
                isPlaying: true,
                title: "a",
                elapsedLabel: "00:00",
                totalLabel: "03:00",
                capturedAt: T0,
            });
        });

        it("returns an idle snapshot for unknown tenants", async () => {
            const { app } = setup();

            const res = await request(app).get("/api/tenants/guild-9/status");

            expect(res.status).toBe(200);
            expect(res.body).toMatchObject({ tenantId: "guild-9", state: "idle", title: null });
        });
    });

    describe("DELETE /api/tenants/:tenantId", () => {
        it("ends the session once", async () => {
            const { app, orchestrator } = setup();
            await orchestrator.enqueue("guild-1", "a");

            const first = await request(app).delete("/api/tenants/guild-1");
            const second = await request(app).delete("/api/tenants/guild-1");

            expect(first.body).toEqual({ ended: true });
            expect(second.body).toEqual({ ended: false });
        });
    });

    describe("GET /api/search", () => {
        it("lists candidates for display", async () => {
            const { app, catalog } = setup();

            const res = await request(app).get("/api/search").query({ q: "rain", limit: 2 });

            expect(res.status).toBe(200);
            expect(res.body).toEqual({
                query: "rain",
                results: [
                    {
                        title: "rain 1",
                        reference: "https://media.example/watch?v=rain-1",
                        durationSeconds: 180,
                        durationLabel: "03:00",
                        thumbnailUrl: null,
                        uploader: null,
                    },
                    {
                        title: "rain 2",
                        reference: "https://media.example/watch?v=rain-2",
                        durationSeconds: 180,
                        durationLabel: "03:00",
                        thumbnailUrl: null,
                        uploader: null,
                    },
                ],
            });
            expect(catalog.resolveCandidates).toHaveBeenCalledWith("rain", 2, {
                signal: expect.any(AbortSignal),
            });
        });

        it("requires a query", async () => {
            const { app } = setup();

            const res = await request(app).get("/api/search");

            expect(res.status).toBe(400);
        });

        it("maps resolution failures to 422", async () => {
            const { app, catalog } = setup();
            catalog.resolveCandidates.mockRejectedValueOnce(
                new ResolutionError("rain", 3, new Error("HTTP 503"))
            );

            const res = await request(app).get("/api/search").query({ q: "rain" });

            expect(res.status).toBe(422);
            expect(res.body).toEqual({
                error: 'Could not resolve "rain" after 3 attempts: HTTP 503',
                code: "RESOLUTION_FAILED",
            });
        });

        it("hides unexpected errors", async () => {
            const { app, catalog } = setup();
            catalog.resolveCandidates.mockRejectedValueOnce(new Error("database on fire"));

            const res = await request(app).get("/api/search").query({ q: "rain" });

            expect(res.status).toBe(500);
            expect(res.body).toEqual({ error: "Internal server error" });
        });
    });
});
