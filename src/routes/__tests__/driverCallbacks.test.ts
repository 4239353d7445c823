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

import { GATEWAY_TOKEN_HEADER, createDriverCallbackRouter } from "../driverCallbacks";
import { createRouteTestApp } from "./helpers/createRouteTestApp";

function setup(callbackToken?: string) {
    const orchestrator = {
        notifyFinished: jest.fn(
            async (_tenantId: string, playbackId: string, _error?: unknown) =>
                playbackId === "p-current"
        ),
    };
    const app = createRouteTestApp({
        "/api/driver": createDriverCallbackRouter(orchestrator, { callbackToken }),
    });
    return { app, orchestrator };
}

describe("driver callback routes", () => {
    it("forwards a finished playback to the orchestrator", async () => {
        const { app, orchestrator } = setup();

        const res = await request(app)
            .post("/api/driver/guild-1/finished")
            .send({ playbackId: "p-current" });

        expect(res.status).toBe(200);
        expect(res.body).toEqual({ advanced: true });
        expect(orchestrator.notifyFinished).toHaveBeenCalledWith(
            "guild-1",
            "p-current",
            undefined
        );
    });

    it("passes the driver's error along and reports stale ids", async () => {
        const { app, orchestrator } = setup();

        const res = await request(app)
            .post("/api/driver/guild-1/finished")
            .send({ playbackId: "p-old", error: "stream ended early" });

        expect(res.body).toEqual({ advanced: false });
        expect(orchestrator.notifyFinished).toHaveBeenCalledWith(
            "guild-1",
            "p-old",
            "stream ended early"
        );
    });

    it("rejects a body without a playback id", async () => {
        const { app, orchestrator } = setup();

        const res = await request(app).post("/api/driver/guild-1/finished").send({});

        expect(res.status).toBe(400);
        expect(orchestrator.notifyFinished).not.toHaveBeenCalled();
    });

    it("requires the gateway token when one is configured", async () => {
        const { app, orchestrator } = setup("test-callback-token");

        const missing = await request(app)
            .post("/api/driver/guild-1/finished")
            .send({ playbackId: "p-current" });
        const wrong = await request(app)
            .post("/api/driver/guild-1/finished")
            .set(GATEWAY_TOKEN_HEADER, "not-the-token")
            .send({ playbackId: "p-current" });
        const accepted = await request(app)
            .post("/api/driver/guild-1/finished")
            .set(GATEWAY_TOKEN_HEADER, "test-callback-token")
            .send({ playbackId: "p-current" });

        expect(missing.status).toBe(401);
        expect(missing.body).toEqual({ error: "Invalid gateway token" });
        expect(wrong.status).toBe(401);
        expect(accepted.body).toEqual({ advanced: true });
        expect(orchestrator.notifyFinished).toHaveBeenCalledTimes(1);
    });
});
