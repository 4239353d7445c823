/**
 * Audio Gateway driver
 *
 * Plays resolved sources through the audio gateway, the service that holds
 * each tenant's actual voice/speaker connection. Commands go out over HTTP;
 * the gateway reports the end of every playback it started by calling the
 * orchestrator's driver webhook, which feeds the completion bridge.
 */

import axios, { AxiosInstance } from "axios";
import http from "node:http";
import https from "node:https";
import { logger } from "../utils/logger";
import { DriverError } from "../utils/errors";
import type {
    PlaybackDriver,
    PlaybackDriverFactory,
    SourceHandle,
} from "./playbackTypes";

const log = logger.child("gateway");

// ── Shared client ──────────────────────────────────────────────────
const GATEWAY_AGENT_OPTIONS = {
    keepAlive: true,
    maxSockets: 64,
    maxFreeSockets: 16,
};
const DEFAULT_TIMEOUT_MS = 10_000;

export interface AudioGatewayOptions {
    baseUrl: string;
    timeoutMs?: number;
}

export function createAudioGatewayClient(options: AudioGatewayOptions): AxiosInstance {
    return axios.create({
        baseURL: options.baseUrl,
        timeout: options.timeoutMs ?? DEFAULT_TIMEOUT_MS,
        httpAgent: new http.Agent(GATEWAY_AGENT_OPTIONS),
        httpsAgent: new https.Agent(GATEWAY_AGENT_OPTIONS),
    });
}

// ── Driver ─────────────────────────────────────────────────────────

export class AudioGatewayDriver implements PlaybackDriver {
    private activePlaybackId: string | null = null;

    constructor(
        private readonly tenantId: string,
        private readonly client: AxiosInstance
    ) {}

    private get sessionPath(): string {
        return `/sessions/${encodeURIComponent(this.tenantId)}`;
    }

    async start(source: SourceHandle, playbackId: string): Promise<void> {
        await this.send("start", () =>
            this.client.post(`${this.sessionPath}/play`, {
                playbackId,
                streamUrl: source.streamUrl,
                httpHeaders: source.httpHeaders,
                mimeType: source.mimeType ?? null,
            })
        );
        this.activePlaybackId = playbackId;
        log.debug(`Gateway playing ${playbackId} for tenant ${this.tenantId}`);
    }

    async stop(): Promise<void> {
        await this.send("stop", () => this.client.post(`${this.sessionPath}/stop`));
        this.activePlaybackId = null;
    }

    async pause(): Promise<void> {
        await this.send("pause", () => this.client.post(`${this.sessionPath}/pause`));
    }

    async resume(): Promise<void> {
        await this.send("resume", () => this.client.post(`${this.sessionPath}/resume`));
    }

    isActive(): boolean {
        return this.activePlaybackId !== null;
    }

    onFinished(playbackId: string): void {
        if (this.activePlaybackId === playbackId) {
            this.activePlaybackId = null;
        }
    }

    /** Releases the tenant's output on the gateway side. */
    async dispose(): Promise<void> {
        this.activePlaybackId = null;
        await this.send("dispose", () => this.client.delete(this.sessionPath));
    }

    private async send(operation: string, request: () => Promise<unknown>): Promise<void> {
        try {
            await request();
        } catch (err) {
            throw new DriverError(this.tenantId, operation, err);
        }
    }
}

export function createAudioGatewayDriverFactory(
    options: AudioGatewayOptions
): PlaybackDriverFactory {
    const client = createAudioGatewayClient(options);
    return (tenantId) => new AudioGatewayDriver(tenantId, client);
}
