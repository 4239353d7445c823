/**
 * Media extraction adapter.
 *
 * Talks to the extraction sidecar (a yt-dlp style HTTP service) that turns
 * page URLs and search phrases into stream metadata. Each resolution attempt
 * opens its own `ExtractionContext`: a fresh HTTP client with its own
 * non-pooled agents and cache-busting headers, so a half-failed attempt leaves
 * nothing behind for the next one.
 */

import axios, { type AxiosInstance } from "axios";
import http from "node:http";
import https from "node:https";
import { randomUUID } from "crypto";
import { z } from "zod";
import { logger, withLogTiming } from "../utils/logger";
import { EmptyExtractionError } from "../utils/errors";
import type { ResolvedTrack } from "./playbackTypes";

const log = logger.child("extractor");

// ── Wire schemas ───────────────────────────────────────────────────

const thumbnailSchema = z.object({ url: z.string().url() }).passthrough();

// Only `title` and `url` decide whether a result is playable; a malformed
// display field is dropped instead.
const mediaInfoSchema = z
    .object({
        title: z.string().trim().min(1),
        url: z.string().url(),
        duration: z.number().nonnegative().nullish().catch(null),
        thumbnail: z.string().url().nullish().catch(null),
        thumbnails: z.array(z.unknown()).nullish().catch(null),
        webpage_url: z.string().url().nullish().catch(null),
        uploader: z.string().nullish().catch(null),
        http_headers: z.record(z.string()).nullish(),
        mime_type: z.string().nullish().catch(null),
    })
    .passthrough();

type MediaInfo = z.infer<typeof mediaInfoSchema>;

const listResponseSchema = z.object({
    entries: z.array(z.unknown()).min(1),
});

const searchResponseSchema = z.object({
    results: z.array(z.unknown()),
});

const playlistEntrySchema = z
    .object({
        url: z.string().url().nullish(),
        webpage_url: z.string().url().nullish(),
        id: z.string().nullish(),
        title: z.string().nullish(),
    })
    .passthrough();

const playlistResponseSchema = z.object({
    title: z.string().nullish(),
    entries: z.array(z.unknown()),
});

export interface PlaylistEntry {
    /** Null when the sidecar listed the entry without any usable URL. */
    url: string | null;
    title: string | null;
}

// ── Contracts ──────────────────────────────────────────────────────

export interface ExtractionContext {
    /** Full metadata for one page URL; the first entry when the URL is a list. */
    extract(url: string, signal?: AbortSignal): Promise<ResolvedTrack>;
    /** Up to `limit` search hits; malformed hits are dropped. */
    search(query: string, limit: number, signal?: AbortSignal): Promise<ResolvedTrack[]>;
    /** Flat playlist listing, capped at `limit` entries. */
    listPlaylist(url: string, limit: number, signal?: AbortSignal): Promise<PlaylistEntry[]>;
    close(): void;
}

export interface MediaExtractor {
    openContext(): ExtractionContext;
    isAvailable(): Promise<boolean>;
}

// ── Parsing ────────────────────────────────────────────────────────

function pickThumbnail(info: MediaInfo): string | null {
    if (info.thumbnail) return info.thumbnail;
    const urls: string[] = [];
    for (const raw of info.thumbnails ?? []) {
        const thumbnail = thumbnailSchema.safeParse(raw);
        if (thumbnail.success) urls.push(thumbnail.data.url);
    }
    // Sidecar lists thumbnails smallest first.
    return urls.length > 0 ? urls[urls.length - 1] : null;
}

export function toResolvedTrack(raw: unknown, target: string): ResolvedTrack {
    const parsed = mediaInfoSchema.safeParse(raw);
    if (!parsed.success) {
        const fields = parsed.error.errors.map((err) => err.path.join(".") || "(root)");
        throw new EmptyExtractionError(target, `malformed metadata (${fields.join(", ")})`);
    }

    const info = parsed.data;
    return {
        title: info.title,
        durationSeconds: info.duration ? Math.round(info.duration) : 0,
        source: {
            streamUrl: info.url,
            httpHeaders: info.http_headers ?? {},
            ...(info.mime_type ? { mimeType: info.mime_type } : {}),
        },
        thumbnailUrl: pickThumbnail(info),
        pageUrl: info.webpage_url ?? null,
        uploader: info.uploader ?? null,
    };
}

function toPlaylistEntry(raw: unknown): PlaylistEntry {
    const parsed = playlistEntrySchema.safeParse(raw);
    if (!parsed.success) return { url: null, title: null };
    return {
        url: parsed.data.url ?? parsed.data.webpage_url ?? null,
        title: parsed.data.title ?? null,
    };
}

// ── Sidecar implementation ─────────────────────────────────────────

export interface SidecarExtractorOptions {
    baseUrl: string;
    timeoutMs?: number;
}

class SidecarExtractionContext implements ExtractionContext {
    private readonly httpAgent = new http.Agent({ keepAlive: false });
    private readonly httpsAgent = new https.Agent({ keepAlive: false });
    private readonly client: AxiosInstance;

    constructor(options: SidecarExtractorOptions, readonly contextId: string) {
        this.client = axios.create({
            baseURL: options.baseUrl,
            timeout: options.timeoutMs ?? 30_000,
            httpAgent: this.httpAgent,
            httpsAgent: this.httpsAgent,
            headers: {
                "Cache-Control": "no-cache",
                "X-Extraction-Context": contextId,
            },
        });
    }

    async extract(url: string, signal?: AbortSignal): Promise<ResolvedTrack> {
        const res = await withLogTiming(
            log,
            "Sidecar extract",
            () => this.client.post("/extract", { url, no_cache: true }, { signal }),
            { contextId: this.contextId, url }
        );
        const data: unknown = res.data;
        const listed = listResponseSchema.safeParse(data);
        const first = listed.success ? listed.data.entries[0] : data;
        if (first === null || typeof first !== "object") {
            throw new EmptyExtractionError(url, "empty response");
        }
        return toResolvedTrack(first, url);
    }

    async search(
        query: string,
        limit: number,
        signal?: AbortSignal
    ): Promise<ResolvedTrack[]> {
        const res = await withLogTiming(
            log,
            "Sidecar search",
            () => this.client.post("/search", { query, limit, no_cache: true }, { signal }),
            { contextId: this.contextId, query }
        );
        const body = searchResponseSchema.safeParse(res.data);
        if (!body.success) {
            throw new EmptyExtractionError(query, "malformed search response");
        }

        const tracks: ResolvedTrack[] = [];
        for (const item of body.data.results.slice(0, limit)) {
            try {
                tracks.push(toResolvedTrack(item, query));
            } catch (err) {
                log.debug(`Dropping malformed search hit for "${query}"`, {
                    contextId: this.contextId,
                    error: err,
                });
            }
        }
        return tracks;
    }

    async listPlaylist(
        url: string,
        limit: number,
        signal?: AbortSignal
    ): Promise<PlaylistEntry[]> {
        const res = await withLogTiming(
            log,
            "Sidecar playlist",
            () => this.client.post("/playlist", { url, limit, no_cache: true }, { signal }),
            { contextId: this.contextId, url }
        );
        const body = playlistResponseSchema.safeParse(res.data);
        if (!body.success) {
            throw new EmptyExtractionError(url, "not a playlist");
        }
        return body.data.entries.slice(0, limit).map(toPlaylistEntry);
    }

    close(): void {
        this.httpAgent.destroy();
        this.httpsAgent.destroy();
    }
}

export class SidecarMediaExtractor implements MediaExtractor {
    private readonly healthClient: AxiosInstance;

    constructor(private readonly options: SidecarExtractorOptions) {
        this.healthClient = axios.create({ baseURL: options.baseUrl });
    }

    openContext(): ExtractionContext {
        return new SidecarExtractionContext(this.options, randomUUID());
    }

    async isAvailable(): Promise<boolean> {
        try {
            await this.healthClient.get("/health", { timeout: 5000 });
            return true;
        } catch (err) {
            log.warn("Extraction sidecar health check failed", { error: err });
            return false;
        }
    }
}
