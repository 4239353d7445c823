/**
 * Track resolution.
 *
 * Turns what a tenant typed into playable tracks. Every public call runs the
 * same policy: a bounded number of attempts, a fixed pause between them, a
 * fresh extraction context per attempt, and an optional AbortSignal that stops
 * the loop at the next request or backoff.
 */

import { logger, type Logger } from "../utils/logger";
import { abortableDelay, yieldToEventLoop } from "../utils/async";
import {
    AppError,
    ErrorCategory,
    ErrorCode,
    EmptyExtractionError,
    ResolutionCancelledError,
    ResolutionError,
} from "../utils/errors";
import type { ExtractionContext, MediaExtractor } from "./mediaExtractor";
import type {
    ResolveOptions,
    ResolvedTrack,
    TrackReference,
    TrackResolving,
} from "./playbackTypes";

export const DEFAULT_MAX_ATTEMPTS = 3;
export const DEFAULT_BACKOFF_MS = 1000;
export const DEFAULT_PLAYLIST_MAX_ITEMS = 50;

export type QueryKind = "url" | "search";

export interface TrackResolverOptions {
    maxAttempts?: number;
    backoffMs?: number;
    playlistMaxItems?: number;
    playlistAliases?: Record<string, string>;
    logger?: Logger;
}

const URL_PATTERN = /^https?:\/\/\S+$/i;
const PLAYLIST_ID_PATTERN = /[?&]list=([^&#]+)/;

export function classifyQuery(query: string): QueryKind {
    return URL_PATTERN.test(query.trim()) ? "url" : "search";
}

/**
 * A watch URL that also carries `list=` is turned into the playlist page URL
 * so the listing covers the whole list rather than one video.
 */
export function normalizePlaylistUrl(url: string): string {
    const match = PLAYLIST_ID_PATTERN.exec(url);
    if (!match) return url;

    let parsed: URL;
    try {
        parsed = new URL(url);
    } catch {
        return url;
    }
    if (parsed.pathname === "/playlist") return url;
    return `${parsed.protocol}//${parsed.host}/playlist?list=${match[1]}`;
}

export class TrackResolver implements TrackResolving {
    private readonly maxAttempts: number;
    private readonly backoffMs: number;
    private readonly playlistMaxItems: number;
    private readonly aliases: ReadonlyMap<string, string>;
    private readonly log: Logger;

    constructor(
        private readonly extractor: MediaExtractor,
        options: TrackResolverOptions = {}
    ) {
        this.maxAttempts = Math.max(1, options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
        this.backoffMs = Math.max(0, options.backoffMs ?? DEFAULT_BACKOFF_MS);
        this.playlistMaxItems = Math.max(
            1,
            options.playlistMaxItems ?? DEFAULT_PLAYLIST_MAX_ITEMS
        );
        this.aliases = new Map(
            Object.entries(options.playlistAliases ?? {}).map(([alias, url]) => [
                alias.trim().toLowerCase(),
                url,
            ])
        );
        this.log = options.logger ?? logger.child("resolver");
    }

    /**
     * Resolve one reference to a playable track: a URL is extracted as is, any
     * other text resolves to the top search hit.
     */
    async resolve(
        query: TrackReference,
        options: ResolveOptions = {}
    ): Promise<ResolvedTrack> {
        const target = query.trim();
        const kind = classifyQuery(target);

        return this.withRetry(target, options.signal, async (context, signal) => {
            if (kind === "url") {
                return context.extract(target, signal);
            }
            const [top] = await context.search(target, 1, signal);
            if (!top) {
                throw new EmptyExtractionError(target, "no search results");
            }
            return top;
        });
    }

    /** Up to `count` ordered candidates for a pick-one search. */
    async resolveCandidates(
        query: string,
        count: number,
        options: ResolveOptions = {}
    ): Promise<ResolvedTrack[]> {
        const target = query.trim();
        const limit = Math.max(1, Math.floor(count));

        return this.withRetry(target, options.signal, async (context, signal) => {
            const candidates = await context.search(target, limit, signal);
            if (candidates.length === 0) {
                throw new EmptyExtractionError(target, "no search results");
            }
            return candidates;
        });
    }

    /**
     * Expand a playlist URL or alias into track references, lazily and at most
     * `playlistMaxItems` of them. Entries without a URL are skipped.
     */
    async *resolvePlaylist(
        urlOrAlias: string,
        options: ResolveOptions = {}
    ): AsyncGenerator<TrackReference, void, undefined> {
        const url = this.playlistUrlFor(urlOrAlias);
        const entries = await this.withRetry(url, options.signal, (context, signal) =>
            context.listPlaylist(url, this.playlistMaxItems, signal)
        );

        let skipped = 0;
        for (const [index, entry] of entries.slice(0, this.playlistMaxItems).entries()) {
            if (options.signal?.aborted) {
                throw new ResolutionCancelledError(url);
            }
            if (!entry.url) {
                skipped++;
                this.log.debug(`Skipping playlist entry ${index + 1} without a URL`, {
                    playlist: url,
                    title: entry.title,
                });
                continue;
            }
            yield entry.url;
            await yieldToEventLoop();
        }

        if (skipped > 0) {
            this.log.info(`Skipped ${skipped} unusable playlist entries`, { playlist: url });
        }
    }

    private playlistUrlFor(urlOrAlias: string): string {
        const trimmed = urlOrAlias.trim();
        const aliased = this.aliases.get(trimmed.toLowerCase());
        if (aliased) return aliased;
        if (classifyQuery(trimmed) === "url") return normalizePlaylistUrl(trimmed);

        throw new AppError(
            ErrorCode.PLAYLIST_NOT_FOUND,
            ErrorCategory.RECOVERABLE,
            `Unknown playlist "${trimmed}"`,
            { knownAliases: Array.from(this.aliases.keys()) }
        );
    }

    private async withRetry<T>(
        target: string,
        signal: AbortSignal | undefined,
        attempt: (context: ExtractionContext, signal?: AbortSignal) => Promise<T>
    ): Promise<T> {
        let lastError: unknown = null;

        for (let attemptNumber = 1; attemptNumber <= this.maxAttempts; attemptNumber++) {
            if (attemptNumber > 1) {
                await abortableDelay(
                    this.backoffMs,
                    signal,
                    () => new ResolutionCancelledError(target)
                );
                this.log.debug(`Retry attempt ${attemptNumber - 1} for "${target}"`);
            } else if (signal?.aborted) {
                throw new ResolutionCancelledError(target);
            }

            const context = this.extractor.openContext();
            try {
                return await attempt(context, signal);
            } catch (err) {
                if (signal?.aborted) {
                    throw new ResolutionCancelledError(target);
                }
                lastError = err;
                this.log.warn(
                    `Extraction attempt ${attemptNumber}/${this.maxAttempts} failed for "${target}"`,
                    { error: err }
                );
            } finally {
                context.close();
            }
        }

        throw new ResolutionError(target, this.maxAttempts, lastError);
    }
}
